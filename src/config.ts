// Configuration loading for the .NET test visualizer
import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import {
  type VisualizerConfig,
  VisualizerConfigSchema,
} from './types.js';
import type { NamingOptions } from './xunit/types.js';

export const CONFIG_FILE_NAME = 'dotnet-test-visualizer.config.json';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export const DEFAULT_CONFIG: VisualizerConfig = Object.freeze(VisualizerConfigSchema.parse({}));

export class ConfigLoader {
  private configPath: string;

  constructor(configPath: string) {
    this.configPath = resolve(configPath);
  }

  public loadConfig(): VisualizerConfig {
    if (!existsSync(this.configPath)) {
      throw new ConfigurationError(`Configuration file not found: ${this.configPath}`);
    }

    return Object.freeze(this.validateConfig(this.readConfigFile()));
  }

  public getConfigPath(): string {
    return this.configPath;
  }

  private readConfigFile(): unknown {
    try {
      return JSON.parse(readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new ConfigurationError(`Invalid JSON in configuration file: ${error.message}`);
      }
      throw error;
    }
  }

  private validateConfig(config: unknown): VisualizerConfig {
    const result = VisualizerConfigSchema.safeParse(config);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('\n');
      throw new ConfigurationError(`Configuration validation failed:\n${issues}`);
    }
    return result.data;
  }
}

export interface ResolvedConfig {
  config: VisualizerConfig;
  /** Absent when no configuration file was found and the defaults apply. */
  configPath?: string;
}

/**
 * Load the configuration from `configPath`, or from the default config file in
 * `cwd` when no path is given. Without either, the defaults apply.
 */
export function resolveConfig(configPath?: string, cwd: string = process.cwd()): ResolvedConfig {
  if (configPath) {
    const loader = new ConfigLoader(resolve(cwd, configPath));
    return { config: loader.loadConfig(), configPath: loader.getConfigPath() };
  }

  const discovered = join(cwd, CONFIG_FILE_NAME);
  if (existsSync(discovered)) {
    return { config: new ConfigLoader(discovered).loadConfig(), configPath: discovered };
  }

  return { config: DEFAULT_CONFIG };
}

export function toNamingOptions(config: VisualizerConfig): NamingOptions {
  return { noSplit: config.noSplit, noTransform: config.noTransform };
}
