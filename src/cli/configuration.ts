import { ConfigurationError, resolveConfig } from '../config.js';
import { LOG_LEVELS, type LogLevel, type VisualizerConfig } from '../types.js';

export interface LoadedConfiguration {
  config: VisualizerConfig;
  configPath?: string;
}

export class ConfigurationLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationLoadError';
  }
}

/**
 * Load the configuration (explicit path, discovered file, or defaults) and
 * normalize failures into a ConfigurationLoadError for the command handlers.
 */
export function loadConfiguration(configPath?: string, cwd?: string): LoadedConfiguration {
  try {
    return resolveConfig(configPath, cwd);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new ConfigurationLoadError(error.message);
    }
    throw new ConfigurationLoadError(`Failed to load configuration: ${error}`);
  }
}

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

/** `--verbose` wins over `--log-level`; warnings and errors only by default. */
export function parseLogLevelOption(options: { verbose?: boolean; logLevel?: string }): LogLevel {
  if (options.verbose) {
    return 'debug';
  }
  if (!options.logLevel) {
    return 'warn';
  }
  const normalized = options.logLevel.toLowerCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }
  throw new Error(
    `Invalid log level "${options.logLevel}". Use ${LOG_LEVELS.join(', ')}.`
  );
}
