import chalk from 'chalk';
import type { LogLevel } from '../types.js';
import { type LoadedConfiguration, loadConfiguration, parseLogLevelOption } from './configuration.js';

export const exitWithError = (message: string, code = 1): never => {
  console.error(chalk.red(message));
  process.exit(code);
};

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const loadConfigOrExit = (configPath?: string): LoadedConfiguration => {
  try {
    return loadConfiguration(configPath);
  } catch (error) {
    return exitWithError(errorMessage(error));
  }
};

export const parseLogLevelOrExit = (options: {
  verbose?: boolean;
  logLevel?: string;
}): LogLevel => {
  try {
    return parseLogLevelOption(options);
  } catch (error) {
    return exitWithError(errorMessage(error));
  }
};
