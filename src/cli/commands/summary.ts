import chalk from 'chalk';
import type { Command } from 'commander';
import { toNamingOptions } from '../../config.js';
import { createLogger, createSourceLogger, type Logger } from '../../logger.js';
import type { VisualizerConfig } from '../../types.js';
import { XunitDecodeError } from '../../xunit/decoder.js';
import { readTestRunFile, XunitReadError } from '../../xunit/reader.js';
import type { TestRun } from '../../xunit/types.js';
import { applyConfigOption, applyLogFileOption, applyLogLevelOptions } from '../options.js';
import { loadConfigOrExit, parseLogLevelOrExit } from '../shared.js';
import { BANNER, formatNoLogFiles, formatTestRun } from '../summary-formatters.js';

export interface SummaryCommandOptions {
  logFile: string[];
  config?: string;
  json?: boolean;
  details?: boolean;
  verbose?: boolean;
  logLevel?: string;
}

export interface SummaryContext {
  config: VisualizerConfig;
  logger: Logger;
  json?: boolean;
  details?: boolean;
  write?: (line: string) => void;
}

export interface RunReport {
  source: string;
  run: TestRun;
}

/**
 * Load every result file and print its summary (or a JSON document with all
 * of them). Files that can't be read or decoded are reported and skipped.
 *
 * @returns the process exit code: 1 when no file was given or any file failed.
 */
export async function runSummary(
  files: readonly string[],
  context: SummaryContext
): Promise<number> {
  const { config, logger } = context;
  const write = context.write ?? ((line: string) => console.log(line));

  if (files.length === 0) {
    formatNoLogFiles().forEach((line) => write(line));
    return 1;
  }

  if (!context.json) {
    [...BANNER, ''].forEach((line) => write(line));
  }

  const naming = toNamingOptions(config);
  const reports: RunReport[] = [];
  let failures = 0;

  for (const file of files) {
    const fileLogger = createSourceLogger(logger, file);
    try {
      const run = await readTestRunFile(file, naming);
      fileLogger.debug(`Loaded ${run.assemblies.length} assemblies`);

      if (context.json) {
        reports.push({ source: file, run });
      } else {
        formatTestRun(file, run, { ...config, details: context.details }).forEach((line) =>
          write(line)
        );
        write('');
      }
    } catch (error) {
      if (!(error instanceof XunitReadError || error instanceof XunitDecodeError)) {
        throw error;
      }
      failures++;
      if (context.json) {
        fileLogger.error(error.message, { error: error.name });
      } else {
        fileLogger.debug(error.message, { error: error.name });
        write(`${chalk.red('Failed')} - ${file}: ${error.message}`);
      }
    }
  }

  if (context.json) {
    write(JSON.stringify(reports, null, 2));
  }

  return failures > 0 ? 1 : 0;
}

export const registerSummaryCommand = (program: Command): void => {
  const command = program
    .command('summary', { isDefault: true })
    .description('Summarize xUnit v2+ XML result files');

  applyLogFileOption(command);
  applyConfigOption(command);
  applyLogLevelOptions(command);

  command
    .option('--json', 'Print the parsed results as JSON instead of a summary')
    .option('--details', 'Show failure messages, skip reasons and environment errors')
    .action(async (options: SummaryCommandOptions) => {
      const logger = createLogger({ level: parseLogLevelOrExit(options) });
      const loaded = loadConfigOrExit(options.config);
      logger.debug(
        loaded.configPath
          ? `Using configuration from ${loaded.configPath}`
          : 'Using default configuration'
      );

      process.exitCode = await runSummary(options.logFile, {
        config: loaded.config,
        logger,
        json: options.json,
        details: options.details,
      });
    });
};
