import type { Command } from 'commander';

const collect = (value: string, previous: string[]): string[] => [...previous, value];

export const applyLogFileOption = (cmd: Command): Command =>
  cmd.option(
    '-l, --logFile <path>',
    "File with results in xUnit's v2+ XML format (repeat for multiple files)",
    collect,
    []
  );

export const applyConfigOption = (cmd: Command): Command =>
  cmd.option('-c, --config <path>', 'Path to config file');

export const applyLogLevelOptions = (cmd: Command): Command =>
  cmd
    .option('--verbose', 'Enable verbose logging (same as --log-level debug)')
    .option('--log-level <level>', 'Set log level (debug, info, warn, error)');
