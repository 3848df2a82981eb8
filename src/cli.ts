#!/usr/bin/env node
import chalk from 'chalk';
import { Command } from 'commander';
import { registerCliCommands } from './cli/commands/index.js';
import { HELP_GROUPS, helpOptions } from './cli/commands/registry.js';
import { PACKAGE_INFO } from './cli/version.js';
import { formatHelp } from './utils/cli-formatter.js';
import { isMainModule } from './utils/paths.js';

export const createProgram = (): Command => {
  const program = new Command();

  program
    .name(PACKAGE_INFO.name)
    .description('Grouped, human-readable summaries of .NET xUnit v2+ test results')
    .version(PACKAGE_INFO.version, '-v, --version', 'output the version number');

  registerCliCommands(program);

  // Configured after registration so subcommands keep commander's own help layout
  program.configureHelp({
    formatHelp: () =>
      formatHelp({
        title: '.NET Test Visualizer',
        tagline: 'Readable xUnit test results',
        programName: PACKAGE_INFO.name,
        usage: '[command] [options]',
        commandGroups: HELP_GROUPS,
        options: helpOptions(),
        examples: [
          { command: '--logFile TestResults/results.xml', description: 'Summarize one result file' },
          {
            command: '--logFile unit.xml --logFile integration.xml --details',
            description: 'Summarize several files, with failure messages',
          },
          { command: '--logFile results.xml --json', description: 'Print the parsed results as JSON' },
        ],
      }),
  });

  return program;
};

const program = createProgram();

if (isMainModule(import.meta.url)) {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    process.exit(1);
  });
}

export { program };
