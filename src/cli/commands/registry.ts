import type { Command } from 'commander';
import type { CommandGroup, OptionInfo } from '../../utils/cli-formatter.js';
import { registerSummaryCommand } from './summary.js';
import { registerVersionCommand } from './version.js';

export interface CommandDescriptor {
  name: string;
  register: (program: Command) => void;
  options?: OptionInfo[];
}

export const COMMAND_DESCRIPTORS: CommandDescriptor[] = [
  {
    name: 'summary',
    register: registerSummaryCommand,
    options: [
      {
        flags: '-l, --logFile <path>',
        description: "File with results in xUnit's v2+ XML format (repeatable)",
      },
      { flags: '-c, --config <path>', description: 'Path to config file' },
      { flags: '--json', description: 'Print the parsed results as JSON' },
      { flags: '--details', description: 'Show failure messages and skip reasons' },
      { flags: '--verbose', description: 'Enable verbose logging (same as --log-level debug)' },
      { flags: '--log-level <level>', description: 'Set log level (debug, info, warn, error)' },
    ],
  },
  {
    name: 'version',
    register: registerVersionCommand,
  },
];

export const HELP_GROUPS: CommandGroup[] = [
  {
    title: 'Results',
    commands: [
      { name: 'summary', args: '--logFile <path>', description: 'Summarize result files (default)' },
    ],
  },
  {
    title: 'Other',
    commands: [{ name: 'version', description: 'Show .NET Test Visualizer version' }],
  },
];

/** Options shown in the top-level help: the default command's, plus help/version. */
export const helpOptions = (): OptionInfo[] => [
  ...(COMMAND_DESCRIPTORS.find((descriptor) => descriptor.name === 'summary')?.options ?? []),
  { flags: '-v, --version', description: 'Show version' },
  { flags: '-h, --help', description: 'Show help' },
];
