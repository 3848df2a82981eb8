/**
 * Help screen formatting for the visualizer CLI
 */

import chalk from 'chalk';

export interface CommandInfo {
  name: string;
  description: string;
  args?: string;
}

export interface CommandGroup {
  title: string;
  commands: CommandInfo[];
}

export interface OptionInfo {
  flags: string;
  description: string;
}

export interface ExampleInfo {
  command: string;
  description?: string;
}

export interface HelpConfig {
  title: string;
  tagline: string;
  programName: string;
  usage: string;
  commandGroups: CommandGroup[];
  options: OptionInfo[];
  examples?: ExampleInfo[];
}

const MAX_PAD = 30;

const commandLabel = (cmd: CommandInfo): string => (cmd.args ? `${cmd.name} ${cmd.args}` : cmd.name);

// Column width for a list of labels, capped so long flags don't push descriptions off screen
const padFor = (labels: string[]): number =>
  Math.min(Math.max(0, ...labels.map((label) => label.length)) + 2, MAX_PAD);

export function header(title: string, tagline: string): string {
  return chalk.cyan(`${title} - ${tagline}`);
}

export function sectionTitle(title: string): string {
  return chalk.yellow(title.toUpperCase());
}

export function usage(programName: string, usageLine: string): string {
  return [sectionTitle('Usage'), `  $ ${programName} ${usageLine}`].join('\n');
}

export function formatCommand(cmd: CommandInfo, padTo = 25): string {
  return `  ${commandLabel(cmd).padEnd(padTo)} ${chalk.gray(cmd.description)}`;
}

export function commandGroups(groups: CommandGroup[]): string {
  const lines: string[] = [sectionTitle('Commands')];

  for (const group of groups) {
    if (group.title) {
      lines.push(`  ${chalk.white(group.title)}`);
    }
    const padTo = padFor(group.commands.map(commandLabel));
    for (const cmd of group.commands) {
      lines.push(formatCommand(cmd, padTo));
    }
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}

export function options(opts: OptionInfo[]): string {
  const padTo = padFor(opts.map((opt) => opt.flags));
  return [
    sectionTitle('Options'),
    ...opts.map((opt) => `  ${opt.flags.padEnd(padTo)} ${chalk.gray(opt.description)}`),
  ].join('\n');
}

export function examples(programName: string, items: ExampleInfo[]): string {
  const lines: string[] = [sectionTitle('Examples')];
  for (const example of items) {
    lines.push(`  $ ${programName} ${example.command}`);
    if (example.description) {
      lines.push(`    ${chalk.gray(example.description)}`);
    }
  }
  return lines.join('\n');
}

export function formatHelp(config: HelpConfig): string {
  const sections = [
    header(config.title, config.tagline),
    '',
    usage(config.programName, config.usage),
    '',
  ];

  if (config.commandGroups.length > 0) {
    sections.push(commandGroups(config.commandGroups), '');
  }

  sections.push(options(config.options));

  if (config.examples && config.examples.length > 0) {
    sections.push('', examples(config.programName, config.examples));
  }

  return sections.join('\n');
}
