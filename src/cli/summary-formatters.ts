import chalk from 'chalk';
import { NO_TRAIT } from '../xunit/hierarchy.js';
import type { Assembly, TestCase, TestGroup, TestRun } from '../xunit/types.js';

export interface SummaryFormatOptions {
  /** Seconds at or below which a test counts as fast. */
  thresholdFast: number;
  /** Seconds at or below which a test counts as normal; anything slower is slow. */
  thresholdNormal: number;
  /** Print failure messages, skip reasons and environment error messages. */
  details?: boolean;
}

export const BANNER: readonly string[] = [
  '    _  _ ___ _____   _____       _    __   ___              _ _            ',
  '   | \\| | __|_   _| |_   _|__ __| |_  \\ \\ / (_)____  _ __ _| (_)______ _ _ ',
  "  _| .` | _|  | |     | |/ -_|_-<  _|  \\ V /| (_-< || / _` | | |_ / -_) '_|",
  ' (_)_|\\_|___| |_|     |_|\\___/__/\\__|   \\_/ |_/__/\\_,_\\__,_|_|_/__\\___|_|  ',
];

export function formatNoLogFiles(): string[] {
  return [
    `${chalk.red('Failed')}: No LOG files found to process.`,
    "        Use the `--logFile` argument to pass a file containing logs in xUnit's v2+ XML format.",
    '        If you want to specify multiple files, pass the argument once for each log file.',
    '',
  ];
}

export function formatTimingBadge(seconds: number, options: SummaryFormatOptions): string {
  if (seconds <= options.thresholdFast) return '🚀';
  if (seconds <= options.thresholdNormal) return '🕐';
  return '🐌';
}

export function formatOutcome(result: string): string {
  switch (result) {
    case 'Pass':
      return chalk.green('✓');
    case 'Skip':
    case 'NotRun':
      return chalk.yellow('○');
    default:
      return chalk.red('⛌');
  }
}

function formatTestCase(test: TestCase, indent: string, options: SummaryFormatOptions): string[] {
  const lines = [
    `${indent}${formatTimingBadge(test.time, options)} ${formatOutcome(test.result)} ${test.name} (${test.time} seconds)`,
  ];

  if (options.details) {
    const detailIndent = `${indent}     `;
    if (test.failure && test.failure.message) {
      for (const line of test.failure.message.split(/\r?\n/)) {
        lines.push(`${detailIndent}${chalk.red(line)}`);
      }
    }
    if (test.skipReason) {
      lines.push(`${detailIndent}${chalk.gray(`Skipped: ${test.skipReason}`)}`);
    }
  }

  return lines;
}

function formatGroup(group: TestGroup, indent: string, options: SummaryFormatOptions): string[] {
  const lines = [`${indent}  ${chalk.bold(group.name)}`];

  for (const test of group.tests) {
    lines.push(...formatTestCase(test, `${indent}     `, options));
  }
  if (group.tests.length > 0) {
    lines.push('');
  }

  for (const child of group.groups) {
    lines.push(...formatGroup(child, `${indent}  `, options));
  }

  return lines;
}

function formatCounts(assembly: Assembly): string[] {
  const counts: [string, number][] = [
    ['# Tests:', assembly.totalCount],
    ['# Passed tests:', assembly.passedCount],
    ['# Failed tests:', assembly.failedCount],
    ['# Skipped tests:', assembly.skippedCount],
    ['# Errors:', assembly.errorCount],
  ];
  return counts.map(([label, value]) => `  ${label.padEnd(17)}${value}`);
}

export function formatAssembly(assembly: Assembly, options: SummaryFormatOptions): string[] {
  const verdict =
    assembly.failedCount !== 0
      ? chalk.red(`⛌ Failed (${assembly.failedCount} of ${assembly.totalCount} failed).`)
      : chalk.green(`✓ Passed (${assembly.passedCount} of ${assembly.totalCount} passed).`);
  const totalTime = assembly.timeRtf ? `${assembly.timeRtf}.` : `${assembly.time} seconds.`;

  const lines = [
    '',
    `  Assembly:         ${assembly.name} - ${verdict}`,
    `  Date / time:      ${assembly.runDate} ${assembly.runTime}`.trimEnd(),
    `  Total time:       ${totalTime}`,
    '',
    ...formatCounts(assembly),
    '',
  ];

  if (assembly.environmentErrors.length > 0) {
    lines.push(`  ${chalk.red('Environment errors:')}`);
    for (const error of assembly.environmentErrors) {
      lines.push(`    - ${error.type}: ${error.name}`);
      if (options.details && error.message) {
        lines.push(`      ${chalk.red(error.message)}`);
      }
    }
    lines.push('');
  }

  for (const root of assembly.testGroups) {
    const hasTrait = root.name !== NO_TRAIT;
    const indent = hasTrait ? '  ' : '';

    if (hasTrait) {
      lines.push('', `  Trait: ${chalk.cyan(root.name)}`);
    }
    for (const test of root.tests) {
      lines.push(...formatTestCase(test, `${indent}  `, options));
    }
    for (const group of root.groups) {
      lines.push('', ...formatGroup(group, indent, options));
    }
  }

  return lines;
}

export function formatRunHeader(source: string, run: TestRun): string[] {
  const lines = [
    `Input source:         ${source}`,
    `Amount of assemblies: ${run.assemblies.length}`,
  ];

  if (run.computer) lines.push(`Computer:             ${run.computer}`);
  if (run.user) lines.push(`User:                 ${run.user}`);
  if (run.startTimeRtf) lines.push(`Start time:           ${run.startTimeRtf}`);

  // Older runners don't write finish-rtf; the timestamp is the best we have then
  const endTime = run.endTimeRtf || run.timestamp;
  if (endTime) lines.push(`End time:             ${endTime}`);

  return lines;
}

export function formatTestRun(
  source: string,
  run: TestRun,
  options: SummaryFormatOptions
): string[] {
  return [
    ...formatRunHeader(source, run),
    ...run.assemblies.flatMap((assembly) => formatAssembly(assembly, options)),
  ];
}

export function printTestRun(
  source: string,
  run: TestRun,
  options: SummaryFormatOptions,
  write: (line: string) => void = console.log
): void {
  formatTestRun(source, run, options).forEach((line) => write(line));
}
