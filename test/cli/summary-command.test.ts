import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { describe, expect, it, vi } from 'vitest';
import { runSummary, type RunReport } from '../../src/cli/commands/summary.js';
import { BANNER } from '../../src/cli/summary-formatters.js';
import { DEFAULT_CONFIG } from '../../src/config.js';
import type { Logger } from '../../src/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixture = join(__dirname, '..', 'fixtures', 'results.xml');
const missing = join(__dirname, '..', 'fixtures', 'missing.xml');

const ESC = String.fromCharCode(27);
const ANSI_REGEX = new RegExp(`${ESC}\\[[0-9;]*m`, 'g');
const stripAnsi = (value: string) => value.replace(ANSI_REGEX, '');

const createFakeLogger = (): Logger => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
  success: vi.fn(),
});

const collect = () => {
  const lines: string[] = [];
  return { lines, write: (line: string) => lines.push(stripAnsi(line)) };
};

describe('runSummary', () => {
  it('fails without result files', async () => {
    const output = collect();

    const code = await runSummary([], {
      config: DEFAULT_CONFIG,
      logger: createFakeLogger(),
      write: output.write,
    });

    expect(code).toBe(1);
    expect(output.lines[0]).toBe('Failed: No LOG files found to process.');
  });

  it('prints the banner and a summary per file', async () => {
    const output = collect();

    const code = await runSummary([fixture], {
      config: DEFAULT_CONFIG,
      logger: createFakeLogger(),
      write: output.write,
    });

    expect(code).toBe(0);
    expect(output.lines.slice(0, 5)).toEqual([...BANNER, '']);
    expect(output.lines).toContain(`Input source:         ${fixture}`);
    expect(output.lines).toContain('  Assembly:         Sample.Tests.dll - ⛌ Failed (1 of 5 failed).');
    expect(output.lines).toContain('  Trait: Category - Unit');
    expect(output.lines).toContain('    🐌 ✓ Uses DbSynchronizer (1.5 seconds)');
    expect(output.lines.at(-1)).toBe('');
  });

  it('shows failure messages with details', async () => {
    const output = collect();

    await runSummary([fixture], {
      config: DEFAULT_CONFIG,
      logger: createFakeLogger(),
      details: true,
      write: output.write,
    });

    const index = output.lines.indexOf('           🕐 ⛌ Computes total (0.08 seconds)');
    expect(index).toBeGreaterThan(0);
    expect(output.lines.slice(index + 1, index + 4)).toEqual([
      '                Assert.Equal() Failure',
      '                Expected: 10',
      '                Actual:   12',
    ]);
  });

  it('reports unreadable files and keeps going', async () => {
    const output = collect();
    const logger = createFakeLogger();

    const code = await runSummary([missing, fixture], {
      config: DEFAULT_CONFIG,
      logger,
      write: output.write,
    });

    expect(code).toBe(1);
    expect(output.lines[5]).toMatch(new RegExp(`^Failed - ${missing.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}: Unable to read `));
    expect(output.lines).toContain(`Input source:         ${fixture}`);
    expect(logger.debug).toHaveBeenCalledTimes(2);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('prints JSON reports', async () => {
    const output = collect();
    const logger = createFakeLogger();

    const code = await runSummary([fixture, missing], {
      config: DEFAULT_CONFIG,
      logger,
      json: true,
      write: output.write,
    });

    expect(code).toBe(1);
    expect(output.lines).toHaveLength(1);

    const reports: RunReport[] = JSON.parse(output.lines[0]);
    expect(reports).toHaveLength(1);
    expect(reports[0].source).toBe(fixture);
    expect(reports[0].run.computer).toBe('BUILD-01');
    expect(reports[0].run.assemblies[0].testGroups.map((group) => group.name)).toEqual([
      '',
      'Category - Unit',
      'Speed - Slow',
    ]);
    expect(logger.error).toHaveBeenCalledWith(
      expect.stringMatching(/^\[.*missing\.xml\] Unable to read /),
      { error: 'XunitReadError' }
    );
  });
});
