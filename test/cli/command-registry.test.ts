import { Command } from 'commander';
import { describe, expect, it } from 'vitest';
import { registerCliCommands } from '../../src/cli/commands/index.js';
import { COMMAND_DESCRIPTORS, HELP_GROUPS, helpOptions } from '../../src/cli/commands/registry.js';

describe('command registry', () => {
  it('covers all registered commands', () => {
    const program = new Command();
    registerCliCommands(program);

    const registered = program.commands.map((c) => c.name()).sort();
    const described = COMMAND_DESCRIPTORS.map((d) => d.name).sort();

    expect(described).toEqual(registered);
    expect(registered).toEqual(['summary', 'version']);
  });

  it('lists every described command in the help groups', () => {
    const grouped = HELP_GROUPS.flatMap((group) => group.commands.map((c) => c.name)).sort();

    expect(grouped).toEqual(COMMAND_DESCRIPTORS.map((d) => d.name).sort());
  });

  it('documents the options the summary command accepts', () => {
    const program = new Command();
    registerCliCommands(program);
    const summary = program.commands.find((c) => c.name() === 'summary');

    const accepted = summary?.options.map((option) => option.long) ?? [];
    const documented = helpOptions().map((option) => option.flags.match(/--[\w-]+/)?.[0]);

    for (const flag of accepted) {
      expect(documented).toContain(flag);
    }
  });
});
