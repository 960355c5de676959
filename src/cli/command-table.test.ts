import { describe, it, expect } from 'vitest';
import { COMMANDS, findCommand, type CommandDescriptor } from './command-table.js';

describe('findCommand', () => {
  it('should find a command in the default table', () => {
    expect(findCommand('help')?.name).toBe('help');
    expect(findCommand('lint')?.action).toBe(findCommand('run-hooks-all')?.action);
  });

  it('should return undefined for an unknown name', () => {
    expect(findCommand('nope')).toBeUndefined();
    expect(findCommand('')).toBeUndefined();
  });

  it('should search the table it is given', () => {
    const only: CommandDescriptor = { name: 'only', group: 'General', action: async () => {} };

    expect(findCommand('only', [only])).toBe(only);
    expect(findCommand('help', [only])).toBeUndefined();
  });

  it('should keep names unique', () => {
    const names = COMMANDS.map(command => command.name);
    expect(new Set(names).size).toBe(names.length);
  });
});
