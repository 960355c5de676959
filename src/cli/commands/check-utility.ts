// check-utility-install - fail unless a utility resolves on PATH

import type { CommandDescriptor, CommandInput } from '../command-table.js';

const ASSIGNMENT = /^UTILITY=(.*)$/;

/**
 * Accepts both `ls` and `UTILITY=ls`
 */
export function parseUtilityArgument(value: string): string {
  const match = ASSIGNMENT.exec(value);
  return match ? match[1] : value;
}

/**
 * Positional value first, then --utility; empty when neither is given
 */
export function utilityFromInput(input: CommandInput): string {
  if (input.argument !== undefined) {
    return parseUtilityArgument(input.argument);
  }
  const option = input.options.utility;
  return typeof option === 'string' ? option : '';
}

export const checkUtilityCommand: CommandDescriptor = {
  name: 'check-utility-install',
  group: 'Environment checks',
  help: 'Error unless UTILITY is installed',
  argument: { name: 'utility', description: 'Utility name, as NAME or UTILITY=NAME' },
  options: [{ flags: '-u, --utility <name>', description: 'Utility name' }],
  action: async (context, input) => {
    await context.guard.require(utilityFromInput(input));
  }
};
