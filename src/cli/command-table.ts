/**
 * The static command table.
 *
 * Every entry point of the CLI is declared here once, in help order. Each
 * descriptor carries its own help text, so the help listing and commander
 * registration both read from the same frozen list.
 */

import type { ChalkInstance } from 'chalk';
import type { IHookManagerService } from '../services/hook-manager/hook-manager-service.js';
import type { UtilityGuard } from '../services/utility/utility-guard.js';
import type { CliIO } from './utils/output.js';
import { helpCommand } from './commands/help.js';
import { hookCommands } from './commands/hooks.js';
import { checkUtilityCommand } from './commands/check-utility.js';

/**
 * Everything a command action may touch
 */
export interface CommandContext {
  hooks: IHookManagerService;
  guard: UtilityGuard;
  io: CliIO;
  style: ChalkInstance;
  commands: readonly CommandDescriptor[];
  helpColumnWidth: number;
}

export interface CommandInput {
  argument?: string;
  options: Record<string, unknown>;
}

export type CommandAction = (context: CommandContext, input: CommandInput) => Promise<void>;

export interface CommandArgumentSpec {
  name: string;
  description: string;
}

export interface CommandOptionSpec {
  flags: string;
  description: string;
}

export interface CommandDescriptor {
  readonly name: string;
  readonly group: string;
  readonly help?: string;
  readonly argument?: CommandArgumentSpec;
  readonly options?: readonly CommandOptionSpec[];
  readonly action: CommandAction;
}

export const COMMANDS: readonly CommandDescriptor[] = Object.freeze(
  [helpCommand, ...hookCommands, checkUtilityCommand].map(command => Object.freeze(command))
);

export function findCommand(
  name: string,
  commands: readonly CommandDescriptor[] = COMMANDS
): CommandDescriptor | undefined {
  return commands.find(command => command.name === name);
}
