// Help command - grouped two-column listing of the command table

import type { ChalkInstance } from 'chalk';
import type { CommandDescriptor } from '../command-table.js';

export const HELP_HEADER = 'Usage: hooktask [command]';

/**
 * Render the help listing.
 *
 * Groups appear in order of first appearance; each starts with a blank line
 * and a bold green title. Commands without help text are left out.
 */
export function renderHelp(
  commands: readonly CommandDescriptor[],
  style: ChalkInstance,
  columnWidth: number
): string {
  const lines: string[] = [HELP_HEADER];
  const groups = new Map<string, CommandDescriptor[]>();

  for (const command of commands) {
    if (!command.help) {
      continue;
    }
    const members = groups.get(command.group) ?? [];
    members.push(command);
    groups.set(command.group, members);
  }

  for (const [group, members] of groups) {
    lines.push('');
    lines.push(style.bold.green(group));
    for (const command of members) {
      lines.push(`${style.cyan(command.name.padEnd(columnWidth))} ${command.help}`);
    }
  }

  lines.push('');
  return lines.join('\n') + '\n';
}

export const helpCommand: CommandDescriptor = {
  name: 'help',
  group: 'General',
  help: 'Print this help message',
  action: async (context) => {
    context.io.stdout(renderHelp(context.commands, context.style, context.helpColumnWidth));
  }
};
