// Hook commands - thin entry points over the hook manager service

import type { CommandAction, CommandDescriptor } from '../command-table.js';

const installHooks: CommandAction = async (context) => {
  await context.hooks.installHooks();
};

const updateHooks: CommandAction = async (context) => {
  await context.hooks.updateHooks();
};

const runHooks: CommandAction = async (context) => {
  await context.hooks.runHooks('staged');
};

const runHooksAll: CommandAction = async (context) => {
  await context.hooks.runHooks('all');
};

// Stops at the first failing step
const init: CommandAction = async (context, input) => {
  await installHooks(context, input);
  await updateHooks(context, input);
};

export const hookCommands: readonly CommandDescriptor[] = [
  { name: 'init', group: 'Linting', help: 'Install `pre-commit` hooks', action: init },
  { name: 'install-hooks', group: 'Linting', help: 'Install `pre-commit` hooks', action: installHooks },
  { name: 'update-hooks', group: 'Linting', help: 'Update `pre-commit` hooks', action: updateHooks },
  { name: 'run-hooks', group: 'Linting', help: 'Run pre-commit hooks', action: runHooks },
  { name: 'run-hooks-all', group: 'Linting', help: 'Run pre-commit hooks on all files', action: runHooksAll },
  { name: 'lint', group: 'Linting', help: 'Alias for run-hooks-all', action: runHooksAll }
];
