// Public API for hooktask

export * from './core/errors.js';
export * from './core/logger.js';
export * from './core/schemas.js';
export * from './services/index.js';
export * from './cli/command-table.js';
export { renderHelp, HELP_HEADER } from './cli/commands/help.js';
export { parseUtilityArgument } from './cli/commands/check-utility.js';
export { runCli, buildProgram, VERSION } from './cli/program.js';
export type { CliDependencies } from './cli/program.js';
