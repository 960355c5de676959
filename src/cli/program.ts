// Commander wiring for the hooktask CLI

import { Command, CommanderError } from 'commander';
import type { ChalkInstance } from 'chalk';
import { UsageError } from '../core/errors.js';
import { Logger, LogLevel, logger as defaultLogger, parseLogLevel } from '../core/logger.js';
import { ConfigService, DEFAULT_CONFIG_FILE } from '../services/config/config-service.js';
import { ExecaProcessRunner, type ProcessRunner } from '../services/exec/process-runner.js';
import { HookManagerService } from '../services/hook-manager/hook-manager-service.js';
import { UtilityGuard, type Environment } from '../services/utility/utility-guard.js';
import { COMMANDS, findCommand, type CommandContext, type CommandDescriptor } from './command-table.js';
import { ConsoleStepReporter, defaultStyle, processIO, type CliIO } from './utils/output.js';
import { reportError } from './utils/error-handler.js';

export const VERSION = '0.1.0';

interface GlobalOptions {
  config: string;
  verbose?: boolean;
  help?: boolean;
}

/**
 * Collaborators the CLI needs; everything defaults to the real process
 */
export interface CliDependencies {
  io?: CliIO;
  style?: ChalkInstance;
  runner?: ProcessRunner;
  env?: Environment;
  cwd?: string;
  logger?: Logger;
  commands?: readonly CommandDescriptor[];
}

/**
 * Build the command context once global options are known
 */
async function createContext(globals: GlobalOptions, deps: Required<CliDependencies>): Promise<CommandContext> {
  const level = globals.verbose
    ? LogLevel.DEBUG
    : parseLogLevel(deps.env.HOOKTASK_LOG_LEVEL) ?? LogLevel.WARN;
  deps.logger.setLevel(level);

  const configService = new ConfigService({ configPath: globals.config, cwd: deps.cwd });
  const settings = await configService.getSettings();
  deps.logger.debug('Loaded settings', { path: configService.getConfigPath(), ...settings });

  const guard = new UtilityGuard({ env: deps.env, installHint: settings.installHint });
  const hooks = new HookManagerService(
    deps.runner,
    guard,
    new ConsoleStepReporter(deps.io, deps.style),
    {
      command: settings.hookManager,
      hookTypes: settings.hookTypes,
      process: { cwd: deps.cwd, env: deps.env }
    },
    deps.logger
  );

  return {
    hooks,
    guard,
    io: deps.io,
    style: deps.style,
    commands: deps.commands,
    helpColumnWidth: settings.helpColumnWidth
  };
}

/**
 * Register the command table on a commander program
 */
export function buildProgram(deps: Required<CliDependencies>): Command {
  const program = new Command();

  program
    .name('hooktask')
    .description('Install, update and run pre-commit hooks')
    .version(VERSION, '-V, --version')
    .option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_FILE)
    .option('--verbose', 'Enable debug logging')
    .helpOption(false)
    .option('-h, --help', 'Print this help message')
    .helpCommand(false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.io.stdout(text),
      writeErr: (text) => deps.io.stderr(text)
    });

  const help = findCommand('help', deps.commands);

  const runDescriptor = async (descriptor: CommandDescriptor, argument: string | undefined, options: Record<string, unknown>) => {
    const globals = program.opts<GlobalOptions>();
    const context = await createContext(globals, deps);
    // -h anywhere on the line shows the command table instead of running anything
    const target = globals.help && help ? help : descriptor;
    await target.action(context, { argument, options });
  };

  for (const descriptor of deps.commands) {
    const sub = program.command(descriptor.name);
    if (descriptor.help) {
      sub.description(descriptor.help);
    }
    if (descriptor.argument) {
      sub.argument(`[${descriptor.argument.name}]`, descriptor.argument.description);
    }
    for (const option of descriptor.options ?? []) {
      sub.option(option.flags, option.description);
    }
    sub.action(async () => {
      const argument = descriptor.argument ? sub.args[0] : undefined;
      await runDescriptor(descriptor, argument, sub.opts());
    });
  }

  // No command given: show help
  program.action(async () => {
    if (program.args.length > 0) {
      throw new UsageError(`Unknown command '${program.args[0]}'. See 'hooktask help'.`);
    }
    if (help) {
      await runDescriptor(help, undefined, {});
    }
  });

  return program;
}

/**
 * Run the CLI and resolve to the process exit code
 *
 * @param argv - user arguments, without the node and script paths
 */
export async function runCli(argv: readonly string[], dependencies: CliDependencies = {}): Promise<number> {
  const logger = dependencies.logger ?? defaultLogger;
  const deps: Required<CliDependencies> = {
    io: dependencies.io ?? processIO,
    style: dependencies.style ?? defaultStyle,
    runner: dependencies.runner ?? new ExecaProcessRunner(logger),
    env: dependencies.env ?? process.env,
    cwd: dependencies.cwd ?? process.cwd(),
    logger,
    commands: dependencies.commands ?? COMMANDS
  };

  const program = buildProgram(deps);

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already printed its message
      return error.exitCode === 0 ? 0 : new UsageError(error.message).exitCode;
    }
    return reportError(error, deps.io, deps.style);
  }
}
