/**
 * Hook Manager Service
 *
 * Drives the external pre-commit executable: install/uninstall of hook
 * bindings, autoupdate, and hook runs. The hook manager itself is opaque;
 * this service only builds argv and decides which failures are fatal.
 */

import { ExternalToolError } from '../../core/errors.js';
import { logger as defaultLogger, type Logger } from '../../core/logger.js';
import type { HookType } from '../../core/schemas.js';
import type { ProcessResult, ProcessRunner, RunOptions } from '../exec/process-runner.js';
import type { UtilityRequirement } from '../utility/utility-guard.js';

/**
 * Which files a hook run covers
 */
export type RunScope = 'staged' | 'all';

/**
 * Receives a title before each multi-step operation starts
 */
export interface StepReporter {
  step(title: string): void;
}

export interface HookManagerOptions {
  command: string;
  hookTypes: readonly HookType[];
  /** Working directory and environment for every hook manager process */
  process?: RunOptions;
}

/**
 * Hook Manager Service Interface
 */
export interface IHookManagerService {
  installHooks(): Promise<void>;
  updateHooks(): Promise<void>;
  runHooks(scope: RunScope): Promise<void>;
}

export function hookTypeArgs(hookTypes: readonly HookType[]): string[] {
  return hookTypes.flatMap(type => ['--hook-type', type]);
}

export function uninstallArgs(hookTypes: readonly HookType[]): string[] {
  return ['uninstall', ...hookTypeArgs(hookTypes)];
}

export function installArgs(hookTypes: readonly HookType[]): string[] {
  return ['install', '--install-hooks', ...hookTypeArgs(hookTypes)];
}

export function autoupdateArgs(): string[] {
  return ['autoupdate'];
}

export function runArgs(scope: RunScope): string[] {
  return scope === 'all' ? ['run', '--all-files', '--color', 'always'] : ['run'];
}

/**
 * Hook Manager Service Implementation
 */
export class HookManagerService implements IHookManagerService {
  private readonly command: string;
  private readonly hookTypes: readonly HookType[];
  private readonly runOptions: RunOptions | undefined;

  constructor(
    private readonly runner: ProcessRunner,
    private readonly guard: UtilityRequirement,
    private readonly reporter: StepReporter,
    options: HookManagerOptions,
    private readonly logger: Logger = defaultLogger
  ) {
    this.command = options.command;
    this.hookTypes = [...options.hookTypes];
    this.runOptions = options.process;
  }

  /**
   * Reinstalls hook bindings for every configured hook class.
   *
   * @throws MissingUtilityError if the hook manager is not on PATH; nothing is run
   * @throws ExternalToolError if the install step fails
   */
  async installHooks(): Promise<void> {
    await this.guard.require(this.command);

    this.reporter.step(`Installing ${this.command} hooks`);

    // Uninstalling hooks that were never installed is not an error
    const removed = await this.runner.run(this.command, uninstallArgs(this.hookTypes), this.runOptions);
    if (removed.exitCode !== 0) {
      this.logger.debug('Ignoring uninstall failure', { exitCode: removed.exitCode });
    }

    this.assertSucceeded(await this.runner.run(this.command, installArgs(this.hookTypes), this.runOptions));
  }

  /**
   * @throws ExternalToolError with the autoupdate exit status
   */
  async updateHooks(): Promise<void> {
    this.reporter.step(`Updating ${this.command} hooks`);
    this.assertSucceeded(await this.runner.run(this.command, autoupdateArgs(), this.runOptions));
  }

  /**
   * @throws ExternalToolError with the hook manager's exit status
   */
  async runHooks(scope: RunScope): Promise<void> {
    this.assertSucceeded(await this.runner.run(this.command, runArgs(scope), this.runOptions));
  }

  private assertSucceeded(result: ProcessResult): void {
    if (result.exitCode !== 0) {
      throw new ExternalToolError(result.command, result.args, result.exitCode);
    }
  }
}
