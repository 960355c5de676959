/**
 * External process execution.
 *
 * Output of the child is streamed straight to the terminal; callers get back
 * only the argv that ran and how it ended, and decide per call site whether
 * a non-zero status is fatal.
 */

import { execa } from 'execa';
import { logger as defaultLogger, type Logger } from '../../core/logger.js';

export interface ProcessResult {
  command: string;
  args: string[];
  exitCode: number;
  signal?: string;
}

export interface RunOptions {
  cwd?: string;
  /** Merged over process.env; a PATH here is also where the command is looked up */
  env?: Record<string, string | undefined>;
}

export interface ProcessRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<ProcessResult>;
}

/**
 * Runs processes with execa, inheriting stdio
 */
export class ExecaProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger = defaultLogger) {}

  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<ProcessResult> {
    this.logger.debug('Running external command', { command, args });

    const result = await execa(command, [...args], {
      cwd: options.cwd,
      env: options.env,
      stdio: 'inherit',
      reject: false
    });

    // No exit code means the child never started or was killed by a signal
    const exitCode = result.exitCode ?? 1;
    if (result.exitCode === undefined) {
      this.logger.debug('External command did not exit normally', { command, signal: result.signal });
    }

    this.logger.debug('External command finished', { command, exitCode });

    return {
      command,
      args: [...args],
      exitCode,
      signal: result.signal ?? undefined
    };
  }
}
