// In-process ProcessRunner that records argv instead of spawning

import type { ProcessResult, ProcessRunner, RunOptions } from './process-runner.js';

export interface RecordedCall {
  command: string;
  args: string[];
  options?: RunOptions;
}

/**
 * Exit codes are looked up by subcommand (the first argument); anything
 * not listed exits 0.
 */
export class RecordingProcessRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly exitCodes: Partial<Record<string, number>> = {}) {}

  async run(command: string, args: readonly string[], options?: RunOptions): Promise<ProcessResult> {
    this.calls.push(options ? { command, args: [...args], options } : { command, args: [...args] });
    return {
      command,
      args: [...args],
      exitCode: this.exitCodes[args[0]] ?? 0
    };
  }
}
