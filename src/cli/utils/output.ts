// Terminal output sinks and styling for the CLI

import chalk, { type ChalkInstance } from 'chalk';
import type { StepReporter } from '../../services/hook-manager/hook-manager-service.js';

/**
 * Where the CLI writes; tests swap in buffers
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processIO: CliIO = {
  stdout: (text) => { process.stdout.write(text); },
  stderr: (text) => { process.stderr.write(text); }
};

export const defaultStyle: ChalkInstance = chalk;

/**
 * Prints a bold green banner before each hook manager step
 */
export class ConsoleStepReporter implements StepReporter {
  constructor(private readonly io: CliIO, private readonly style: ChalkInstance) {}

  step(title: string): void {
    this.io.stdout(`\n${this.style.bold.green(title)}...\n\n`);
  }
}
