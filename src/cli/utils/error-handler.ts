// CLI error handling utilities

import type { ChalkInstance } from 'chalk';
import {
  HookTaskError,
  MissingUtilityError,
  ExternalToolError,
  ConfigError,
  UsageError
} from '../../core/errors.js';
import type { CliIO } from './output.js';

/**
 * Two-line report for a utility that is not on PATH
 */
export function formatMissingUtility(error: MissingUtilityError, style: ChalkInstance): string {
  return `\n${style.bold.red('ERROR')}. "${error.utility}" is required.\n` +
    `To install: ${error.installHint}\n\n`;
}

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigError) {
    const field = error.field ? ` (field: ${error.field})` : '';
    return `Configuration Error${field}: ${error.message}`;
  }

  if (error instanceof UsageError) {
    return `Usage Error: ${error.message}`;
  }

  if (error instanceof HookTaskError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for an error thrown out of a command
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof HookTaskError) {
    return error.exitCode;
  }
  return 1;
}

/**
 * Print an error where the user expects it and return the exit code
 */
export function reportError(error: unknown, io: CliIO, style: ChalkInstance): number {
  if (error instanceof MissingUtilityError) {
    io.stdout(formatMissingUtility(error, style));
  } else if (!(error instanceof ExternalToolError)) {
    // The hook manager reports its own failures; only its status is forwarded
    io.stderr(`${formatError(error)}\n`);
  }

  return exitCodeFor(error);
}
