// Domain-specific error types for hooktask

/**
 * Base error class for all hooktask errors
 */
export abstract class HookTaskError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      exitCode: this.exitCode,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * A required utility could not be resolved on the search path
 */
export class MissingUtilityError extends HookTaskError {
  readonly code = 'MISSING_UTILITY';
  readonly exitCode = 1;

  constructor(public readonly utility: string, public readonly installHint: string) {
    super(`"${utility}" is required`, { utility, installHint });
  }
}

/**
 * The hook manager (or another external tool) exited non-zero.
 * The tool's own exit status is passed through unchanged.
 */
export class ExternalToolError extends HookTaskError {
  readonly code = 'EXTERNAL_TOOL_FAILURE';

  constructor(
    public readonly command: string,
    public readonly args: readonly string[],
    public readonly exitCode: number
  ) {
    super(`${[command, ...args].join(' ')} exited with ${exitCode}`, { command, args, exitCode });
  }
}

/**
 * Invalid or unreadable configuration file
 */
export class ConfigError extends HookTaskError {
  readonly code = 'CONFIG_ERROR';
  readonly exitCode = 78;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Bad command line: unknown command, malformed option
 */
export class UsageError extends HookTaskError {
  readonly code = 'USAGE_ERROR';
  readonly exitCode = 2;
}
