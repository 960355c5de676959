// Centralized logging service for hooktask

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  /** Sink for formatted lines, stderr unless overridden */
  write?: (line: string) => void;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.WARN,
  prefix: '[hooktask]'
};

const LEVEL_NAMES = new Map<string, LogLevel>([
  ['debug', LogLevel.DEBUG],
  ['info', LogLevel.INFO],
  ['warn', LogLevel.WARN],
  ['error', LogLevel.ERROR],
  ['silent', LogLevel.SILENT]
]);

/**
 * Parse a level name such as "debug" or "WARN".
 * Returns undefined for anything unrecognized.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) {
    return undefined;
  }
  return LEVEL_NAMES.get(name.trim().toLowerCase());
}

/**
 * Centralized logger with structured output
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  private format(level: string, message: string, context?: Record<string, unknown>): string {
    const parts: string[] = [];

    if (this.config.prefix) {
      parts.push(this.config.prefix);
    }

    parts.push(`[${level}]`);
    parts.push(message);

    if (context && Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }

    return parts.join(' ');
  }

  private emit(line: string): void {
    if (this.config.write) {
      this.config.write(line);
    } else {
      console.error(line);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.config.level <= LogLevel.DEBUG) {
      this.emit(this.format('DEBUG', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.config.level <= LogLevel.INFO) {
      this.emit(this.format('INFO', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.config.level <= LogLevel.WARN) {
      this.emit(this.format('WARN', message, context));
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.config.level <= LogLevel.ERROR) {
      this.emit(this.format('ERROR', message, context));
    }
  }
}

// Shared instance; the CLI adjusts its level from --verbose / HOOKTASK_LOG_LEVEL
export const logger = new Logger();
