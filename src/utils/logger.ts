/**
 * Logger interface for type-safe logging
 */
export interface Logger {
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug?(message: string, context?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Anything with the console's logging methods, e.g. a `new Console(process.stderr)`
 */
export type ConsoleSink = Pick<Console, 'warn' | 'error' | 'info' | 'debug'>;

export interface ConsoleLoggerOptions {
  /** Messages below this level are dropped (default: debug) */
  level?: LogLevel;
  sink?: ConsoleSink;
}

/**
 * Simple console-based logger implementation
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly sink: ConsoleSink;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'debug';
    this.sink = options.sink ?? console;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  private write(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    if (context !== undefined) {
      this.sink[level](message, context);
    } else {
      this.sink[level](message);
    }
  }
}

/**
 * Logger that discards everything; the default for library callers
 */
export class NullLogger implements Logger {
  warn(): void {}
  error(): void {}
  info(): void {}
  debug(): void {}
}
