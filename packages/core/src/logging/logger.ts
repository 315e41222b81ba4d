/**
 * Logger with structured output
 *
 * Writes one JSON line per record to the console. Context fields set on
 * the logger (or a child) are merged into every record.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LoggerOptions {
  level?: LogLevel;
  context?: Record<string, unknown>;
}

export class Logger {
  private context: Record<string, unknown>;
  private readonly level: LogLevel;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.context = { ...options.context };
  }

  setContext(context: Record<string, unknown>): void {
    this.context = { ...this.context, ...context };
  }

  /**
   * Create a logger sharing this one's level with extra context fields
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      context: { ...this.context, ...context },
    });
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log('error', message, {
      ...data,
      error: error?.message,
      stack: error?.stack,
    });
  }

  private log(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (!this.isEnabled(level)) return;

    const line = JSON.stringify({
      level: level.toUpperCase(),
      message,
      ...this.context,
      ...data,
      timestamp: new Date().toISOString(),
    });

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Logger that drops every record
 */
export function createSilentLogger(): Logger {
  return new Logger({ level: 'silent' });
}
