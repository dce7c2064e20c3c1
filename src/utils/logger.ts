import color from 'picocolors';

const LOG_LEVELS = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export type LogContext = Record<string, string | number | undefined>;

export interface LoggerOptions {
  showTimestamp?: boolean;
  showLevel?: boolean;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

interface LoggerState {
  level: LogLevel;
  isCLI: boolean;
}

// Leveled logger. Under a service supervisor (no TTY) every line carries a
// timestamp and level so the redirected log file stays greppable.
export class SimpleLogger {
  private readonly state: LoggerState;
  private readonly prefix: string;

  constructor(state?: LoggerState, context?: LogContext) {
    if (state) {
      this.state = state;
    } else {
      const envLevel = process.env.LOG_LEVEL?.toLowerCase();
      this.state = {
        level: isLogLevel(envLevel) ? envLevel : 'info',
        isCLI: process.env.NODE_ENV !== 'test' && process.stdout.isTTY === true,
      };
    }
    this.prefix = formatContext(context);
  }

  /**
   * Derive a logger that tags every line with the given context.
   * Children share the parent's level.
   */
  child(context: LogContext): SimpleLogger {
    return new SimpleLogger(this.state, context);
  }

  setLevel(level: string): void {
    const normalizedLevel = level.toLowerCase();
    if (isLogLevel(normalizedLevel)) {
      this.state.level = normalizedLevel;
    }
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] <= LOG_LEVELS[this.state.level];
  }

  private formatMessage(level: LogLevel, message: string, options?: LoggerOptions): string {
    const showTimestamp = options?.showTimestamp ?? !this.state.isCLI;
    const showLevel = options?.showLevel ?? !this.state.isCLI;

    let formatted = '';

    if (showTimestamp) {
      const timestamp = new Date().toISOString().replace('T', ' ').slice(0, -5);
      formatted += `${timestamp} `;
    }

    if (showLevel) {
      formatted += `[${level}]: `;
    }

    formatted += this.prefix + message;
    return formatted;
  }

  private withMeta(message: string, meta?: Record<string, unknown>): string {
    return meta ? `${message} ${JSON.stringify(meta)}` : message;
  }

  success(message: string): void {
    if (this.shouldLog('info')) {
      console.log(color.green(`✓ ${this.prefix}${message}`));
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;

    const fullMessage = this.withMeta(message, meta);
    if (this.state.isCLI) {
      console.log(color.cyan(`ℹ ${this.prefix}${fullMessage}`));
    } else {
      console.log(color.blue(this.formatMessage('info', fullMessage)));
    }
  }

  error(message: string, error?: unknown): void {
    if (!this.shouldLog('error')) return;

    let fullMessage = message;
    if (error instanceof Error) {
      fullMessage += `: ${error.message}`;
      if (this.state.level === 'debug' && error.stack) {
        fullMessage += `\n${error.stack}`;
      }
    } else if (error !== undefined) {
      fullMessage += ` ${JSON.stringify(error)}`;
    }

    if (this.state.isCLI) {
      console.error(color.red(`✖ ${this.prefix}${fullMessage}`));
    } else {
      console.error(color.red(this.formatMessage('error', fullMessage)));
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;

    const fullMessage = this.withMeta(message, meta);
    if (this.state.isCLI) {
      console.warn(color.yellow(`⚠ ${this.prefix}${fullMessage}`));
    } else {
      console.warn(color.yellow(this.formatMessage('warn', fullMessage)));
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.log(
        color.gray(
          this.formatMessage('debug', this.withMeta(message, meta), {
            showTimestamp: true,
            showLevel: true,
          }),
        ),
      );
    }
  }

  dim(message: string): void {
    if (this.state.isCLI) {
      console.log(color.dim(message));
    } else {
      this.info(message);
    }
  }

  plain(message: string): void {
    console.log(message);
  }

  emptyLine(): void {
    console.log();
  }
}

export function formatContext(context?: LogContext): string {
  if (!context) return '';
  const parts = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${value}`);
  return parts.length > 0 ? `[${parts.join(' ')}] ` : '';
}

export const logger = new SimpleLogger();
