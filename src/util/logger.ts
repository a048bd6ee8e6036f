/**
 * Leveled console logger with a context prefix and child loggers.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  colors?: boolean;
}

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

const tags: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: colors.gray + '[debug]' + colors.reset,
  info: colors.blue + '[info]' + colors.reset,
  warn: colors.yellow + '[warn]' + colors.reset,
  error: colors.red + '[error]' + colors.reset,
};

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export class Logger {
  private readonly level: LogLevel;
  private readonly context: string;
  private readonly useColors: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.context = options.context ?? '';
    this.useColors = options.colors ?? (process.stdout.isTTY ?? false);
  }

  private format(level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): string {
    const tag = this.useColors ? tags[level] : `[${level}]`;
    let ctx = '';
    if (this.context) ctx = this.useColors ? ` ${colors.dim}(${this.context})${colors.reset}` : ` (${this.context})`;

    let output = `${tag}${ctx} ${message}`;
    if (data) output += ` ${JSON.stringify(data)}`;
    return output;
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) console.log(this.format('debug', message, data));
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('info')) console.log(this.format('info', message, data));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) console.warn(this.format('warn', message, data));
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('error')) console.error(this.format('error', message, data));
  }

  /** Create a child logger whose context is nested under this one. */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      colors: this.useColors,
    });
  }
}
