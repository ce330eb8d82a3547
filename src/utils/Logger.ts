import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

export class Logger {
  private static instance: Logger;
  private logLevel: LogLevel = 'info';

  private constructor() {
    const fromEnv = process.env.PYPROV_LOG_LEVEL;
    if (fromEnv && isLogLevel(fromEnv)) {
      this.logLevel = fromEnv;
    }
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  debug(message: string, meta?: unknown): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log('error', message, meta);
  }

  // stdout carries command output only
  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const prefix = this.getLevelPrefix(level);
    const metaStr = meta !== undefined ? ` ${this.formatMeta(meta)}` : '';
    const [first, ...rest] = message.split('\n');
    const continuation = rest.map(line => `\n${' '.repeat(13)}${this.formatMessage(level, line)}`);

    console.error(`${prefix} ${this.formatMessage(level, first)}${metaStr}${continuation.join('')}`);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.logLevel];
  }

  private getLevelPrefix(level: LogLevel): string {
    const prefixes = {
      debug: chalk.cyan('DEBUG'),
      info: chalk.blue('INFO '),
      warn: chalk.yellow('WARN '),
      error: chalk.red('ERROR'),
    };
    return `pyprov ${prefixes[level]}`;
  }

  private formatMessage(level: LogLevel, message: string): string {
    switch (level) {
      case 'error':
        return chalk.red(message);
      case 'warn':
        return chalk.yellow(message);
      case 'debug':
        return chalk.gray(message);
      default:
        return message;
    }
  }

  private formatMeta(meta: unknown): string {
    if (typeof meta === 'string') {
      return chalk.gray(`(${meta})`);
    }

    if (meta instanceof Error) {
      return chalk.red(`(${meta.message})`);
    }

    try {
      return chalk.gray(`(${JSON.stringify(meta)})`);
    } catch {
      return chalk.gray(`(${String(meta)})`);
    }
  }
}

export const logger = Logger.getInstance();
