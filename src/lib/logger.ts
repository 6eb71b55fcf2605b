import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, string>;

/**
 * Leveled logger handed to every component. Use `child()` to bind fields
 * such as the application name, so each line can be traced back to the
 * worker that wrote it.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(fields: LogFields): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .map(([key, value]) => `${key}=${value}`)
    .join(' ');
}

export class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(
    private readonly level: LogLevel = 'warn',
    private readonly fields: LogFields = {}
  ) {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  debug(message: string): void {
    if (this.enabled('debug')) {
      console.log(chalk.dim('debug:'), this.decorate(message));
    }
  }

  info(message: string): void {
    if (this.enabled('info')) {
      console.log(chalk.gray(this.decorate(message)));
    }
  }

  warn(message: string): void {
    if (this.enabled('warn')) {
      console.log(
        chalk.yellow.bold('!'),
        chalk.yellow('warning:'),
        this.decorate(message)
      );
    }
  }

  error(message: string): void {
    if (this.enabled('error')) {
      console.error(chalk.red('✗ error:'), this.decorate(message));
    }
  }

  child(fields: LogFields): Logger {
    return new ConsoleLogger(this.level, {...this.fields, ...fields});
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }

  private decorate(message: string): string {
    const suffix = formatFields(this.fields);
    return suffix ? `${message} ${chalk.gray(suffix)}` : message;
  }
}

/**
 * Logger that drops everything. Handy for library callers and tests.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
