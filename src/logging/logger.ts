import { appendFileSync } from 'fs';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  readonly name: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(name: string): Logger;
}

export interface LoggerOptions {
  name: string;
  /** Append formatted lines to this file. */
  filename?: string | null;
  /** Also print to stderr. */
  console?: boolean;
  level?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const CONSOLE_COLOR: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red
};

function pad(value: string, width: number): string {
  return value.length > width ? value.slice(0, width) : value.padEnd(width);
}

/**
 * `2018-06-01T10:00:00.000 | DEBUG | vcd-testbed     | message`
 */
export function formatLogLine(level: LogLevel, name: string, message: string, now: Date = new Date()): string {
  const timestamp = pad(now.toISOString().replace('Z', ''), 23);
  return `${timestamp} | ${pad(level.toUpperCase(), 5)} | ${pad(name, 15)} | ${message}`;
}

class DestinationLogger implements Logger {
  constructor(private readonly options: Required<LoggerOptions>) {}

  get name(): string {
    return this.options.name;
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  child(name: string): Logger {
    return new DestinationLogger({ ...this.options, name: `${this.options.name}.${name}` });
  }

  private write(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.options.level]) {
      return;
    }

    const line = formatLogLine(level, this.options.name, message);
    if (this.options.filename) {
      appendFileSync(this.options.filename, `${line}\n`, 'utf-8');
    }
    if (this.options.console) {
      console.error(CONSOLE_COLOR[level](line));
    }
  }
}

export function createLogger(options: LoggerOptions): Logger {
  return new DestinationLogger({
    filename: null,
    console: false,
    level: 'debug',
    ...options
  });
}

/** Logger that discards everything, the default when no destination is configured. */
export function createNullLogger(name = 'null'): Logger {
  return createLogger({ name });
}
