import type { LogLevel, Logger } from '../../logging';

export interface LogEntry {
  level: LogLevel;
  name: string;
  message: string;
}

/** Logger that keeps every line, children included, for assertions. */
export class MemoryLogger implements Logger {
  constructor(
    readonly name = 'test',
    readonly entries: LogEntry[] = []
  ) {}

  debug(message: string): void {
    this.entries.push({ level: 'debug', name: this.name, message });
  }

  info(message: string): void {
    this.entries.push({ level: 'info', name: this.name, message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', name: this.name, message });
  }

  error(message: string): void {
    this.entries.push({ level: 'error', name: this.name, message });
  }

  child(name: string): Logger {
    return new MemoryLogger(`${this.name}.${name}`, this.entries);
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter(entry => entry.level === level).map(entry => entry.message);
  }
}
