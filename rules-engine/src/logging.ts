/**
 * logging.ts
 *
 * Structured game log. The sink is optional everywhere it is accepted;
 * engine behaviour is the same with or without one.
 */

import { debug } from './utils/debug';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  /** Kind tag such as `damage` or `responseWindow` */
  readonly eventType: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly data?: Readonly<Record<string, unknown>>;
}

export interface LogSink {
  log(entry: LogEntry): void;
}

/**
 * Collects entries in memory for hosts that replay or display them
 */
export class InMemoryLogSink implements LogSink {
  private readonly entries: LogEntry[] = [];

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  getEntries(): readonly LogEntry[] {
    return [...this.entries];
  }

  ofType(eventType: string): LogEntry[] {
    return this.entries.filter(e => e.eventType === eventType);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/**
 * Write to the sink when present and mirror to the debug log
 */
export function logTo(sink: LogSink | undefined, entry: LogEntry): void {
  debug(entry.level === 'debug' ? 2 : 1, `[${entry.eventType}] ${entry.message}`);
  sink?.log(entry);
}
