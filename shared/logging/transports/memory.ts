/**
 * Memory Transport
 *
 * Keeps the most recent entries in process. Used by tests to assert on what
 * was logged, and by the CLI's `logs` command.
 */

import type { LogTransport, LogEntry, LogLevel } from "../types.js";

export interface MemoryTransportOptions {
  minLevel?: LogLevel;
  /** Oldest entries are dropped past this many (default: 500) */
  capacity?: number;
}

export class MemoryTransport implements LogTransport {
  name = "memory";
  minLevel: LogLevel;
  private capacity: number;
  private entries: LogEntry[] = [];

  constructor(options: MemoryTransportOptions = {}) {
    this.minLevel = options.minLevel ?? "trace";
    this.capacity = options.capacity ?? 500;
  }

  log(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getLast(count: number): LogEntry[] {
    return this.entries.slice(-count);
  }

  clear(): void {
    this.entries = [];
  }
}
