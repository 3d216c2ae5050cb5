/**
 * Bounded in-memory log buffer backing the admin log view.
 * Fixed capacity; the oldest entry is evicted once full.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  tag: string;
  message: string;
  context?: Record<string, unknown>;
}

export interface LogBuffer {
  push(entry: LogEntry): void;
  entries(limit?: number): LogEntry[];
  clear(): void;
  readonly size: number;
  readonly capacity: number;
}

export class RingLogBuffer implements LogBuffer {
  private readonly slots: Array<LogEntry | undefined>;
  private next = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Log buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<LogEntry | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  push(entry: LogEntry): void {
    this.slots[this.next] = entry;
    this.next = (this.next + 1) % this.capacity;
    this.count = Math.min(this.count + 1, this.capacity);
  }

  /**
   * Entries oldest first. With a limit, only the most recent `limit` entries.
   */
  entries(limit?: number): LogEntry[] {
    const start = (this.next - this.count + this.capacity) % this.capacity;
    const result: LogEntry[] = [];
    for (let i = 0; i < this.count; i++) {
      const entry = this.slots[(start + i) % this.capacity];
      if (entry) result.push(entry);
    }
    return limit !== undefined && limit >= 0 ? result.slice(result.length - limit) : result;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.next = 0;
    this.count = 0;
  }
}
