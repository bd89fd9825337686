/**
 * Activity log shared by every task of a node.
 *
 * Keeps the most recent lines for the status display and, when a log file
 * is configured, appends every line to it. `add` never yields to the event
 * loop, so lines from concurrent handlers are never interleaved or lost.
 *
 * @module engine/log
 */

import { appendFile } from 'fs/promises';
import { toError } from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Log level indicating the severity of a log entry.
 */
export type LogLevel = 'info' | 'warn' | 'error';

/**
 * A single log line.
 */
export interface LogEntry {
  /** Timestamp when the entry was created */
  timestamp: Date;

  /** Severity level of the entry */
  level: LogLevel;

  /** Human-readable message */
  message: string;
}

export interface ActivityLogOptions {
  /** Number of entries kept in memory (default: 10) */
  capacity?: number;

  /** File every entry is appended to */
  logFile?: string;

  /** Clock, replaceable in tests */
  now?: () => Date;
}

type LogListener = (entry: LogEntry) => void;

// =============================================================================
// ActivityLog
// =============================================================================

/**
 * Bounded, levelled log buffer.
 *
 * @example
 * ```typescript
 * const log = new ActivityLog({ capacity: 10 });
 * log.info('0: alice@laptop - report.pdf (4.0 KB)');
 * log.recent(); // [{ timestamp, level: 'info', message: '0: alice@...' }]
 * ```
 */
export class ActivityLog {
  private readonly capacity: number;
  private readonly now: () => Date;
  private logFile: string | undefined;
  private entries: LogEntry[] = [];
  private listeners = new Set<LogListener>();
  private fileWrites: Promise<void> = Promise.resolve();

  constructor(options: ActivityLogOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? 10);
    this.logFile = options.logFile;
    this.now = options.now ?? (() => new Date());
  }

  info(message: string): LogEntry {
    return this.add('info', message);
  }

  warn(message: string): LogEntry {
    return this.add('warn', message);
  }

  error(message: string): LogEntry {
    return this.add('error', message);
  }

  /**
   * Records an entry, evicting the oldest one past capacity.
   */
  add(level: LogLevel, message: string): LogEntry {
    const entry: LogEntry = { timestamp: this.now(), level, message };

    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }

    this.writeToFile(entry);

    for (const listener of this.listeners) {
      listener(entry);
    }

    return entry;
  }

  /**
   * Returns a copy of the retained entries, oldest first.
   */
  recent(): LogEntry[] {
    return [...this.entries];
  }

  /**
   * Registers a listener called for every new entry.
   *
   * @returns Function that removes the listener
   */
  subscribe(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolves once every pending file write has settled.
   */
  flush(): Promise<void> {
    return this.fileWrites;
  }

  private writeToFile(entry: LogEntry): void {
    if (!this.logFile) {
      return;
    }

    const line = `[${entry.timestamp.toISOString()}] ${entry.level.toUpperCase()} ${entry.message}\n`;

    this.fileWrites = this.fileWrites.then(async () => {
      // Writes queued before a failure are dropped once the sink is disabled
      const logFile = this.logFile;
      if (!logFile) {
        return;
      }
      try {
        await appendFile(logFile, line);
      } catch (err) {
        this.logFile = undefined;
        this.add('warn', `log file disabled: ${toError(err).message}`);
      }
    });
  }
}
