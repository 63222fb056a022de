import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSource = 'agent' | 'coordinator' | 'gateway' | 'repository' | 'files';

export interface LogEntry {
  id: string;
  timestamp: number;
  level: LogLevel;
  source: LogSource;
  message: string;
  transferId?: string;
  details?: string;
}

const DEFAULT_MAX_ENTRIES = 5000;

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function formatLogEntry(entry: LogEntry): string {
  const timestamp = new Date(entry.timestamp).toISOString();
  const level = entry.level.toUpperCase().padEnd(5);
  const source = entry.source.padEnd(11);
  const transfer = entry.transferId ? ` (${entry.transferId})` : '';
  const details = entry.details ? `\n  ${entry.details}` : '';
  return `[${timestamp}] [${level}] [${source}] ${entry.message}${transfer}${details}`;
}

/**
 * In-memory log of transfer activity, capped at `maxEntries` (oldest dropped first).
 * Emits `entry` with the stored `LogEntry`.
 */
export class TransferLog extends EventEmitter {
  private readonly entries: LogEntry[] = [];
  private readonly maxEntries: number;
  private readonly debugMode: boolean;

  constructor(options?: { maxEntries?: number; debug?: boolean }) {
    super();
    this.maxEntries = options?.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.debugMode = options?.debug ?? false;
  }

  log(
    level: LogLevel,
    source: LogSource,
    message: string,
    context?: { transferId?: string; details?: string },
  ): LogEntry | undefined {
    if (level === 'debug' && !this.debugMode) {
      return undefined;
    }

    const entry: LogEntry = {
      id: randomUUID(),
      timestamp: Date.now(),
      level,
      source,
      message,
      transferId: context?.transferId,
      details: context?.details,
    };

    this.entries.push(entry);
    while (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }

    this.emit('entry', entry);
    return entry;
  }

  debug(source: LogSource, message: string, context?: { transferId?: string; details?: string }): void {
    this.log('debug', source, message, context);
  }

  info(source: LogSource, message: string, context?: { transferId?: string; details?: string }): void {
    this.log('info', source, message, context);
  }

  warn(source: LogSource, message: string, context?: { transferId?: string; details?: string }): void {
    this.log('warn', source, message, context);
  }

  error(source: LogSource, message: string, context?: { transferId?: string; details?: string }): void {
    this.log('error', source, message, context);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }
}
