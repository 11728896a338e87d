/** Log sinks for buffered entries */

import { appendFile } from 'node:fs/promises';
import type { LogEntry, LogSink } from './types.js';

/**
 * Appends entries to a file as JSON lines
 */
export function createFileSink(filePath: string): LogSink {
  return {
    async write(entries: LogEntry[]): Promise<void> {
      if (entries.length === 0) return;
      const lines = entries.map((entry) => JSON.stringify(entry)).join('\n');
      await appendFile(filePath, `${lines}\n`, 'utf-8');
    },
  };
}

export interface MemorySink extends LogSink {
  readonly entries: LogEntry[];
  clear(): void;
}

/**
 * Keeps entries in memory (useful for tests and short-lived tools)
 */
export function createMemorySink(): MemorySink {
  const entries: LogEntry[] = [];
  return {
    entries,
    async write(batch: LogEntry[]): Promise<void> {
      entries.push(...batch);
    },
    clear(): void {
      entries.length = 0;
    },
  };
}
