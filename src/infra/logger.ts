import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { isoNow } from '../utils/time.js';

export type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  event: string;
  [key: string]: unknown;
}

const logEntrySchema = z.object({
  ts: z.string(),
  level: z.enum(['info', 'warn', 'error']),
  event: z.string(),
}).passthrough();

/**
 * Append-only NDJSON event log. Writes are chained so lines never interleave.
 */
export class EventLogger {
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly logFilePath: string) {}

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
  }

  log(level: LogLevel, event: string, payload: Record<string, unknown> = {}): Promise<void> {
    const entry: LogEntry = { ...payload, ts: isoNow(), level, event };
    const line = `${JSON.stringify(entry)}\n`;

    const write = this.pending.then(() => fs.appendFile(this.logFilePath, line, 'utf-8'));
    this.pending = write.catch(() => undefined);
    return write;
  }

  async flush(): Promise<void> {
    await this.pending;
  }

  async read(limit = 100): Promise<LogEntry[]> {
    await this.flush();

    let raw: string;
    try {
      raw = await fs.readFile(this.logFilePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw error;
    }

    return raw
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .slice(-limit)
      .map((line): LogEntry => logEntrySchema.parse(JSON.parse(line)));
  }
}
