import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import * as log from '../utils/logger.js';

export const FAILURE_SENTINEL = '<failure>';

export interface RequestLogRecord {
  timestamp: Date;
  requester: string;
  /** Artifact path, or FAILURE_SENTINEL. */
  result: string;
  requestText: string;
}

/**
 * Append-only audit trail of generation attempts, one line per attempt:
 * `<timestamp> <requester> <result> <requestText>`.
 *
 * Every append opens, writes and closes the file, so several writers (other
 * processes included) interleave at line granularity. Write failures are
 * logged and swallowed.
 */
export class RequestLog {
  private filePath: string;
  private inFlight = new Set<Promise<void>>();
  private closed = false;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async open(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    this.closed = false;
  }

  append(record: RequestLogRecord): Promise<void> {
    if (this.closed) {
      log.warn(`Request log ${this.filePath} is closed, dropping record for ${record.requester}`);
      return Promise.resolve();
    }

    const write = this.write(formatRecord(record));
    this.inFlight.add(write);
    return write.finally(() => this.inFlight.delete(write));
  }

  /** Waits for pending appends. */
  async close(): Promise<void> {
    this.closed = true;
    await Promise.all([...this.inFlight]);
  }

  private async write(line: string): Promise<void> {
    try {
      await appendFile(this.filePath, line, 'utf-8');
    } catch (err) {
      log.warn(`Couldn't add log record to the file ${this.filePath}: ${log.errorMessage(err)}`);
    }
  }
}

export function formatRecord(record: RequestLogRecord): string {
  // One record per line, whatever the request contains
  const requestText = record.requestText.replace(/\r\n|[\r\n]/g, ' ');
  return `${formatTimestamp(record.timestamp)} ${record.requester} ${record.result} ${requestText}\n`;
}

/** `YYYY-MM-DD HH:mm:ss.SSS`, local time. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}
