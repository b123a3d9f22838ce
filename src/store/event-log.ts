import { appendFileSync, existsSync, mkdirSync, readFileSync } from 'fs';
import { dirname } from 'path';
import type { LifecycleTag } from '../types/index.js';

export interface EventRecord {
  timestamp: string;
  tag: LifecycleTag;
  requestId?: string;
  message: string;
}

const LINE_PATTERN = /^(\S+) (SCAN|REQUEST_START|REQUEST_SUCCESS|REQUEST_FAILED|REQUEST_SKIP) (\S+) ?(.*)$/;

function isLifecycleTag(value: string): value is LifecycleTag {
  return (
    value === 'SCAN' ||
    value === 'REQUEST_START' ||
    value === 'REQUEST_SUCCESS' ||
    value === 'REQUEST_FAILED' ||
    value === 'REQUEST_SKIP'
  );
}

/**
 * Append-only diagnostic log kept beside the exchange directories.
 * One line per lifecycle event: `<timestamp> <TAG> <request id or -> <message>`.
 */
export class EventLog {
  private logPath: string;

  constructor(logPath: string) {
    this.logPath = logPath;

    const dir = dirname(logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  get path(): string {
    return this.logPath;
  }

  log(tag: LifecycleTag, requestId: string | undefined, message: string): EventRecord {
    const record: EventRecord = {
      timestamp: new Date().toISOString(),
      tag,
      requestId,
      message: message.replace(/[\r\n]+/g, ' ')
    };

    appendFileSync(this.logPath, `${record.timestamp} ${record.tag} ${record.requestId ?? '-'} ${record.message}\n`);

    return record;
  }

  read(): EventRecord[] {
    if (!existsSync(this.logPath)) return [];

    const content = readFileSync(this.logPath, 'utf-8');
    const records: EventRecord[] = [];

    for (const line of content.split('\n')) {
      const match = LINE_PATTERN.exec(line);
      if (!match || !isLifecycleTag(match[2])) continue;

      records.push({
        timestamp: match[1],
        tag: match[2],
        requestId: match[3] === '-' ? undefined : match[3],
        message: match[4]
      });
    }

    return records;
  }
}
