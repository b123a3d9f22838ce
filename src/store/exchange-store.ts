import { mkdir, readFile, readdir, rename, stat, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { setTimeout as sleep } from 'timers/promises';
import type { ExchangeKind } from '../types/index.js';
import { errorMessage } from '../errors.js';

const ENTRY_SUFFIX = '.json';
const TEMP_SUFFIX = '.json.tmp';
const ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export type ReadOutcome<T> =
  | { status: 'absent' }
  | { status: 'ok'; value: T }
  | { status: 'corrupt'; error: string };

export interface ExchangeStoreOptions {
  readRetries?: number;
  readBackoffMs?: number;
}

export interface StoreStats {
  pendingRequests: number;
  pendingResponses: number;
}

// fs errors may come from another realm, so match on shape rather than class
function isMissing(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export function isValidExchangeId(id: string): boolean {
  return ID_PATTERN.test(id) && !id.endsWith('.tmp');
}

export class ExchangeStore {
  readonly root: string;
  private readRetries: number;
  private readBackoffMs: number;

  constructor(root: string, options: ExchangeStoreOptions = {}) {
    this.root = root;
    this.readRetries = options.readRetries ?? 3;
    this.readBackoffMs = options.readBackoffMs ?? 50;
  }

  get logDir(): string {
    return join(this.root, 'logs');
  }

  dir(kind: ExchangeKind): string {
    return join(this.root, kind);
  }

  pathFor(kind: ExchangeKind, id: string): string {
    if (!isValidExchangeId(id)) {
      throw new Error(`Invalid exchange id: ${id}`);
    }
    return join(this.dir(kind), `${id}${ENTRY_SUFFIX}`);
  }

  async init(): Promise<void> {
    for (const dir of [this.dir('requests'), this.dir('responses'), this.logDir]) {
      await mkdir(dir, { recursive: true });
    }
  }

  // Readers only ever see the final name, which appears after the rename completes
  async publish(kind: ExchangeKind, id: string, bytes: Buffer): Promise<void> {
    const finalPath = this.pathFor(kind, id);
    const tempPath = join(this.dir(kind), `${id}${TEMP_SUFFIX}`);

    await writeFile(tempPath, bytes);
    try {
      await rename(tempPath, finalPath);
    } catch (error) {
      try {
        await unlink(tempPath);
      } catch (cleanupError) {
        if (!isMissing(cleanupError)) {
          throw new AggregateError([error, cleanupError], `Failed to publish ${kind}/${id}`);
        }
      }
      throw error;
    }
  }

  async exists(kind: ExchangeKind, id: string): Promise<boolean> {
    try {
      await stat(this.pathFor(kind, id));
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  /**
   * Read and parse one entry without blocking on its arrival.
   *
   * Network filesystems can briefly expose a renamed file before its content is
   * visible, so an empty or unparseable file is retried with linear backoff
   * before it is reported corrupt.
   */
  async tryRead<T>(kind: ExchangeKind, id: string, parse: (bytes: Buffer) => T): Promise<ReadOutcome<T>> {
    const path = this.pathFor(kind, id);
    let lastError = 'empty file';

    for (let attempt = 0; attempt <= this.readRetries; attempt++) {
      if (attempt > 0) {
        await sleep(this.readBackoffMs * attempt);
      }

      let bytes: Buffer;
      try {
        bytes = await readFile(path);
      } catch (error) {
        if (isMissing(error)) return { status: 'absent' };
        lastError = errorMessage(error);
        continue;
      }

      if (bytes.length === 0) {
        lastError = 'empty file';
        continue;
      }

      try {
        return { status: 'ok', value: parse(bytes) };
      } catch (error) {
        lastError = errorMessage(error);
      }
    }

    return { status: 'corrupt', error: lastError };
  }

  async listPending(kind: ExchangeKind): Promise<Set<string>> {
    let names: string[];
    try {
      names = await readdir(this.dir(kind));
    } catch (error) {
      if (isMissing(error)) return new Set();
      throw error;
    }

    const ids = new Set<string>();
    for (const name of names) {
      if (name.endsWith(TEMP_SUFFIX) || !name.endsWith(ENTRY_SUFFIX)) continue;
      const id = name.slice(0, -ENTRY_SUFFIX.length);
      if (isValidExchangeId(id)) ids.add(id);
    }
    return ids;
  }

  async listStale(kind: ExchangeKind, olderThanMs: number, now: number = Date.now()): Promise<string[]> {
    const stale: string[] = [];
    for (const id of await this.listPending(kind)) {
      try {
        const info = await stat(this.pathFor(kind, id));
        if (now - info.mtimeMs > olderThanMs) stale.push(id);
      } catch (error) {
        if (!isMissing(error)) throw error;
      }
    }
    return stale;
  }

  // Either side may already have removed the entry
  async delete(kind: ExchangeKind, id: string): Promise<boolean> {
    try {
      await unlink(this.pathFor(kind, id));
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  async stats(): Promise<StoreStats> {
    const [requests, responses] = await Promise.all([
      this.listPending('requests'),
      this.listPending('responses')
    ]);
    return { pendingRequests: requests.size, pendingResponses: responses.size };
  }
}
