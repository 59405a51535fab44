import { createHash, randomUUID } from 'crypto';
import { mkdir, readFile, readdir, rename, rm, writeFile } from 'fs/promises';
import path from 'path';
import NodeCache from 'node-cache';

export type QueryValue = string | number;
export type QueryParams = Record<string, QueryValue | undefined>;

/**
 * Store for raw upstream response bodies, keyed by request.
 * Entries are never invalidated unless a TTL is configured.
 */
export interface ResponseCache {
  get<T>(key: string): Promise<T | undefined>;
  set<T>(key: string, value: T): Promise<void>;
  clear(): Promise<void>;
}

export type CacheDriver = 'file' | 'memory' | 'none';

/**
 * Content-addressed key: the same endpoint and parameters always map to the
 * same key, whatever order the parameters were given in.
 */
export function createCacheKey(endpoint: string, params: QueryParams = {}): string {
  const query = Object.keys(params)
    .filter(key => params[key] !== undefined)
    .sort()
    .map(key => `${key}=${params[key]}`)
    .join('&');

  return createHash('sha256').update(`${endpoint}?${query}`).digest('hex');
}

export class MemoryResponseCache implements ResponseCache {
  private cache: NodeCache;

  constructor(ttlSeconds = 0) {
    this.cache = new NodeCache({
      stdTTL: ttlSeconds,
      useClones: false,
      checkperiod: ttlSeconds > 0 ? 600 : 0,
    });
  }

  async get<T>(key: string): Promise<T | undefined> {
    return this.cache.get<T>(key);
  }

  async set<T>(key: string, value: T): Promise<void> {
    this.cache.set(key, value);
  }

  async clear(): Promise<void> {
    this.cache.flushAll();
  }
}

interface FileCacheEntry<T> {
  value: T;
  // epoch ms, null when entries never expire
  expiresAt: number | null;
}

/**
 * One JSON file per key. Writes land in a unique temp file that is renamed
 * over the target, so concurrent writers never leave a torn file behind.
 * Expired entries are deleted when read.
 */
export class FileResponseCache implements ResponseCache {
  constructor(
    private readonly directory: string,
    private readonly ttlSeconds = 0,
    private readonly now: () => number = Date.now
  ) {}

  private filePath(key: string): string {
    return path.join(this.directory, `${key}.json`);
  }

  async get<T>(key: string): Promise<T | undefined> {
    let contents: string;
    try {
      contents = await readFile(this.filePath(key), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    const entry: FileCacheEntry<T> = JSON.parse(contents);
    if (typeof entry.expiresAt === 'number' && this.now() >= entry.expiresAt) {
      await rm(this.filePath(key), { force: true });
      return undefined;
    }
    return entry.value;
  }

  async set<T>(key: string, value: T): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const entry: FileCacheEntry<T> = {
      value,
      expiresAt: this.ttlSeconds > 0 ? this.now() + this.ttlSeconds * 1000 : null,
    };
    const target = this.filePath(key);
    const temp = `${target}.${process.pid}.${randomUUID()}.tmp`;
    await writeFile(temp, JSON.stringify(entry, null, 2), 'utf8');
    await rename(temp, target);
  }

  async clear(): Promise<void> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw error;
    }
    await Promise.all(
      entries
        .filter(entry => entry.endsWith('.json'))
        .map(entry => rm(path.join(this.directory, entry), { force: true }))
    );
  }
}

export class NoopResponseCache implements ResponseCache {
  async get<T>(): Promise<T | undefined> {
    return undefined;
  }

  async set(): Promise<void> {}

  async clear(): Promise<void> {}
}

export function createResponseCache(
  driver: CacheDriver,
  options: { directory: string; ttlSeconds: number }
): ResponseCache {
  switch (driver) {
    case 'file':
      return new FileResponseCache(options.directory, options.ttlSeconds);
    case 'memory':
      return new MemoryResponseCache(options.ttlSeconds);
    case 'none':
      return new NoopResponseCache();
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
