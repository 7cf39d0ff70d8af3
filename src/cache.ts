/**
 * In-memory cache of rescaled images
 *
 * Eviction is strict LRU by last access. The backing Map keeps keys in
 * recency order: a hit deletes and re-inserts its key, so iteration starts at
 * the least recently used entry and ties fall back to insertion order.
 */

import { createHash } from 'node:crypto';
import type { Logger } from 'pino';
import type { CacheConfig } from './config';
import type { CacheEntry, CacheStats, RequestKey, UpstreamPayload } from './types';
import { formatBytes } from './utils';

export interface CacheStoreOptions extends Partial<CacheConfig> {
  logger: Logger;
  now?: () => number;
}

/**
 * Stable string form of a request key
 */
export function cacheKeyOf(key: RequestKey): string {
  return `${key.variant} ${key.originUrl}`;
}

/**
 * Build a frozen cache entry for freshly rescaled bytes
 */
export function createCacheEntry(key: RequestKey, payload: UpstreamPayload, fetchedAt = Date.now()): CacheEntry {
  const etag = `"${createHash('sha256').update(payload.bytes).digest('hex')}"`;
  return Object.freeze({
    key: Object.freeze({ originUrl: key.originUrl, variant: key.variant }),
    bytes: payload.bytes,
    contentType: payload.contentType,
    fetchedAt,
    size: payload.bytes.byteLength,
    etag,
  });
}

export class CacheStore {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly maxBytes: number;
  private readonly maxEntries: number;
  private readonly maxAgeMs: number;

  private totalBytes = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(options: CacheStoreOptions) {
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.maxBytes = options.maxBytes ?? Number.POSITIVE_INFINITY;
    this.maxEntries = options.maxEntries ?? 0;
    this.maxAgeMs = options.maxAgeMs ?? 0;
  }

  get size(): number {
    return this.entries.size;
  }

  get bytes(): number {
    return this.totalBytes;
  }

  /**
   * Look up an entry and mark it most recently used.
   * Expired entries are purged and reported as absent.
   */
  get(key: RequestKey): CacheEntry | undefined {
    const id = cacheKeyOf(key);
    const entry = this.lookup(id);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    this.entries.delete(id);
    this.entries.set(id, entry);
    this.hits++;
    return entry;
  }

  /**
   * Look up an entry without touching its recency or the hit counters
   */
  peek(key: RequestKey): CacheEntry | undefined {
    return this.lookup(cacheKeyOf(key));
  }

  has(key: RequestKey): boolean {
    return this.peek(key) !== undefined;
  }

  /**
   * Insert or replace the entry for `key`, then evict down to the limits.
   * Returns false when the entry alone exceeds the byte limit and was not stored.
   */
  put(key: RequestKey, entry: CacheEntry): boolean {
    const id = cacheKeyOf(key);

    if (entry.size > this.maxBytes) {
      this.logger.warn(
        { key: id, size: entry.size, maxBytes: this.maxBytes },
        `Not caching ${id}: ${formatBytes(entry.size)} exceeds cache size`
      );
      return false;
    }

    this.remove(id);
    this.entries.set(id, entry);
    this.totalBytes += entry.size;
    this.logger.info({ key: id, size: entry.size }, `Caching ${id}`);

    this.evict();
    return true;
  }

  delete(key: RequestKey): boolean {
    return this.remove(cacheKeyOf(key));
  }

  clear(): void {
    this.entries.clear();
    this.totalBytes = 0;
  }

  /**
   * Remove least recently used entries until both limits hold
   */
  evict(): number {
    let evicted = 0;

    for (const [id, entry] of this.entries) {
      if (!this.overLimit()) break;
      this.remove(id);
      evicted++;
      this.logger.debug({ key: id, size: entry.size }, `Evicted ${id}`);
    }

    this.evictions += evicted;
    if (evicted > 0) {
      this.logger.info(
        { evicted, entries: this.entries.size, bytes: this.totalBytes },
        `Evicted ${evicted} entries, ${formatBytes(this.totalBytes)} cached`
      );
    }
    return evicted;
  }

  stats(): CacheStats {
    return {
      entries: this.entries.size,
      bytes: this.totalBytes,
      maxBytes: this.maxBytes,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }

  private overLimit(): boolean {
    if (this.totalBytes > this.maxBytes) return true;
    return this.maxEntries > 0 && this.entries.size > this.maxEntries;
  }

  private lookup(id: string): CacheEntry | undefined {
    const entry = this.entries.get(id);
    if (!entry) return undefined;

    if (this.maxAgeMs > 0 && this.now() - entry.fetchedAt > this.maxAgeMs) {
      this.remove(id);
      this.expirations++;
      this.logger.debug({ key: id }, `Expired ${id}`);
      return undefined;
    }
    return entry;
  }

  private remove(id: string): boolean {
    const existing = this.entries.get(id);
    if (!existing) return false;
    this.entries.delete(id);
    this.totalBytes -= existing.size;
    return true;
  }
}
