// Response cache: canonical request → finalized canonical response.
// LRU bounded, lazily expired, safe to share between concurrent requests.
import type { CanonicalRequest, CanonicalResponse } from "./canonical.js";
import { cacheKey } from "./cache-key.js";
import { CacheError } from "./errors.js";
import type { Logger } from "./logger.js";

export interface CacheEntry {
  key: string;
  value: CanonicalResponse;
  /** epoch ms */
  createdAt: number;
  ttlMs: number;
  lastAccessedAt: number;
}

/**
 * Storage behind the cache. Async so that a networked store can sit here;
 * implementations own recency and capacity.
 */
export interface CacheBackend {
  /** Read an entry and mark it most recently used */
  get(key: string): Promise<CacheEntry | undefined>;
  /** Store an entry; resolves to the number of entries evicted to make room */
  set(entry: CacheEntry): Promise<number>;
  /** Remove an entry; with `expected`, only while that entry is still the one stored */
  delete(key: string, expected?: CacheEntry): Promise<boolean>;
  entries(): Promise<CacheEntry[]>;
  size(): Promise<number>;
  clear(): Promise<void>;
  close(): Promise<void>;
}

/** In-process LRU: a Map kept in recency order (oldest first) */
export class MemoryCacheBackend implements CacheBackend {
  private readonly map = new Map<string, CacheEntry>();

  constructor(private readonly maxEntries: number) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    const entry = this.map.get(key);
    if (entry) {
      this.map.delete(key);
      this.map.set(key, entry);
    }
    return entry;
  }

  async set(entry: CacheEntry): Promise<number> {
    this.map.delete(entry.key);
    this.map.set(entry.key, entry);
    let evicted = 0;
    while (this.map.size > this.maxEntries) {
      const oldest = this.map.keys().next();
      if (oldest.done) break;
      this.map.delete(oldest.value);
      evicted++;
    }
    return evicted;
  }

  async delete(key: string, expected?: CacheEntry): Promise<boolean> {
    if (expected && this.map.get(key) !== expected) return false;
    return this.map.delete(key);
  }

  async entries(): Promise<CacheEntry[]> {
    return [...this.map.values()];
  }

  async size(): Promise<number> {
    return this.map.size;
  }

  async clear(): Promise<void> {
    this.map.clear();
  }

  async close(): Promise<void> {
    this.map.clear();
  }
}

export interface CacheStats {
  hits: number;
  misses: number;
  stores: number;
  evictions: number;
  expirations: number;
  /** puts refused by eligibility or size */
  skipped: number;
  /** backend failures absorbed as misses */
  errors: number;
  size: number;
  hitRate: number;
}

export interface ResponseCacheOptions {
  maxEntries: number;
  ttlMs: number;
  namespace: string;
  /** Entries whose serialized value exceeds this are not stored */
  maxEntryBytes?: number;
  backend?: CacheBackend;
  now?: () => number;
  logger?: Logger;
}

export interface CacheableOptions {
  /** Caller opted this request out of caching */
  noStore?: boolean;
}

export class ResponseCache {
  private readonly backend: CacheBackend;
  private readonly ttlMs: number;
  private readonly namespace: string;
  private readonly maxEntryBytes: number;
  private readonly now: () => number;
  private readonly log: Logger | undefined;
  private closed = false;
  private counters = { hits: 0, misses: 0, stores: 0, evictions: 0, expirations: 0, skipped: 0, errors: 0 };

  constructor(options: ResponseCacheOptions) {
    this.backend = options.backend ?? new MemoryCacheBackend(options.maxEntries);
    this.ttlMs = options.ttlMs;
    this.namespace = options.namespace;
    this.maxEntryBytes = options.maxEntryBytes ?? Number.POSITIVE_INFINITY;
    this.now = options.now ?? Date.now;
    this.log = options.logger?.child({ module: "response-cache" });
  }

  keyFor(req: CanonicalRequest): string {
    return cacheKey(req, this.namespace);
  }

  /** Requests that call a tool with side effects, or that opted out, are never stored */
  isCacheable(req: CanonicalRequest, options: CacheableOptions = {}): boolean {
    if (options.noStore) return false;
    return !(req.tools ?? []).some((t) => !t.idempotent);
  }

  async get(req: CanonicalRequest): Promise<CanonicalResponse | undefined> {
    if (this.closed) return undefined;
    const key = this.keyFor(req);
    let entry: CacheEntry | undefined;
    try {
      entry = await this.backend.get(key);
    } catch (err) {
      this.absorb(new CacheError("cache read failed", { cause: err }), key);
      this.counters.misses++;
      return undefined;
    }

    if (!entry) {
      this.counters.misses++;
      return undefined;
    }

    const now = this.now();
    if (now - entry.createdAt >= entry.ttlMs) {
      this.counters.expirations++;
      this.counters.misses++;
      try {
        // a put may have replaced the entry while we were reading it
        await this.backend.delete(key, entry);
      } catch (err) {
        this.absorb(new CacheError("cache delete failed", { cause: err }), key);
      }
      return undefined;
    }

    entry.lastAccessedAt = now;
    this.counters.hits++;
    this.log?.debug({ key }, "cache hit");
    return structuredClone(entry.value);
  }

  /** Store a finalized response. Resolves to whether it was stored. */
  async put(
    req: CanonicalRequest,
    value: CanonicalResponse,
    options: CacheableOptions & { ttlMs?: number } = {},
  ): Promise<boolean> {
    if (this.closed) return false;
    if (!this.isCacheable(req, options)) {
      this.counters.skipped++;
      return false;
    }
    const size = Buffer.byteLength(JSON.stringify(value));
    if (size > this.maxEntryBytes) {
      this.counters.skipped++;
      this.log?.debug({ size, maxEntryBytes: this.maxEntryBytes }, "response too large to cache");
      return false;
    }

    const key = this.keyFor(req);
    const now = this.now();
    const entry: CacheEntry = {
      key,
      value: structuredClone(value),
      createdAt: now,
      ttlMs: options.ttlMs ?? this.ttlMs,
      lastAccessedAt: now,
    };
    try {
      const evicted = await this.backend.set(entry);
      this.counters.stores++;
      this.counters.evictions += evicted;
      return true;
    } catch (err) {
      this.absorb(new CacheError("cache write failed", { cause: err }), key);
      return false;
    }
  }

  /** Drop every entry matching the predicate; resolves to how many were dropped */
  async invalidate(predicate: (entry: CacheEntry) => boolean): Promise<number> {
    let removed = 0;
    for (const entry of await this.backend.entries()) {
      if (predicate(entry) && (await this.backend.delete(entry.key, entry))) removed++;
    }
    return removed;
  }

  async clear(): Promise<void> {
    await this.backend.clear();
  }

  async stats(): Promise<CacheStats> {
    const lookups = this.counters.hits + this.counters.misses;
    let size = 0;
    try {
      size = await this.backend.size();
    } catch (err) {
      this.absorb(new CacheError("cache size failed", { cause: err }));
    }
    return { ...this.counters, size, hitRate: lookups === 0 ? 0 : this.counters.hits / lookups };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.backend.close();
  }

  private absorb(err: CacheError, key?: string): void {
    this.counters.errors++;
    this.log?.warn({ err, key }, err.message);
  }
}
