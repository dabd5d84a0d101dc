/**
 * Cache Service
 *
 * Two-tier, content-addressed memoization store. Callers check it before
 * reserving budget so an identical repeated request is paid for once.
 *
 * get: memory, then disk (a disk hit is promoted into memory).
 * set: both tiers, then a disk sweep if the last one is older than
 * sweepIntervalMs. Disk failures are logged and never reach the caller.
 */

import { CacheSettings } from '../../config/settings';
import { createServiceLogger } from '../../observability/logger';
import { cacheLookupsTotal } from '../../observability/metrics';
import { Clock, systemClock } from '../../utils/clock';
import { cacheKey, JsonValue } from './cache.key';
import { CACHE_FORMAT, DiskTier, SweepResult } from './disk.tier';
import { MemoryTier, readMemoryValue } from './memory.tier';

const log = createServiceLogger('cache-service');

export interface CacheStats {
  hits: number;
  misses: number;
  memoryHits: number;
  diskHits: number;
  sets: number;
  evictions: number;
  sweeps: number;
  hitRate: number;
  memoryEntries: number;
}

export interface MemoizeOptions<T extends JsonValue> {
  /** Rejects a cached value of the wrong shape; it is then recomputed */
  isValue: (value: JsonValue) => value is T;
  ttlMs?: number;
}

export class CacheService {
  private readonly memory: MemoryTier;
  private readonly disk: DiskTier;
  private readonly settings: CacheSettings;
  private readonly clock: Clock;
  private lastSweepAt: number | null = null;
  private readonly inFlight = new Map<string, Promise<JsonValue>>();
  private readonly counters = {
    hits: 0,
    misses: 0,
    memoryHits: 0,
    diskHits: 0,
    sets: 0,
    evictions: 0,
    sweeps: 0,
  };

  constructor(settings: CacheSettings, clock: Clock = systemClock) {
    this.settings = settings;
    this.clock = clock;
    this.memory = new MemoryTier(settings.memoryMaxEntries, clock);
    this.disk = new DiskTier(settings.dir, clock);
  }

  async get(namespace: string, key: JsonValue): Promise<JsonValue | undefined> {
    const hash = cacheKey(namespace, key);

    const cached = this.memory.get(hash);
    if (cached !== undefined && cached !== 'expired') {
      this.counters.hits += 1;
      this.counters.memoryHits += 1;
      cacheLookupsTotal.inc({ tier: 'memory', outcome: 'hit' });
      return readMemoryValue(cached);
    }
    cacheLookupsTotal.inc({ tier: 'memory', outcome: cached ?? 'miss' });

    const read = await this.disk.read(hash);
    cacheLookupsTotal.inc({ tier: 'disk', outcome: read.status });
    if (read.status !== 'hit') {
      this.counters.misses += 1;
      return undefined;
    }

    const { record } = read;
    this.counters.hits += 1;
    this.counters.diskHits += 1;
    this.counters.evictions += this.memory.set(hash, {
      namespace,
      json: JSON.stringify(record.value),
      expiresAt: Math.min(
        record.writtenAt + record.ttlMs,
        this.clock.now() + this.settings.memoryTtlMs
      ),
    });
    return record.value;
  }

  async set(
    namespace: string,
    key: JsonValue,
    value: JsonValue,
    ttlMs: number = this.settings.ttlMs
  ): Promise<void> {
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new RangeError(`Cache ttlMs must be greater than 0, got ${ttlMs}`);
    }

    const hash = cacheKey(namespace, key);
    const now = this.clock.now();

    this.counters.sets += 1;
    this.counters.evictions += this.memory.set(hash, {
      namespace,
      json: JSON.stringify(value),
      expiresAt: now + Math.min(ttlMs, this.settings.memoryTtlMs),
    });

    try {
      await this.disk.write({ format: CACHE_FORMAT, namespace, key: hash, value, writtenAt: now, ttlMs });
      await this.maybeSweep(now);
    } catch (error) {
      log.warn({ namespace, key: hash, err: error }, 'Cache disk write failed');
    }
  }

  async has(namespace: string, key: JsonValue): Promise<boolean> {
    return (await this.get(namespace, key)) !== undefined;
  }

  /**
   * @returns whether either tier held the entry
   */
  async delete(namespace: string, key: JsonValue): Promise<boolean> {
    const hash = cacheKey(namespace, key);
    const inMemory = this.memory.delete(hash);
    const onDisk = await this.disk.remove(hash);
    return inMemory || onDisk;
  }

  async clear(namespace?: string): Promise<void> {
    this.memory.clear(namespace);
    const removed = await this.disk.clear(namespace);
    log.info({ namespace: namespace ?? '*', removed }, 'Cache cleared');
  }

  /**
   * Cached value when present and of the expected shape; otherwise compute,
   * store and return it. Concurrent calls for one key share a single compute.
   */
  async memoize<T extends JsonValue>(
    namespace: string,
    key: JsonValue,
    compute: () => Promise<T>,
    options: MemoizeOptions<T>
  ): Promise<T> {
    const hash = cacheKey(namespace, key);
    const pending = this.inFlight.get(hash);
    if (pending) {
      const shared = await pending;
      if (options.isValue(shared)) return shared;
    }

    const run = this.lookupOrCompute(namespace, key, compute, options);
    this.inFlight.set(hash, run);
    try {
      return await run;
    } finally {
      if (this.inFlight.get(hash) === run) {
        this.inFlight.delete(hash);
      }
    }
  }

  private async lookupOrCompute<T extends JsonValue>(
    namespace: string,
    key: JsonValue,
    compute: () => Promise<T>,
    options: MemoizeOptions<T>
  ): Promise<T> {
    const cached = await this.get(namespace, key);
    if (cached !== undefined && options.isValue(cached)) {
      return cached;
    }

    const value = await compute();
    await this.set(namespace, key, value, options.ttlMs);
    return value;
  }

  /**
   * Sweep the disk tier now, regardless of the interval
   */
  async sweep(): Promise<SweepResult> {
    this.lastSweepAt = this.clock.now();
    const result = await this.disk.sweep(this.settings.maxBytes);
    this.counters.sweeps += 1;
    this.counters.evictions += result.evicted;
    return result;
  }

  private async maybeSweep(now: number): Promise<void> {
    if (this.lastSweepAt !== null && now - this.lastSweepAt < this.settings.sweepIntervalMs) {
      return;
    }
    await this.sweep();
  }

  getStats(): CacheStats {
    const lookups = this.counters.hits + this.counters.misses;
    return {
      ...this.counters,
      hitRate: lookups > 0 ? this.counters.hits / lookups : 0,
      memoryEntries: this.memory.size,
    };
  }
}
