import { Clock } from '../../utils/clock';
import { isJsonValue, JsonValue } from './cache.key';

export interface MemoryEntry {
  namespace: string;
  /** Serialized, so callers never share an object with the cache */
  json: string;
  expiresAt: number;
}

export function readMemoryValue(entry: MemoryEntry): JsonValue {
  const value: unknown = JSON.parse(entry.json);
  if (!isJsonValue(value)) {
    throw new TypeError('Memory cache entry does not hold a JSON value');
  }
  return value;
}

/**
 * Tier 1: bounded in-process map. Each entry carries its own expiry; over
 * capacity, the entries closest to expiry go first.
 */
export class MemoryTier {
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(
    private readonly maxEntries: number,
    private readonly clock: Clock
  ) {}

  get size(): number {
    return this.entries.size;
  }

  /**
   * Expired entries are removed and reported as 'expired'
   */
  get(hash: string): MemoryEntry | 'expired' | undefined {
    const entry = this.entries.get(hash);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.clock.now()) {
      this.entries.delete(hash);
      return 'expired';
    }
    return entry;
  }

  /**
   * @returns number of entries evicted to stay within capacity
   */
  set(hash: string, entry: MemoryEntry): number {
    this.entries.delete(hash);
    this.entries.set(hash, entry);

    let evicted = 0;
    while (this.entries.size > this.maxEntries) {
      let victim: string | null = null;
      let earliest = Infinity;
      for (const [candidate, { expiresAt }] of this.entries) {
        if (expiresAt < earliest) {
          earliest = expiresAt;
          victim = candidate;
        }
      }
      if (victim === null) break;
      this.entries.delete(victim);
      evicted += 1;
    }
    return evicted;
  }

  delete(hash: string): boolean {
    return this.entries.delete(hash);
  }

  clear(namespace?: string): void {
    if (namespace === undefined) {
      this.entries.clear();
      return;
    }
    for (const [hash, entry] of this.entries) {
      if (entry.namespace === namespace) {
        this.entries.delete(hash);
      }
    }
  }
}
