/**
 * Tier 2: one JSON file per entry, <hash>.cache, in the cache directory.
 * A file whose format tag or fields do not check out is treated as corrupt.
 */

import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from 'fs/promises';
import { Stats } from 'fs';
import path from 'path';
import { v4 as uuid } from 'uuid';

import { createServiceLogger } from '../../observability/logger';
import { Clock } from '../../utils/clock';
import { isJsonValue, JsonValue } from './cache.key';

const log = createServiceLogger('cache-disk');

export const CACHE_FORMAT = 'budget-ledger.cache/v1';
const EXTENSION = '.cache';
/** Size sweeps stop once the directory is back under this share of maxBytes */
const SWEEP_TARGET_RATIO = 0.8;

export interface CacheRecord {
  format: typeof CACHE_FORMAT;
  namespace: string;
  key: string;
  value: JsonValue;
  writtenAt: number;
  ttlMs: number;
}

export type DiskRead =
  | { status: 'hit'; record: CacheRecord }
  | { status: 'miss' }
  | { status: 'expired' }
  | { status: 'corrupt' };

export interface SweepResult {
  expired: number;
  corrupt: number;
  evicted: number;
  remainingBytes: number;
}

// fs errors may come from another realm, where instanceof Error is false
const isMissingFile = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

export function parseCacheRecord(raw: unknown): CacheRecord | null {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return null;
  const fields: Record<string, unknown> = Object.fromEntries(Object.entries(raw));
  const { format, namespace, key, value, writtenAt, ttlMs } = fields;
  if (
    format !== CACHE_FORMAT ||
    typeof namespace !== 'string' ||
    typeof key !== 'string' ||
    !isJsonValue(value) ||
    typeof writtenAt !== 'number' ||
    typeof ttlMs !== 'number'
  ) {
    return null;
  }
  return { format, namespace, key, value, writtenAt, ttlMs };
}

export class DiskTier {
  constructor(
    private readonly directory: string,
    private readonly clock: Clock
  ) {}

  private fileFor(hash: string): string {
    return path.join(this.directory, `${hash}${EXTENSION}`);
  }

  private isExpired(record: CacheRecord): boolean {
    return record.writtenAt + record.ttlMs <= this.clock.now();
  }

  private async load(file: string): Promise<CacheRecord | null | undefined> {
    let content: string;
    try {
      content = await readFile(file, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
    try {
      return parseCacheRecord(JSON.parse(content));
    } catch {
      return null;
    }
  }

  /**
   * Expired and corrupt files are deleted as they are found
   */
  async read(hash: string): Promise<DiskRead> {
    const file = this.fileFor(hash);
    const record = await this.load(file);
    if (record === undefined) return { status: 'miss' };

    if (record === null || record.key !== hash) {
      log.debug({ file }, 'Removing corrupt cache entry');
      await this.remove(hash);
      return { status: 'corrupt' };
    }
    if (this.isExpired(record)) {
      await this.remove(hash);
      return { status: 'expired' };
    }
    return { status: 'hit', record };
  }

  async write(record: CacheRecord): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const file = this.fileFor(record.key);
    const temp = `${file}.${uuid()}.tmp`;
    await writeFile(temp, JSON.stringify(record), 'utf8');
    await rename(temp, file);
  }

  async remove(hash: string): Promise<boolean> {
    try {
      await rm(this.fileFor(hash));
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  private async listFiles(): Promise<string[]> {
    try {
      const names = await readdir(this.directory);
      return names.filter((name) => name.endsWith(EXTENSION));
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
  }

  /**
   * Delete every entry of a namespace, or every entry when none is given
   */
  async clear(namespace?: string): Promise<number> {
    let removed = 0;
    for (const name of await this.listFiles()) {
      const file = path.join(this.directory, name);
      if (namespace !== undefined) {
        const record = await this.load(file);
        if (!record || record.namespace !== namespace) continue;
      }
      await rm(file, { force: true });
      removed += 1;
    }
    return removed;
  }

  /**
   * Drop expired and corrupt files, then the least recently written until
   * the directory is under SWEEP_TARGET_RATIO of maxBytes
   */
  async sweep(maxBytes: number): Promise<SweepResult> {
    const result: SweepResult = { expired: 0, corrupt: 0, evicted: 0, remainingBytes: 0 };
    const survivors: { file: string; size: number; mtimeMs: number }[] = [];

    for (const name of await this.listFiles()) {
      const file = path.join(this.directory, name);
      const record = await this.load(file);
      if (record === undefined) continue;

      if (record === null || `${record.key}${EXTENSION}` !== name) {
        await rm(file, { force: true });
        result.corrupt += 1;
        continue;
      }
      if (this.isExpired(record)) {
        await rm(file, { force: true });
        result.expired += 1;
        continue;
      }

      let info: Stats;
      try {
        info = await stat(file);
      } catch (error) {
        if (isMissingFile(error)) continue;
        throw error;
      }
      survivors.push({ file, size: info.size, mtimeMs: info.mtimeMs });
    }

    let total = survivors.reduce((sum, entry) => sum + entry.size, 0);
    const target = maxBytes * SWEEP_TARGET_RATIO;
    if (total > target) {
      survivors.sort((a, b) => a.mtimeMs - b.mtimeMs);
      for (const entry of survivors) {
        if (total <= target) break;
        await rm(entry.file, { force: true });
        total -= entry.size;
        result.evicted += 1;
      }
    }

    result.remainingBytes = total;
    if (result.expired + result.corrupt + result.evicted > 0) {
      log.debug(result, 'Cache sweep removed entries');
    }
    return result;
  }
}
