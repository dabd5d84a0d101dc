/**
 * Local fallback backend
 *
 * One append-only JSON-lines log per principal and table:
 *   <directory>/<principal>_<table>.jsonl
 *
 * A process only ever appends to its own principal's files. Reads replay
 * every principal's log for the table (inserts first, then updates in
 * timestamp order) so a receiver's read-flag updates apply to records the
 * sender wrote. Lines that do not parse are skipped.
 */

import { appendFile, mkdir, readdir, readFile } from 'fs/promises';
import path from 'path';

import { createServiceLogger } from '../observability/logger';
import { Clock, systemClock } from '../utils/clock';
import { isPlainObject } from './store.codecs';
import { applySelectOptions, matchesFilters } from './store.filters';
import { Filters, SelectOptions, StoreBackend, StoredRecord, TableName, TableSpec } from './store.types';

const log = createServiceLogger('file-backend');

export interface FileBackendOptions {
  directory: string;
  principal: string;
  clock?: Clock;
}

type LogEntry =
  | { op: 'insert'; at: string; record: unknown }
  | { op: 'update'; at: string; filters: Record<string, unknown>; patch: Record<string, unknown> };

// fs errors may come from another realm, where instanceof Error is false
const isMissingFile = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

function toLogEntry(value: unknown): LogEntry | null {
  if (!isPlainObject(value)) return null;
  const { op, at, filters, patch } = value;
  if (typeof at !== 'string') return null;
  if (op === 'insert' && 'record' in value) {
    return { op, at, record: value.record };
  }
  if (op === 'update' && isPlainObject(filters) && isPlainObject(patch)) {
    return { op, at, filters, patch };
  }
  return null;
}

export class FileLogBackend implements StoreBackend {
  readonly name = 'file-log';
  private readonly directory: string;
  private readonly principal: string;
  private readonly clock: Clock;

  constructor(options: FileBackendOptions) {
    this.directory = options.directory;
    this.principal = options.principal;
    this.clock = options.clock ?? systemClock;
  }

  logFile(table: TableName): string {
    return path.join(this.directory, `${this.principal}_${table}.jsonl`);
  }

  async insert<T extends StoredRecord>(table: TableSpec<T>, record: T): Promise<void> {
    await this.append(table, { op: 'insert', at: this.timestamp(), record });
  }

  async select<T extends StoredRecord>(
    table: TableSpec<T>,
    filters: Filters<T>,
    options: SelectOptions<T> = {}
  ): Promise<T[]> {
    const records = await this.replay(table);
    return applySelectOptions(
      records.filter((record) => matchesFilters(record, filters)),
      options
    );
  }

  async updateWhere<T extends StoredRecord>(
    table: TableSpec<T>,
    filters: Filters<T>,
    patch: Partial<T>
  ): Promise<number> {
    const records = await this.replay(table);
    const matched = records.filter((record) => matchesFilters(record, filters)).length;

    if (matched > 0) {
      await this.append(table, {
        op: 'update',
        at: this.timestamp(),
        filters: { ...filters },
        patch: { ...patch },
      });
    }

    return matched;
  }

  private timestamp(): string {
    return new Date(this.clock.now()).toISOString();
  }

  private async append<T extends StoredRecord>(table: TableSpec<T>, entry: LogEntry): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    await appendFile(this.logFile(table.name), `${JSON.stringify(entry)}\n`, 'utf8');
  }

  private async readEntries(table: string): Promise<LogEntry[]> {
    let files: string[];
    try {
      files = await readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const suffix = `_${table}.jsonl`;
    const entries: LogEntry[] = [];

    for (const file of files.filter((name) => name.endsWith(suffix)).sort()) {
      const content = await readFile(path.join(this.directory, file), 'utf8');
      content.split('\n').forEach((line, index) => {
        if (line.trim() === '') return;
        let entry: LogEntry | null = null;
        try {
          entry = toLogEntry(JSON.parse(line));
        } catch {
          entry = null;
        }
        if (entry) {
          entries.push(entry);
        } else {
          log.warn({ file, line: index + 1 }, 'Skipping unreadable fallback log line');
        }
      });
    }

    return entries;
  }

  private async replay<T extends StoredRecord>(table: TableSpec<T>): Promise<T[]> {
    const entries = await this.readEntries(table.name);
    const byTime = (a: LogEntry, b: LogEntry): number => Date.parse(a.at) - Date.parse(b.at);

    let records: T[] = [];
    for (const entry of entries.filter((item) => item.op === 'insert').sort(byTime)) {
      if (entry.op !== 'insert') continue;
      try {
        records.push(table.parse(entry.record));
      } catch (error) {
        log.warn({ table: table.name, err: error }, 'Skipping malformed fallback record');
      }
    }

    for (const entry of entries.filter((item) => item.op === 'update').sort(byTime)) {
      if (entry.op !== 'update') continue;
      records = records.map((record) => {
        if (!matchesFilters(record, entry.filters)) return record;
        try {
          return table.parse({ ...record, ...entry.patch });
        } catch (error) {
          log.warn({ table: table.name, err: error }, 'Skipping malformed fallback update');
          return record;
        }
      });
    }

    return records;
  }
}
