/**
 * Ledger Store
 *
 * Front for a primary backend (MongoDB) and the local fallback log.
 *
 * - Every primary call is bounded by timeoutMs.
 * - Writes try the primary, then the fallback once. Failing both is fatal.
 * - Reads go to whichever backend last succeeded; a failing primary read is
 *   retried against the fallback, which becomes active.
 * - A successful primary write makes the primary active again.
 * - A primary document that fails its codec raises RecordFormatError; the
 *   primary stays active and nothing is read from the fallback.
 *
 * Records written to the fallback are not promoted back into the primary.
 */

import { createServiceLogger } from '../observability/logger';
import { storeFallbacksTotal } from '../observability/metrics';
import { withTimeout } from '../utils/timeout';
import {
  ActiveBackend,
  BackendStatus,
  Filters,
  RecordFormatError,
  SelectOptions,
  StorageUnavailableError,
  StoreBackend,
  StoredRecord,
  TableSpec,
} from './store.types';

const log = createServiceLogger('ledger-store');

export interface LedgerStoreOptions {
  /** Omit to run on the fallback only */
  primary?: StoreBackend | null;
  fallback: StoreBackend;
  timeoutMs: number;
}

type StoreOperation = 'insert' | 'select' | 'update';

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class LedgerStore {
  private readonly primary: StoreBackend | null;
  private readonly fallback: StoreBackend;
  private readonly timeoutMs: number;
  private active: ActiveBackend;
  private lastPrimaryError: string | null = null;

  constructor(options: LedgerStoreOptions) {
    this.primary = options.primary ?? null;
    this.fallback = options.fallback;
    this.timeoutMs = options.timeoutMs;
    this.active = this.primary ? 'primary' : 'fallback';
  }

  async insert<T extends StoredRecord>(table: TableSpec<T>, record: T): Promise<void> {
    await this.write('insert', table, (backend) => backend.insert(table, record));
  }

  async updateWhere<T extends StoredRecord>(
    table: TableSpec<T>,
    filters: Filters<T>,
    patch: Partial<T>
  ): Promise<number> {
    return this.write('update', table, (backend) => backend.updateWhere(table, filters, patch));
  }

  async select<T extends StoredRecord>(
    table: TableSpec<T>,
    filters: Filters<T>,
    options: SelectOptions<T> = {}
  ): Promise<T[]> {
    const run = (backend: StoreBackend): Promise<T[]> => backend.select(table, filters, options);

    if (this.primary && this.active === 'primary') {
      try {
        return await this.callPrimary(this.primary, 'select', table.name, run);
      } catch (error) {
        if (error instanceof RecordFormatError) {
          log.error({ table: table.name, field: error.field, err: error }, 'Malformed primary record');
          throw error;
        }
        this.recordPrimaryFailure('select', table.name, error);
      }
    }

    try {
      return await run(this.fallback);
    } catch (error) {
      log.error({ table: table.name, err: error }, 'Fallback read failed');
      throw new StorageUnavailableError('select', table.name, error);
    }
  }

  getBackendStatus(): BackendStatus {
    return {
      active: this.active,
      primaryConfigured: this.primary !== null,
      primaryName: this.primary?.name ?? null,
      fallbackName: this.fallback.name,
      lastPrimaryError: this.lastPrimaryError,
    };
  }

  private async write<T extends StoredRecord, R>(
    operation: StoreOperation,
    table: TableSpec<T>,
    run: (backend: StoreBackend) => Promise<R>
  ): Promise<R> {
    if (this.primary) {
      try {
        const result = await this.callPrimary(this.primary, operation, table.name, run);
        if (this.active !== 'primary') {
          log.info({ table: table.name }, 'Primary store reachable again');
        }
        this.active = 'primary';
        return result;
      } catch (error) {
        this.recordPrimaryFailure(operation, table.name, error);
      }
    }

    try {
      return await run(this.fallback);
    } catch (error) {
      log.error({ operation, table: table.name, err: error }, 'Fallback write failed');
      throw new StorageUnavailableError(operation, table.name, error);
    }
  }

  private callPrimary<R>(
    primary: StoreBackend,
    operation: StoreOperation,
    table: string,
    run: (backend: StoreBackend) => Promise<R>
  ): Promise<R> {
    return withTimeout(run(primary), this.timeoutMs, `${primary.name} ${operation} on ${table}`);
  }

  private recordPrimaryFailure(operation: StoreOperation, table: string, error: unknown): void {
    this.lastPrimaryError = errorMessage(error);
    this.active = 'fallback';
    storeFallbacksTotal.inc({ operation });
    log.warn({ operation, table, err: error }, 'Primary store failed, using local fallback');
  }
}
