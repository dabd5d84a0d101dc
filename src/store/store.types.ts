/**
 * Ledger Store contracts
 *
 * A backend stores string-keyed documents per table. Filters are plain
 * field-equality matches; every result is passed through the table codec
 * before it leaves the backend.
 */

export type StoredRecord = Record<string, unknown>;

export type TableName = 'ledger_transactions' | 'project_status' | 'coordination_messages';

export interface TableSpec<T extends StoredRecord> {
  name: TableName;
  parse: (raw: unknown) => T;
}

export type Filters<T extends StoredRecord> = Partial<T>;

export interface SelectOptions<T extends StoredRecord> {
  orderBy?: {
    field: keyof T & string;
    direction: 'asc' | 'desc';
  };
  limit?: number;
}

export interface StoreBackend {
  readonly name: string;

  insert<T extends StoredRecord>(table: TableSpec<T>, record: T): Promise<void>;

  select<T extends StoredRecord>(
    table: TableSpec<T>,
    filters: Filters<T>,
    options?: SelectOptions<T>
  ): Promise<T[]>;

  /**
   * Apply patch to every record matching filters
   * @returns number of matched records
   */
  updateWhere<T extends StoredRecord>(
    table: TableSpec<T>,
    filters: Filters<T>,
    patch: Partial<T>
  ): Promise<number>;
}

export type ActiveBackend = 'primary' | 'fallback';

export interface BackendStatus {
  active: ActiveBackend;
  primaryConfigured: boolean;
  primaryName: string | null;
  fallbackName: string;
  lastPrimaryError: string | null;
}

/**
 * Neither the primary nor the local fallback accepted the operation
 */
export class StorageUnavailableError extends Error {
  constructor(
    public readonly operation: string,
    public readonly table: TableName,
    public readonly failure?: unknown
  ) {
    super(`Storage unavailable: ${operation} on ${table} failed on every backend`);
    this.name = 'StorageUnavailableError';
  }
}

/**
 * A stored document does not have the shape its table expects
 */
export class RecordFormatError extends Error {
  constructor(
    public readonly table: TableName,
    public readonly field: string,
    detail: string
  ) {
    super(`Invalid ${table} record: field "${field}" ${detail}`);
    this.name = 'RecordFormatError';
  }
}
