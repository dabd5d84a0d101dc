/**
 * MongoDB backend
 *
 * Goes through the native collections behind the mongoose models: the
 * store speaks in plain field-equality filters and already-validated
 * records, so documents are written as-is and parsed on the way out.
 */

import { Collection } from 'mongoose';

import { CoordinationMessageModel, LedgerTransactionModel, ProjectStatusModel } from '../models';
import { Filters, SelectOptions, StoreBackend, StoredRecord, TableName, TableSpec } from './store.types';

export interface MongoBackendOptions {
  /** Server-side bound on each query, in ms */
  maxTimeMS?: number;
}

const toQuery = (filters: object): Record<string, unknown> =>
  Object.fromEntries(Object.entries(filters).filter(([, value]) => value !== undefined));

export class MongoBackend implements StoreBackend {
  readonly name = 'mongodb';
  private readonly maxTimeMS: number;

  constructor(options: MongoBackendOptions = {}) {
    this.maxTimeMS = options.maxTimeMS ?? 5000;
  }

  private collection(table: TableName): Collection {
    switch (table) {
      case 'ledger_transactions':
        return LedgerTransactionModel.collection;
      case 'project_status':
        return ProjectStatusModel.collection;
      case 'coordination_messages':
        return CoordinationMessageModel.collection;
    }
  }

  async insert<T extends StoredRecord>(table: TableSpec<T>, record: T): Promise<void> {
    await this.collection(table.name).insertOne({ ...record });
  }

  async select<T extends StoredRecord>(
    table: TableSpec<T>,
    filters: Filters<T>,
    options: SelectOptions<T> = {}
  ): Promise<T[]> {
    let cursor = this.collection(table.name).find(toQuery(filters), {
      projection: { _id: 0 },
      maxTimeMS: this.maxTimeMS,
    });

    if (options.orderBy) {
      cursor = cursor.sort(options.orderBy.field, options.orderBy.direction === 'asc' ? 1 : -1);
    }
    if (options.limit !== undefined) {
      cursor = cursor.limit(options.limit);
    }

    const documents = await cursor.toArray();
    return documents.map((document) => table.parse(document));
  }

  async updateWhere<T extends StoredRecord>(
    table: TableSpec<T>,
    filters: Filters<T>,
    patch: Partial<T>
  ): Promise<number> {
    const result = await this.collection(table.name).updateMany(toQuery(filters), {
      $set: toQuery(patch),
    });
    return result.matchedCount;
  }
}
