export { LedgerStore, LedgerStoreOptions } from './ledger.store';
export { MongoBackend } from './mongo.backend';
export { FileLogBackend } from './file.backend';
export { messagesTable, statusTable, transactionsTable } from './store.codecs';
export * from './store.types';
