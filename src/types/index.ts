export * from './errors';
export * from './ledger';
export * from './coordination';
