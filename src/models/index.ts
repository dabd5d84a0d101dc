export { LedgerTransactionModel } from './LedgerTransaction';
export { ProjectStatusModel } from './ProjectStatus';
export { CoordinationMessageModel } from './CoordinationMessage';
