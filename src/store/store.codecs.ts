/**
 * Record codecs
 *
 * Backends hand back whatever they stored (mongo documents with Date
 * fields, JSON-lines rows with ISO strings). Each table parses raw rows into
 * its typed record here and rejects anything malformed.
 */

import { LedgerTransaction, TransactionKind, TransactionStatus } from '../types/ledger';
import {
  CoordinationMessage,
  MessagePriority,
  MessageType,
  ProjectStatus,
} from '../types/coordination';
import { RecordFormatError, TableName, TableSpec } from './store.types';

type RawRecord = Record<string, unknown>;

export function isPlainObject(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

const toRecord = (table: TableName, raw: unknown): RawRecord => {
  if (!isPlainObject(raw)) {
    throw new RecordFormatError(table, '(root)', 'must be an object');
  }
  return Object.fromEntries(Object.entries(raw));
};

const readString = (table: TableName, raw: RawRecord, field: string): string => {
  const value = raw[field];
  if (typeof value !== 'string') {
    throw new RecordFormatError(table, field, 'must be a string');
  }
  return value;
};

const readNumber = (table: TableName, raw: RawRecord, field: string): number => {
  const value = raw[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new RecordFormatError(table, field, 'must be a finite number');
  }
  return value;
};

const readNullableNumber = (table: TableName, raw: RawRecord, field: string): number | null => {
  if (raw[field] === null || raw[field] === undefined) return null;
  return readNumber(table, raw, field);
};

const readBoolean = (table: TableName, raw: RawRecord, field: string): boolean => {
  const value = raw[field];
  if (typeof value !== 'boolean') {
    throw new RecordFormatError(table, field, 'must be a boolean');
  }
  return value;
};

const readDate = (table: TableName, raw: RawRecord, field: string): Date => {
  const value = raw[field];
  const date =
    value instanceof Date ? value : typeof value === 'string' ? new Date(value) : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw new RecordFormatError(table, field, 'must be a date');
  }
  return date;
};

const readNullableDate = (table: TableName, raw: RawRecord, field: string): Date | null => {
  if (raw[field] === null || raw[field] === undefined) return null;
  return readDate(table, raw, field);
};

const readEnum = <E extends string>(
  table: TableName,
  raw: RawRecord,
  field: string,
  values: readonly E[]
): E => {
  const value = raw[field];
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new RecordFormatError(table, field, `must be one of ${values.join(', ')}`);
  }
  return match;
};

const readMetadata = (raw: RawRecord, field: string): Record<string, unknown> => {
  const value = raw[field];
  return isPlainObject(value) ? Object.fromEntries(Object.entries(value)) : {};
};

const TRANSACTION_KINDS = Object.values(TransactionKind);
const TRANSACTION_STATUSES = Object.values(TransactionStatus);
const MESSAGE_TYPES = Object.values(MessageType);
const MESSAGE_PRIORITIES = Object.values(MessagePriority);

export function parseLedgerTransaction(input: unknown): LedgerTransaction {
  const table: TableName = 'ledger_transactions';
  const raw = toRecord(table, input);
  return {
    transactionId: readString(table, raw, 'transactionId'),
    principal: readString(table, raw, 'principal'),
    operationId: readString(table, raw, 'operationId'),
    kind: readEnum(table, raw, 'kind', TRANSACTION_KINDS),
    status: readEnum(table, raw, 'status', TRANSACTION_STATUSES),
    tokensEstimated: readNumber(table, raw, 'tokensEstimated'),
    tokensActual: readNullableNumber(table, raw, 'tokensActual'),
    budgetDay: readString(table, raw, 'budgetDay'),
    createdAt: readDate(table, raw, 'createdAt'),
    completedAt: readNullableDate(table, raw, 'completedAt'),
    metadata: readMetadata(raw, 'metadata'),
  };
}

export function parseProjectStatus(input: unknown): ProjectStatus {
  const table: TableName = 'project_status';
  const raw = toRecord(table, input);
  return {
    principal: readString(table, raw, 'principal'),
    versionMarker: readString(table, raw, 'versionMarker'),
    tokensUsedToday: readNumber(table, raw, 'tokensUsedToday'),
    dailyLimit: readNumber(table, raw, 'dailyLimit'),
    healthScore: readNumber(table, raw, 'healthScore'),
    budgetDay: readString(table, raw, 'budgetDay'),
    lastUpdate: readDate(table, raw, 'lastUpdate'),
  };
}

export function parseCoordinationMessage(input: unknown): CoordinationMessage {
  const table: TableName = 'coordination_messages';
  const raw = toRecord(table, input);
  return {
    messageId: readString(table, raw, 'messageId'),
    fromPrincipal: readString(table, raw, 'fromPrincipal'),
    toPrincipal: readString(table, raw, 'toPrincipal'),
    type: readEnum(table, raw, 'type', MESSAGE_TYPES),
    priority: readEnum(table, raw, 'priority', MESSAGE_PRIORITIES),
    title: readString(table, raw, 'title'),
    body: readString(table, raw, 'body'),
    metadata: readMetadata(raw, 'metadata'),
    createdAt: readDate(table, raw, 'createdAt'),
    expiresAt: readNullableDate(table, raw, 'expiresAt'),
    read: readBoolean(table, raw, 'read'),
  };
}

export const transactionsTable: TableSpec<LedgerTransaction> = {
  name: 'ledger_transactions',
  parse: parseLedgerTransaction,
};

export const statusTable: TableSpec<ProjectStatus> = {
  name: 'project_status',
  parse: parseProjectStatus,
};

export const messagesTable: TableSpec<CoordinationMessage> = {
  name: 'coordination_messages',
  parse: parseCoordinationMessage,
};
