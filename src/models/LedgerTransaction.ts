import mongoose, { Schema } from 'mongoose';

import { LedgerTransaction, TransactionKind, TransactionStatus } from '../types/ledger';

const ledgerTransactionSchema = new Schema<LedgerTransaction>(
  {
    transactionId: {
      type: String,
      required: true,
      unique: true,
    },
    principal: {
      type: String,
      required: true,
    },
    operationId: {
      type: String,
      required: true,
      index: true,
    },
    kind: {
      type: String,
      required: true,
      enum: Object.values(TransactionKind),
    },
    status: {
      type: String,
      required: true,
      enum: Object.values(TransactionStatus),
      default: TransactionStatus.RESERVED,
    },
    tokensEstimated: {
      type: Number,
      required: true,
      min: 0,
    },
    tokensActual: {
      type: Number,
      default: null,
    },
    budgetDay: {
      type: String,
      required: true,
    },
    createdAt: {
      type: Date,
      required: true,
    },
    completedAt: {
      type: Date,
      default: null,
    },
    metadata: {
      type: Schema.Types.Mixed,
      default: {},
    },
  },
  {
    versionKey: false,
  }
);

// Used-today is derived from (principal, budgetDay)
ledgerTransactionSchema.index({ principal: 1, budgetDay: 1, status: 1 });

export const LedgerTransactionModel = mongoose.model<LedgerTransaction>(
  'LedgerTransaction',
  ledgerTransactionSchema,
  'ledger_transactions'
);
