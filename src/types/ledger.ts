/**
 * Ledger record types
 *
 * Stored records are plain object types (not interfaces) so that they can be
 * handed to the store backends as string-keyed documents.
 */

export enum TransactionKind {
  RESERVE = 'RESERVE',
  SETTLE = 'SETTLE',
  REFUND = 'REFUND',
}

export enum TransactionStatus {
  RESERVED = 'RESERVED',
  SETTLED = 'SETTLED',
  REFUNDED = 'REFUNDED',
}

export type LedgerTransaction = {
  transactionId: string;
  principal: string;
  /** Caller-supplied correlation key; at most one open transaction per id */
  operationId: string;
  /** Last operation applied to this transaction */
  kind: TransactionKind;
  status: TransactionStatus;
  tokensEstimated: number;
  /** Set only at settlement */
  tokensActual: number | null;
  /** Calendar date (YYYY-MM-DD) of createdAt in the budget time zone */
  budgetDay: string;
  createdAt: Date;
  completedAt: Date | null;
  metadata: Record<string, unknown>;
};

/**
 * Expected denials. These are returned, never thrown.
 */
export type BudgetDenial =
  | {
      kind: 'INSUFFICIENT_BUDGET';
      message: string;
      shortage: number;
      remaining: number;
    }
  | {
      kind: 'COST_EXCEEDS_MAXIMUM';
      message: string;
      estimatedTokens: number;
      maxSingleOperation: number;
    }
  | {
      kind: 'NO_SUCH_RESERVATION';
      message: string;
      operationId: string;
    }
  | {
      kind: 'DUPLICATE_SETTLEMENT';
      message: string;
      operationId: string;
    };

export type BudgetDenialKind = BudgetDenial['kind'];

export type LedgerResult<T> = { ok: true; value: T } | { ok: false; denial: BudgetDenial };
