import { TransactionStatus } from '../../types/ledger';
import { ApiError } from '../../middlewares/errorHandler';

/**
 * Valid state transitions for a ledger transaction
 *
 * State Machine:
 * RESERVED ────► SETTLED ────► REFUNDED
 *     │         (settle)      (refund, reverses the actual)
 *     │                           ▲
 *     └───────────────────────────┘
 *              (refund)
 *
 * REFUNDED is terminal, so a transaction is credited back at most once.
 */
const validTransitions: Record<TransactionStatus, TransactionStatus[]> = {
  [TransactionStatus.RESERVED]: [TransactionStatus.SETTLED, TransactionStatus.REFUNDED],
  [TransactionStatus.SETTLED]: [TransactionStatus.REFUNDED],
  [TransactionStatus.REFUNDED]: [], // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(
  currentStatus: TransactionStatus,
  newStatus: TransactionStatus
): boolean {
  const allowedTransitions = validTransitions[currentStatus];
  return allowedTransitions.includes(newStatus);
}

/**
 * Throws ApiError if the transition is invalid
 */
export function validateTransition(
  currentStatus: TransactionStatus,
  newStatus: TransactionStatus,
  transactionId: string
): void {
  if (!isValidTransition(currentStatus, newStatus)) {
    throw ApiError.internal(
      `Invalid state transition from ${currentStatus} to ${newStatus} for transaction ${transactionId}`
    );
  }
}

/**
 * Check if a transaction is in a terminal state
 */
export function isTerminalState(status: TransactionStatus): boolean {
  return validTransitions[status].length === 0;
}

/**
 * Open transactions count against the budget and can still be refunded
 */
export function isOpenState(status: TransactionStatus): boolean {
  return !isTerminalState(status);
}

/**
 * Get allowed next states for a given status
 */
export function getAllowedTransitions(status: TransactionStatus): TransactionStatus[] {
  return validTransitions[status];
}
