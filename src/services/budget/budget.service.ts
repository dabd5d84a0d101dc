/**
 * Budget Service
 *
 * Reservation/settlement ledger for per-day token budgets.
 *
 * Used-today is never stored: it is summed from the principal's
 * transactions for the current budget day on every call.
 *   RESERVED  -> tokensEstimated
 *   SETTLED   -> tokensActual
 *   REFUNDED  -> 0
 *
 * reserve/settle/refund run one at a time within the process so the
 * read-then-insert on used-today cannot interleave.
 */

import { v4 as uuid } from 'uuid';

import { BudgetSettings } from '../../config/settings';
import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability/logger';
import { budgetUsedTokens, ledgerOperationsTotal } from '../../observability/metrics';
import { LedgerStore, transactionsTable } from '../../store';
import {
  BudgetDenial,
  LedgerResult,
  LedgerTransaction,
  TransactionKind,
  TransactionStatus,
} from '../../types/ledger';
import { Clock, systemClock } from '../../utils/clock';
import { Mutex } from '../../utils/mutex';
import { budgetDayOf, recentBudgetDays } from './budget.day';
import { isOpenState, validateTransition } from './budget.state';

const log = createServiceLogger('budget-service');

export interface ReservationResult {
  transaction: LedgerTransaction;
  usedToday: number;
  remaining: number;
  /** True when an open transaction for the operation id already existed */
  idempotent: boolean;
}

export interface SettlementResult {
  transaction: LedgerTransaction;
  usedToday: number;
  remaining: number;
}

export interface RefundResult {
  transaction: LedgerTransaction;
  /** Tokens returned to the day's balance */
  refundedTokens: number;
  usedToday: number;
  remaining: number;
}

export interface ReservationPreview {
  estimatedTokens: number;
  usedToday: number;
  dailyLimit: number;
  /** Remaining before the reservation */
  remaining: number;
  denial: BudgetDenial | null;
}

export interface BudgetStatus {
  principal: string;
  budgetDay: string;
  dailyLimit: number;
  usedToday: number;
  remaining: number;
  usagePct: number;
  warning: boolean;
  emergency: boolean;
  operationsToday: number;
  openReservations: number;
  averageTokensPerOperation: number;
}

export interface DailyUsage {
  budgetDay: string;
  operations: number;
  chargedTokens: number;
}

export interface UsageStatistics {
  principal: string;
  days: number;
  fromDay: string;
  toDay: string;
  operations: number;
  chargedTokens: number;
  refundedOperations: number;
  averageTokensPerOperation: number;
  averageTokensPerDay: number;
  byDay: DailyUsage[];
}

export interface MeteredOutcome<T> {
  result: T;
  actualTokens: number;
}

export interface MeteredResult<T> {
  result: T;
  settlement: SettlementResult;
}

export interface BudgetServiceDeps {
  store: LedgerStore;
  settings: BudgetSettings;
  clock?: Clock;
}

/**
 * Tokens a transaction currently counts against its budget day
 */
export function chargedTokens(transaction: LedgerTransaction): number {
  switch (transaction.status) {
    case TransactionStatus.REFUNDED:
      return 0;
    case TransactionStatus.SETTLED:
      return transaction.tokensActual ?? transaction.tokensEstimated;
    case TransactionStatus.RESERVED:
      return transaction.tokensEstimated;
  }
}

const sumCharged = (transactions: LedgerTransaction[]): number =>
  transactions.reduce((total, transaction) => total + chargedTokens(transaction), 0);

/**
 * Token amounts are caller input; anything but a non-negative integer is a
 * programming error, not a denial
 */
export function assertTokenAmount(field: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw ApiError.invalidTokenAmount(field, value);
  }
}

const assertIdentifier = (field: string, value: string): void => {
  if (value.trim() === '') {
    throw ApiError.validationError(`${field} must be a non-empty string`, {
      [field]: [`${field} must be a non-empty string`],
    });
  }
};

const noSuchReservation = (operationId: string): BudgetDenial => ({
  kind: 'NO_SUCH_RESERVATION',
  message: `No open reservation for operation ${operationId}`,
  operationId,
});

export class BudgetService {
  private readonly store: LedgerStore;
  private readonly settings: BudgetSettings;
  private readonly clock: Clock;
  private readonly mutex = new Mutex();

  constructor(deps: BudgetServiceDeps) {
    this.store = deps.store;
    this.settings = deps.settings;
    this.clock = deps.clock ?? systemClock;
  }

  get dailyLimit(): number {
    return this.settings.budget.dailyLimit;
  }

  /**
   * Current budget day in the configured time zone
   */
  today(): string {
    return budgetDayOf(this.clock.now(), this.settings.budget.timeZone);
  }

  private remainingFor(usedToday: number): number {
    return Math.max(0, this.dailyLimit - usedToday);
  }

  private async transactionsToday(principal: string): Promise<LedgerTransaction[]> {
    return this.store.select(transactionsTable, { principal, budgetDay: this.today() });
  }

  /**
   * Latest open (RESERVED or SETTLED) transaction for an operation id
   */
  private async findOpen(operationId: string): Promise<LedgerTransaction | null> {
    const transactions = await this.store.select(
      transactionsTable,
      { operationId },
      { orderBy: { field: 'createdAt', direction: 'desc' } }
    );
    return transactions.find((transaction) => isOpenState(transaction.status)) ?? null;
  }

  /**
   * Derived used-today for a principal
   */
  async getUsedToday(principal: string): Promise<number> {
    const usedToday = sumCharged(await this.transactionsToday(principal));
    budgetUsedTokens.set({ principal }, usedToday);
    return usedToday;
  }

  private costDenial(estimatedTokens: number): BudgetDenial | null {
    const { maxSingleOperation } = this.settings.budget;
    if (estimatedTokens <= maxSingleOperation) return null;
    return {
      kind: 'COST_EXCEEDS_MAXIMUM',
      message: `Estimated cost ${estimatedTokens} exceeds the single-operation maximum of ${maxSingleOperation}`,
      estimatedTokens,
      maxSingleOperation,
    };
  }

  /**
   * Dry run of the reserve arithmetic. Nothing is written.
   */
  async previewReservation(principal: string, estimatedTokens: number): Promise<ReservationPreview> {
    assertIdentifier('principal', principal);
    assertTokenAmount('estimatedTokens', estimatedTokens);

    const usedToday = await this.getUsedToday(principal);
    const remaining = this.remainingFor(usedToday);
    const preview = { estimatedTokens, usedToday, dailyLimit: this.dailyLimit, remaining };

    const costDenial = this.costDenial(estimatedTokens);
    if (costDenial) {
      return { ...preview, denial: costDenial };
    }

    const shortage = usedToday + estimatedTokens - this.dailyLimit;
    if (shortage > 0) {
      return {
        ...preview,
        denial: {
          kind: 'INSUFFICIENT_BUDGET',
          message: `Insufficient budget: ${estimatedTokens} requested, ${remaining} remaining`,
          shortage,
          remaining,
        },
      };
    }

    return { ...preview, denial: null };
  }

  /**
   * Reserve estimated tokens for an operation
   *
   * A second reserve for an operation id that is still open returns the
   * existing transaction with idempotent = true.
   */
  async reserve(
    principal: string,
    operationId: string,
    estimatedTokens: number,
    metadata: Record<string, unknown> = {}
  ): Promise<LedgerResult<ReservationResult>> {
    assertIdentifier('principal', principal);
    assertIdentifier('operationId', operationId);
    assertTokenAmount('estimatedTokens', estimatedTokens);

    return this.mutex.runExclusive<LedgerResult<ReservationResult>>(async () => {
      const existing = await this.findOpen(operationId);
      if (existing) {
        const usedToday = await this.getUsedToday(existing.principal);
        ledgerOperationsTotal.inc({ operation: 'reserve', outcome: 'idempotent' });
        log.debug({ operationId, transactionId: existing.transactionId }, 'Reservation already open');
        return {
          ok: true,
          value: {
            transaction: existing,
            usedToday,
            remaining: this.remainingFor(usedToday),
            idempotent: true,
          },
        };
      }

      const preview = await this.previewReservation(principal, estimatedTokens);
      if (preview.denial) {
        ledgerOperationsTotal.inc({ operation: 'reserve', outcome: preview.denial.kind });
        log.info(
          { principal, operationId, estimatedTokens, denial: preview.denial.kind },
          'Reservation denied'
        );
        return { ok: false, denial: preview.denial };
      }

      const now = this.clock.now();
      const transaction: LedgerTransaction = {
        transactionId: uuid(),
        principal,
        operationId,
        kind: TransactionKind.RESERVE,
        status: TransactionStatus.RESERVED,
        tokensEstimated: estimatedTokens,
        tokensActual: null,
        budgetDay: budgetDayOf(now, this.settings.budget.timeZone),
        createdAt: new Date(now),
        completedAt: null,
        metadata,
      };

      await this.store.insert(transactionsTable, transaction);

      const usedToday = preview.usedToday + estimatedTokens;
      budgetUsedTokens.set({ principal }, usedToday);
      ledgerOperationsTotal.inc({ operation: 'reserve', outcome: 'ok' });
      log.info(
        { principal, operationId, transactionId: transaction.transactionId, estimatedTokens },
        'Tokens reserved'
      );

      return {
        ok: true,
        value: { transaction, usedToday, remaining: this.remainingFor(usedToday), idempotent: false },
      };
    });
  }

  /**
   * Record the actual cost of a reserved operation
   */
  async settle(
    operationId: string,
    actualTokens: number,
    metadata: Record<string, unknown> = {}
  ): Promise<LedgerResult<SettlementResult>> {
    assertIdentifier('operationId', operationId);
    assertTokenAmount('actualTokens', actualTokens);

    return this.mutex.runExclusive<LedgerResult<SettlementResult>>(async () => {
      const open = await this.findOpen(operationId);
      if (!open) {
        ledgerOperationsTotal.inc({ operation: 'settle', outcome: 'NO_SUCH_RESERVATION' });
        return { ok: false, denial: noSuchReservation(operationId) };
      }
      if (open.status === TransactionStatus.SETTLED) {
        ledgerOperationsTotal.inc({ operation: 'settle', outcome: 'DUPLICATE_SETTLEMENT' });
        return {
          ok: false,
          denial: {
            kind: 'DUPLICATE_SETTLEMENT',
            message: `Operation ${operationId} is already settled`,
            operationId,
          },
        };
      }

      validateTransition(open.status, TransactionStatus.SETTLED, open.transactionId);

      const patch = {
        status: TransactionStatus.SETTLED,
        kind: TransactionKind.SETTLE,
        tokensActual: actualTokens,
        completedAt: new Date(this.clock.now()),
        metadata: { ...open.metadata, ...metadata },
      };
      await this.store.updateWhere(transactionsTable, { transactionId: open.transactionId }, patch);

      const transaction: LedgerTransaction = { ...open, ...patch };
      const usedToday = await this.getUsedToday(open.principal);
      ledgerOperationsTotal.inc({ operation: 'settle', outcome: 'ok' });
      log.info(
        {
          principal: open.principal,
          operationId,
          estimatedTokens: open.tokensEstimated,
          actualTokens,
        },
        'Reservation settled'
      );

      return {
        ok: true,
        value: { transaction, usedToday, remaining: this.remainingFor(usedToday) },
      };
    });
  }

  /**
   * Terminate an open operation and return its tokens
   *
   * From RESERVED the estimate is returned; from SETTLED the actual recorded
   * at settlement. A refunded transaction is closed and cannot be refunded
   * again.
   */
  async refund(operationId: string, reason = 'unspecified'): Promise<LedgerResult<RefundResult>> {
    assertIdentifier('operationId', operationId);

    return this.mutex.runExclusive<LedgerResult<RefundResult>>(async () => {
      const open = await this.findOpen(operationId);
      if (!open) {
        ledgerOperationsTotal.inc({ operation: 'refund', outcome: 'NO_SUCH_RESERVATION' });
        return { ok: false, denial: noSuchReservation(operationId) };
      }

      validateTransition(open.status, TransactionStatus.REFUNDED, open.transactionId);

      const refundedTokens = chargedTokens(open);
      const patch = {
        status: TransactionStatus.REFUNDED,
        kind: TransactionKind.REFUND,
        completedAt: new Date(this.clock.now()),
        metadata: { ...open.metadata, refundReason: reason, refundedFrom: open.status },
      };
      await this.store.updateWhere(transactionsTable, { transactionId: open.transactionId }, patch);

      const transaction: LedgerTransaction = { ...open, ...patch };
      const usedToday = await this.getUsedToday(open.principal);
      ledgerOperationsTotal.inc({ operation: 'refund', outcome: 'ok' });
      log.info(
        { principal: open.principal, operationId, refundedTokens, reason },
        'Reservation refunded'
      );

      return {
        ok: true,
        value: { transaction, refundedTokens, usedToday, remaining: this.remainingFor(usedToday) },
      };
    });
  }

  async getBudgetStatus(principal: string): Promise<BudgetStatus> {
    assertIdentifier('principal', principal);

    const transactions = await this.transactionsToday(principal);
    const usedToday = sumCharged(transactions);
    budgetUsedTokens.set({ principal }, usedToday);

    const charged = transactions.filter((t) => t.status !== TransactionStatus.REFUNDED);
    const usagePct = usedToday / this.dailyLimit;
    const { warningThreshold, emergencyThreshold } = this.settings.budget;

    return {
      principal,
      budgetDay: this.today(),
      dailyLimit: this.dailyLimit,
      usedToday,
      remaining: this.remainingFor(usedToday),
      usagePct,
      warning: usagePct >= warningThreshold,
      emergency: usagePct >= emergencyThreshold,
      operationsToday: transactions.length,
      openReservations: transactions.filter((t) => t.status === TransactionStatus.RESERVED).length,
      averageTokensPerOperation: charged.length > 0 ? usedToday / charged.length : 0,
    };
  }

  /**
   * Aggregate usage over the last `days` budget days, today included
   */
  async getUsageStatistics(principal: string, days = 7): Promise<UsageStatistics> {
    assertIdentifier('principal', principal);
    if (!Number.isInteger(days) || days < 1 || days > 90) {
      throw ApiError.validationError('days must be an integer between 1 and 90', {
        days: ['days must be an integer between 1 and 90'],
      });
    }

    const budgetDays = recentBudgetDays(this.clock.now(), days, this.settings.budget.timeZone);
    const inRange = new Set(budgetDays);
    const transactions = (await this.store.select(transactionsTable, { principal })).filter((t) =>
      inRange.has(t.budgetDay)
    );

    const byDay = budgetDays.map((budgetDay) => {
      const dayTransactions = transactions.filter(
        (t) => t.budgetDay === budgetDay && t.status !== TransactionStatus.REFUNDED
      );
      return {
        budgetDay,
        operations: dayTransactions.length,
        chargedTokens: sumCharged(dayTransactions),
      };
    });

    const operations = byDay.reduce((total, day) => total + day.operations, 0);
    const charged = byDay.reduce((total, day) => total + day.chargedTokens, 0);

    return {
      principal,
      days,
      fromDay: budgetDays[0],
      toDay: budgetDays[budgetDays.length - 1],
      operations,
      chargedTokens: charged,
      refundedOperations: transactions.filter((t) => t.status === TransactionStatus.REFUNDED).length,
      averageTokensPerOperation: operations > 0 ? charged / operations : 0,
      averageTokensPerDay: charged / days,
      byDay,
    };
  }

  /**
   * Reserve, run the metered call, settle at the reported cost.
   * A call that throws is refunded (reason "call_failed") and the error is
   * rethrown. A refused reservation is returned without running the call.
   */
  async runMetered<T>(
    principal: string,
    operationId: string,
    estimatedTokens: number,
    call: () => Promise<MeteredOutcome<T>>
  ): Promise<LedgerResult<MeteredResult<T>>> {
    const reservation = await this.reserve(principal, operationId, estimatedTokens);
    if (!reservation.ok) {
      return reservation;
    }

    let outcome: MeteredOutcome<T>;
    try {
      outcome = await call();
    } catch (error) {
      try {
        await this.refund(operationId, 'call_failed');
      } catch (refundError) {
        log.error({ operationId, err: refundError }, 'Refund after failed call did not complete');
      }
      throw error;
    }

    const settlement = await this.settle(operationId, outcome.actualTokens);
    if (!settlement.ok) {
      return settlement;
    }

    return { ok: true, value: { result: outcome.result, settlement: settlement.value } };
  }
}
