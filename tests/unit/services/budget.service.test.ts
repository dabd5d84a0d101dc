/**
 * Budget Service Tests
 *
 * Reservation, settlement and refund against an in-memory primary and a
 * temp-directory fallback log.
 */

import { ApiError } from '../../../src/middlewares/errorHandler';
import { RecordFormatError, transactionsTable } from '../../../src/store';
import { ErrorCode } from '../../../src/types/errors';
import { TransactionKind, TransactionStatus } from '../../../src/types/ledger';
import { createTestContext, HOUR, TestContext } from '../../helpers';

describe('BudgetService', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext({
      overrides: { budget: { dailyLimit: 1000, maxSingleOperation: 1000 } },
    });
  });

  afterEach(() => {
    ctx.cleanup();
  });

  describe('daily limit of 1000', () => {
    it('should reserve, deny, settle and refund with the expected balances', async () => {
      const reserveA = await ctx.budget.reserve('agent-a', 'opA', 400);
      expect(reserveA.ok).toBe(true);
      if (reserveA.ok) {
        expect(reserveA.value.remaining).toBe(600);
        expect(reserveA.value.usedToday).toBe(400);
        expect(reserveA.value.idempotent).toBe(false);
      }

      const reserveB = await ctx.budget.reserve('agent-a', 'opB', 700);
      expect(reserveB).toEqual({
        ok: false,
        denial: {
          kind: 'INSUFFICIENT_BUDGET',
          message: 'Insufficient budget: 700 requested, 600 remaining',
          shortage: 100,
          remaining: 600,
        },
      });

      const settleA = await ctx.budget.settle('opA', 350);
      expect(settleA.ok).toBe(true);
      if (settleA.ok) {
        expect(settleA.value.remaining).toBe(650);
        expect(settleA.value.transaction.status).toBe(TransactionStatus.SETTLED);
        expect(settleA.value.transaction.tokensActual).toBe(350);
      }

      // Refund from SETTLED reverses the actual tokens
      const refundA = await ctx.budget.refund('opA');
      expect(refundA.ok).toBe(true);
      if (refundA.ok) {
        expect(refundA.value.refundedTokens).toBe(350);
        expect(refundA.value.remaining).toBe(1000);
        expect(refundA.value.transaction.status).toBe(TransactionStatus.REFUNDED);
      }

      expect(await ctx.budget.getUsedToday('agent-a')).toBe(0);
    });

    it('should credit a settled-then-refunded operation only once', async () => {
      await ctx.budget.reserve('agent-a', 'opA', 400);
      await ctx.budget.settle('opA', 350);
      await ctx.budget.refund('opA');

      const second = await ctx.budget.refund('opA');

      expect(second.ok).toBe(false);
      if (!second.ok) {
        expect(second.denial.kind).toBe('NO_SUCH_RESERVATION');
      }
      expect(await ctx.budget.getUsedToday('agent-a')).toBe(0);
    });
  });

  describe('reserve', () => {
    it('should store a RESERVED transaction for the current budget day', async () => {
      const result = await ctx.budget.reserve('agent-a', 'op-1', 120, { model: 'test-model' });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.transaction).toMatchObject({
        principal: 'agent-a',
        operationId: 'op-1',
        kind: TransactionKind.RESERVE,
        status: TransactionStatus.RESERVED,
        tokensEstimated: 120,
        tokensActual: null,
        budgetDay: '2026-03-10',
        completedAt: null,
        metadata: { model: 'test-model' },
      });
      expect(result.value.transaction.createdAt.toISOString()).toBe('2026-03-10T12:00:00.000Z');
      expect(ctx.primary.count('ledger_transactions')).toBe(1);
    });

    it('should allow a reservation that uses exactly the remaining budget', async () => {
      await ctx.budget.reserve('agent-a', 'op-1', 600);

      const result = await ctx.budget.reserve('agent-a', 'op-2', 400);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.remaining).toBe(0);
      }
    });

    it('should deny an estimate above the single-operation maximum', async () => {
      const strict = createTestContext({
        overrides: { budget: { dailyLimit: 1000, maxSingleOperation: 500 } },
      });

      try {
        const result = await strict.budget.reserve('agent-a', 'op-big', 600);

        expect(result).toEqual({
          ok: false,
          denial: {
            kind: 'COST_EXCEEDS_MAXIMUM',
            message: 'Estimated cost 600 exceeds the single-operation maximum of 500',
            estimatedTokens: 600,
            maxSingleOperation: 500,
          },
        });
        expect(strict.primary.count('ledger_transactions')).toBe(0);
      } finally {
        strict.cleanup();
      }
    });

    it('should return the open transaction for a repeated operation id', async () => {
      const first = await ctx.budget.reserve('agent-a', 'op-1', 200);
      const second = await ctx.budget.reserve('agent-a', 'op-1', 200);

      expect(first.ok && second.ok).toBe(true);
      if (first.ok && second.ok) {
        expect(second.value.idempotent).toBe(true);
        expect(second.value.transaction.transactionId).toBe(first.value.transaction.transactionId);
        expect(second.value.usedToday).toBe(200);
      }
      expect(ctx.primary.count('ledger_transactions')).toBe(1);
    });

    it('should allow a new reservation for an operation id after its refund', async () => {
      await ctx.budget.reserve('agent-a', 'op-1', 200);
      await ctx.budget.refund('op-1', 'retry');

      const again = await ctx.budget.reserve('agent-a', 'op-1', 300);

      expect(again.ok).toBe(true);
      if (again.ok) {
        expect(again.value.idempotent).toBe(false);
        expect(again.value.usedToday).toBe(300);
      }
    });

    it('should never admit past the daily limit under concurrent reservations', async () => {
      const results = await Promise.all(
        Array.from({ length: 10 }, (_, index) =>
          ctx.budget.reserve('agent-a', `op-${index}`, 150)
        )
      );

      expect(results.filter((result) => result.ok)).toHaveLength(6);
      expect(results.filter((result) => !result.ok)).toHaveLength(4);
      expect(await ctx.budget.getUsedToday('agent-a')).toBe(900);
    });

    it('should keep principals separate', async () => {
      await ctx.budget.reserve('agent-a', 'op-a', 900);

      const result = await ctx.budget.reserve('agent-b', 'op-b', 900);

      expect(result.ok).toBe(true);
    });

    it.each([-1, 1.5, Number.NaN, Number.POSITIVE_INFINITY])(
      'should reject %p tokens as invalid input',
      async (tokens) => {
        await expect(ctx.budget.reserve('agent-a', 'op-x', tokens)).rejects.toMatchObject({
          errorCode: ErrorCode.INVALID_TOKEN_AMOUNT,
        });
      }
    );

    it('should reject an empty operation id', async () => {
      await expect(ctx.budget.reserve('agent-a', '  ', 10)).rejects.toBeInstanceOf(ApiError);
    });
  });

  describe('settle', () => {
    it('should account the actual tokens instead of the estimate', async () => {
      await ctx.budget.reserve('agent-a', 'op-1', 400);
      await ctx.budget.settle('op-1', 250);

      const status = await ctx.budget.getBudgetStatus('agent-a');

      expect(status.usedToday).toBe(250);
      expect(status.remaining).toBe(750);
    });

    it('should merge settlement metadata and record completion', async () => {
      await ctx.budget.reserve('agent-a', 'op-1', 400, { model: 'test-model' });
      ctx.clock.advance(5000);

      const result = await ctx.budget.settle('op-1', 380, { provider: 'test-provider' });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.transaction.kind).toBe(TransactionKind.SETTLE);
      expect(result.value.transaction.metadata).toEqual({
        model: 'test-model',
        provider: 'test-provider',
      });
      expect(result.value.transaction.completedAt?.toISOString()).toBe('2026-03-10T12:00:05.000Z');
    });

    it('should refuse a second settlement and leave state unchanged', async () => {
      await ctx.budget.reserve('agent-a', 'op-1', 400);
      await ctx.budget.settle('op-1', 350);

      const second = await ctx.budget.settle('op-1', 100);

      expect(second).toEqual({
        ok: false,
        denial: {
          kind: 'DUPLICATE_SETTLEMENT',
          message: 'Operation op-1 is already settled',
          operationId: 'op-1',
        },
      });
      const [stored] = await ctx.store.select(transactionsTable, { operationId: 'op-1' });
      expect(stored.tokensActual).toBe(350);
      expect(await ctx.budget.getUsedToday('agent-a')).toBe(350);
    });

    it('should deny settling an unknown operation', async () => {
      const result = await ctx.budget.settle('missing-op', 10);

      expect(result).toEqual({
        ok: false,
        denial: {
          kind: 'NO_SUCH_RESERVATION',
          message: 'No open reservation for operation missing-op',
          operationId: 'missing-op',
        },
      });
    });

    it('should deny settling a refunded operation', async () => {
      await ctx.budget.reserve('agent-a', 'op-1', 100);
      await ctx.budget.refund('op-1');

      const result = await ctx.budget.settle('op-1', 100);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.denial.kind).toBe('NO_SUCH_RESERVATION');
      }
    });
  });

  describe('refund', () => {
    it('should restore the remaining balance exactly', async () => {
      const before = await ctx.budget.getBudgetStatus('agent-a');
      await ctx.budget.reserve('agent-a', 'op-1', 300);

      const result = await ctx.budget.refund('op-1', 'cancelled');

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.refundedTokens).toBe(300);
        expect(result.value.remaining).toBe(before.remaining);
      }
    });

    it('should store the reason and the state it was refunded from', async () => {
      await ctx.budget.reserve('agent-a', 'op-1', 300);
      await ctx.budget.settle('op-1', 280);
      await ctx.budget.refund('op-1', 'duplicate_request');

      const [stored] = await ctx.store.select(transactionsTable, { operationId: 'op-1' });

      expect(stored.status).toBe(TransactionStatus.REFUNDED);
      expect(stored.kind).toBe(TransactionKind.REFUND);
      expect(stored.metadata).toEqual({
        refundReason: 'duplicate_request',
        refundedFrom: TransactionStatus.SETTLED,
      });
    });

    it('should deny refunding an unknown operation', async () => {
      const result = await ctx.budget.refund('missing-op');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.denial.kind).toBe('NO_SUCH_RESERVATION');
      }
    });
  });

  describe('daily reset', () => {
    it('should free the previous day once the budget day changes', async () => {
      await ctx.budget.reserve('agent-a', 'op-1', 900);
      expect((await ctx.budget.reserve('agent-a', 'op-2', 200)).ok).toBe(false);

      ctx.clock.advance(24 * HOUR);

      expect(await ctx.budget.getUsedToday('agent-a')).toBe(0);
      const result = await ctx.budget.reserve('agent-a', 'op-2', 900);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.transaction.budgetDay).toBe('2026-03-11');
      }
    });

    it('should follow the configured time zone', async () => {
      const tokyo = createTestContext({
        overrides: { budget: { dailyLimit: 1000, maxSingleOperation: 1000, timeZone: 'Asia/Tokyo' } },
      });

      try {
        // 12:00Z is 21:00 in Tokyo; 15:00Z is midnight there
        await tokyo.budget.reserve('agent-a', 'op-1', 800);
        tokyo.clock.advance(3 * HOUR);

        expect(tokyo.budget.today()).toBe('2026-03-11');
        expect(await tokyo.budget.getUsedToday('agent-a')).toBe(0);
      } finally {
        tokyo.cleanup();
      }
    });
  });

  describe('previewReservation', () => {
    it('should not write anything', async () => {
      await ctx.budget.reserve('agent-a', 'op-1', 300);

      const preview = await ctx.budget.previewReservation('agent-a', 800);

      expect(preview).toEqual({
        estimatedTokens: 800,
        usedToday: 300,
        dailyLimit: 1000,
        remaining: 700,
        denial: {
          kind: 'INSUFFICIENT_BUDGET',
          message: 'Insufficient budget: 800 requested, 700 remaining',
          shortage: 100,
          remaining: 700,
        },
      });
      expect(ctx.primary.count('ledger_transactions')).toBe(1);
    });
  });

  describe('getBudgetStatus', () => {
    it('should report usage and threshold flags', async () => {
      await ctx.budget.reserve('agent-a', 'op-1', 850);

      const status = await ctx.budget.getBudgetStatus('agent-a');

      expect(status).toEqual({
        principal: 'agent-a',
        budgetDay: '2026-03-10',
        dailyLimit: 1000,
        usedToday: 850,
        remaining: 150,
        usagePct: 0.85,
        warning: true,
        emergency: false,
        operationsToday: 1,
        openReservations: 1,
        averageTokensPerOperation: 850,
      });
    });

    it('should raise the emergency flag at 95% usage', async () => {
      await ctx.budget.reserve('agent-a', 'op-1', 950);

      const status = await ctx.budget.getBudgetStatus('agent-a');

      expect(status.emergency).toBe(true);
      expect(status.remaining).toBe(50);
    });

    it('should leave refunded operations out of the average', async () => {
      await ctx.budget.reserve('agent-a', 'op-1', 100);
      await ctx.budget.settle('op-1', 100);
      await ctx.budget.reserve('agent-a', 'op-2', 300);
      await ctx.budget.refund('op-2');

      const status = await ctx.budget.getBudgetStatus('agent-a');

      expect(status.operationsToday).toBe(2);
      expect(status.openReservations).toBe(0);
      expect(status.averageTokensPerOperation).toBe(100);
    });
  });

  describe('getUsageStatistics', () => {
    it('should aggregate the last N budget days', async () => {
      ctx.clock.set('2026-03-08T12:00:00.000Z');
      await ctx.budget.reserve('agent-a', 'opA', 100);
      await ctx.budget.settle('opA', 80);

      ctx.clock.set('2026-03-09T12:00:00.000Z');
      await ctx.budget.reserve('agent-a', 'opB', 200);
      await ctx.budget.refund('opB');
      await ctx.budget.reserve('agent-a', 'opC', 300);

      ctx.clock.set('2026-03-10T12:00:00.000Z');
      await ctx.budget.reserve('agent-a', 'opD', 50);

      const stats = await ctx.budget.getUsageStatistics('agent-a', 3);

      expect(stats.fromDay).toBe('2026-03-08');
      expect(stats.toDay).toBe('2026-03-10');
      expect(stats.byDay).toEqual([
        { budgetDay: '2026-03-08', operations: 1, chargedTokens: 80 },
        { budgetDay: '2026-03-09', operations: 1, chargedTokens: 300 },
        { budgetDay: '2026-03-10', operations: 1, chargedTokens: 50 },
      ]);
      expect(stats.operations).toBe(3);
      expect(stats.chargedTokens).toBe(430);
      expect(stats.refundedOperations).toBe(1);
      expect(stats.averageTokensPerOperation).toBeCloseTo(143.33, 2);
      expect(stats.averageTokensPerDay).toBeCloseTo(143.33, 2);
    });

    it('should exclude days outside the window', async () => {
      ctx.clock.set('2026-03-01T12:00:00.000Z');
      await ctx.budget.reserve('agent-a', 'old-op', 500);
      ctx.clock.set('2026-03-10T12:00:00.000Z');

      const stats = await ctx.budget.getUsageStatistics('agent-a');

      expect(stats.days).toBe(7);
      expect(stats.byDay).toHaveLength(7);
      expect(stats.chargedTokens).toBe(0);
    });

    it('should reject an out-of-range window', async () => {
      await expect(ctx.budget.getUsageStatistics('agent-a', 0)).rejects.toMatchObject({
        errorCode: ErrorCode.VALIDATION_ERROR,
      });
    });
  });

  describe('runMetered', () => {
    it('should settle at the reported cost', async () => {
      const result = await ctx.budget.runMetered('agent-a', 'op-1', 500, async () => ({
        result: 'summary text',
        actualTokens: 420,
      }));

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.result).toBe('summary text');
        expect(result.value.settlement.usedToday).toBe(420);
      }
    });

    it('should refund and rethrow when the call fails', async () => {
      const failure = new Error('provider timeout');

      await expect(
        ctx.budget.runMetered('agent-a', 'op-1', 500, async () => {
          throw failure;
        })
      ).rejects.toBe(failure);

      const [stored] = await ctx.store.select(transactionsTable, { operationId: 'op-1' });
      expect(stored.status).toBe(TransactionStatus.REFUNDED);
      expect(stored.metadata.refundReason).toBe('call_failed');
      expect(await ctx.budget.getUsedToday('agent-a')).toBe(0);
    });

    it('should not run the call when the reservation is denied', async () => {
      const call = jest.fn(async () => ({ result: 1, actualTokens: 1 }));
      await ctx.budget.reserve('agent-a', 'op-0', 900);

      const result = await ctx.budget.runMetered('agent-a', 'op-1', 200, call);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.denial.kind).toBe('INSUFFICIENT_BUDGET');
      }
      expect(call).not.toHaveBeenCalled();
    });
  });

  describe('with the primary store unreachable', () => {
    it('should keep accounting on the local fallback', async () => {
      ctx.primary.failing = true;

      const reserved = await ctx.budget.reserve('agent-a', 'op-1', 400);
      const settled = await ctx.budget.settle('op-1', 300);

      expect(reserved.ok).toBe(true);
      expect(settled.ok).toBe(true);
      expect(ctx.store.getBackendStatus().active).toBe('fallback');
      expect(await ctx.budget.getUsedToday('agent-a')).toBe(300);
    });
  });

  describe('with a malformed record in the primary store', () => {
    beforeEach(() => {
      ctx.primary.insertRaw('ledger_transactions', {
        transactionId: 'txn-bad',
        principal: 'agent-a',
        operationId: 'op-bad',
        kind: 'RESERVE',
        status: 'PENDING',
        tokensEstimated: 900,
        tokensActual: null,
        budgetDay: '2026-03-10',
        createdAt: '2026-03-10T11:00:00.000Z',
        completedAt: null,
        metadata: {},
      });
    });

    it('should refuse to reserve instead of reading the local log', async () => {
      await expect(ctx.budget.reserve('agent-a', 'op-1', 400)).rejects.toThrow(RecordFormatError);

      expect(ctx.store.getBackendStatus()).toMatchObject({ active: 'primary', lastPrimaryError: null });
      expect(ctx.primary.count('ledger_transactions')).toBe(1);
    });

    it('should never admit past the limit across repeated attempts', async () => {
      const results = await Promise.allSettled(
        ['op-1', 'op-2', 'op-3', 'op-4', 'op-5'].map((operationId) =>
          ctx.budget.reserve('agent-a', operationId, 400)
        )
      );

      expect(results.every((result) => result.status === 'rejected')).toBe(true);
      expect(ctx.primary.count('ledger_transactions')).toBe(1);
    });
  });
});
