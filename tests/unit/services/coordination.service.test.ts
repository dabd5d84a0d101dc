import { TriggerReason } from '../../../src/services/coordination';
import { MessagePriority, MessageType } from '../../../src/types/coordination';
import { ErrorCode } from '../../../src/types/errors';
import { createTestContext, HOUR, TestContext } from '../../helpers';

describe('CoordinationService', () => {
  let ctx: TestContext;

  const send = (to: string, title: string, overrides: { priority?: MessagePriority; ttlHours?: number } = {}) =>
    ctx.coordination.sendMessage({
      from: to === 'agent-a' ? 'agent-b' : 'agent-a',
      to,
      type: MessageType.INFORMATIONAL,
      priority: overrides.priority ?? MessagePriority.MEDIUM,
      title,
      body: `${title} body`,
      ttlHours: overrides.ttlHours,
    });

  beforeEach(() => {
    ctx = createTestContext({
      overrides: {
        principalId: 'agent-a',
        peerPrincipalId: 'agent-b',
        budget: { dailyLimit: 1000, maxSingleOperation: 1000 },
        coordination: {
          combinedUsageThreshold: 0.8,
          healthFloor: 0.6,
          stalenessWindowHours: 1,
          messageTtlHours: 24,
        },
      },
    });
  });

  afterEach(() => {
    ctx.cleanup();
  });

  describe('publishStatus', () => {
    it('should keep one row per principal', async () => {
      await ctx.coordination.publishStatus('agent-a', {
        tokensUsed: 100,
        healthScore: 0.9,
        versionMarker: 'v1',
      });
      ctx.clock.advance(60000);
      await ctx.coordination.publishStatus('agent-a', {
        tokensUsed: 250,
        healthScore: 0.7,
        versionMarker: 'v2',
      });

      const status = await ctx.coordination.getStatus('agent-a');

      expect(ctx.primary.count('project_status')).toBe(1);
      expect(status).toEqual({
        principal: 'agent-a',
        versionMarker: 'v2',
        tokensUsedToday: 250,
        dailyLimit: 1000,
        healthScore: 0.7,
        budgetDay: '2026-03-10',
        lastUpdate: new Date('2026-03-10T12:01:00.000Z'),
      });
    });

    it('should reject a health score outside 0..1', async () => {
      await expect(
        ctx.coordination.publishStatus('agent-a', { tokensUsed: 0, healthScore: 1.5, versionMarker: 'v1' })
      ).rejects.toMatchObject({ errorCode: ErrorCode.VALIDATION_ERROR });
    });

    it('should reject a negative token count', async () => {
      await expect(
        ctx.coordination.publishStatus('agent-a', { tokensUsed: -1, healthScore: 1, versionMarker: 'v1' })
      ).rejects.toMatchObject({ errorCode: ErrorCode.INVALID_TOKEN_AMOUNT });
    });

    it('should return null for a principal that never published', async () => {
      expect(await ctx.coordination.getStatus('agent-b')).toBeNull();
    });
  });

  describe('sendMessage', () => {
    it('should expire after the configured TTL by default', async () => {
      const message = await send('agent-b', 'update');

      expect(message.read).toBe(false);
      expect(message.createdAt.toISOString()).toBe('2026-03-10T12:00:00.000Z');
      expect(message.expiresAt?.toISOString()).toBe('2026-03-11T12:00:00.000Z');
    });

    it('should never expire with a TTL of 0', async () => {
      const message = await send('agent-b', 'pinned', { ttlHours: 0 });
      ctx.clock.advance(1000 * HOUR);

      expect(message.expiresAt).toBeNull();
      expect(await ctx.coordination.drainInbox('agent-b')).toHaveLength(1);
    });

    it('should reject an empty title', async () => {
      await expect(send('agent-b', '   ')).rejects.toMatchObject({
        errorCode: ErrorCode.VALIDATION_ERROR,
      });
    });
  });

  describe('drainInbox', () => {
    it('should return unread messages for the principal, newest first', async () => {
      await send('agent-a', 'first');
      ctx.clock.advance(1000);
      await send('agent-a', 'second');
      ctx.clock.advance(1000);
      await send('agent-b', 'for the peer');

      const inbox = await ctx.coordination.drainInbox('agent-a');

      expect(inbox.map((message) => message.title)).toEqual(['second', 'first']);
    });

    it('should leave out expired messages', async () => {
      await send('agent-a', 'short-lived', { ttlHours: 1 });
      await send('agent-a', 'long-lived', { ttlHours: 48 });
      ctx.clock.advance(2 * HOUR);

      const inbox = await ctx.coordination.drainInbox('agent-a');

      expect(inbox.map((message) => message.title)).toEqual(['long-lived']);
    });

    it('should honour the limit', async () => {
      for (let index = 0; index < 5; index += 1) {
        await send('agent-a', `message ${index}`);
        ctx.clock.advance(1000);
      }

      const inbox = await ctx.coordination.drainInbox('agent-a', 2);

      expect(inbox.map((message) => message.title)).toEqual(['message 4', 'message 3']);
    });

    it('should not mark anything read', async () => {
      await send('agent-a', 'hello');

      await ctx.coordination.drainInbox('agent-a');

      expect(await ctx.coordination.drainInbox('agent-a')).toHaveLength(1);
    });
  });

  describe('markRead', () => {
    it('should only let the receiver mark a message read', async () => {
      const message = await send('agent-a', 'hello');

      expect(await ctx.coordination.markRead(message.messageId, 'agent-b')).toBe(false);
      expect(await ctx.coordination.drainInbox('agent-a')).toHaveLength(1);

      expect(await ctx.coordination.markRead(message.messageId, 'agent-a')).toBe(true);
      expect(await ctx.coordination.drainInbox('agent-a')).toHaveLength(0);
    });

    it('should report an unknown message id', async () => {
      expect(await ctx.coordination.markRead('missing', 'agent-a')).toBe(false);
    });
  });

  describe('evaluateCoordinationTriggers', () => {
    it('should see staleness and critical messages across both principals', async () => {
      await ctx.coordination.publishStatus('agent-b', { tokensUsed: 0, healthScore: 0.9, versionMarker: 'v1' });
      ctx.clock.advance(2 * HOUR);
      await ctx.coordination.publishStatus('agent-a', { tokensUsed: 0, healthScore: 0.9, versionMarker: 'v1' });
      await send('agent-b', 'urgent', { priority: MessagePriority.CRITICAL });

      const evaluation = await ctx.coordination.evaluateCoordinationTriggers('agent-a', 'agent-b');

      expect(evaluation.reasons.map((finding) => finding.reason)).toEqual([
        TriggerReason.STATUS_STALENESS,
        TriggerReason.CRITICAL_MESSAGE,
      ]);
    });
  });

  describe('getSystemStatus', () => {
    it('should report a healthy system before anyone publishes', async () => {
      const system = await ctx.coordination.getSystemStatus('agent-a', 'agent-b');

      expect(system).toEqual({
        budgetDay: '2026-03-10',
        combinedUsagePct: 0,
        averageHealth: 1,
        level: 'healthy',
        statuses: [],
        unreadMessages: { 'agent-a': 0, 'agent-b': 0 },
      });
    });

    it('should combine both statuses and count unread messages', async () => {
      await ctx.coordination.publishStatus('agent-a', { tokensUsed: 700, healthScore: 0.9, versionMarker: 'v1' });
      await ctx.coordination.publishStatus('agent-b', { tokensUsed: 900, healthScore: 0.7, versionMarker: 'v1' });
      await send('agent-a', 'one');
      await send('agent-a', 'two');

      const system = await ctx.coordination.getSystemStatus('agent-a', 'agent-b');

      expect(system.combinedUsagePct).toBe(0.8);
      expect(system.averageHealth).toBeCloseTo(0.8, 10);
      expect(system.level).toBe('warning');
      expect(system.statuses).toHaveLength(2);
      expect(system.unreadMessages).toEqual({ 'agent-a': 2, 'agent-b': 0 });
    });
  });

  describe('shareOptimizationInsight', () => {
    it('should send an optimization message to the peer', async () => {
      const message = await ctx.coordination.shareOptimizationInsight('agent-a', 'agent-b', {
        title: 'Cache summaries',
        description: 'Repeated summaries can be served from the cache',
        estimatedSavings: 1200,
      });

      expect(message).toMatchObject({
        fromPrincipal: 'agent-a',
        toPrincipal: 'agent-b',
        type: MessageType.OPTIMIZATION_SHARE,
        priority: MessagePriority.MEDIUM,
        title: 'Cache summaries',
        body: 'Repeated summaries can be served from the cache',
        metadata: { estimatedSavings: 1200 },
      });
    });
  });

  describe('runCoordinationCycle', () => {
    const input = { healthScore: 0.9, versionMarker: 'v3' };

    it('should publish derived usage and request coordination when triggered', async () => {
      await ctx.budget.reserve('agent-a', 'op-1', 900);
      await ctx.coordination.publishStatus('agent-b', { tokensUsed: 800, healthScore: 0.9, versionMarker: 'v1' });

      const result = await ctx.coordination.runCoordinationCycle('agent-a', 'agent-b', input, jest.fn());

      expect(result.status.tokensUsedToday).toBe(900);
      expect(result.status.versionMarker).toBe('v3');
      expect(result.evaluation.coordinationNeeded).toBe(true);
      expect(result.requestSent).toMatchObject({
        fromPrincipal: 'agent-a',
        toPrincipal: 'agent-b',
        type: MessageType.COORDINATION_REQUEST,
        priority: MessagePriority.HIGH,
        title: 'Coordination requested',
        body: 'Combined usage 85.0% exceeds 80.0%',
        metadata: { reasons: ['combined_usage'], combinedUsagePct: 0.85 },
      });
      expect(await ctx.coordination.drainInbox('agent-b')).toHaveLength(1);
    });

    it('should not resend while the previous request is still unread', async () => {
      await ctx.budget.reserve('agent-a', 'op-1', 900);
      await ctx.coordination.publishStatus('agent-b', { tokensUsed: 800, healthScore: 0.9, versionMarker: 'v1' });

      const first = await ctx.coordination.runCoordinationCycle('agent-a', 'agent-b', input, jest.fn());
      ctx.clock.advance(60000);
      const second = await ctx.coordination.runCoordinationCycle('agent-a', 'agent-b', input, jest.fn());

      expect(first.requestSent).not.toBeNull();
      expect(second.evaluation.coordinationNeeded).toBe(true);
      expect(second.requestSent).toBeNull();
      expect(await ctx.coordination.drainInbox('agent-b')).toHaveLength(1);

      await ctx.coordination.markRead(first.requestSent?.messageId ?? '', 'agent-b');
      ctx.clock.advance(60000);
      const third = await ctx.coordination.runCoordinationCycle('agent-a', 'agent-b', input, jest.fn());

      expect(third.requestSent).not.toBeNull();
    });

    it('should send nothing when no trigger fires', async () => {
      await ctx.coordination.publishStatus('agent-b', { tokensUsed: 100, healthScore: 0.9, versionMarker: 'v1' });

      const result = await ctx.coordination.runCoordinationCycle('agent-a', 'agent-b', input, jest.fn());

      expect(result.evaluation.coordinationNeeded).toBe(false);
      expect(result.requestSent).toBeNull();
    });

    it('should mark handled messages read and keep failed ones for the next cycle', async () => {
      await ctx.coordination.publishStatus('agent-b', { tokensUsed: 0, healthScore: 0.9, versionMarker: 'v1' });
      await send('agent-a', 'handled');
      ctx.clock.advance(1000);
      await send('agent-a', 'broken');
      const handler = jest.fn(async (message: { title: string }) => {
        if (message.title === 'broken') {
          throw new Error('handler failed');
        }
      });

      const result = await ctx.coordination.runCoordinationCycle('agent-a', 'agent-b', input, handler);

      expect(handler).toHaveBeenCalledTimes(2);
      expect(result.processed).toBe(1);
      expect(result.failed).toBe(1);
      const remaining = await ctx.coordination.drainInbox('agent-a');
      expect(remaining.map((message) => message.title)).toEqual(['broken']);
    });
  });
});
