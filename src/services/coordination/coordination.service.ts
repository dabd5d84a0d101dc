/**
 * Coordination Service
 *
 * Status heartbeat and addressed messages between the two principals,
 * stored in the same ledger store as the transactions.
 *
 * Each principal writes only its own status row and the read flag of
 * messages addressed to it. Delivery is whatever the store gives: there is
 * no acknowledgement beyond markRead and no redelivery guarantee.
 */

import { v4 as uuid } from 'uuid';

import { BudgetSettings } from '../../config/settings';
import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability/logger';
import { coordinationCyclesTotal, coordinationMessagesTotal } from '../../observability/metrics';
import { LedgerStore, messagesTable, statusTable } from '../../store';
import {
  CoordinationMessage,
  MessagePriority,
  MessageType,
  ProjectStatus,
} from '../../types/coordination';
import { Clock, systemClock } from '../../utils/clock';
import { budgetDayOf } from '../budget/budget.day';
import { BudgetService } from '../budget/budget.service';
import {
  combinedUsage,
  evaluateTriggers,
  HealthLevel,
  healthLevel,
  TriggerEvaluation,
} from './coordination.triggers';

const log = createServiceLogger('coordination-service');

const HOUR_MS = 3600000;
const DEFAULT_INBOX_LIMIT = 50;

export interface StatusUpdate {
  tokensUsed: number;
  healthScore: number;
  versionMarker: string;
}

export interface SendMessageInput {
  from: string;
  to: string;
  type: MessageType;
  priority: MessagePriority;
  title: string;
  body: string;
  metadata?: Record<string, unknown>;
  /** 0 means the message never expires; defaults to the configured TTL */
  ttlHours?: number;
}

export interface OptimizationInsight {
  title: string;
  description: string;
  estimatedSavings: number;
}

export interface SystemStatus {
  budgetDay: string;
  combinedUsagePct: number;
  averageHealth: number;
  level: HealthLevel;
  statuses: ProjectStatus[];
  unreadMessages: Record<string, number>;
}

export interface CycleInput {
  healthScore: number;
  versionMarker: string;
}

export type MessageHandler = (message: CoordinationMessage) => Promise<void> | void;

export interface CycleResult {
  status: ProjectStatus;
  evaluation: TriggerEvaluation;
  requestSent: CoordinationMessage | null;
  processed: number;
  failed: number;
}

export interface CoordinationServiceDeps {
  store: LedgerStore;
  budget: BudgetService;
  settings: BudgetSettings;
  clock?: Clock;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class CoordinationService {
  private readonly store: LedgerStore;
  private readonly budget: BudgetService;
  private readonly settings: BudgetSettings;
  private readonly clock: Clock;

  constructor(deps: CoordinationServiceDeps) {
    this.store = deps.store;
    this.budget = deps.budget;
    this.settings = deps.settings;
    this.clock = deps.clock ?? systemClock;
  }

  private today(): string {
    return budgetDayOf(this.clock.now(), this.settings.budget.timeZone);
  }

  private isLive(message: CoordinationMessage): boolean {
    return message.expiresAt === null || message.expiresAt.getTime() > this.clock.now();
  }

  /**
   * Upsert the principal's status row
   */
  async publishStatus(principal: string, update: StatusUpdate): Promise<ProjectStatus> {
    if (!Number.isSafeInteger(update.tokensUsed) || update.tokensUsed < 0) {
      throw ApiError.invalidTokenAmount('tokensUsed', update.tokensUsed);
    }
    if (!Number.isFinite(update.healthScore) || update.healthScore < 0 || update.healthScore > 1) {
      throw ApiError.validationError('healthScore must be between 0 and 1', {
        healthScore: ['healthScore must be between 0 and 1'],
      });
    }

    const status: ProjectStatus = {
      principal,
      versionMarker: update.versionMarker,
      tokensUsedToday: update.tokensUsed,
      dailyLimit: this.settings.budget.dailyLimit,
      healthScore: update.healthScore,
      budgetDay: this.today(),
      lastUpdate: new Date(this.clock.now()),
    };

    const matched = await this.store.updateWhere(statusTable, { principal }, status);
    if (matched === 0) {
      await this.store.insert(statusTable, status);
    }

    log.debug({ principal, tokensUsed: update.tokensUsed, healthScore: update.healthScore }, 'Status published');
    return status;
  }

  async getStatus(principal: string): Promise<ProjectStatus | null> {
    const [status] = await this.store.select(statusTable, { principal }, { limit: 1 });
    return status ?? null;
  }

  private async getStatuses(principals: string[]): Promise<ProjectStatus[]> {
    const statuses = await Promise.all(principals.map((principal) => this.getStatus(principal)));
    return statuses.filter((status): status is ProjectStatus => status !== null);
  }

  async sendMessage(input: SendMessageInput): Promise<CoordinationMessage> {
    if (input.title.trim() === '') {
      throw ApiError.validationError('title must be a non-empty string', {
        title: ['title must be a non-empty string'],
      });
    }
    const ttlHours = input.ttlHours ?? this.settings.coordination.messageTtlHours;
    if (!Number.isFinite(ttlHours) || ttlHours < 0) {
      throw ApiError.validationError('ttlHours must be 0 or greater', {
        ttlHours: ['ttlHours must be 0 or greater'],
      });
    }

    const now = this.clock.now();
    const message: CoordinationMessage = {
      messageId: uuid(),
      fromPrincipal: input.from,
      toPrincipal: input.to,
      type: input.type,
      priority: input.priority,
      title: input.title,
      body: input.body,
      metadata: input.metadata ?? {},
      createdAt: new Date(now),
      expiresAt: ttlHours > 0 ? new Date(now + ttlHours * HOUR_MS) : null,
      read: false,
    };

    await this.store.insert(messagesTable, message);
    coordinationMessagesTotal.inc({ direction: 'sent' });
    log.info(
      { messageId: message.messageId, from: input.from, to: input.to, type: input.type, priority: input.priority },
      'Coordination message sent'
    );

    return message;
  }

  /**
   * Unread, unexpired messages for the principal, newest first.
   * Nothing is marked read here.
   */
  async drainInbox(principal: string, limit = DEFAULT_INBOX_LIMIT): Promise<CoordinationMessage[]> {
    const unread = await this.store.select(
      messagesTable,
      { toPrincipal: principal, read: false },
      { orderBy: { field: 'createdAt', direction: 'desc' } }
    );
    return unread.filter((message) => this.isLive(message)).slice(0, limit);
  }

  /**
   * Only the receiver can mark a message read
   * @returns whether a message matched
   */
  async markRead(messageId: string, principal: string): Promise<boolean> {
    const matched = await this.store.updateWhere(
      messagesTable,
      { messageId, toPrincipal: principal },
      { read: true }
    );
    return matched > 0;
  }

  async evaluateCoordinationTriggers(principal: string, peer: string): Promise<TriggerEvaluation> {
    const statuses = await this.getStatuses([principal, peer]);
    const inboxes = await Promise.all([
      this.drainInbox(principal, Number.MAX_SAFE_INTEGER),
      this.drainInbox(peer, Number.MAX_SAFE_INTEGER),
    ]);

    return evaluateTriggers(statuses, inboxes.flat(), this.today(), {
      combinedUsageThreshold: this.settings.coordination.combinedUsageThreshold,
      healthFloor: this.settings.coordination.healthFloor,
      stalenessWindowHours: this.settings.coordination.stalenessWindowHours,
    });
  }

  async getSystemStatus(principal: string, peer: string): Promise<SystemStatus> {
    const statuses = await this.getStatuses([principal, peer]);
    const today = this.today();
    const combinedUsagePct = combinedUsage(statuses, today);
    const averageHealth =
      statuses.length > 0
        ? statuses.reduce((total, status) => total + status.healthScore, 0) / statuses.length
        : 1;

    const [ownInbox, peerInbox] = await Promise.all([
      this.drainInbox(principal, Number.MAX_SAFE_INTEGER),
      this.drainInbox(peer, Number.MAX_SAFE_INTEGER),
    ]);

    return {
      budgetDay: today,
      combinedUsagePct,
      averageHealth,
      level: healthLevel(combinedUsagePct, averageHealth),
      statuses,
      unreadMessages: { [principal]: ownInbox.length, [peer]: peerInbox.length },
    };
  }

  async shareOptimizationInsight(
    from: string,
    to: string,
    insight: OptimizationInsight
  ): Promise<CoordinationMessage> {
    return this.sendMessage({
      from,
      to,
      type: MessageType.OPTIMIZATION_SHARE,
      priority: MessagePriority.MEDIUM,
      title: insight.title,
      body: insight.description,
      metadata: { estimatedSavings: insight.estimatedSavings },
    });
  }

  private async hasPendingRequest(from: string, to: string): Promise<boolean> {
    const inbox = await this.drainInbox(to, Number.MAX_SAFE_INTEGER);
    return inbox.some(
      (message) => message.fromPrincipal === from && message.type === MessageType.COORDINATION_REQUEST
    );
  }

  /**
   * publish own status -> evaluate triggers -> request coordination from the
   * peer when triggered -> hand each inbox message to the handler.
   *
   * No new request is sent while an earlier one from this principal is still
   * unread in the peer's inbox.
   *
   * Handler failures are logged and the message stays unread for the next
   * cycle. They never propagate.
   */
  async runCoordinationCycle(
    principal: string,
    peer: string,
    input: CycleInput,
    handler: MessageHandler
  ): Promise<CycleResult> {
    const tokensUsed = await this.budget.getUsedToday(principal);
    const status = await this.publishStatus(principal, {
      tokensUsed,
      healthScore: input.healthScore,
      versionMarker: input.versionMarker,
    });

    const evaluation = await this.evaluateCoordinationTriggers(principal, peer);
    coordinationCyclesTotal.inc({ triggered: String(evaluation.coordinationNeeded) });

    let requestSent: CoordinationMessage | null = null;
    if (evaluation.coordinationNeeded && (await this.hasPendingRequest(principal, peer))) {
      log.debug({ principal, peer }, 'Coordination request still unread, not resending');
    } else if (evaluation.coordinationNeeded) {
      requestSent = await this.sendMessage({
        from: principal,
        to: peer,
        type: MessageType.COORDINATION_REQUEST,
        priority: MessagePriority.HIGH,
        title: 'Coordination requested',
        body: evaluation.reasons.map((finding) => finding.detail).join('\n'),
        metadata: {
          reasons: evaluation.reasons.map((finding) => finding.reason),
          combinedUsagePct: evaluation.combinedUsagePct,
        },
      });
    }

    let processed = 0;
    let failed = 0;
    for (const message of await this.drainInbox(principal)) {
      try {
        await handler(message);
        await this.markRead(message.messageId, principal);
        processed += 1;
        coordinationMessagesTotal.inc({ direction: 'processed' });
      } catch (error) {
        failed += 1;
        coordinationMessagesTotal.inc({ direction: 'failed' });
        log.warn(
          { messageId: message.messageId, from: message.fromPrincipal, error: errorMessage(error) },
          'Coordination message handler failed, will retry next cycle'
        );
      }
    }

    log.info(
      { principal, peer, triggered: evaluation.coordinationNeeded, processed, failed },
      'Coordination cycle complete'
    );

    return { status, evaluation, requestSent, processed, failed };
  }
}
