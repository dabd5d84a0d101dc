/**
 * Coordination trigger evaluation
 *
 * Pure functions over the two principals' status rows and their unread
 * messages. A status row from an earlier budget day contributes no usage.
 */

import { CoordinationMessage, MessagePriority, ProjectStatus } from '../../types/coordination';

export interface TriggerThresholds {
  combinedUsageThreshold: number;
  healthFloor: number;
  stalenessWindowHours: number;
}

export enum TriggerReason {
  COMBINED_USAGE = 'combined_usage',
  LOW_HEALTH = 'low_health',
  STATUS_STALENESS = 'status_staleness',
  CRITICAL_MESSAGE = 'critical_message',
}

export interface TriggerFinding {
  reason: TriggerReason;
  detail: string;
}

export interface TriggerEvaluation {
  coordinationNeeded: boolean;
  reasons: TriggerFinding[];
  combinedUsagePct: number;
  statuses: ProjectStatus[];
  unreadMessages: number;
  criticalMessages: number;
}

const HOUR_MS = 3600000;

export function usageForDay(status: ProjectStatus, today: string): number {
  return status.budgetDay === today ? status.tokensUsedToday : 0;
}

/**
 * Σ used today / Σ daily limit; 0 when no status has been published
 */
export function combinedUsage(statuses: ProjectStatus[], today: string): number {
  const limit = statuses.reduce((total, status) => total + status.dailyLimit, 0);
  if (limit === 0) return 0;
  const used = statuses.reduce((total, status) => total + usageForDay(status, today), 0);
  return used / limit;
}

export function evaluateTriggers(
  statuses: ProjectStatus[],
  unread: CoordinationMessage[],
  today: string,
  thresholds: TriggerThresholds
): TriggerEvaluation {
  const reasons: TriggerFinding[] = [];
  const combinedUsagePct = combinedUsage(statuses, today);

  if (combinedUsagePct > thresholds.combinedUsageThreshold) {
    reasons.push({
      reason: TriggerReason.COMBINED_USAGE,
      detail: `Combined usage ${(combinedUsagePct * 100).toFixed(1)}% exceeds ${(thresholds.combinedUsageThreshold * 100).toFixed(1)}%`,
    });
  }

  for (const status of statuses) {
    if (status.healthScore < thresholds.healthFloor) {
      reasons.push({
        reason: TriggerReason.LOW_HEALTH,
        detail: `${status.principal} health ${status.healthScore} is below ${thresholds.healthFloor}`,
      });
    }
  }

  if (statuses.length === 2) {
    const [first, second] = statuses;
    const gapMs = Math.abs(first.lastUpdate.getTime() - second.lastUpdate.getTime());
    if (gapMs > thresholds.stalenessWindowHours * HOUR_MS) {
      reasons.push({
        reason: TriggerReason.STATUS_STALENESS,
        detail: `Status updates are ${(gapMs / HOUR_MS).toFixed(2)}h apart`,
      });
    }
  }

  const criticalMessages = unread.filter(
    (message) => message.priority === MessagePriority.CRITICAL
  ).length;
  if (criticalMessages > 0) {
    reasons.push({
      reason: TriggerReason.CRITICAL_MESSAGE,
      detail: `${criticalMessages} unread critical message(s)`,
    });
  }

  return {
    coordinationNeeded: reasons.length > 0,
    reasons,
    combinedUsagePct,
    statuses,
    unreadMessages: unread.length,
    criticalMessages,
  };
}

export type HealthLevel = 'healthy' | 'caution' | 'warning' | 'critical';

export function healthLevel(combinedUsagePct: number, averageHealth: number): HealthLevel {
  if (combinedUsagePct > 0.9 || averageHealth < 0.3) return 'critical';
  if (combinedUsagePct > 0.75 || averageHealth < 0.5) return 'warning';
  if (combinedUsagePct > 0.5 || averageHealth < 0.7) return 'caution';
  return 'healthy';
}
