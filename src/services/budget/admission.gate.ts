/**
 * Admission Gate
 *
 * Answers "may this operation proceed" from the same arithmetic reserve()
 * uses, without writing anything.
 */

import { BudgetLimits } from '../../config/settings';
import { createServiceLogger } from '../../observability/logger';
import { admissionDecisionsTotal } from '../../observability/metrics';
import { BudgetDenial } from '../../types/ledger';
import { assertTokenAmount, BudgetService } from './budget.service';

const log = createServiceLogger('admission-gate');

export enum AdmissionVerdict {
  ALLOWED = 'ALLOWED',
  ALLOWED_WITH_WARNING = 'ALLOWED_WITH_WARNING',
  DENIED = 'DENIED',
}

export interface AdmissionDecision {
  verdict: AdmissionVerdict;
  allowed: boolean;
  /** usagePct has reached the emergency threshold; a signal, not a denial */
  emergency: boolean;
  remaining: number;
  /** usedToday / dailyLimit, before this operation */
  usagePct: number;
  usedToday: number;
  dailyLimit: number;
  estimatedTokens: number;
  denial?: BudgetDenial;
}

export interface CostValidation {
  valid: boolean;
  estimatedTokens: number;
  maxSingleOperation: number;
  denial?: BudgetDenial;
}

export class AdmissionGate {
  constructor(
    private readonly budget: BudgetService,
    private readonly limits: BudgetLimits
  ) {}

  /**
   * Single-operation ceiling, independent of the remaining balance
   */
  validateOperationCost(estimatedTokens: number): CostValidation {
    assertTokenAmount('estimatedTokens', estimatedTokens);
    const { maxSingleOperation } = this.limits;

    if (estimatedTokens > maxSingleOperation) {
      return {
        valid: false,
        estimatedTokens,
        maxSingleOperation,
        denial: {
          kind: 'COST_EXCEEDS_MAXIMUM',
          message: `Estimated cost ${estimatedTokens} exceeds the single-operation maximum of ${maxSingleOperation}`,
          estimatedTokens,
          maxSingleOperation,
        },
      };
    }

    return { valid: true, estimatedTokens, maxSingleOperation };
  }

  async checkAvailability(principal: string, estimatedTokens: number): Promise<AdmissionDecision> {
    const preview = await this.budget.previewReservation(principal, estimatedTokens);
    const usagePct = preview.usedToday / preview.dailyLimit;
    const emergency = usagePct >= this.limits.emergencyThreshold;

    let verdict: AdmissionVerdict;
    if (preview.denial) {
      verdict = AdmissionVerdict.DENIED;
    } else if (usagePct >= this.limits.warningThreshold) {
      verdict = AdmissionVerdict.ALLOWED_WITH_WARNING;
    } else {
      verdict = AdmissionVerdict.ALLOWED;
    }

    admissionDecisionsTotal.inc({ verdict });
    if (verdict !== AdmissionVerdict.ALLOWED || emergency) {
      log.info({ principal, estimatedTokens, verdict, usagePct, emergency }, 'Admission decision');
    }

    const decision: AdmissionDecision = {
      verdict,
      allowed: verdict !== AdmissionVerdict.DENIED,
      emergency,
      remaining: preview.remaining,
      usagePct,
      usedToday: preview.usedToday,
      dailyLimit: preview.dailyLimit,
      estimatedTokens,
    };
    if (preview.denial) {
      decision.denial = preview.denial;
    }
    return decision;
  }
}
