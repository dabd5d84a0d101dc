import { Request, Response, NextFunction } from 'express';

import { ApiError } from '../../middlewares/errorHandler';
import { addLogContext } from '../../observability/log-context';
import { AdmissionGate } from './admission.gate';
import { BudgetService } from './budget.service';

export class BudgetController {
  constructor(
    private readonly budget: BudgetService,
    private readonly gate: AdmissionGate
  ) {}

  /**
   * Admission decision for an estimated cost
   * POST /budget/check
   */
  async checkAvailability(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { principal, estimatedTokens } = req.body;
      addLogContext({ principal });

      const decision = await this.gate.checkAvailability(principal, estimatedTokens);

      res.status(200).json({
        success: true,
        data: decision,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Reserve tokens for an operation
   * POST /budget/reservations
   */
  async reserve(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { principal, operationId, estimatedTokens, metadata } = req.body;
      addLogContext({ principal, operationId });

      const result = await this.budget.reserve(principal, operationId, estimatedTokens, metadata);
      if (!result.ok) {
        throw ApiError.fromDenial(result.denial);
      }

      res.status(result.value.idempotent ? 200 : 201).json({
        success: true,
        data: result.value,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Settle a reservation at its actual cost
   * POST /budget/reservations/:operationId/settle
   */
  async settle(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { operationId } = req.params;
      const { actualTokens, metadata } = req.body;
      addLogContext({ operationId });

      const result = await this.budget.settle(operationId, actualTokens, metadata);
      if (!result.ok) {
        throw ApiError.fromDenial(result.denial);
      }

      res.status(200).json({
        success: true,
        data: result.value,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Refund an open reservation or settlement
   * POST /budget/reservations/:operationId/refund
   */
  async refund(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { operationId } = req.params;
      const { reason } = req.body;
      addLogContext({ operationId });

      const result = await this.budget.refund(operationId, reason);
      if (!result.ok) {
        throw ApiError.fromDenial(result.denial);
      }

      res.status(200).json({
        success: true,
        data: result.value,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Current budget day status
   * GET /budget/:principal/status
   */
  async getStatus(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const status = await this.budget.getBudgetStatus(req.params.principal);

      res.status(200).json({
        success: true,
        data: status,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Usage aggregate over recent budget days
   * GET /budget/:principal/statistics?days=7
   */
  async getStatistics(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const days = req.query.days === undefined ? 7 : Number(req.query.days);
      const statistics = await this.budget.getUsageStatistics(req.params.principal, days);

      res.status(200).json({
        success: true,
        data: statistics,
      });
    } catch (error) {
      next(error);
    }
  }
}
