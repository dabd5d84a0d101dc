import { Router, Request, Response, NextFunction } from 'express';
import { BudgetController } from './budget.controller';
import {
  checkAvailabilityValidation,
  principalParamValidation,
  refundValidation,
  reserveValidation,
  settleValidation,
  statisticsValidation,
} from './budget.validation';
import { validateRequest } from '../../middlewares/validateRequest';

export const createBudgetRoutes = (controller: BudgetController): Router => {
  const router = Router();

  // POST /budget/check - Admission decision, no state change
  router.post('/check', checkAvailabilityValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.checkAvailability(req, res, next));

  // POST /budget/reservations - Reserve tokens for an operation
  router.post('/reservations', reserveValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.reserve(req, res, next));

  // POST /budget/reservations/:operationId/settle - Record the actual cost
  router.post('/reservations/:operationId/settle', settleValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.settle(req, res, next));

  // POST /budget/reservations/:operationId/refund - Return the tokens
  router.post('/reservations/:operationId/refund', refundValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.refund(req, res, next));

  // GET /budget/:principal/status - Current budget day
  router.get('/:principal/status', principalParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.getStatus(req, res, next));

  // GET /budget/:principal/statistics - Recent usage
  router.get('/:principal/statistics', statisticsValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.getStatistics(req, res, next));

  return router;
};
