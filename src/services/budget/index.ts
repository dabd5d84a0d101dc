export {
  BudgetService,
  BudgetStatus,
  ReservationResult,
  SettlementResult,
  RefundResult,
  UsageStatistics,
  MeteredOutcome,
  MeteredResult,
  chargedTokens,
} from './budget.service';
export { AdmissionGate, AdmissionDecision, AdmissionVerdict } from './admission.gate';
export { BudgetController } from './budget.controller';
export { createBudgetRoutes } from './budget.routes';
export { budgetDayOf, recentBudgetDays } from './budget.day';
