export {
  CoordinationService,
  CycleResult,
  MessageHandler,
  SendMessageInput,
  StatusUpdate,
  SystemStatus,
} from './coordination.service';
export {
  evaluateTriggers,
  combinedUsage,
  healthLevel,
  HealthLevel,
  TriggerEvaluation,
  TriggerReason,
} from './coordination.triggers';
export { CoordinationController } from './coordination.controller';
export { createCoordinationRoutes } from './coordination.routes';
