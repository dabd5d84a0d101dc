import { Router, Request, Response, NextFunction } from 'express';
import { CoordinationController } from './coordination.controller';
import {
  inboxValidation,
  markReadValidation,
  publishStatusValidation,
  sendMessageValidation,
  triggersValidation,
} from './coordination.validation';
import { validateRequest } from '../../middlewares/validateRequest';

export const createCoordinationRoutes = (controller: CoordinationController): Router => {
  const router = Router();

  // PUT /coordination/status/:principal - Publish status heartbeat
  router.put('/status/:principal', publishStatusValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.publishStatus(req, res, next));

  // POST /coordination/messages - Send a message
  router.post('/messages', sendMessageValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.sendMessage(req, res, next));

  // POST /coordination/messages/:messageId/read - Mark a message read
  router.post('/messages/:messageId/read', markReadValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.markRead(req, res, next));

  // GET /coordination/triggers - Evaluate coordination triggers
  router.get('/triggers', triggersValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.getTriggers(req, res, next));

  // GET /coordination/system - Combined system status
  router.get('/system', triggersValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.getSystemStatus(req, res, next));

  // GET /coordination/:principal/inbox - Unread messages
  router.get('/:principal/inbox', inboxValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.getInbox(req, res, next));

  return router;
};
