import { Request, Response, NextFunction } from 'express';

import { ApiError } from '../../middlewares/errorHandler';
import { addLogContext } from '../../observability/log-context';
import { MessagePriority } from '../../types/coordination';
import { CoordinationService } from './coordination.service';

export class CoordinationController {
  constructor(private readonly coordination: CoordinationService) {}

  /**
   * Publish a principal's status heartbeat
   * PUT /coordination/status/:principal
   */
  async publishStatus(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { principal } = req.params;
      const { tokensUsed, healthScore, versionMarker } = req.body;
      addLogContext({ principal });

      const status = await this.coordination.publishStatus(principal, {
        tokensUsed,
        healthScore,
        versionMarker,
      });

      res.status(200).json({
        success: true,
        data: status,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Send a message to the other principal
   * POST /coordination/messages
   */
  async sendMessage(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { from, to, type, priority, title, body, metadata, ttlHours } = req.body;
      addLogContext({ principal: from });

      const message = await this.coordination.sendMessage({
        from,
        to,
        type,
        priority: priority ?? MessagePriority.MEDIUM,
        title,
        body: body ?? '',
        metadata,
        ttlHours,
      });

      res.status(201).json({
        success: true,
        data: message,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Unread messages, newest first
   * GET /coordination/:principal/inbox
   */
  async getInbox(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { principal } = req.params;
      const limit = req.query.limit === undefined ? undefined : Number(req.query.limit);

      const messages = await this.coordination.drainInbox(principal, limit);

      res.status(200).json({
        success: true,
        data: {
          messages,
          count: messages.length,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Mark a message read on behalf of its receiver
   * POST /coordination/messages/:messageId/read
   */
  async markRead(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { messageId } = req.params;
      const { principal } = req.body;

      const matched = await this.coordination.markRead(messageId, principal);
      if (!matched) {
        throw ApiError.notFound('Message');
      }

      res.status(200).json({
        success: true,
        data: { messageId, read: true },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Trigger evaluation for a principal pair
   * GET /coordination/triggers?principal=&peer=
   */
  async getTriggers(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const principal = String(req.query.principal);
      const peer = String(req.query.peer);

      const evaluation = await this.coordination.evaluateCoordinationTriggers(principal, peer);

      res.status(200).json({
        success: true,
        data: evaluation,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Combined health of both principals
   * GET /coordination/system?principal=&peer=
   */
  async getSystemStatus(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const principal = String(req.query.principal);
      const peer = String(req.query.peer);

      const status = await this.coordination.getSystemStatus(principal, peer);

      res.status(200).json({
        success: true,
        data: status,
      });
    } catch (error) {
      next(error);
    }
  }
}
