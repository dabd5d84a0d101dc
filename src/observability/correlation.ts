import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

import { LogContext, runWithContext } from './log-context';
import { logger } from './logger';

const headerValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

/**
 * Correlation ID middleware
 * - Reuses x-correlation-id / x-request-id from the calling principal, or generates one
 * - Stores it in AsyncLocalStorage for the rest of the request
 * - Echoes it in the response headers
 */
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId =
    headerValue(req.headers['x-correlation-id']) ||
    headerValue(req.headers['x-request-id']) ||
    uuid();

  res.setHeader('x-correlation-id', correlationId);

  const context: LogContext = {
    correlationId,
  };

  runWithContext(context, () => {
    logger.debug({ correlationId, method: req.method, path: req.path }, 'Request started');

    res.on('finish', () => {
      logger.info(
        {
          correlationId,
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
          principal: context.principal,
          operationId: context.operationId,
        },
        'Request completed'
      );
    });

    next();
  });
};
