import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { BudgetContext } from './context';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler';
import { createHealthRoutes } from './routes/health';
import { BudgetController, createBudgetRoutes } from './services/budget';
import { CoordinationController, createCoordinationRoutes } from './services/coordination';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
  logger,
} from './observability';

export const createApp = (context: BudgetContext): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));
  app.use(express.urlencoded({ extended: true, limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  // Routes
  app.use('/health', createHealthRoutes(context.store));
  app.use('/budget', createBudgetRoutes(new BudgetController(context.budget, context.gate)));
  app.use('/coordination', createCoordinationRoutes(new CoordinationController(context.coordination)));

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error({ err: error }, 'Failed to collect metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'budget-ledger',
      version: '1.0.0',
      description: 'Shared daily token budget for cooperating agent processes',
      principal: context.settings.principalId,
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
