import { Router, Request, Response } from 'express';
import { getDatabaseStatus } from '../config/database';
import { LedgerStore } from '../store';

/**
 * The ledger keeps serving from the local fallback when MongoDB is down, so
 * a lost primary degrades health instead of failing readiness
 */
export const createHealthRoutes = (store: LedgerStore): Router => {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const dbStatus = getDatabaseStatus();
    const storeStatus = store.getBackendStatus();

    const degraded = storeStatus.primaryConfigured && storeStatus.active !== 'primary';

    res.status(200).json({
      status: degraded ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
      services: {
        database: {
          configured: storeStatus.primaryConfigured,
          connected: dbStatus.connected,
          readyState: dbStatus.readyState,
        },
        store: storeStatus,
      },
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  // The local fallback is always writable, so the ledger is ready whichever
  // backend is active
  router.get('/ready', (_req: Request, res: Response) => {
    const storeStatus = store.getBackendStatus();

    res.status(200).json({
      status: 'ready',
      activeBackend: storeStatus.active,
      databaseConnected: getDatabaseStatus().connected,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
