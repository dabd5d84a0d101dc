import { createApp } from './app';
import { config } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { createBudgetContext } from './context';
import { createServiceLogger } from './observability/logger';
import { CoordinationMessage } from './types/coordination';

const log = createServiceLogger('server');

const logIncomingMessage = (message: CoordinationMessage): void => {
  log.info(
    {
      messageId: message.messageId,
      from: message.fromPrincipal,
      type: message.type,
      priority: message.priority,
      title: message.title,
    },
    'Coordination message received'
  );
};

const startServer = async (): Promise<void> => {
  try {
    const context = createBudgetContext({ mongoConfigured: config.mongodb.uri !== '' });
    const { settings } = context;

    // Connect to database; the store falls back to the local log if it is down
    if (config.mongodb.uri) {
      try {
        await connectDatabase();
      } catch (error) {
        log.warn({ err: error }, 'MongoDB unavailable at startup, serving from local fallback');
      }
    } else {
      log.info({ fallbackDir: settings.store.fallbackDir }, 'No MongoDB URI configured, using local fallback only');
    }

    const app = createApp(context);

    // Start HTTP server
    const server = app.listen(config.port, () => {
      log.info(
        { port: config.port, env: config.nodeEnv, principal: settings.principalId, peer: settings.peerPrincipalId },
        'Server started'
      );
    });

    // Periodic coordination cycle
    let cycleRunning = false;
    const runCycle = async (): Promise<void> => {
      if (cycleRunning) return;
      cycleRunning = true;
      try {
        await context.coordination.runCoordinationCycle(
          settings.principalId,
          settings.peerPrincipalId,
          config.heartbeat,
          logIncomingMessage
        );
      } catch (error) {
        log.error({ err: error }, 'Coordination cycle failed');
      } finally {
        cycleRunning = false;
      }
    };
    const cycleTimer = setInterval(() => {
      void runCycle();
    }, settings.coordination.pollIntervalMs);
    cycleTimer.unref();

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      log.info({ signal }, 'Starting graceful shutdown');
      clearInterval(cycleTimer);

      server.close(async () => {
        log.info('HTTP server closed');

        try {
          await disconnectDatabase();
          log.info('Graceful shutdown completed');
          process.exit(0);
        } catch (error) {
          log.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        }
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        log.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    log.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
