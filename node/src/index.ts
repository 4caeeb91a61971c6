// Load environment variables FIRST
import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import { appConfig } from '@/config/app.config';
import { logger } from '@/services/logger';
import { createPipeline } from '@/services/pipeline-deps';
import { createApp } from './app';
import {
  setShutdownTarget,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from './stability/errorHandlers';

setupUnhandledRejectionHandler();
setupUncaughtExceptionHandler();
setupGracefulShutdown();

function startServer(): void {
  const { orchestrator, sessions } = createPipeline(appConfig);
  const app = createApp(orchestrator, appConfig);

  const server = app.listen(appConfig.port, () => {
    logger.info('server:listening', {
      port: appConfig.port,
      environment: appConfig.nodeEnv,
      health: `http://localhost:${appConfig.port}/health`,
    });
  });

  setShutdownTarget({ server, cleanup: () => sessions.destroy() });
}

try {
  startServer();
} catch (error) {
  logger.fatal('server:start_failed', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
}
