// Express application: security, parsing, logging, then the chat routes
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import rateLimit from 'express-rate-limit';

import type { AppConfig } from '@/config/app.config';
import type { Orchestrator } from '@/services/orchestrator';
import { logger } from '@/services/logger';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { createChatRouter } from '@/routes/chat';

export function createApp(orchestrator: Orchestrator, config: Pick<AppConfig, 'nodeEnv' | 'corsOrigins'>): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.corsOrigins, credentials: true }));

  // Rate limiting stays off in development and tests
  if (config.nodeEnv === 'production') {
    app.use(
      rateLimit({
        windowMs: 60 * 1000,
        max: 100,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
  }

  app.use(express.json({ limit: '100kb' }));
  app.use(compression());
  app.use(attachCorrelationId);

  if (config.nodeEnv === 'development') {
    app.use(morgan('dev'));
  } else if (config.nodeEnv === 'production') {
    app.use(
      morgan('combined', {
        stream: { write: (line: string) => logger.info('http:access', { line: line.trim() }) },
      }),
    );
  }

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
      activeSessions: orchestrator.activeSessions(),
    });
  });

  app.use('/api/chat', createChatRouter(orchestrator));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
