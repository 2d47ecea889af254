// src/app.ts: Express app for the forecast API (no listen; index.ts starts the server)
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import rateLimit from 'express-rate-limit';

import type { AppConfig } from '@/config/app.config';
import type { ForecastServices } from '@/services/pipeline-deps';
import { logger } from '@/services/logger';
import { attachCorrelationId } from '@/middleware/correlation';
import { createForecastRouter } from '@/routes/forecast';
import { errorHandler, notFoundHandler, requestTimeout } from '@/stability/errorHandlers';

export function createApp(config: AppConfig, services: ForecastServices): express.Express {
  const app = express();

  app.use(helmet());
  app.use(
    cors({
      origin: config.corsOrigins,
      credentials: true,
    }),
  );

  if (config.nodeEnv === 'production') {
    app.use(
      rateLimit({
        windowMs: 60 * 1000,
        limit: 30,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
  }

  app.use(attachCorrelationId);
  app.use(requestTimeout());
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));
  app.use(compression());

  if (config.nodeEnv !== 'test') {
    app.use(
      morgan(config.nodeEnv === 'development' ? 'dev' : 'combined', {
        stream: { write: (line: string) => logger.info(line.trim()) },
      }),
    );
  }

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.use('/api/forecast', createForecastRouter(services, { maxUploadBytes: config.maxUploadBytes }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
