// src/stability/errorHandlers.ts: process-level error handlers, graceful shutdown, request timeout

import type { Server } from 'http';
import type { ErrorRequestHandler, RequestHandler } from 'express';
import { logger } from '@/services/logger';
import { createErrorResponse } from '@/utils/errorResponse';
import { correlationIdOf } from '@/middleware/correlation';

const SHUTDOWN_GRACE_MS = 15_000;

let serverInstance: Server | null = null;
let shuttingDown = false;

export function setServerInstance(server: Server): void {
  serverInstance = server;
}

export function setupUnhandledRejectionHandler(nodeEnv: string): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    // keep serving in production; fail fast elsewhere
    if (nodeEnv !== 'production') {
      process.exit(1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('Uncaught exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  signals.forEach((signal) => {
    process.on(signal, () => {
      logger.info(`Received ${signal}, starting graceful shutdown`);
      gracefulShutdown(signal, 0);
    });
  });
}

function gracefulShutdown(reason: string, exitCode: number): void {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('Graceful shutdown initiated', { reason });

  const forceExit = setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, SHUTDOWN_GRACE_MS);
  forceExit.unref();

  if (!serverInstance) {
    process.exit(exitCode);
  }
  // stop accepting connections; in-flight forecasts finish first
  serverInstance.close((err) => {
    if (err) {
      logger.error('Error while closing HTTP server', { error: err.message });
      process.exit(1);
    }
    logger.info('HTTP server closed');
    process.exit(exitCode);
  });
}

/** Forecast requests wait on the model, so they get a longer budget than everything else. */
export function requestTimeout(defaultTimeoutMs = 15_000, forecastTimeoutMs = 60_000): RequestHandler {
  return (req, res, next) => {
    const isForecastRoute = req.method === 'POST' && req.originalUrl.startsWith('/api/forecast');
    const effectiveTimeout = isForecastRoute ? forecastTimeoutMs : defaultTimeoutMs;

    const timeout = setTimeout(() => {
      if (!res.headersSent) {
        res
          .status(408)
          .json(createErrorResponse(`Request exceeded ${effectiveTimeout}ms timeout`, undefined, 'request_timeout'));
      }
    }, effectiveTimeout);

    res.on('finish', () => clearTimeout(timeout));
    res.on('close', () => clearTimeout(timeout));
    next();
  };
}

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json(createErrorResponse(`Route ${req.method} ${req.path} not found`, undefined, 'not_found'));
};

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  logger.error('Unhandled error', {
    correlationId: correlationIdOf(res),
    error: err instanceof Error ? err.message : String(err),
  });
  if (res.headersSent) return;
  res.status(500).json(createErrorResponse('Internal Server Error', undefined, 'internal_error'));
};
