// Load environment variables FIRST
import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import { loadConfig } from '@/config/app.config';
import { logger, setLogLevel } from '@/services/logger';
import { createForecastServices } from '@/services/pipeline-deps';
import { isConfiguredCredential, PLACEHOLDER_CREDENTIALS } from '@/services/providers/credentials';
import { createApp } from '@/app';
import {
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';

function startServer(): void {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  logger.info('Provider configuration', {
    stormglass: isConfiguredCredential(config.credentials.stormglass, PLACEHOLDER_CREDENTIALS.stormglass),
    worldTides: isConfiguredCredential(config.credentials.worldTides, PLACEHOLDER_CREDENTIALS.worldTides),
    openai: isConfiguredCredential(config.credentials.openai, PLACEHOLDER_CREDENTIALS.openai),
    model: config.openaiModel,
  });
  if (config.traceEnabled) {
    logger.info('Forecast tracing is enabled - stage and model calls will be logged');
  }

  const services = createForecastServices(config);
  const app = createApp(config, services);

  setupUnhandledRejectionHandler(config.nodeEnv);
  setupUncaughtExceptionHandler();
  setupGracefulShutdown();

  const server = app.listen(config.port, () => {
    logger.info(`Server running on http://localhost:${config.port}`, { environment: config.nodeEnv });
  });
  setServerInstance(server);
}

try {
  startServer();
} catch (error: unknown) {
  logger.fatal('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
}
