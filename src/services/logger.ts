// src/services/logger.ts: structured logging for the forecast service
import { Logger } from 'tslog';
import type { LogLevelName } from '@/config/app.config';

const LEVEL_IDS: Record<LogLevelName, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export const logger = new Logger({
  name: 'surfcast-backend',
  minLevel: LEVEL_IDS.info,
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} {{name}} ',
  type: process.env.NODE_ENV === 'production' ? 'json' : 'pretty',
});

/** Applied once at startup from AppConfig.logLevel. */
export function setLogLevel(level: LogLevelName): void {
  logger.settings.minLevel = LEVEL_IDS[level];
}
