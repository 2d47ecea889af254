/** App configuration, validated from environment-style key/value pairs. */
import { z } from 'zod';

export const LOG_LEVELS = ['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

const booleanFlag = z
  .string()
  .optional()
  .transform((v) => ['true', '1', 'yes'].includes((v ?? '').trim().toLowerCase()));

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  STORMGLASS_API_KEY: optionalString,
  WORLDTIDES_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FORECAST_TRACE: booleanFlag,
  FORECAST_SEQUENTIAL_COLLECTION: booleanFlag,
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
});

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevelName;
  credentials: {
    stormglass?: string;
    worldTides?: string;
    openai?: string;
  };
  openaiModel: string;
  providerTimeoutMs: number;
  /** Verbose tracing of pipeline stages and model calls. */
  traceEnabled: boolean;
  sequentialCollection: boolean;
  maxUploadBytes: number;
  corsOrigins: string[];
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: Array<{ path: string; message: string }>,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message }));
    throw new ConfigError(
      `Invalid configuration: ${issues.map((i) => `${i.path} ${i.message}`).join('; ')}`,
      issues,
    );
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    credentials: {
      stormglass: e.STORMGLASS_API_KEY,
      worldTides: e.WORLDTIDES_API_KEY,
      openai: e.OPENAI_API_KEY,
    },
    openaiModel: e.OPENAI_MODEL,
    providerTimeoutMs: e.PROVIDER_TIMEOUT_MS,
    traceEnabled: e.FORECAST_TRACE,
    sequentialCollection: e.FORECAST_SEQUENTIAL_COLLECTION,
    maxUploadBytes: e.MAX_UPLOAD_BYTES,
    corsOrigins: e.CORS_ORIGIN.split(',')
      .map((o) => o.trim())
      .filter(Boolean),
  };
}
