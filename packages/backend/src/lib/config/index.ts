import { z } from 'zod';
import { ValidationError } from '../errors.js';

const booleanString = z
  .string()
  .default('true')
  .transform((value) => value.trim().toLowerCase() === 'true');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  FRONTEND_URL: z.string().min(1).default('http://localhost:5173'),
  APP_VERSION: z.string().min(1).default('dev'),
  LICENSE_DB_PATH: z.string().min(1).default('licenses.db'),
  LICENSE_DB_SEED: booleanString,
  POOL_SEED_FILE: z.string().min(1).optional(),
  SNAPSHOT_INTERVAL_MS: z.coerce.number().int().min(100).default(1000),
  EVENT_RETENTION_HOURS: z.coerce.number().positive().default(6),
  EVENT_BUFFER_MAX_EVENTS: z.coerce.number().int().positive().default(50_000),
  RECENT_EVENTS_SECONDS: z.coerce.number().int().positive().default(10),
  SESSION_QUEUE_DEPTH: z.coerce.number().int().positive().default(2),
  HISTORY_MODE: z.enum(['direct', 'queue']).default('direct'),
  REDIS_HOST: z.string().min(1).default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().int().min(0).default(0),
});

export interface AppConfig {
  port: number;
  host: string;
  frontendUrl: string;
  appVersion: string;
  database: {
    path: string;
    seed: boolean;
    seedFile?: string;
  };
  telemetry: {
    snapshotIntervalMs: number;
    retentionMs: number;
    maxEventsPerCategory: number;
    recentEventsMs: number;
    sessionQueueDepth: number;
  };
  history: {
    mode: 'direct' | 'queue';
  };
  redis: {
    host: string;
    port: number;
    password?: string;
    db: number;
  };
}

let cachedConfig: AppConfig | undefined;

/**
 * Parse service settings from environment variables.
 * Throws ValidationError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new ValidationError(`Invalid environment configuration: ${invalid.join(', ')}`, {
      invalid,
    });
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    frontendUrl: vars.FRONTEND_URL,
    appVersion: vars.APP_VERSION,
    database: {
      path: vars.LICENSE_DB_PATH,
      seed: vars.LICENSE_DB_SEED,
      seedFile: vars.POOL_SEED_FILE,
    },
    telemetry: {
      snapshotIntervalMs: vars.SNAPSHOT_INTERVAL_MS,
      retentionMs: vars.EVENT_RETENTION_HOURS * 60 * 60 * 1000,
      maxEventsPerCategory: vars.EVENT_BUFFER_MAX_EVENTS,
      recentEventsMs: vars.RECENT_EVENTS_SECONDS * 1000,
      sessionQueueDepth: vars.SESSION_QUEUE_DEPTH,
    },
    history: {
      mode: vars.HISTORY_MODE,
    },
    redis: {
      host: vars.REDIS_HOST,
      port: vars.REDIS_PORT,
      password: vars.REDIS_PASSWORD || undefined,
      db: vars.REDIS_DB,
    },
  };
}

/** Validated config for this process, parsed once. */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetConfigCache(): void {
  cachedConfig = undefined;
}
