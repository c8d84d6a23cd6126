import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { ValidationError } from '../lib/errors/index.js';

// ===================================
// 1. AUTO-DETECT ENVIRONMENT
// ===================================

export enum EnvMode {
  TEST = 'test',
  LOCAL = 'local',
  PRODUCTION = 'production',
}

export function detectMode(source: NodeJS.ProcessEnv = process.env): EnvMode {
  if (source.NODE_ENV === 'test' || source.VITEST === 'true') return EnvMode.TEST;
  if (source.NODE_ENV === 'production') return EnvMode.PRODUCTION;
  return EnvMode.LOCAL;
}

// ===================================
// 2. LOAD ENV FILE
// ===================================

const CURRENT_MODE = detectMode();

if (CURRENT_MODE === EnvMode.LOCAL) {
  dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
  dotenv.config({ path: path.resolve(process.cwd(), '.env') });
} else if (CURRENT_MODE === EnvMode.TEST) {
  dotenv.config({ path: path.resolve(process.cwd(), '.env.test') });
}
// Production uses injected variables

// ===================================
// 3. SCHEMA
// ===================================

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  ATTENDANCE_API_URL: z.string().url().default('http://localhost:3000'),
  ATTENDANCE_API_TOKEN: z.string().default(''),
  ATTENDANCE_DATA_DIR: z.string().min(1).default('./.attendance-data'),
  GEO_ACCURACY_CEILING_METERS: positiveInt(50),
  SYNC_INTERVAL_MS: positiveInt(60_000),
  SYNC_TIMEOUT_MS: positiveInt(30_000),
  SYNC_BATCH_SIZE: positiveInt(50),
  SYNC_BACKOFF_BASE_MS: positiveInt(2_000),
  SYNC_BACKOFF_CAP_MS: positiveInt(300_000),
  SYNC_BACKOFF_JITTER: z.coerce.number().min(0).max(1).default(0.2),
  SYNC_RETRY_HORIZON_DAYS: positiveInt(14),
  SYNC_ERROR_VISIBILITY_THRESHOLD: positiveInt(3),
  PIN_MAX_ATTEMPTS: positiveInt(5),
  PIN_LOCKOUT_MINUTES: positiveInt(15),
});

export interface EngineConfig {
  mode: EnvMode;
  api: { baseUrl: string; token: string };
  storage: { dataDir: string };
  geo: { accuracyCeilingMeters: number };
  sync: {
    intervalMs: number;
    timeoutMs: number;
    batchSize: number;
    backoffBaseMs: number;
    backoffCapMs: number;
    backoffJitter: number;
    retryHorizonMs: number;
    errorVisibilityThreshold: number;
  };
  pin: { maxAttempts: number; lockoutMs: number };
}

// ===================================
// 4. LOAD & VALIDATE
// ===================================

export function loadEngineConfig(source: NodeJS.ProcessEnv = process.env): EngineConfig {
  // Empty strings mean "unset" so defaults apply
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid engine configuration: ${issues.join('; ')}`, { issues });
  }

  const env = parsed.data;
  return Object.freeze({
    mode: detectMode(source),
    api: { baseUrl: env.ATTENDANCE_API_URL.replace(/\/+$/, ''), token: env.ATTENDANCE_API_TOKEN },
    storage: { dataDir: path.resolve(env.ATTENDANCE_DATA_DIR) },
    geo: { accuracyCeilingMeters: env.GEO_ACCURACY_CEILING_METERS },
    sync: {
      intervalMs: env.SYNC_INTERVAL_MS,
      timeoutMs: env.SYNC_TIMEOUT_MS,
      batchSize: env.SYNC_BATCH_SIZE,
      backoffBaseMs: env.SYNC_BACKOFF_BASE_MS,
      backoffCapMs: env.SYNC_BACKOFF_CAP_MS,
      backoffJitter: env.SYNC_BACKOFF_JITTER,
      retryHorizonMs: env.SYNC_RETRY_HORIZON_DAYS * 24 * 60 * 60 * 1000,
      errorVisibilityThreshold: env.SYNC_ERROR_VISIBILITY_THRESHOLD,
    },
    pin: { maxAttempts: env.PIN_MAX_ATTEMPTS, lockoutMs: env.PIN_LOCKOUT_MINUTES * 60 * 1000 },
  });
}
