/**
 * Server Configuration
 *
 * Centralized configuration for all environment variables. Read once at
 * startup through getConfig(); the result is validated against the zod
 * schema so a bad value fails fast with every problem listed.
 */

import dotenv from 'dotenv';
import path from 'path';
import { assertValidConfig } from './schema';
import type { AppConfig } from './types';

dotenv.config({ path: path.join(__dirname, '../../.env') });

export const DEFAULT_HEALTH_CHECK = {
  intervalMs: 10_000,
  timeoutMs: 5_000,
  maxConsecutiveFailures: 3,
  baseBackoffIntervalMs: 10_000,
  maxBackoffIntervalMs: 300_000,
} as const;

type Env = Record<string, string | undefined>;

function intFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  // Non-numeric input becomes NaN and is rejected by the schema
  return Number(value.trim());
}

/**
 * Build and validate configuration from an environment map
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const raw = {
    server: {
      nodeEnv: env.NODE_ENV || 'development',
      port: intFromEnv(env.PORT, 8080),
    },
    database: {
      path: env.DATABASE_PATH || path.join(__dirname, '../../data/service-providers.db'),
    },
    logging: {
      level: (env.LOG_LEVEL || 'info').toLowerCase(),
    },
    healthCheck: {
      intervalMs: intFromEnv(env.HEALTH_CHECK_INTERVAL_MS, DEFAULT_HEALTH_CHECK.intervalMs),
      timeoutMs: intFromEnv(env.HEALTH_CHECK_TIMEOUT_MS, DEFAULT_HEALTH_CHECK.timeoutMs),
      maxConsecutiveFailures: intFromEnv(
        env.HEALTH_CHECK_MAX_CONSECUTIVE_FAILURES,
        DEFAULT_HEALTH_CHECK.maxConsecutiveFailures
      ),
      baseBackoffIntervalMs: intFromEnv(
        env.HEALTH_CHECK_BASE_BACKOFF_INTERVAL_MS,
        DEFAULT_HEALTH_CHECK.baseBackoffIntervalMs
      ),
      maxBackoffIntervalMs: intFromEnv(
        env.HEALTH_CHECK_MAX_BACKOFF_INTERVAL_MS,
        DEFAULT_HEALTH_CHECK.maxBackoffIntervalMs
      ),
    },
  };

  assertValidConfig(raw);
  return raw;
}

let cachedConfig: AppConfig | null = null;

/**
 * Get the process-wide configuration, loading it on first use
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Drop the cached configuration (tests)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

export type { AppConfig, HealthCheckConfig } from './types';
