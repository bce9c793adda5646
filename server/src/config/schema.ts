/**
 * Configuration Validation Schema
 *
 * Zod schemas for runtime validation of application configuration.
 */

import { z } from 'zod';

// =============================================================================
// Basic Type Schemas
// =============================================================================

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);

const DurationMsSchema = z.number().int().positive();

// =============================================================================
// Component Schemas
// =============================================================================

export const ServerConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  port: z.number().int().min(0).max(65535),
});

export const DatabaseConfigSchema = z.object({
  path: z.string().min(1, 'DATABASE_PATH must not be empty'),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

export const HealthCheckConfigSchema = z
  .object({
    intervalMs: DurationMsSchema,
    timeoutMs: DurationMsSchema,
    maxConsecutiveFailures: z.number().int().min(1),
    baseBackoffIntervalMs: DurationMsSchema,
    maxBackoffIntervalMs: DurationMsSchema,
  })
  .refine((hc) => hc.timeoutMs < hc.intervalMs, {
    message: 'timeoutMs must be shorter than intervalMs',
    path: ['timeoutMs'],
  })
  .refine((hc) => hc.baseBackoffIntervalMs <= hc.maxBackoffIntervalMs, {
    message: 'baseBackoffIntervalMs must not exceed maxBackoffIntervalMs',
    path: ['baseBackoffIntervalMs'],
  });

// =============================================================================
// Main Config Schema
// =============================================================================

export const AppConfigSchema = z.object({
  server: ServerConfigSchema,
  database: DatabaseConfigSchema,
  logging: LoggingConfigSchema,
  healthCheck: HealthCheckConfigSchema,
});

// =============================================================================
// Validation Functions
// =============================================================================

export type ConfigValidationResult = {
  success: boolean;
  errors: string[];
};

/**
 * Validate configuration and return detailed errors
 */
export function validateConfigSchema(config: unknown): ConfigValidationResult {
  const result = AppConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, errors: [] };
  }

  const errors = result.error.issues.map((issue: z.ZodIssue) => {
    const path = issue.path.join('.');
    return `${path}: ${issue.message}`;
  });

  return { success: false, errors };
}

/**
 * Validate configuration and throw if invalid
 */
export function assertValidConfig(config: unknown): asserts config is z.infer<typeof AppConfigSchema> {
  const result = validateConfigSchema(config);

  if (!result.success) {
    console.error('');
    console.error('================================================================================');
    console.error('CONFIGURATION VALIDATION FAILED');
    console.error('================================================================================');
    console.error('');
    for (const error of result.errors) {
      console.error(`  - ${error}`);
    }
    console.error('');
    console.error('Please check your .env file and environment variables.');
    console.error('================================================================================');
    console.error('');

    throw new Error(`Configuration validation failed: ${result.errors.join('; ')}`);
  }
}
