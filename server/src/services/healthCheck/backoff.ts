/**
 * Health Check Scheduling
 *
 * Decides when a provider is probed next. Ready providers are polled at the
 * steady interval; not_ready providers back off exponentially, starting at
 * the base interval on the failure that crossed the threshold.
 *
 *   delay = min(maxBackoff, baseBackoff * 2^(failures - maxConsecutiveFailures))
 */

import type { HealthCheckConfig } from '../../config/types';
import { HealthStatus } from '../../models/provider';

/**
 * Ceiling for the backoff exponent. With any sane base interval the cap in
 * maxBackoffIntervalMs is hit long before this; it keeps the multiplier
 * finite when a provider has been failing for a very long time.
 */
export const MAX_BACKOFF_EXPONENT = 10;

export type BackoffConfig = Pick<
  HealthCheckConfig,
  'intervalMs' | 'maxConsecutiveFailures' | 'baseBackoffIntervalMs' | 'maxBackoffIntervalMs'
>;

/**
 * Delay in milliseconds until the next probe
 */
export function calculateCheckDelay(
  status: HealthStatus,
  consecutiveFailures: number,
  config: BackoffConfig
): number {
  if (status === HealthStatus.READY) {
    return config.intervalMs;
  }

  const exponent = Math.min(
    Math.max(0, consecutiveFailures - config.maxConsecutiveFailures),
    MAX_BACKOFF_EXPONENT
  );

  return Math.min(config.baseBackoffIntervalMs * 2 ** exponent, config.maxBackoffIntervalMs);
}

/**
 * Time of the next probe, given the status and failure count about to be
 * recorded
 */
export function calculateNextCheckTime(
  now: Date,
  status: HealthStatus,
  consecutiveFailures: number,
  config: BackoffConfig
): Date {
  return new Date(now.getTime() + calculateCheckDelay(status, consecutiveFailures, config));
}
