import {
  calculateCheckDelay,
  calculateNextCheckTime,
  MAX_BACKOFF_EXPONENT,
} from '../../../../src/services/healthCheck/backoff';
import type { BackoffConfig } from '../../../../src/services/healthCheck/backoff';
import { HealthStatus } from '../../../../src/models/provider';

const config: BackoffConfig = {
  intervalMs: 10_000,
  maxConsecutiveFailures: 3,
  baseBackoffIntervalMs: 10_000,
  maxBackoffIntervalMs: 300_000,
};

const now = new Date('2026-03-01T12:00:00.000Z');

describe('health check backoff', () => {
  describe('calculateCheckDelay', () => {
    it.each([0, 1, 3, 50])('uses the steady interval for ready providers (%i failures)', (failures) => {
      expect(calculateCheckDelay(HealthStatus.READY, failures, config)).toBe(10_000);
    });

    it('starts backoff at exactly the base interval on the failure that crosses the threshold', () => {
      expect(calculateCheckDelay(HealthStatus.NOT_READY, 3, config)).toBe(10_000);
    });

    it('doubles the delay for every failure past the threshold', () => {
      expect(calculateCheckDelay(HealthStatus.NOT_READY, 4, config)).toBe(20_000);
      expect(calculateCheckDelay(HealthStatus.NOT_READY, 5, config)).toBe(40_000);
      expect(calculateCheckDelay(HealthStatus.NOT_READY, 7, config)).toBe(160_000);
    });

    it('caps the delay at maxBackoffIntervalMs', () => {
      expect(calculateCheckDelay(HealthStatus.NOT_READY, 8, config)).toBe(300_000);
      expect(calculateCheckDelay(HealthStatus.NOT_READY, 1000, config)).toBe(300_000);
    });

    it('uses the base interval when a not_ready provider is below the threshold', () => {
      expect(calculateCheckDelay(HealthStatus.NOT_READY, 1, config)).toBe(10_000);
    });

    it('clamps the exponent so long failure streaks stay finite', () => {
      const uncapped: BackoffConfig = { ...config, baseBackoffIntervalMs: 1_000, maxBackoffIntervalMs: 1e12 };

      expect(MAX_BACKOFF_EXPONENT).toBe(10);
      expect(calculateCheckDelay(HealthStatus.NOT_READY, 12, uncapped)).toBe(512_000);
      expect(calculateCheckDelay(HealthStatus.NOT_READY, 13, uncapped)).toBe(1_024_000);
      expect(calculateCheckDelay(HealthStatus.NOT_READY, 5_000, uncapped)).toBe(1_024_000);
    });
  });

  describe('calculateNextCheckTime', () => {
    it('returns now + interval for ready providers', () => {
      expect(calculateNextCheckTime(now, HealthStatus.READY, 2, config)).toEqual(
        new Date('2026-03-01T12:00:10.000Z')
      );
    });

    it('returns now + backoff for not_ready providers', () => {
      expect(calculateNextCheckTime(now, HealthStatus.NOT_READY, 5, config)).toEqual(
        new Date('2026-03-01T12:00:40.000Z')
      );
    });

    it('does not modify the input date', () => {
      calculateNextCheckTime(now, HealthStatus.NOT_READY, 3, config);
      expect(now.toISOString()).toBe('2026-03-01T12:00:00.000Z');
    });
  });
});
