/**
 * Provider Health Monitor
 *
 * Periodically probes every provider that is due for a health check and
 * records the outcome through the ProviderDirectory.
 *
 * Per provider and scan:
 *   ready --(failures reach maxConsecutiveFailures)--> not_ready
 *   not_ready --(one successful probe)--> ready
 *
 * A scan takes one snapshot of the due set when it starts and probes its
 * members one at a time. Providers that become due while a scan is running
 * are picked up by the next tick.
 *
 * @module services/healthCheck/monitor
 */

import type { HealthCheckConfig } from '../../config/types';
import { HealthStatus } from '../../models/provider';
import type { ProviderHealthRecord } from '../../models/provider';
import { ProviderNotFoundError } from '../../repositories/types';
import type { ProviderDirectory } from '../../repositories/types';
import { createLogger, extractError } from '../../utils/logger';
import { getErrorMessage } from '../../utils/errors';
import { calculateNextCheckTime } from './backoff';
import { probeProvider } from './prober';
import type { Prober } from './prober';

const log = createLogger('HEALTHCHECK');

export interface HealthState {
  status: HealthStatus;
  consecutiveFailures: number;
}

/**
 * Apply one probe result to a provider's health state
 */
export function computeHealthTransition(
  current: HealthState,
  healthy: boolean,
  maxConsecutiveFailures: number
): HealthState {
  if (healthy) {
    return { status: HealthStatus.READY, consecutiveFailures: 0 };
  }

  const consecutiveFailures = current.consecutiveFailures + 1;
  return {
    status: consecutiveFailures >= maxConsecutiveFailures ? HealthStatus.NOT_READY : current.status,
    consecutiveFailures,
  };
}

export type ProviderCheckResult = 'healthy' | 'unhealthy' | 'update_failed' | 'aborted';

export interface ProviderCheckOutcome {
  result: ProviderCheckResult;
  transitioned: boolean;
}

export interface ScanSummary {
  due: number;
  checked: number;
  healthy: number;
  unhealthy: number;
  updateFailures: number;
  transitions: number;
  durationMs: number;
}

export interface HealthMonitorStatus {
  running: boolean;
  scanInProgress: boolean;
  scans: number;
  lastScanStartedAt: string | null;
  lastScanCompletedAt: string | null;
  lastScanError: string | null;
  lastScan: ScanSummary | null;
}

export interface HealthMonitorOptions {
  directory: ProviderDirectory;
  config: HealthCheckConfig;
  /** Defaults to the HTTP probe */
  prober?: Prober;
  /** Defaults to wall-clock time */
  clock?: () => Date;
}

export class HealthMonitor {
  private readonly directory: ProviderDirectory;
  private readonly config: HealthCheckConfig;
  private readonly prober: Prober;
  private readonly clock: () => Date;

  private timer: NodeJS.Timeout | null = null;
  private abortController: AbortController | null = null;
  private activeScan: Promise<ScanSummary | null> | null = null;

  private readonly state: HealthMonitorStatus = {
    running: false,
    scanInProgress: false,
    scans: 0,
    lastScanStartedAt: null,
    lastScanCompletedAt: null,
    lastScanError: null,
    lastScan: null,
  };

  constructor(options: HealthMonitorOptions) {
    this.directory = options.directory;
    this.config = options.config;
    this.prober = options.prober ?? probeProvider;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Run one scan now, then every intervalMs until stop()
   */
  start(): void {
    if (this.timer) {
      log.info('Health monitor already running');
      return;
    }

    this.abortController = new AbortController();
    this.state.running = true;

    this.runScheduledScan();
    this.timer = setInterval(() => this.runScheduledScan(), this.config.intervalMs);
    // The HTTP server keeps the process alive, not the monitor
    this.timer.unref();

    log.info('Health monitor started', {
      intervalMs: this.config.intervalMs,
      timeoutMs: this.config.timeoutMs,
      maxConsecutiveFailures: this.config.maxConsecutiveFailures,
    });
  }

  /**
   * Stop scheduling, abort the in-flight probe and wait for the running scan
   */
  async stop(): Promise<void> {
    const controller = this.abortController;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    controller?.abort();

    if (this.activeScan) {
      await this.activeScan;
    }

    // start() was called again while the scan drained; the new run owns the state
    if (this.abortController !== controller) {
      return;
    }

    const wasRunning = this.state.running;
    this.state.running = false;
    this.abortController = null;

    if (wasRunning) {
      log.info('Health monitor stopped');
    }
  }

  isRunning(): boolean {
    return this.state.running;
  }

  getStatus(): HealthMonitorStatus {
    return {
      ...this.state,
      lastScan: this.state.lastScan ? { ...this.state.lastScan } : null,
    };
  }

  /**
   * Probe every provider due at `now` and record the results. Resolves to
   * null when the due set could not be listed. Never rejects.
   */
  async checkProviders(now: Date = this.clock()): Promise<ScanSummary | null> {
    const signal = this.abortController?.signal;
    const startedAt = Date.now();

    this.state.scanInProgress = true;
    this.state.lastScanStartedAt = now.toISOString();

    try {
      let providers: ProviderHealthRecord[];
      try {
        providers = await this.directory.listDueForHealthCheck(now);
      } catch (error) {
        log.error('Error listing providers for health check', extractError(error));
        this.state.lastScanError = getErrorMessage(error);
        return null;
      }

      const summary: ScanSummary = {
        due: providers.length,
        checked: 0,
        healthy: 0,
        unhealthy: 0,
        updateFailures: 0,
        transitions: 0,
        durationMs: 0,
      };

      for (const provider of providers) {
        if (signal?.aborted) {
          log.debug('Shutdown requested, ending scan early', {
            remaining: providers.length - summary.checked,
          });
          break;
        }

        const outcome = await this.checkProvider(provider, signal);
        if (outcome.result === 'aborted') break;

        summary.checked++;
        if (outcome.result === 'healthy') summary.healthy++;
        if (outcome.result === 'unhealthy') summary.unhealthy++;
        if (outcome.result === 'update_failed') summary.updateFailures++;
        if (outcome.transitioned) summary.transitions++;
      }

      summary.durationMs = Date.now() - startedAt;
      this.state.scans++;
      this.state.lastScan = summary;
      this.state.lastScanError = null;
      this.state.lastScanCompletedAt = this.clock().toISOString();

      if (summary.due > 0) {
        log.debug('Health check scan completed', { ...summary });
      }

      return summary;
    } finally {
      this.state.scanInProgress = false;
    }
  }

  private runScheduledScan(): void {
    if (this.activeScan) {
      log.debug('Previous health check scan still running, skipping tick');
      return;
    }

    const scan: Promise<ScanSummary | null> = this.checkProviders().finally(() => {
      if (this.activeScan === scan) {
        this.activeScan = null;
      }
    });
    this.activeScan = scan;
  }

  private async checkProvider(
    provider: ProviderHealthRecord,
    signal: AbortSignal | undefined
  ): Promise<ProviderCheckOutcome> {
    let healthy: boolean;
    try {
      const probe = await this.prober(provider.endpoint, { timeoutMs: this.config.timeoutMs, signal });
      if (probe.aborted) {
        return { result: 'aborted', transitioned: false };
      }
      healthy = probe.healthy;
      if (!healthy) {
        log.warn('Health check failed', {
          provider: provider.name,
          url: probe.url,
          error: probe.error,
        });
      }
    } catch (error) {
      // A probe is not supposed to throw; treat it as a failed check
      log.error('Health probe threw', { provider: provider.name, ...extractError(error) });
      healthy = false;
    }

    const next = computeHealthTransition(
      { status: provider.healthStatus, consecutiveFailures: provider.consecutiveFailures },
      healthy,
      this.config.maxConsecutiveFailures
    );
    const nextCheck = calculateNextCheckTime(this.clock(), next.status, next.consecutiveFailures, this.config);

    try {
      await this.directory.updateHealthStatus(provider.id, next.status, next.consecutiveFailures, nextCheck);
    } catch (error) {
      if (error instanceof ProviderNotFoundError) {
        log.warn('Provider removed during health check, skipping update', {
          provider: provider.name,
          providerId: provider.id,
        });
      } else {
        log.error('Error updating health status', {
          provider: provider.name,
          providerId: provider.id,
          ...extractError(error),
        });
      }
      return { result: 'update_failed', transitioned: false };
    }

    const transitioned = provider.healthStatus !== next.status;
    if (transitioned) {
      log.info('Provider health status changed', {
        provider: provider.name,
        from: provider.healthStatus,
        to: next.status,
        consecutiveFailures: next.consecutiveFailures,
      });
    }

    return { result: healthy ? 'healthy' : 'unhealthy', transitioned };
  }
}
