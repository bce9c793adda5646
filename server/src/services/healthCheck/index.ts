export { HealthMonitor, computeHealthTransition } from './monitor';
export type {
  HealthMonitorOptions,
  HealthMonitorStatus,
  HealthState,
  ProviderCheckOutcome,
  ProviderCheckResult,
  ScanSummary,
} from './monitor';
export { calculateCheckDelay, calculateNextCheckTime, MAX_BACKOFF_EXPONENT } from './backoff';
export type { BackoffConfig } from './backoff';
export { buildHealthUrl, isSuccessStatus, probeProvider } from './prober';
export type { ProbeOptions, ProbeResult, Prober } from './prober';
