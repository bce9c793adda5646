/**
 * Provider Model
 *
 * A provider is an external backend registered for one service type and
 * reachable at `endpoint`. The health fields are owned by the health
 * monitor; registry updates never write them.
 */

export const HealthStatus = {
  /** Provider answers its health endpoint and can serve requests */
  READY: 'ready',
  /** Provider failed too many health probes in a row */
  NOT_READY: 'not_ready',
} as const;

export type HealthStatus = (typeof HealthStatus)[keyof typeof HealthStatus];

export function isHealthStatus(value: unknown): value is HealthStatus {
  return value === HealthStatus.READY || value === HealthStatus.NOT_READY;
}

export interface Provider {
  id: string;
  name: string;
  serviceType: string;
  schemaVersion: string;
  endpoint: string;
  createTime: Date;
  updateTime: Date;

  healthStatus: HealthStatus;
  consecutiveFailures: number;
  /** null means the provider has never been scheduled and is due now */
  nextHealthCheck: Date | null;
}

/**
 * The subset of a provider the health monitor reads
 */
export type ProviderHealthRecord = Pick<
  Provider,
  'id' | 'name' | 'endpoint' | 'healthStatus' | 'consecutiveFailures' | 'nextHealthCheck'
>;

/**
 * Registry-owned fields supplied on registration and update
 */
export interface ProviderInput {
  name: string;
  serviceType: string;
  schemaVersion: string;
  endpoint: string;
}
