/**
 * Repository Types
 *
 * Interfaces for provider persistence. The health monitor depends only on
 * ProviderDirectory; the registry service uses the full ProviderStore.
 */

import type { HealthStatus, Provider, ProviderInput } from '../models/provider';

/**
 * The two operations the health monitor needs from persistence
 */
export interface ProviderDirectory {
  /**
   * Providers whose next health check is unset or at/before `now`
   */
  listDueForHealthCheck(now: Date): Promise<Provider[]>;

  /**
   * Atomically write the three health fields of one provider.
   * Rejects with ProviderNotFoundError if the provider no longer exists.
   */
  updateHealthStatus(
    id: string,
    status: HealthStatus,
    consecutiveFailures: number,
    nextCheck: Date
  ): Promise<void>;
}

export interface ProviderFilter {
  serviceType?: string;
}

export interface ProviderStore extends ProviderDirectory {
  create(input: ProviderInput & { id: string }): Promise<Provider>;
  get(id: string): Promise<Provider>;
  getByName(name: string): Promise<Provider | null>;
  existsById(id: string): Promise<boolean>;
  list(filter?: ProviderFilter): Promise<Provider[]>;
  /** Updates registry-owned fields only; health fields are left untouched */
  update(id: string, input: ProviderInput): Promise<Provider>;
  delete(id: string): Promise<void>;
}

// =============================================================================
// Store errors
// =============================================================================

export class ProviderNotFoundError extends Error {
  constructor(readonly providerId: string) {
    super(`provider ${providerId} not found`);
    this.name = 'ProviderNotFoundError';
  }
}

export class ProviderNameTakenError extends Error {
  constructor(readonly providerName: string) {
    super(`provider name '${providerName}' already taken`);
    this.name = 'ProviderNameTakenError';
  }
}

export class ProviderIdTakenError extends Error {
  constructor(readonly providerId: string) {
    super(`provider ID '${providerId}' already taken`);
    this.name = 'ProviderIdTakenError';
  }
}
