/**
 * In-memory ProviderStore
 *
 * Stand-in for the SQLite repository in service and monitor tests. Calls to
 * the directory methods are recorded so tests can assert what was written.
 */

import { HealthStatus } from '../../src/models/provider';
import type { Provider, ProviderInput } from '../../src/models/provider';
import { ProviderIdTakenError, ProviderNameTakenError, ProviderNotFoundError } from '../../src/repositories/types';
import type { ProviderFilter, ProviderStore } from '../../src/repositories/types';

export interface HealthUpdate {
  id: string;
  status: HealthStatus;
  consecutiveFailures: number;
  nextCheck: Date;
}

let sequence = 0;

/**
 * Build a provider with sensible defaults, overriding any field
 */
export function makeProvider(overrides: Partial<Provider> = {}): Provider {
  sequence++;
  const created = new Date('2026-01-01T00:00:00.000Z');
  return {
    id: `00000000-0000-4000-8000-${String(sequence).padStart(12, '0')}`,
    name: `provider-${sequence}`,
    serviceType: 'vm',
    schemaVersion: 'v1alpha1',
    endpoint: `http://provider-${sequence}.local:8080`,
    createTime: created,
    updateTime: created,
    healthStatus: HealthStatus.READY,
    consecutiveFailures: 0,
    nextHealthCheck: null,
    ...overrides,
  };
}

export class InMemoryProviderStore implements ProviderStore {
  readonly providers = new Map<string, Provider>();
  readonly healthUpdates: HealthUpdate[] = [];

  constructor(
    initial: Provider[] = [],
    private readonly clock: () => Date = () => new Date('2026-01-01T00:00:00.000Z')
  ) {
    for (const provider of initial) {
      this.providers.set(provider.id, { ...provider });
    }
  }

  async create(input: ProviderInput & { id: string }): Promise<Provider> {
    if (this.providers.has(input.id)) {
      throw new ProviderIdTakenError(input.id);
    }
    if (this.findByName(input.name)) {
      throw new ProviderNameTakenError(input.name);
    }
    const now = this.clock();
    const provider: Provider = {
      ...input,
      createTime: now,
      updateTime: now,
      healthStatus: HealthStatus.READY,
      consecutiveFailures: 0,
      nextHealthCheck: null,
    };
    this.providers.set(provider.id, provider);
    return { ...provider };
  }

  async get(id: string): Promise<Provider> {
    const provider = this.providers.get(id);
    if (!provider) throw new ProviderNotFoundError(id);
    return { ...provider };
  }

  async getByName(name: string): Promise<Provider | null> {
    const provider = this.findByName(name);
    return provider ? { ...provider } : null;
  }

  async existsById(id: string): Promise<boolean> {
    return this.providers.has(id);
  }

  async list(filter: ProviderFilter = {}): Promise<Provider[]> {
    return [...this.providers.values()]
      .filter((p) => filter.serviceType === undefined || p.serviceType === filter.serviceType)
      .map((p) => ({ ...p }));
  }

  async update(id: string, input: ProviderInput): Promise<Provider> {
    const provider = this.providers.get(id);
    if (!provider) throw new ProviderNotFoundError(id);
    const owner = this.findByName(input.name);
    if (owner && owner.id !== id) throw new ProviderNameTakenError(input.name);

    const updated: Provider = { ...provider, ...input, updateTime: this.clock() };
    this.providers.set(id, updated);
    return { ...updated };
  }

  async delete(id: string): Promise<void> {
    if (!this.providers.delete(id)) throw new ProviderNotFoundError(id);
  }

  async listDueForHealthCheck(now: Date): Promise<Provider[]> {
    return [...this.providers.values()]
      .filter((p) => p.nextHealthCheck === null || p.nextHealthCheck.getTime() <= now.getTime())
      .map((p) => ({ ...p }));
  }

  async updateHealthStatus(
    id: string,
    status: HealthStatus,
    consecutiveFailures: number,
    nextCheck: Date
  ): Promise<void> {
    const provider = this.providers.get(id);
    if (!provider) throw new ProviderNotFoundError(id);
    this.healthUpdates.push({ id, status, consecutiveFailures, nextCheck });
    this.providers.set(id, { ...provider, healthStatus: status, consecutiveFailures, nextHealthCheck: nextCheck });
  }

  private findByName(name: string): Provider | undefined {
    return [...this.providers.values()].find((p) => p.name === name);
  }
}
