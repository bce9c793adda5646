/**
 * Provider Service
 *
 * Registry business logic: idempotent registration by name, lookup, update
 * and removal of providers, and the readiness gate used before work is sent
 * to a provider. Health fields are never written here; new providers start
 * ready and immediately due for a health check.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  ConflictError,
  ErrorCodes,
  ProviderNotFoundApiError,
  ProviderNotReadyError,
  ValidationError,
} from '../errors/ApiError';
import { HealthStatus } from '../models/provider';
import type { Provider, ProviderInput } from '../models/provider';
import { ProviderIdTakenError, ProviderNameTakenError, ProviderNotFoundError } from '../repositories/types';
import type { ProviderStore } from '../repositories/types';
import { createLogger } from '../utils/logger';

const log = createLogger('PROVIDERS');

const UuidSchema = z.string().uuid();

export type RegistrationStatus = 'registered' | 'updated';

export interface RegistrationResult {
  provider: Provider;
  status: RegistrationStatus;
}

function parseProviderId(providerId: string): string {
  if (!UuidSchema.safeParse(providerId).success) {
    throw new ValidationError('invalid provider ID format', ErrorCodes.INVALID_INPUT, { providerId });
  }
  return providerId.toLowerCase();
}

export class ProviderService {
  constructor(private readonly store: ProviderStore) {}

  /**
   * Register a provider, or update it if one with the same name exists.
   *
   * Conflicts when the name belongs to a provider with a different ID than
   * `requestedId`, or when `requestedId` is already used by another name.
   */
  async registerOrUpdate(input: ProviderInput, requestedId?: string): Promise<RegistrationResult> {
    const id = requestedId !== undefined ? parseProviderId(requestedId) : undefined;

    const existing = await this.store.getByName(input.name);
    if (existing) {
      if (id !== undefined && existing.id !== id) {
        throw new ConflictError(
          `name '${input.name}' already exists with a different provider ID`,
          ErrorCodes.CONFLICT,
          { name: input.name }
        );
      }

      const updated = await this.withStoreErrors(existing.id, () => this.store.update(existing.id, input));
      log.info('Updated provider', { name: updated.name, providerId: updated.id });
      return { provider: updated, status: 'updated' };
    }

    if (id !== undefined && (await this.store.existsById(id))) {
      throw new ConflictError(`provider with ID '${id}' already exists`, ErrorCodes.CONFLICT, {
        providerId: id,
      });
    }

    const created = await this.withStoreErrors(id ?? '', () =>
      this.store.create({ ...input, id: id ?? randomUUID() })
    );
    log.info('Created provider', { name: created.name, providerId: created.id });
    return { provider: created, status: 'registered' };
  }

  async get(providerId: string): Promise<Provider> {
    const id = parseProviderId(providerId);
    return this.withStoreErrors(id, () => this.store.get(id));
  }

  async list(serviceType?: string): Promise<Provider[]> {
    return this.store.list(serviceType !== undefined ? { serviceType } : {});
  }

  /**
   * Replace the registry fields of an existing provider
   */
  async update(providerId: string, input: ProviderInput): Promise<Provider> {
    const id = parseProviderId(providerId);
    const updated = await this.withStoreErrors(id, () => this.store.update(id, input));
    log.info('Updated provider', { name: updated.name, providerId: updated.id });
    return updated;
  }

  async delete(providerId: string): Promise<void> {
    const id = parseProviderId(providerId);
    await this.withStoreErrors(id, () => this.store.delete(id));
    log.info('Deleted provider', { providerId: id });
  }

  /**
   * Resolve a provider that can accept work, rejecting not_ready ones
   */
  async assertReady(providerId: string): Promise<Provider> {
    const provider = await this.get(providerId);
    if (provider.healthStatus !== HealthStatus.READY) {
      throw new ProviderNotReadyError(provider.id, provider.name);
    }
    return provider;
  }

  private async withStoreErrors<T>(providerId: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof ProviderNotFoundError) {
        throw new ProviderNotFoundApiError(providerId);
      }
      if (error instanceof ProviderIdTakenError) {
        throw new ConflictError(`provider with ID '${error.providerId}' already exists`, ErrorCodes.CONFLICT, {
          providerId: error.providerId,
        });
      }
      if (error instanceof ProviderNameTakenError) {
        throw new ConflictError(`name '${error.providerName}' is already taken`, ErrorCodes.DUPLICATE_ENTRY, {
          name: error.providerName,
        });
      }
      throw error;
    }
  }
}
