import { vi } from 'vitest';
import { ConflictError, ErrorCodes, ProviderNotReadyError, ValidationError } from '../../../src/errors/ApiError';
import { HealthStatus } from '../../../src/models/provider';
import type { ProviderInput } from '../../../src/models/provider';
import { ProviderService } from '../../../src/services/providerService';
import { InMemoryProviderStore, makeProvider } from '../../mocks/providerStore';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;
const REQUESTED_ID = '3d3c1b4e-5f6a-4b7c-8d9e-0f1a2b3c4d5e';

const input: ProviderInput = {
  name: 'kubevirt',
  serviceType: 'vm',
  schemaVersion: 'v1alpha1',
  endpoint: 'http://kubevirt.local:8080',
};

describe('ProviderService', () => {
  let store: InMemoryProviderStore;
  let service: ProviderService;

  beforeEach(() => {
    store = new InMemoryProviderStore();
    service = new ProviderService(store);
  });

  describe('registerOrUpdate', () => {
    it('registers a new provider with a generated ID', async () => {
      const { provider, status } = await service.registerOrUpdate(input);

      expect(status).toBe('registered');
      expect(provider.id).toMatch(UUID_PATTERN);
      expect(provider).toMatchObject({
        ...input,
        healthStatus: HealthStatus.READY,
        consecutiveFailures: 0,
        nextHealthCheck: null,
      });
    });

    it('uses the requested ID, lowercased', async () => {
      const { provider } = await service.registerOrUpdate(input, REQUESTED_ID.toUpperCase());

      expect(provider.id).toBe(REQUESTED_ID);
    });

    it('rejects a malformed requested ID', async () => {
      await expect(service.registerOrUpdate(input, 'not-a-uuid')).rejects.toMatchObject({
        statusCode: 400,
        code: ErrorCodes.INVALID_INPUT,
        message: 'invalid provider ID format',
      });
    });

    it('updates the provider already registered under the same name', async () => {
      const existing = makeProvider({ name: 'kubevirt', healthStatus: HealthStatus.NOT_READY, consecutiveFailures: 3 });
      store = new InMemoryProviderStore([existing]);
      service = new ProviderService(store);

      const { provider, status } = await service.registerOrUpdate({ ...input, endpoint: 'http://kv2.local' });

      expect(status).toBe('updated');
      expect(provider.id).toBe(existing.id);
      expect(provider.endpoint).toBe('http://kv2.local');
      expect(provider.healthStatus).toBe(HealthStatus.NOT_READY);
      expect(provider.consecutiveFailures).toBe(3);
    });

    it('updates when the requested ID matches the existing provider', async () => {
      const existing = makeProvider({ id: REQUESTED_ID, name: 'kubevirt' });
      store = new InMemoryProviderStore([existing]);
      service = new ProviderService(store);

      const { status } = await service.registerOrUpdate(input, REQUESTED_ID);

      expect(status).toBe('updated');
    });

    it('conflicts when the name belongs to a different ID', async () => {
      store = new InMemoryProviderStore([makeProvider({ name: 'kubevirt' })]);
      service = new ProviderService(store);

      const error = await service.registerOrUpdate(input, REQUESTED_ID).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConflictError);
      expect(error).toMatchObject({
        statusCode: 409,
        message: "name 'kubevirt' already exists with a different provider ID",
      });
    });

    it('conflicts when the requested ID is used by another name', async () => {
      store = new InMemoryProviderStore([makeProvider({ id: REQUESTED_ID, name: 'openstack' })]);
      service = new ProviderService(store);

      await expect(service.registerOrUpdate(input, REQUESTED_ID)).rejects.toMatchObject({
        statusCode: 409,
        message: `provider with ID '${REQUESTED_ID}' already exists`,
      });
    });

    it('reports an ID claimed between the existence check and the insert as an ID conflict', async () => {
      store = new InMemoryProviderStore([makeProvider({ id: REQUESTED_ID, name: 'openstack' })]);
      service = new ProviderService(store);
      vi.spyOn(store, 'existsById').mockResolvedValue(false);

      await expect(service.registerOrUpdate(input, REQUESTED_ID)).rejects.toMatchObject({
        statusCode: 409,
        code: ErrorCodes.CONFLICT,
        message: `provider with ID '${REQUESTED_ID}' already exists`,
        details: { providerId: REQUESTED_ID },
      });
    });
  });

  describe('get', () => {
    it('returns a registered provider', async () => {
      const { provider } = await service.registerOrUpdate(input);

      expect(await service.get(provider.id)).toEqual(provider);
    });

    it('rejects an unknown ID with a not-found error', async () => {
      await expect(service.get(REQUESTED_ID)).rejects.toMatchObject({
        statusCode: 404,
        code: ErrorCodes.PROVIDER_NOT_FOUND,
        message: `provider ${REQUESTED_ID} not found`,
      });
    });

    it('rejects a malformed ID', async () => {
      await expect(service.get('abc')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('list', () => {
    it('filters by service type', async () => {
      await service.registerOrUpdate(input);
      await service.registerOrUpdate({ ...input, name: 'postgres', serviceType: 'database' });

      expect((await service.list()).map((p) => p.name)).toEqual(['kubevirt', 'postgres']);
      expect((await service.list('database')).map((p) => p.name)).toEqual(['postgres']);
    });
  });

  describe('update', () => {
    it('replaces registry fields', async () => {
      const { provider } = await service.registerOrUpdate(input);

      const updated = await service.update(provider.id, { ...input, schemaVersion: 'v1beta1' });

      expect(updated.schemaVersion).toBe('v1beta1');
    });

    it('conflicts on a rename onto a taken name', async () => {
      await service.registerOrUpdate(input);
      const { provider } = await service.registerOrUpdate({ ...input, name: 'openstack' });

      await expect(service.update(provider.id, input)).rejects.toMatchObject({
        statusCode: 409,
        code: ErrorCodes.DUPLICATE_ENTRY,
        message: "name 'kubevirt' is already taken",
      });
    });

    it('rejects an unknown provider', async () => {
      await expect(service.update(REQUESTED_ID, input)).rejects.toMatchObject({ statusCode: 404 });
    });
  });

  describe('delete', () => {
    it('removes the provider', async () => {
      const { provider } = await service.registerOrUpdate(input);

      await service.delete(provider.id);

      await expect(service.get(provider.id)).rejects.toMatchObject({ statusCode: 404 });
    });

    it('rejects an unknown provider', async () => {
      await expect(service.delete(REQUESTED_ID)).rejects.toMatchObject({ statusCode: 404 });
    });
  });

  describe('assertReady', () => {
    it('returns a ready provider', async () => {
      const provider = makeProvider({ id: REQUESTED_ID });
      service = new ProviderService(new InMemoryProviderStore([provider]));

      expect((await service.assertReady(REQUESTED_ID)).id).toBe(REQUESTED_ID);
    });

    it('rejects a not_ready provider as unavailable', async () => {
      const provider = makeProvider({ id: REQUESTED_ID, name: 'kubevirt', healthStatus: HealthStatus.NOT_READY });
      service = new ProviderService(new InMemoryProviderStore([provider]));

      const error = await service.assertReady(REQUESTED_ID).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderNotReadyError);
      expect(error).toMatchObject({
        statusCode: 503,
        code: ErrorCodes.PROVIDER_NOT_READY,
        message: "provider 'kubevirt' is not ready",
      });
    });
  });
});
