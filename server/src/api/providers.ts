/**
 * Providers API Routes
 *
 * Registration, lookup, update and removal of service providers.
 */

import { Router, Request, Response } from 'express';
import { asyncHandler } from '../errors/errorHandler';
import type { Provider } from '../models/provider';
import type { ProviderService } from '../services/providerService';
import { parseRequest } from './schemas/validation';
import {
  ListProvidersQuerySchema,
  ProviderBodySchema,
  ProviderUpdateSchema,
  RegisterProviderQuerySchema,
} from './schemas/provider';

export interface ProviderResponse {
  id: string;
  name: string;
  serviceType: string;
  schemaVersion: string;
  endpoint: string;
  healthStatus: string;
  consecutiveFailures: number;
  nextHealthCheck: string | null;
  createTime: string;
  updateTime: string;
}

export function toProviderResponse(provider: Provider): ProviderResponse {
  return {
    id: provider.id,
    name: provider.name,
    serviceType: provider.serviceType,
    schemaVersion: provider.schemaVersion,
    endpoint: provider.endpoint,
    healthStatus: provider.healthStatus,
    consecutiveFailures: provider.consecutiveFailures,
    nextHealthCheck: provider.nextHealthCheck ? provider.nextHealthCheck.toISOString() : null,
    createTime: provider.createTime.toISOString(),
    updateTime: provider.updateTime.toISOString(),
  };
}

export function createProvidersRouter(providerService: ProviderService): Router {
  const router = Router();

  /**
   * GET /providers
   * List providers, optionally filtered by service type
   */
  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const query = parseRequest(ListProvidersQuerySchema, req.query);
    const providers = await providerService.list(query.type);
    res.json({ providers: providers.map(toProviderResponse) });
  }));

  /**
   * POST /providers
   * Register a provider, or update the one already registered under its name
   */
  router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const query = parseRequest(RegisterProviderQuerySchema, req.query);
    const { id: bodyId, ...input } = parseRequest(ProviderBodySchema, req.body);

    const { provider, status } = await providerService.registerOrUpdate(input, bodyId ?? query.id);

    res
      .status(status === 'registered' ? 201 : 200)
      .json({ ...toProviderResponse(provider), status });
  }));

  /**
   * GET /providers/:providerId
   */
  router.get('/:providerId', asyncHandler(async (req: Request, res: Response) => {
    const provider = await providerService.get(req.params.providerId);
    res.json(toProviderResponse(provider));
  }));

  /**
   * PUT /providers/:providerId
   * Replace the registry fields; health state is kept
   */
  router.put('/:providerId', asyncHandler(async (req: Request, res: Response) => {
    const input = parseRequest(ProviderUpdateSchema, req.body);
    const provider = await providerService.update(req.params.providerId, input);
    res.json(toProviderResponse(provider));
  }));

  /**
   * DELETE /providers/:providerId
   */
  router.delete('/:providerId', asyncHandler(async (req: Request, res: Response) => {
    await providerService.delete(req.params.providerId);
    res.status(204).send();
  }));

  return router;
}
