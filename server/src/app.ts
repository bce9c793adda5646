/**
 * Express application
 *
 * Built from its services so tests can mount it with in-memory dependencies.
 */

import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { createHealthRouter } from './api/health';
import { createProvidersRouter } from './api/providers';
import { errorHandler, notFoundHandler } from './errors/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import type { HealthMonitor } from './services/healthCheck';
import type { ProviderService } from './services/providerService';

export const API_PREFIX = '/api/v1alpha1';

export interface AppDependencies {
  providerService: ProviderService;
  monitor: HealthMonitor;
}

export function createApp({ providerService, monitor }: AppDependencies): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Request logging and correlation IDs
  app.use(requestLogger);

  app.use(`${API_PREFIX}/health`, createHealthRouter(monitor));
  app.use(`${API_PREFIX}/providers`, createProvidersRouter(providerService));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
