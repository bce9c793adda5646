/**
 * Repository Layer
 *
 * Usage:
 *   import { ProviderRepository } from '../repositories';
 *
 *   const providers = new ProviderRepository(openDatabase(config.database.path));
 *   const due = await providers.listDueForHealthCheck(new Date());
 */

export { ProviderRepository } from './providerRepository';
export { ProviderIdTakenError, ProviderNotFoundError, ProviderNameTakenError } from './types';
export type { ProviderDirectory, ProviderStore, ProviderFilter } from './types';
