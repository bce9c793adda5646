/**
 * Provider Validation Schemas
 */

import { z } from 'zod';

/** Trimmed non-empty string */
export const NonEmptyStringSchema = z.string().trim().min(1);

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export const EndpointSchema = z
  .string()
  .trim()
  .refine(isHttpUrl, 'endpoint must be an absolute http(s) URL');

export const ProviderBodySchema = z.object({
  /** Requested provider ID on registration; takes precedence over `?id=` */
  id: NonEmptyStringSchema.optional(),
  name: NonEmptyStringSchema.max(255),
  serviceType: NonEmptyStringSchema.max(255),
  schemaVersion: NonEmptyStringSchema.max(64),
  endpoint: EndpointSchema,
});

export type ProviderBody = z.infer<typeof ProviderBodySchema>;

/** The path names the provider on update, so a body `id` is dropped */
export const ProviderUpdateSchema = ProviderBodySchema.omit({ id: true });

/** `id` is checked by the service, which reports a malformed ID itself */
export const RegisterProviderQuerySchema = z.object({
  id: NonEmptyStringSchema.optional(),
});

export const ListProvidersQuerySchema = z.object({
  type: NonEmptyStringSchema.optional(),
});
