import { z } from 'zod';
import type { RegistryEntry } from '../types';
import { ConfigurationError } from '../utils/errors';
import registryData from './instrumentRegistry.json';

const RegistrySchema = z.array(
  z.object({
    name: z.string().trim().min(1, 'Registry name is required'),
    instrumentId: z.string().trim().min(1, 'Instrument id is required'),
    aliases: z.array(z.string().trim().min(1)).optional(),
  })
);

/**
 * Validate a registry snapshot. Entries keep their file order; the resolver
 * sorts on its own when it needs a deterministic tie-break.
 */
export function parseRegistry(data: unknown): RegistryEntry[] {
  const result = RegistrySchema.safeParse(data);
  if (!result.success) {
    throw ConfigurationError.fromZod('registry', 'Invalid instrument registry', result.error);
  }
  return result.data;
}

export function getDefaultRegistry(): RegistryEntry[] {
  return parseRegistry(registryData);
}
