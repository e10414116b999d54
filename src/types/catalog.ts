import { z } from 'zod';
import { PERIODICITIES, TIERS } from './domain.js';

const externalId = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

/**
 * One catalog entry, keyed by product name in the catalog file
 */
export const skuInfoSchema = z.object({
  sku: z.string().default(''),
  weight: z.number().nonnegative().default(0),
  type: z.enum(['product', 'combo', 'subscription']).default('product'),
  guru_ids: z.array(externalId).default([]),
  shopify_ids: z.array(externalId).default([]),
  composed_of: z.array(z.string()).default([]),
  unavailable: z.boolean().default(false),
  periodicity: z.enum(PERIODICITIES).optional(),
  recurrence: z.enum(TIERS).optional(),
});

export type SkuInfo = z.infer<typeof skuInfoSchema>;

export const catalogFileSchema = z.record(z.string(), skuInfoSchema);

export type CatalogFile = z.infer<typeof catalogFileSchema>;
