/**
 * Zod schema for persisted product records
 *
 * Rows written by an older build (or edited by hand) are validated before they
 * are served; anything that does not parse is treated as a miss.
 */

import { z } from 'zod';
import { LANGUAGE_CODES } from '../catalog/languages';
import type { ProductRecord } from '../catalog/catalog.types';

const priceRecordSchema = z.object({
  amount: z.number(),
  currency: z.string(),
  storeName: z.string().nullable(),
  storeBrand: z.string().nullable(),
  location: z.string().nullable(),
  date: z.string(),
  unitPrice: z.number().nullable(),
  isPromotion: z.boolean(),
  source: z.literal('open_prices'),
});

const priceStatisticsSchema = z.union([
  z.object({
    count: z.literal(0),
    average: z.null(),
    min: z.null(),
    max: z.null(),
    currency: z.null(),
    lastUpdated: z.null(),
  }),
  z.object({
    count: z.number().int().positive(),
    average: z.number(),
    min: z.number(),
    max: z.number(),
    currency: z.string(),
    lastUpdated: z.string(),
  }),
]);

export const productRecordSchema = z.object({
  barcode: z.string(),
  productType: z.enum(['food', 'beauty', 'general']),
  name: z.string().nullable(),
  brand: z.string().nullable(),
  ingredients: z.string().nullable(),
  allergens: z.array(z.string()),
  nutriScore: z.enum(['A', 'B', 'C', 'D', 'E']).nullable(),
  novaGroup: z
    .union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)])
    .nullable(),
  periodAfterOpening: z.string().nullable(),
  imageUrl: z.string().nullable(),
  ingredientsImageUrl: z.string().nullable(),
  nutritionImageUrl: z.string().nullable(),
  language: z.enum(LANGUAGE_CODES),
  retrievedAt: z.string(),
  currentPrice: priceRecordSchema.nullable(),
  recentPrices: z.array(priceRecordSchema),
  priceStats: priceStatisticsSchema.nullable(),
});

export function parseProductRecord(value: unknown): ProductRecord | null {
  const parsed = productRecordSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
