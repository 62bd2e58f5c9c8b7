/**
 * Open Prices API schemas (subset we use)
 */

import { z } from 'zod';
import type { PriceRecord } from './prices.types';

const nullableString = z.string().nullable().optional();

const decimal = z.union([
  z.number(),
  z
    .string()
    .regex(/^\d+(\.\d+)?$/)
    .transform(Number),
]);

export const openPricesPriceSchema = z.object({
  id: z.number().optional(),
  product_code: nullableString,
  price: decimal,
  currency: z.string().min(1),
  date: z.string().min(10),
  price_is_discounted: z.boolean().nullable().optional(),
  price_per: nullableString,
  location: z
    .object({
      osm_name: nullableString,
      osm_brand: nullableString,
      osm_display_name: nullableString,
      osm_address_city: nullableString,
    })
    .nullable()
    .optional(),
  product: z
    .object({
      product_quantity: z.number().nullable().optional(),
      product_quantity_unit: nullableString,
    })
    .nullable()
    .optional(),
});

export type OpenPricesPrice = z.infer<typeof openPricesPriceSchema>;

export const openPricesPageSchema = z.object({
  results: z.array(z.unknown()).default([]),
  total: z.number().optional(),
  page: z.number().optional(),
  size: z.number().optional(),
});

export const jsonObjectSchema = z.record(z.string(), z.unknown());

/** Per kg / L price: given directly, or derived from the product quantity */
function unitPriceOf(p: OpenPricesPrice): number | null {
  if (p.price_per === 'KILOGRAM' || p.price_per === 'LITER') return p.price;
  const quantity = p.product?.product_quantity;
  const unit = p.product?.product_quantity_unit;
  if (!quantity || quantity <= 0) return null;
  if (unit && unit !== 'g' && unit !== 'ml') return null;
  return Math.round((p.price / quantity) * 1000 * 100) / 100;
}

export function mapOpenPricesPrice(p: OpenPricesPrice): PriceRecord {
  return {
    amount: p.price,
    currency: p.currency,
    storeName: p.location?.osm_name ?? null,
    storeBrand: p.location?.osm_brand ?? null,
    location:
      p.location?.osm_address_city ?? p.location?.osm_display_name ?? null,
    date: p.date.slice(0, 10),
    unitPrice: unitPriceOf(p),
    isPromotion: p.price_is_discounted === true,
    source: 'open_prices',
  };
}
