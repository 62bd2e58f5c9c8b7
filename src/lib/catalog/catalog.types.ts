/**
 * Product record types
 *
 * Normalized product from any of the Open *Facts catalogs, optionally
 * enriched with Open Prices data.
 */

import type { LanguageCode } from './languages';
import type { PriceRecord, PriceStatistics } from '../open-prices/prices.types';

/** Catalog the product comes from */
export type ProductType = 'food' | 'beauty' | 'general';

export type NutriScoreGrade = 'A' | 'B' | 'C' | 'D' | 'E';

/** NOVA processing group, 1 (unprocessed) to 4 (ultra-processed) */
export type NovaGroup = 1 | 2 | 3 | 4;

export type ProductRecord = {
  barcode: string;
  productType: ProductType;
  /** Name in the resolved language, when the catalog has one */
  name: string | null;
  brand: string | null;
  ingredients: string | null;
  /** Allergen names without the language prefix (e.g. "milk") */
  allergens: string[];
  /** Food only */
  nutriScore: NutriScoreGrade | null;
  /** Food only */
  novaGroup: NovaGroup | null;
  /** Beauty only, e.g. "12M" */
  periodAfterOpening: string | null;
  imageUrl: string | null;
  ingredientsImageUrl: string | null;
  /** Food only */
  nutritionImageUrl: string | null;
  /** Language the metadata was fetched in */
  language: LanguageCode;
  /** ISO timestamp of the catalog fetch */
  retrievedAt: string;
  currentPrice: PriceRecord | null;
  /** Most recent first */
  recentPrices: PriceRecord[];
  priceStats: PriceStatistics | null;
};

/**
 * Result of one catalog fetch (one barcode, one language).
 */
export type CatalogLookupResult =
  | { found: true; product: ProductRecord }
  | {
      found: false;
      reason: 'not_found' | 'rate_limited' | 'malformed' | 'error';
      message?: string;
    };

/** Fetches one product in one language */
export type CatalogFetcher = (
  barcode: string,
  language: LanguageCode,
) => Promise<CatalogLookupResult>;

export function hasPriceData(product: ProductRecord): boolean {
  return product.currentPrice != null || product.recentPrices.length > 0;
}
