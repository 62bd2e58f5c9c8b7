/**
 * Product cache collaborator
 *
 * The resolver reads fresh records from it and writes every resolved record
 * back without waiting. Implementations decide where records live.
 */

import type { ProductRecord, ProductType } from '../catalog/catalog.types';

export type ProductCacheStats = {
  entries: number;
  hits: number;
  misses: number;
  maxAgeDays: number;
};

export interface ProductCache {
  /** Fresh record or null (missing and stale read the same) */
  get(barcode: string, productType: ProductType): Promise<ProductRecord | null>;
  set(record: ProductRecord): Promise<void>;
  clear(): Promise<void>;
  stats(): Promise<ProductCacheStats>;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** A record is fresh while its retrieval time is within maxAgeDays */
export function isFresh(
  record: Pick<ProductRecord, 'retrievedAt'>,
  maxAgeDays: number,
  now: number,
): boolean {
  const retrieved = Date.parse(record.retrievedAt);
  if (Number.isNaN(retrieved)) return false;
  return now - retrieved <= maxAgeDays * DAY_MS;
}

export function cacheKey(barcode: string, productType: ProductType): string {
  return `${productType}:${barcode}`;
}
