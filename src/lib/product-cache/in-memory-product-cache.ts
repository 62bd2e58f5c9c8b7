import type { ProductRecord, ProductType } from '../catalog/catalog.types';
import {
  cacheKey,
  isFresh,
  type ProductCache,
  type ProductCacheStats,
} from './product-cache.types';

export type InMemoryProductCacheOptions = {
  maxAgeDays: number;
  now?: () => number;
};

/**
 * Process-local cache keyed by product type and barcode. Entries leave only
 * by age or clear(), never by size.
 */
export class InMemoryProductCache implements ProductCache {
  private readonly entries = new Map<string, ProductRecord>();
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(private readonly options: InMemoryProductCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  async get(
    barcode: string,
    productType: ProductType,
  ): Promise<ProductRecord | null> {
    const key = cacheKey(barcode, productType);
    const record = this.entries.get(key);
    if (!record) {
      this.misses++;
      return null;
    }
    if (!isFresh(record, this.options.maxAgeDays, this.now())) {
      this.entries.delete(key);
      this.misses++;
      return null;
    }
    this.hits++;
    return structuredClone(record);
  }

  async set(record: ProductRecord): Promise<void> {
    this.entries.set(
      cacheKey(record.barcode, record.productType),
      structuredClone(record),
    );
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  async stats(): Promise<ProductCacheStats> {
    return {
      entries: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      maxAgeDays: this.options.maxAgeDays,
    };
  }
}
