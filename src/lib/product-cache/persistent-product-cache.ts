/**
 * Persistent product cache
 *
 * Stores records through a ProductCacheRepo (Supabase in production, an
 * in-process fake in tests). Freshness is checked on read.
 */

import type { ProductRecord, ProductType } from '../catalog/catalog.types';
import { createLogger, errorMessage, type Logger } from '../logging/logger';
import {
  isFresh,
  type ProductCache,
  type ProductCacheStats,
} from './product-cache.types';
import { parseProductRecord } from './product-record.schema';

/** Row shape of the product_cache table */
export type ProductCacheRow = {
  barcode: string;
  product_type: ProductType;
  language: string;
  payload: unknown;
  retrieved_at: string;
};

/**
 * Repository interface for database access (mockable for tests)
 */
export interface ProductCacheRepo {
  findProduct(
    barcode: string,
    productType: ProductType,
  ): Promise<ProductCacheRow | null>;
  upsertProduct(row: ProductCacheRow): Promise<void>;
  deleteAll(): Promise<void>;
  countProducts(): Promise<number>;
}

export type PersistentProductCacheOptions = {
  maxAgeDays: number;
  now?: () => number;
  logger?: Logger;
};

export class PersistentProductCache implements ProductCache {
  private readonly now: () => number;
  private readonly logger: Logger;
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly repo: ProductCacheRepo,
    private readonly options: PersistentProductCacheOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('ProductCache');
  }

  async get(
    barcode: string,
    productType: ProductType,
  ): Promise<ProductRecord | null> {
    let row: ProductCacheRow | null;
    try {
      row = await this.repo.findProduct(barcode, productType);
    } catch (err) {
      this.logger.warn(`Cache read failed for ${barcode}:`, errorMessage(err));
      this.misses++;
      return null;
    }

    const record = row ? parseProductRecord(row.payload) : null;
    if (row && !record) {
      this.logger.warn(`Ignoring unreadable cache row for ${barcode}`);
    }
    if (!record || !isFresh(record, this.options.maxAgeDays, this.now())) {
      this.misses++;
      return null;
    }
    this.hits++;
    return record;
  }

  async set(record: ProductRecord): Promise<void> {
    await this.repo.upsertProduct({
      barcode: record.barcode,
      product_type: record.productType,
      language: record.language,
      payload: record,
      retrieved_at: record.retrievedAt,
    });
  }

  async clear(): Promise<void> {
    await this.repo.deleteAll();
    this.hits = 0;
    this.misses = 0;
  }

  async stats(): Promise<ProductCacheStats> {
    return {
      entries: await this.repo.countProducts(),
      hits: this.hits,
      misses: this.misses,
      maxAgeDays: this.options.maxAgeDays,
    };
  }
}
