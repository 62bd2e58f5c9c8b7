/**
 * Supabase-backed ProductCacheRepo (table: product_cache)
 *
 * Schema: supabase/migrations/20261001000000_product_cache.sql
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { ProductType } from '../catalog/catalog.types';
import {
  PersistentProductCache,
  type ProductCacheRepo,
  type ProductCacheRow,
} from './persistent-product-cache';
import type { Logger } from '../logging/logger';

const TABLE = 'product_cache';

const rowSchema = z.object({
  barcode: z.string(),
  product_type: z.enum(['food', 'beauty', 'general']),
  language: z.string(),
  payload: z.unknown(),
  retrieved_at: z.string(),
});

export class SupabaseProductCacheRepo implements ProductCacheRepo {
  constructor(private readonly supabase: SupabaseClient) {}

  async findProduct(
    barcode: string,
    productType: ProductType,
  ): Promise<ProductCacheRow | null> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .select('barcode, product_type, language, payload, retrieved_at')
      .eq('barcode', barcode)
      .eq('product_type', productType)
      .maybeSingle();

    if (error) {
      throw new Error(`Failed to read product cache: ${error.message}`);
    }
    if (!data) return null;
    const parsed = rowSchema.safeParse(data);
    if (!parsed.success) return null;
    return { ...parsed.data, payload: parsed.data.payload };
  }

  async upsertProduct(row: ProductCacheRow): Promise<void> {
    const { error } = await this.supabase.from(TABLE).upsert(
      {
        ...row,
        updated_at: new Date().toISOString(),
      },
      { onConflict: 'barcode,product_type' },
    );
    if (error) {
      throw new Error(`Failed to write product cache: ${error.message}`);
    }
  }

  async deleteAll(): Promise<void> {
    // Delete needs a filter; every row has a non-empty barcode
    const { error } = await this.supabase
      .from(TABLE)
      .delete()
      .neq('barcode', '');
    if (error) {
      throw new Error(`Failed to clear product cache: ${error.message}`);
    }
  }

  async countProducts(): Promise<number> {
    const { count, error } = await this.supabase
      .from(TABLE)
      .select('barcode', { count: 'exact', head: true });
    if (error) {
      throw new Error(`Failed to count product cache: ${error.message}`);
    }
    return count ?? 0;
  }
}

/**
 * Persistent cache on the Supabase project named by the environment.
 * Needs PRODUCT_CACHE_SUPABASE_URL and PRODUCT_CACHE_SUPABASE_KEY.
 */
export function createSupabaseProductCache(options: {
  maxAgeDays: number;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}): PersistentProductCache {
  const env = options.env ?? process.env;
  const url = env.PRODUCT_CACHE_SUPABASE_URL?.trim();
  const key = env.PRODUCT_CACHE_SUPABASE_KEY?.trim();

  if (!url || !key) {
    throw new Error(
      'PRODUCT_CACHE_SUPABASE_URL and PRODUCT_CACHE_SUPABASE_KEY must be set for the persistent product cache',
    );
  }

  const repo = new SupabaseProductCacheRepo(
    createClient(url, key, { auth: { persistSession: false } }),
  );
  return new PersistentProductCache(repo, {
    maxAgeDays: options.maxAgeDays,
    logger: options.logger,
  });
}
