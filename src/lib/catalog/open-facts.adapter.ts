/**
 * Open *Facts catalog adapter
 *
 * One adapter for the three catalogs sharing the API v2 shape:
 *   - Open Food Facts      (food)
 *   - Open Beauty Facts    (beauty)
 *   - Open Products Facts  (general)
 * Fetches one barcode in one language and maps it to a ProductRecord.
 * Always send a custom User-Agent.
 *
 * @see https://openfoodfacts.github.io/openfoodfacts-server/api/
 */

import { catalogEnvelopeSchema, catalogFields } from './catalog.schemas';
import type { RawCatalogProduct } from './catalog.schemas';
import type {
  CatalogFetcher,
  CatalogLookupResult,
  NovaGroup,
  NutriScoreGrade,
  ProductRecord,
  ProductType,
} from './catalog.types';
import type { LanguageCode } from './languages';
import { withQuery, type FetchLike } from '../http/fetch.types';
import { createLogger, errorMessage, type Logger } from '../logging/logger';

/** `product_type` a catalog must report for the product to count as a hit */
const EXPECTED_PRODUCT_TYPE: Record<ProductType, string | null> = {
  food: null,
  beauty: 'beauty',
  general: 'product',
};

const CATALOG_NAMES: Record<ProductType, string> = {
  food: 'OpenFoodFacts',
  beauty: 'OpenBeautyFacts',
  general: 'OpenProductsFacts',
};

export type CatalogAdapterOptions = {
  productType: ProductType;
  baseUrl: string;
  userAgent: string;
  fetch?: FetchLike;
  logger?: Logger;
  now?: () => Date;
};

function readString(p: RawCatalogProduct, key: string): string | null {
  const value = p[key];
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/** Localized field first (`<key>_<lc>`), then the default one */
function readLocalized(
  p: RawCatalogProduct,
  key: string,
  language: LanguageCode,
): string | null {
  return readString(p, `${key}_${language}`) ?? readString(p, key);
}

export function mapNutriScoreGrade(
  grade: string | null,
): NutriScoreGrade | null {
  if (!grade || grade.length !== 1) return null;
  const upper = grade.toUpperCase();
  if (
    upper === 'A' ||
    upper === 'B' ||
    upper === 'C' ||
    upper === 'D' ||
    upper === 'E'
  ) {
    return upper;
  }
  return null;
}

export function mapNovaGroup(value: unknown): NovaGroup | null {
  const n =
    typeof value === 'number'
      ? value
      : typeof value === 'string'
        ? parseInt(value, 10)
        : NaN;
  if (n === 1 || n === 2 || n === 3 || n === 4) return n;
  return null;
}

/** "en:milk" -> "milk"; falls back to the comma-separated `allergens` field */
export function mapAllergens(p: RawCatalogProduct): string[] {
  const tags = p.allergens_tags;
  const raw: string[] = Array.isArray(tags)
    ? tags.filter((t): t is string => typeof t === 'string')
    : (readString(p, 'allergens') ?? '').split(',');
  return raw
    .map((tag) => tag.trim().replace(/^[a-z]{2,3}:/, ''))
    .filter((tag) => tag !== '');
}

export function mapCatalogProduct(
  p: RawCatalogProduct,
  barcode: string,
  productType: ProductType,
  language: LanguageCode,
  retrievedAt: Date,
): ProductRecord {
  const isFood = productType === 'food';
  const nutriScoreRaw =
    readString(p, 'nutriscore_grade') ?? readString(p, 'nutrition_grades');

  return {
    barcode,
    productType,
    name:
      readLocalized(p, 'product_name', language) ??
      readLocalized(p, 'generic_name', language),
    brand: readString(p, 'brands'),
    ingredients: readLocalized(p, 'ingredients_text', language),
    allergens: mapAllergens(p),
    nutriScore: isFood ? mapNutriScoreGrade(nutriScoreRaw) : null,
    novaGroup: isFood ? mapNovaGroup(p.nova_group) : null,
    periodAfterOpening:
      productType === 'beauty' ? readString(p, 'periods_after_opening') : null,
    imageUrl: readString(p, 'image_front_url') ?? readString(p, 'image_url'),
    ingredientsImageUrl: readString(p, 'image_ingredients_url'),
    nutritionImageUrl: isFood ? readString(p, 'image_nutrition_url') : null,
    language,
    retrievedAt: retrievedAt.toISOString(),
    currentPrice: null,
    recentPrices: [],
    priceStats: null,
  };
}

/**
 * Build a fetcher for one catalog. The fetcher never throws: network errors,
 * HTTP errors and malformed bodies come back as `found: false`.
 */
export function createCatalogFetcher(
  options: CatalogAdapterOptions,
): CatalogFetcher {
  const fetchImpl = options.fetch ?? fetch;
  const baseUrl = options.baseUrl.replace(/\/$/, '');
  const catalogName = CATALOG_NAMES[options.productType];
  const logger = options.logger ?? createLogger(catalogName);
  const now = options.now ?? (() => new Date());
  const expectedType = EXPECTED_PRODUCT_TYPE[options.productType];

  return async function fetchCatalogProduct(
    barcode: string,
    language: LanguageCode,
  ): Promise<CatalogLookupResult> {
    const url = withQuery(
      `${baseUrl}/api/v2/product/${encodeURIComponent(barcode)}.json`,
      { lc: language, fields: catalogFields(language).join(',') },
    );

    try {
      const res = await fetchImpl(url, {
        method: 'GET',
        headers: {
          'User-Agent': options.userAgent,
          Accept: 'application/json',
        },
      });

      if (res.status === 404) {
        return { found: false, reason: 'not_found' };
      }
      if (res.status === 429) {
        return {
          found: false,
          reason: 'rate_limited',
          message: 'Too many requests',
        };
      }
      if (!res.ok) {
        return { found: false, reason: 'error', message: `HTTP ${res.status}` };
      }

      let body: unknown;
      try {
        body = await res.json();
      } catch {
        return {
          found: false,
          reason: 'malformed',
          message: 'Response is not JSON',
        };
      }

      const parsed = catalogEnvelopeSchema.safeParse(body);
      if (!parsed.success) {
        return {
          found: false,
          reason: 'malformed',
          message: 'Unexpected response shape',
        };
      }

      const data = parsed.data;
      if (String(data.status) !== '1' || !data.product) {
        return { found: false, reason: 'not_found' };
      }

      const product = data.product;
      if (expectedType && product.product_type !== expectedType) {
        logger.debug(
          `Product ${barcode} is not a ${expectedType} product (type: ${String(product.product_type)})`,
        );
        return {
          found: false,
          reason: 'not_found',
          message: `Not a ${expectedType} product`,
        };
      }

      const code = (data.code ?? readString(product, 'code') ?? barcode).trim();
      return {
        found: true,
        product: mapCatalogProduct(
          product,
          code || barcode,
          options.productType,
          language,
          now(),
        ),
      };
    } catch (err) {
      logger.error(`getByBarcode error for ${barcode}:`, errorMessage(err));
      return { found: false, reason: 'error', message: errorMessage(err) };
    }
  };
}
