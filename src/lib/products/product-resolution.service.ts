/**
 * Product Resolution Service
 *
 * Entry point for barcode lookups. Resolves metadata from the Open *Facts
 * catalogs (with language fallback), optionally attaches Open Prices data and
 * keeps a product cache. One instance owns one pricing session.
 *
 * Call `initialize()` once before any lookup; every operation throws
 * AppError('NOT_INITIALIZED') until then.
 */

import {
  isValidBarcode,
  isValidEan13,
  isLikelyFoodProduct,
} from '../catalog/barcode';
import {
  hasPriceData,
  type CatalogFetcher,
  type ProductRecord,
  type ProductType,
} from '../catalog/catalog.types';
import {
  LanguageFallbackResolver,
  type LanguageAttempt,
} from '../catalog/language-fallback.resolver';
import type { LanguageCode } from '../catalog/languages';
import { createCatalogFetcher } from '../catalog/open-facts.adapter';
import {
  buildUserAgent,
  parseServiceConfig,
  type ServiceConfig,
  type ServiceConfigInput,
} from '../config/service-config';
import { EnvCredentialStore } from '../credentials/credential-store';
import type { AuthMethod, CredentialStore } from '../credentials/credentials.types';
import { AppError } from '../errors/app-error';
import type { FetchLike } from '../http/fetch.types';
import { createLogger, errorMessage, type Logger } from '../logging/logger';
import { AuthSessionManager } from '../open-prices/auth-session.manager';
import type { AuthOutcome, AuthStatus } from '../open-prices/auth-session.types';
import { AuthenticatedRequestExecutor } from '../open-prices/authenticated-request.executor';
import { OpenPricesClient } from '../open-prices/open-prices.client';
import { PriceAggregationService } from '../open-prices/price-aggregation.service';
import {
  computePriceStatistics,
  sortByDateDesc,
} from '../open-prices/price-stats';
import type {
  JsonObject,
  PriceEnrichment,
  PriceRecord,
  PriceStatistics,
  SubmitPriceInput,
  SubmitPriceResult,
} from '../open-prices/prices.types';
import { InMemoryProductCache } from '../product-cache/in-memory-product-cache';
import type {
  ProductCache,
  ProductCacheStats,
} from '../product-cache/product-cache.types';

const DAY_MS = 24 * 60 * 60 * 1000;
const PRICE_STATS_WINDOW_DAYS = 30;
const PRICE_STATS_SAMPLE_SIZE = 100;

export type ProductQuery = {
  barcode: string;
  /** Catalog to search; food by default */
  productType?: ProductType;
  includePricing?: boolean;
  /** Store name used to narrow prices */
  location?: string;
  /** Overrides the configured language order for this lookup */
  languages?: readonly LanguageCode[];
};

export type ProductLookupResult =
  | {
      found: true;
      product: ProductRecord;
      source: 'cache' | 'catalog';
      attempts: LanguageAttempt[];
    }
  | {
      found: false;
      reason: 'invalid_barcode' | 'not_found' | 'unavailable';
      attempts: LanguageAttempt[];
    };

export type LookupOptions = Omit<ProductQuery, 'barcode' | 'productType'>;

export type PriceHistoryOptions = {
  location?: string;
  limit?: number;
  since?: Date;
};

export type CredentialStatus = AuthStatus & {
  pricingEnabled: boolean;
  /** Where the credentials came from (never contains secrets) */
  origin: string;
  hasCredentialSource: boolean;
};

export type ProductResolutionDeps = {
  /** Credential source; env variables by default */
  credentials?: CredentialStore;
  /** null disables caching; by default an in-memory cache when enabled in config */
  cache?: ProductCache | null;
  fetch?: FetchLike;
  /** Epoch ms */
  now?: () => number;
  logger?: Logger;
  /** Replace the HTTP catalog fetchers (tests, alternate mirrors) */
  catalogFetchers?: Partial<Record<ProductType, CatalogFetcher>>;
};

const PRODUCT_TYPES: readonly ProductType[] = ['food', 'beauty', 'general'];

export class ProductResolutionService {
  readonly config: ServiceConfig;
  private readonly logger: Logger;
  private readonly now: () => number;
  private credentials: CredentialStore;
  private cache: ProductCache | null;
  private readonly session: AuthSessionManager;
  private readonly prices: OpenPricesClient;
  private readonly aggregation: PriceAggregationService;
  private readonly resolvers: Record<ProductType, LanguageFallbackResolver>;
  private initialized = false;
  private initializing: Promise<void> | null = null;

  constructor(config: ServiceConfigInput, deps: ProductResolutionDeps = {}) {
    this.config = parseServiceConfig(config);
    this.logger = deps.logger ?? createLogger('ProductResolution');
    this.now = deps.now ?? Date.now;
    this.credentials = deps.credentials ?? new EnvCredentialStore();
    this.cache =
      deps.cache !== undefined
        ? deps.cache
        : this.config.cache.enabled
          ? new InMemoryProductCache({
              maxAgeDays: this.config.cache.productMaxAgeDays,
              now: this.now,
            })
          : null;

    const userAgent = buildUserAgent(this.config);
    const pricing = this.config.pricing;

    this.session = new AuthSessionManager({
      sessionUrl: pricing.sessionUrl,
      userAgent,
      fetch: deps.fetch,
      now: this.now,
      logger: this.logger.child('auth'),
    });
    const executor = new AuthenticatedRequestExecutor(this.session, {
      baseUrl: pricing.baseUrl,
      userAgent,
      fetch: deps.fetch,
      logger: this.logger.child('http'),
    });
    this.prices = new OpenPricesClient(executor, this.session, {
      requireAuthForReads: pricing.requireAuthForReads,
      logger: this.logger.child('prices'),
    });
    this.aggregation = new PriceAggregationService(this.prices, {
      enabled: pricing.enabled,
      recentWindowDays: pricing.recentWindowDays,
      recentWindowSize: pricing.recentWindowSize,
      now: this.now,
      logger: this.logger.child('pricing'),
    });

    const buildResolver = (type: ProductType): LanguageFallbackResolver => {
      const fetcher =
        deps.catalogFetchers?.[type] ??
        createCatalogFetcher({
          productType: type,
          baseUrl: this.config.catalogs[type],
          userAgent,
          fetch: deps.fetch,
          now: () => new Date(this.now()),
        });
      return new LanguageFallbackResolver(fetcher, this.logger.child(type));
    };
    this.resolvers = {
      food: buildResolver('food'),
      beauty: buildResolver('beauty'),
      general: buildResolver('general'),
    };
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** Load credentials and open the pricing session. Safe to call twice. */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    if (!this.initializing) {
      this.initializing = this.runInitialize().finally(() => {
        this.initializing = null;
      });
    }
    return this.initializing;
  }

  private async runInitialize(): Promise<void> {
    this.logger.info(
      `Initializing (languages: ${this.config.languages.join(', ')}, pricing: ${this.config.pricing.enabled ? 'on' : 'off'})`,
    );
    if (this.config.pricing.enabled) {
      await this.configureSession();
    }
    this.initialized = true;
  }

  private async configureSession(): Promise<AuthOutcome> {
    try {
      await this.credentials.load();
    } catch (err) {
      this.logger.warn('Could not load credentials:', errorMessage(err));
    }
    const bundle = this.credentials.resolve();
    const outcome = await this.session.authenticate(bundle);
    if (outcome.ok) {
      this.logger.info(`Pricing session ready (${outcome.method})`);
    } else if (outcome.reason !== 'no_credentials') {
      this.logger.warn(
        `Pricing session not established: ${outcome.reason}${outcome.status ? ` (HTTP ${outcome.status})` : ''}`,
      );
    }
    return outcome;
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  /** Drop the session, stored credentials and the cache handle */
  async dispose(): Promise<void> {
    if (this.initializing) {
      await this.initializing;
    }
    this.session.reset();
    this.credentials.clear();
    this.cache = null;
    this.initialized = false;
    this.logger.info('Disposed');
  }

  async clearCache(): Promise<void> {
    this.ensureInitialized();
    await this.cache?.clear();
  }

  async getCacheStats(): Promise<ProductCacheStats | null> {
    this.ensureInitialized();
    return this.cache ? this.cache.stats() : null;
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new AppError(
        'NOT_INITIALIZED',
        'ProductResolutionService not initialized. Call initialize() first.',
      );
    }
  }

  // ---------------------------------------------------------------------------
  // Product lookup
  // ---------------------------------------------------------------------------

  /** Product or null; null covers invalid input, absence and failures */
  async getProduct(query: ProductQuery): Promise<ProductRecord | null> {
    const result = await this.resolveProduct(query);
    return result.found ? result.product : null;
  }

  async resolveProduct(query: ProductQuery): Promise<ProductLookupResult> {
    this.ensureInitialized();

    const barcode = query.barcode.trim();
    if (!isValidBarcode(barcode)) {
      this.logger.warn(`Invalid barcode: ${query.barcode}`);
      return { found: false, reason: 'invalid_barcode', attempts: [] };
    }

    const productType = query.productType ?? 'food';
    const wantsPricing =
      query.includePricing === true && this.aggregation.enabled;

    const cached = await this.readCache(barcode, productType);
    if (cached) {
      this.logger.debug(`Cache hit: ${productType}:${barcode}`);
      if (wantsPricing && !hasPriceData(cached)) {
        const enrichment = await this.aggregation.enrich(barcode, query.location);
        return {
          found: true,
          product: applyEnrichment(cached, enrichment),
          source: 'cache',
          attempts: [],
        };
      }
      return { found: true, product: cached, source: 'cache', attempts: [] };
    }

    const resolution = await this.resolvers[productType].resolveDetailed(
      barcode,
      query.languages ?? this.config.languages,
    );
    if (!resolution.found) {
      return {
        found: false,
        reason: resolution.reason,
        attempts: resolution.attempts,
      };
    }

    let product = resolution.product;
    if (wantsPricing) {
      const enrichment = await this.aggregation.enrich(barcode, query.location);
      product = applyEnrichment(product, enrichment);
    }

    this.writeCache(product);
    return {
      found: true,
      product,
      source: 'catalog',
      attempts: resolution.attempts,
    };
  }

  getFoodProduct(
    barcode: string,
    options: LookupOptions = {},
  ): Promise<ProductRecord | null> {
    return this.getProduct({ ...options, barcode, productType: 'food' });
  }

  getBeautyProduct(
    barcode: string,
    options: LookupOptions = {},
  ): Promise<ProductRecord | null> {
    return this.getProduct({ ...options, barcode, productType: 'beauty' });
  }

  getGeneralProduct(
    barcode: string,
    options: LookupOptions = {},
  ): Promise<ProductRecord | null> {
    return this.getProduct({ ...options, barcode, productType: 'general' });
  }

  getProductWithPricing(
    barcode: string,
    location?: string,
  ): Promise<ProductRecord | null> {
    return this.getProduct({ barcode, includePricing: true, location });
  }

  getProductBasic(barcode: string): Promise<ProductRecord | null> {
    return this.getProduct({ barcode, includePricing: false });
  }

  /** Tries each catalog in turn (food, beauty, general) */
  async findInAnyCatalog(
    barcode: string,
    options: LookupOptions = {},
  ): Promise<ProductRecord | null> {
    for (const productType of PRODUCT_TYPES) {
      const product = await this.getProduct({ ...options, barcode, productType });
      if (product) return product;
    }
    return null;
  }

  private async readCache(
    barcode: string,
    productType: ProductType,
  ): Promise<ProductRecord | null> {
    if (!this.cache) return null;
    try {
      return await this.cache.get(barcode, productType);
    } catch (err) {
      this.logger.warn(`Cache read failed for ${barcode}:`, errorMessage(err));
      return null;
    }
  }

  private writeCache(product: ProductRecord): void {
    const cache = this.cache;
    if (!cache) return;
    void cache.set(product).catch((err: unknown) => {
      this.logger.warn(
        `Cache write failed for ${product.barcode}:`,
        errorMessage(err),
      );
    });
  }

  // ---------------------------------------------------------------------------
  // Pricing
  // ---------------------------------------------------------------------------

  async getLatestPrice(
    barcode: string,
    location?: string,
  ): Promise<PriceRecord | null> {
    if (!this.pricingReady()) return null;
    return this.prices.getLatestPrice(barcode, location);
  }

  /** Most recent first */
  async getPriceHistory(
    barcode: string,
    options: PriceHistoryOptions = {},
  ): Promise<PriceRecord[]> {
    if (!this.pricingReady()) return [];
    const result = await this.prices.getProductPrices(barcode, {
      limit: options.limit ?? 50,
      location: options.location,
      since: options.since,
      orderBy: '-date',
    });
    return result.ok ? sortByDateDesc(result.prices) : [];
  }

  /** Statistics over the last 30 days; null when pricing is off or failed */
  async getPriceStats(
    barcode: string,
    location?: string,
  ): Promise<PriceStatistics | null> {
    if (!this.pricingReady()) return null;
    const result = await this.prices.getProductPrices(barcode, {
      limit: PRICE_STATS_SAMPLE_SIZE,
      location,
      since: new Date(this.now() - PRICE_STATS_WINDOW_DAYS * DAY_MS),
      orderBy: '-date',
    });
    return result.ok ? computePriceStatistics(result.prices) : null;
  }

  async searchProductsWithPrices(
    options: { location?: string; storeBrand?: string; limit?: number } = {},
  ): Promise<JsonObject[]> {
    if (!this.pricingReady()) return [];
    const result = await this.prices.searchPrices({
      location: options.location,
      storeBrand: options.storeBrand,
      limit: options.limit ?? 20,
    });
    return result.ok ? result.items : [];
  }

  async getStoreLocations(limit = 50): Promise<JsonObject[]> {
    if (!this.pricingReady()) return [];
    const result = await this.prices.getLocations(limit);
    return result.ok ? result.items : [];
  }

  async submitPrice(input: SubmitPriceInput): Promise<SubmitPriceResult> {
    if (!this.pricingReady()) return { ok: false, reason: 'disabled' };
    if (!isValidBarcode(input.barcode.trim())) {
      return { ok: false, reason: 'invalid_input', message: 'Invalid barcode' };
    }
    if (this.session.method === 'none') {
      this.logger.warn(
        'Authentication required to submit prices; configure Open Prices credentials',
      );
      return { ok: false, reason: 'unauthenticated' };
    }
    return this.prices.submitPrice(
      { ...input, barcode: input.barcode.trim() },
      new Date(this.now()),
    );
  }

  async getOpenPricesStatus(): Promise<JsonObject | null> {
    if (!this.pricingReady()) return null;
    return this.prices.getApiStatus();
  }

  private pricingReady(): boolean {
    this.ensureInitialized();
    if (!this.config.pricing.enabled) {
      this.logger.debug('Pricing is disabled');
      return false;
    }
    return true;
  }

  // ---------------------------------------------------------------------------
  // Authentication
  // ---------------------------------------------------------------------------

  get isPricingEnabled(): boolean {
    return this.initialized && this.config.pricing.enabled;
  }

  get canSubmitPrices(): boolean {
    return this.isPricingEnabled && this.session.isAuthenticated();
  }

  get authMethod(): AuthMethod {
    return this.session.method;
  }

  getCredentialStatus(): CredentialStatus {
    return {
      ...this.session.getStatus(),
      pricingEnabled: this.config.pricing.enabled,
      origin: this.credentials.origin,
      hasCredentialSource: this.credentials.hasCredentials(),
    };
  }

  /** Use a token given at runtime instead of the credential source */
  async setOpenPricesAuthToken(token: string): Promise<boolean> {
    this.ensureInitialized();
    const trimmed = token.trim();
    if (!trimmed) return false;
    return this.session.configure({
      method: 'apiToken',
      token: trimmed,
      sessionTimeoutSeconds: 0,
    });
  }

  /** Re-read the credential source and rebuild the session */
  async reloadCredentials(
    credentials?: CredentialStore,
  ): Promise<AuthOutcome> {
    this.ensureInitialized();
    if (credentials) {
      this.credentials.clear();
      this.credentials = credentials;
    }
    this.session.reset();
    if (!this.config.pricing.enabled) {
      return { ok: false, reason: 'no_credentials' };
    }
    return this.configureSession();
  }
}

/** Barcode helpers, re-exported for callers of the service */
export const barcodeUtils = {
  isValidBarcode,
  isValidEan13,
  isLikelyFoodProduct,
} as const;

function applyEnrichment(
  product: ProductRecord,
  enrichment: PriceEnrichment,
): ProductRecord {
  if (enrichment.status === 'disabled') return product;
  return {
    ...product,
    currentPrice: enrichment.current,
    recentPrices: enrichment.recent,
    priceStats: enrichment.stats,
  };
}
