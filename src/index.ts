export {
  ProductResolutionService,
  barcodeUtils,
  type CredentialStatus,
  type LookupOptions,
  type PriceHistoryOptions,
  type ProductLookupResult,
  type ProductQuery,
  type ProductResolutionDeps,
} from './lib/products/product-resolution.service';

export {
  CACHE_PRESETS,
  CATALOG_BASE_URLS,
  OPEN_PRICES_BASE_URL,
  OPEN_PRICES_SESSION_URL,
  buildUserAgent,
  loadEnvFile,
  loadServiceConfigFromEnv,
  parseServiceConfig,
  type CacheConfig,
  type PricingConfig,
  type ServiceConfig,
  type ServiceConfigInput,
} from './lib/config/service-config';

export { AppError, isAppError, type AppErrorCode } from './lib/errors/app-error';
export {
  createLogger,
  createMemorySink,
  isDebugLogEnabled,
  type Logger,
  type LogSink,
} from './lib/logging/logger';

export {
  isValidBarcode,
  isValidEan13,
  isLikelyFoodProduct,
} from './lib/catalog/barcode';
export {
  LANGUAGE_CODES,
  DEFAULT_LANGUAGE,
  languageDisplayName,
  languageFromCode,
  normalizeLanguages,
  type LanguageCode,
} from './lib/catalog/languages';
export type {
  CatalogFetcher,
  CatalogLookupResult,
  NovaGroup,
  NutriScoreGrade,
  ProductRecord,
  ProductType,
} from './lib/catalog/catalog.types';
export { createCatalogFetcher } from './lib/catalog/open-facts.adapter';
export {
  LanguageFallbackResolver,
  type LanguageAttempt,
  type ProductResolution,
} from './lib/catalog/language-fallback.resolver';

export {
  ChainedCredentialStore,
  EnvCredentialStore,
  StaticCredentialStore,
} from './lib/credentials/credential-store';
export {
  FileCredentialStore,
  DEFAULT_CREDENTIAL_FILE,
  type FileCredentialStoreOptions,
} from './lib/credentials/file-credential-store';
export {
  AUTH_METHOD_PRECEDENCE,
  compareAuthMethods,
  resolveCredentialBundle,
} from './lib/credentials/auth-method';
export type {
  AuthMethod,
  CredentialBundle,
  CredentialStore,
  RawCredentials,
} from './lib/credentials/credentials.types';

export { AuthSessionManager } from './lib/open-prices/auth-session.manager';
export type {
  AuthOutcome,
  AuthSession,
  AuthSessionState,
  AuthStatus,
} from './lib/open-prices/auth-session.types';
export {
  AuthenticatedRequestExecutor,
  authorizationHeaders,
} from './lib/open-prices/authenticated-request.executor';
export { OpenPricesClient } from './lib/open-prices/open-prices.client';
export { PriceAggregationService } from './lib/open-prices/price-aggregation.service';
export {
  computePriceStatistics,
  EMPTY_PRICE_STATISTICS,
} from './lib/open-prices/price-stats';
export type {
  PriceEnrichment,
  PriceRecord,
  PriceStatistics,
  SubmitPriceInput,
  SubmitPriceResult,
} from './lib/open-prices/prices.types';

export { InMemoryProductCache } from './lib/product-cache/in-memory-product-cache';
export {
  PersistentProductCache,
  type ProductCacheRepo,
  type ProductCacheRow,
} from './lib/product-cache/persistent-product-cache';
export {
  SupabaseProductCacheRepo,
  createSupabaseProductCache,
} from './lib/product-cache/supabase-product-cache.repo';
export type {
  ProductCache,
  ProductCacheStats,
} from './lib/product-cache/product-cache.types';
