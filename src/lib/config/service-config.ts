/**
 * Service configuration
 *
 * Zod schema for the resolver's settings plus the env mapping used by
 * scripts and hosts that configure through environment variables.
 *
 * Env:
 *   PRODUCT_FACTS_APP_NAME / PRODUCT_FACTS_APP_URL
 *   PRODUCT_FACTS_LANGUAGES=fr,en          - Ordered fallback list
 *   PRODUCT_FACTS_CACHE_ENABLED=false
 *   PRODUCT_FACTS_CACHE_MAX_AGE_DAYS=7
 *   OPEN_PRICES_ENABLED=false
 *   OPEN_PRICES_API_URL / OPEN_PRICES_SESSION_URL
 *   OPEN_PRICES_REQUIRE_AUTH_FOR_READS=true
 */

import * as path from 'path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { AppError } from '../errors/app-error';
import {
  DEFAULT_LANGUAGE,
  LANGUAGE_CODES,
  languageFromCode,
  normalizeLanguages,
  type LanguageCode,
} from '../catalog/languages';

export const OPEN_PRICES_BASE_URL = 'https://prices.openfoodfacts.org/api/v1';
export const OPEN_PRICES_SESSION_URL =
  'https://world.openfoodfacts.org/cgi/session.pl';

export const CATALOG_BASE_URLS = {
  food: 'https://world.openfoodfacts.org',
  beauty: 'https://world.openbeautyfacts.org',
  general: 'https://world.openproductsfacts.org',
} as const;

const cacheConfigSchema = z.object({
  enabled: z.boolean().default(true),
  productMaxAgeDays: z.number().int().positive().default(7),
});

export type CacheConfig = z.infer<typeof cacheConfigSchema>;

/** Cache presets */
export const CACHE_PRESETS = {
  production: { enabled: true, productMaxAgeDays: 7 },
  development: { enabled: true, productMaxAgeDays: 1 },
  minimal: { enabled: false, productMaxAgeDays: 7 },
} as const satisfies Record<string, CacheConfig>;

const pricingConfigSchema = z.object({
  enabled: z.boolean().default(true),
  baseUrl: z.string().url().default(OPEN_PRICES_BASE_URL),
  sessionUrl: z.string().url().default(OPEN_PRICES_SESSION_URL),
  recentWindowDays: z.number().int().positive().default(30),
  recentWindowSize: z.number().int().positive().max(100).default(30),
  /** When true, price reads are skipped without an authenticated session */
  requireAuthForReads: z.boolean().default(false),
});

export type PricingConfig = z.infer<typeof pricingConfigSchema>;

export const serviceConfigSchema = z.object({
  appName: z.string().trim().min(1),
  appUrl: z.string().url().optional(),
  appVersion: z.string().default('1.0'),
  languages: z
    .array(z.enum(LANGUAGE_CODES))
    .default([DEFAULT_LANGUAGE])
    .transform((langs) => normalizeLanguages(langs)),
  pricing: pricingConfigSchema.default({}),
  catalogs: z
    .object({
      food: z.string().url().default(CATALOG_BASE_URLS.food),
      beauty: z.string().url().default(CATALOG_BASE_URLS.beauty),
      general: z.string().url().default(CATALOG_BASE_URLS.general),
    })
    .default({}),
  cache: cacheConfigSchema.default(CACHE_PRESETS.production),
});

export type ServiceConfigInput = z.input<typeof serviceConfigSchema>;
export type ServiceConfig = z.output<typeof serviceConfigSchema>;

/**
 * Validate a config object. Throws AppError('CONFIG_ERROR') with the zod
 * issues as details.
 */
export function parseServiceConfig(input: ServiceConfigInput): ServiceConfig {
  const parsed = serviceConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new AppError('CONFIG_ERROR', 'Invalid service configuration', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return parsed.data;
}

/** User-Agent sent to every remote service */
export function buildUserAgent(config: ServiceConfig): string {
  const base = `${config.appName}/${config.appVersion}`;
  return config.appUrl ? `${base} (${config.appUrl})` : base;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value == null || value.trim() === '') return undefined;
  const lower = value.trim().toLowerCase();
  return lower === 'true' || lower === '1';
}

function parsePositiveInt(value: string | undefined): number | undefined {
  if (value == null || value.trim() === '') return undefined;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

function parseLanguageList(value: string | undefined): LanguageCode[] {
  if (!value) return [];
  const langs: LanguageCode[] = [];
  for (const part of value.split(',')) {
    const lang = languageFromCode(part);
    if (lang) langs.push(lang);
  }
  return langs;
}

/**
 * Build a config from environment variables. Unset variables fall back to the
 * schema defaults.
 */
export function loadServiceConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): ServiceConfig {
  const pricing: z.input<typeof pricingConfigSchema> = {};
  const pricingEnabled = parseBoolean(env.OPEN_PRICES_ENABLED);
  if (pricingEnabled !== undefined) pricing.enabled = pricingEnabled;
  if (env.OPEN_PRICES_API_URL?.trim()) {
    pricing.baseUrl = env.OPEN_PRICES_API_URL.trim();
  }
  if (env.OPEN_PRICES_SESSION_URL?.trim()) {
    pricing.sessionUrl = env.OPEN_PRICES_SESSION_URL.trim();
  }
  const requireAuth = parseBoolean(env.OPEN_PRICES_REQUIRE_AUTH_FOR_READS);
  if (requireAuth !== undefined) pricing.requireAuthForReads = requireAuth;

  const cache: z.input<typeof cacheConfigSchema> = {};
  const cacheEnabled = parseBoolean(env.PRODUCT_FACTS_CACHE_ENABLED);
  if (cacheEnabled !== undefined) cache.enabled = cacheEnabled;
  const maxAge = parsePositiveInt(env.PRODUCT_FACTS_CACHE_MAX_AGE_DAYS);
  if (maxAge !== undefined) cache.productMaxAgeDays = maxAge;

  return parseServiceConfig({
    appName: env.PRODUCT_FACTS_APP_NAME?.trim() || 'ProductFactsResolver',
    appUrl: env.PRODUCT_FACTS_APP_URL?.trim() || undefined,
    languages: parseLanguageList(env.PRODUCT_FACTS_LANGUAGES),
    pricing,
    cache,
  });
}

/**
 * Load `.env.local` then `.env` from the working directory into process.env.
 * Values already set are not overridden.
 */
export function loadEnvFile(cwd: string = process.cwd()): void {
  loadDotenv({ path: path.join(cwd, '.env.local') });
  loadDotenv({ path: path.join(cwd, '.env') });
}
