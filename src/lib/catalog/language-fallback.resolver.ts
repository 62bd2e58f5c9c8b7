/**
 * Language fallback resolver
 *
 * Tries the catalog once per language, in order, and stops at the first hit.
 * A failing language (network, not found, malformed) is logged and skipped.
 */

import type {
  CatalogFetcher,
  CatalogLookupResult,
  ProductRecord,
} from './catalog.types';
import {
  languageDisplayName,
  normalizeLanguages,
  type LanguageCode,
} from './languages';
import { createLogger, type Logger } from '../logging/logger';

export type LanguageAttempt = {
  language: LanguageCode;
  outcome: 'found' | Extract<CatalogLookupResult, { found: false }>['reason'];
  message?: string;
};

/**
 * `not_found`: every language answered "no such product".
 * `unavailable`: at least one language failed for another reason, so absence
 * is not certain.
 */
export type ProductResolution =
  | {
      found: true;
      product: ProductRecord;
      language: LanguageCode;
      attempts: LanguageAttempt[];
    }
  | {
      found: false;
      reason: 'not_found' | 'unavailable';
      attempts: LanguageAttempt[];
    };

export class LanguageFallbackResolver {
  private readonly logger: Logger;

  constructor(
    private readonly fetchProduct: CatalogFetcher,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('LanguageFallback');
  }

  /** First product found, or null when every language failed */
  async resolve(
    barcode: string,
    languages: readonly LanguageCode[],
  ): Promise<ProductRecord | null> {
    const result = await this.resolveDetailed(barcode, languages);
    return result.found ? result.product : null;
  }

  async resolveDetailed(
    barcode: string,
    languages: readonly LanguageCode[],
  ): Promise<ProductResolution> {
    const attempts: LanguageAttempt[] = [];

    for (const language of normalizeLanguages(languages)) {
      this.logger.debug(
        `Fetching product ${barcode} in ${languageDisplayName(language)}`,
      );

      let result: CatalogLookupResult;
      try {
        result = await this.fetchProduct(barcode, language);
      } catch (err) {
        result = {
          found: false,
          reason: 'error',
          message: err instanceof Error ? err.message : String(err),
        };
      }

      if (result.found) {
        attempts.push({ language, outcome: 'found' });
        return {
          found: true,
          product: { ...result.product, language },
          language,
          attempts,
        };
      }

      attempts.push({
        language,
        outcome: result.reason,
        ...(result.message ? { message: result.message } : {}),
      });
      if (result.reason !== 'not_found') {
        this.logger.warn(
          `Error fetching product ${barcode} in ${languageDisplayName(language)}: ${result.reason}${result.message ? ` (${result.message})` : ''}`,
        );
      }
    }

    this.logger.info(`Product not found: ${barcode}`);
    const allNotFound = attempts.every((a) => a.outcome === 'not_found');
    return {
      found: false,
      reason: allNotFound ? 'not_found' : 'unavailable',
      attempts,
    };
  }
}
