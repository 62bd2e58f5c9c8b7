/**
 * Price aggregation
 *
 * Attaches pricing context to a product: the latest price and a bounded window
 * of recent prices, fetched concurrently and joined. Pricing is optional, so
 * every failure degrades to an empty enrichment.
 */

import { createLogger, type Logger } from '../logging/logger';
import type { OpenPricesClient } from './open-prices.client';
import { computePriceStatistics, sortByDateDesc } from './price-stats';
import type { PriceEnrichment, PriceListResult } from './prices.types';

const DAY_MS = 24 * 60 * 60 * 1000;

export type PriceAggregationOptions = {
  enabled: boolean;
  recentWindowDays: number;
  recentWindowSize: number;
  now?: () => number;
  logger?: Logger;
};

export function emptyEnrichment(
  status: 'disabled' | 'unauthenticated' | 'empty',
): PriceEnrichment {
  return { status, current: null, recent: [], stats: null };
}

export class PriceAggregationService {
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly client: OpenPricesClient,
    private readonly options: PriceAggregationOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('PriceAggregation');
  }

  get enabled(): boolean {
    return this.options.enabled;
  }

  async enrich(barcode: string, location?: string): Promise<PriceEnrichment> {
    if (!this.options.enabled) return emptyEnrichment('disabled');

    const since = new Date(this.now() - this.options.recentWindowDays * DAY_MS);
    const [latest, window] = await Promise.all([
      this.client.getProductPrices(barcode, {
        limit: 1,
        location,
        orderBy: '-date',
      }),
      this.client.getProductPrices(barcode, {
        limit: this.options.recentWindowSize,
        location,
        since,
        orderBy: '-date',
      }),
    ]);

    if (isUnauthenticated(latest) && isUnauthenticated(window)) {
      this.logger.info(`Pricing skipped for ${barcode}: not authenticated`);
      return emptyEnrichment('unauthenticated');
    }

    const current = latest.ok ? (sortByDateDesc(latest.prices)[0] ?? null) : null;
    const recent = window.ok ? sortByDateDesc(window.prices) : [];
    const stats = recent.length > 0 ? computePriceStatistics(recent) : null;

    this.logger.debug(
      `Pricing for ${barcode}: current=${current ? 'yes' : 'no'} recent=${recent.length}`,
    );
    return {
      status: current || recent.length > 0 ? 'ok' : 'empty',
      current,
      recent,
      stats,
    };
  }
}

function isUnauthenticated(result: PriceListResult): boolean {
  return !result.ok && result.reason === 'unauthenticated';
}
