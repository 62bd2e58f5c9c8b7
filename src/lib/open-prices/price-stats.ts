/**
 * Price statistics and ordering helpers
 */

import type { PriceRecord, PriceStatistics } from './prices.types';

export const EMPTY_PRICE_STATISTICS: PriceStatistics = {
  count: 0,
  average: null,
  min: null,
  max: null,
  currency: null,
  lastUpdated: null,
};

/**
 * Recomputed on every call. Currency is taken from the most recent price;
 * mixed currencies are not converted.
 */
export function computePriceStatistics(
  prices: readonly PriceRecord[],
): PriceStatistics {
  const sorted = sortByDateDesc(prices);
  const latest = sorted[0];
  if (!latest) return EMPTY_PRICE_STATISTICS;

  const amounts = sorted.map((p) => p.amount);
  const total = amounts.reduce((sum, amount) => sum + amount, 0);

  return {
    count: sorted.length,
    average: total / sorted.length,
    min: Math.min(...amounts),
    max: Math.max(...amounts),
    currency: latest.currency,
    lastUpdated: latest.date,
  };
}

/** Newest first; stable for equal dates */
export function sortByDateDesc(prices: readonly PriceRecord[]): PriceRecord[] {
  return [...prices].sort((a, b) =>
    a.date === b.date ? 0 : a.date < b.date ? 1 : -1,
  );
}

export function pickLatest(prices: readonly PriceRecord[]): PriceRecord | null {
  return sortByDateDesc(prices)[0] ?? null;
}
