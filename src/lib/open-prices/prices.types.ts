/**
 * Open Prices types
 */

export type PriceRecord = {
  amount: number;
  currency: string;
  storeName: string | null;
  storeBrand: string | null;
  /** City or display name of the store location */
  location: string | null;
  /** Observation date, YYYY-MM-DD */
  date: string;
  /** Price per kg / L when the product quantity is known */
  unitPrice: number | null;
  isPromotion: boolean;
  source: 'open_prices';
};

/**
 * Summary over a set of prices. The zero-count form has no average/min/max.
 */
export type PriceStatistics =
  | {
      count: 0;
      average: null;
      min: null;
      max: null;
      currency: null;
      lastUpdated: null;
    }
  | {
      count: number;
      average: number;
      min: number;
      max: number;
      currency: string;
      /** Most recent observation date among the inputs */
      lastUpdated: string;
    };

/** Outcome of a price read */
export type PriceListResult =
  | { ok: true; prices: PriceRecord[] }
  | {
      ok: false;
      reason: 'disabled' | 'unauthenticated' | 'error';
      message?: string;
    };

export type PriceEnrichment = {
  status: 'ok' | 'empty' | 'disabled' | 'unauthenticated';
  current: PriceRecord | null;
  /** Most recent first */
  recent: PriceRecord[];
  stats: PriceStatistics | null;
};

export type SubmitPriceInput = {
  barcode: string;
  price: number;
  currency: string;
  /** OpenStreetMap id of the store */
  locationId: string;
  locationType?: 'NODE' | 'WAY' | 'RELATION';
  proofUrl?: string;
  /** Defaults to today */
  date?: Date;
};

export type SubmitPriceResult =
  | { ok: true; status: number }
  | {
      ok: false;
      reason:
        | 'disabled'
        | 'invalid_input'
        | 'unauthenticated'
        | 'rejected'
        | 'error';
      status?: number;
      message?: string;
    };

/** Loose JSON object as returned by list/status endpoints */
export type JsonObject = Record<string, unknown>;
