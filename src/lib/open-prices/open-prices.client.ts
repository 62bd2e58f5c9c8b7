/**
 * Open Prices client
 *
 * Reads and writes go through the AuthenticatedRequestExecutor, so the session
 * handling (proactive refresh, single 401 retry) applies to every call.
 * Failures are returned as typed results and logged; nothing here throws for
 * remote errors.
 */

import type { QueryParams } from '../http/fetch.types';
import { createLogger, errorMessage, type Logger } from '../logging/logger';
import type { AuthSessionManager } from './auth-session.manager';
import type { AuthenticatedRequestExecutor } from './authenticated-request.executor';
import {
  jsonObjectSchema,
  mapOpenPricesPrice,
  openPricesPageSchema,
  openPricesPriceSchema,
} from './open-prices.schemas';
import { sortByDateDesc } from './price-stats';
import type {
  JsonObject,
  PriceListResult,
  PriceRecord,
  SubmitPriceInput,
  SubmitPriceResult,
} from './prices.types';

export type PriceQuery = {
  /** Page size */
  limit?: number;
  /** Store name (OSM name) */
  location?: string;
  /** Store brand, matched against the OSM display name */
  storeBrand?: string;
  /** Only prices dated on or after this day */
  since?: Date;
  orderBy?: '-date' | 'date' | 'price' | '-price';
};

export type OpenPricesClientOptions = {
  /** Skip reads (as unauthenticated) when no session is active */
  requireAuthForReads?: boolean;
  logger?: Logger;
};

export type ObjectListResult =
  | { ok: true; items: JsonObject[] }
  | { ok: false; reason: 'unauthenticated' | 'error'; message?: string };

/** YYYY-MM-DD in UTC */
export function toIsoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class OpenPricesClient {
  private readonly logger: Logger;

  constructor(
    private readonly executor: AuthenticatedRequestExecutor,
    private readonly session: AuthSessionManager,
    private readonly options: OpenPricesClientOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('OpenPrices');
  }

  async getProductPrices(
    barcode: string,
    query: PriceQuery = {},
  ): Promise<PriceListResult> {
    if (this.options.requireAuthForReads && !this.session.isAuthenticated()) {
      return { ok: false, reason: 'unauthenticated' };
    }

    try {
      const res = await this.executor.execute({
        method: 'GET',
        path: '/prices',
        query: {
          product_code: barcode,
          size: query.limit ?? 20,
          location_osm_name: query.location,
          location_osm_display_name: query.storeBrand,
          date__gte: query.since ? toIsoDay(query.since) : undefined,
          order_by: query.orderBy,
        },
      });

      if (res.status === 404) return { ok: true, prices: [] };
      if (res.status === 401) {
        this.logger.warn(`Price read for ${barcode} rejected: HTTP 401`);
        return { ok: false, reason: 'unauthenticated' };
      }
      if (!res.ok) {
        this.logger.warn(`Price read for ${barcode} failed: HTTP ${res.status}`);
        return { ok: false, reason: 'error', message: `HTTP ${res.status}` };
      }

      const page = openPricesPageSchema.safeParse(await res.json());
      if (!page.success) {
        return {
          ok: false,
          reason: 'error',
          message: 'Unexpected response shape',
        };
      }

      const prices: PriceRecord[] = [];
      for (const item of page.data.results) {
        const parsed = openPricesPriceSchema.safeParse(item);
        if (parsed.success) prices.push(mapOpenPricesPrice(parsed.data));
      }
      return { ok: true, prices };
    } catch (err) {
      this.logger.error(`Price read for ${barcode} failed:`, errorMessage(err));
      return { ok: false, reason: 'error', message: errorMessage(err) };
    }
  }

  /** Single most recent price */
  async getLatestPrice(
    barcode: string,
    location?: string,
  ): Promise<PriceRecord | null> {
    const result = await this.getProductPrices(barcode, {
      limit: 1,
      location,
      orderBy: '-date',
    });
    if (!result.ok) return null;
    return sortByDateDesc(result.prices)[0] ?? null;
  }

  /** Raw price entries for a store or brand, any product */
  searchPrices(
    query: Pick<PriceQuery, 'location' | 'storeBrand' | 'limit'> = {},
  ): Promise<ObjectListResult> {
    return this.listObjects('/prices', {
      size: query.limit ?? 20,
      location_osm_name: query.location,
      location_osm_display_name: query.storeBrand,
    });
  }

  getLocations(limit = 50): Promise<ObjectListResult> {
    return this.listObjects('/locations', { size: limit });
  }

  private async listObjects(
    path: string,
    query: QueryParams,
  ): Promise<ObjectListResult> {
    try {
      const res = await this.executor.execute({ method: 'GET', path, query });
      if (res.status === 401) return { ok: false, reason: 'unauthenticated' };
      if (!res.ok) {
        this.logger.warn(`GET ${path} failed: HTTP ${res.status}`);
        return { ok: false, reason: 'error', message: `HTTP ${res.status}` };
      }
      const page = openPricesPageSchema.safeParse(await res.json());
      if (!page.success) {
        return {
          ok: false,
          reason: 'error',
          message: 'Unexpected response shape',
        };
      }
      const items: JsonObject[] = [];
      for (const item of page.data.results) {
        const parsed = jsonObjectSchema.safeParse(item);
        if (parsed.success) items.push(parsed.data);
      }
      return { ok: true, items };
    } catch (err) {
      this.logger.error(`GET ${path} failed:`, errorMessage(err));
      return { ok: false, reason: 'error', message: errorMessage(err) };
    }
  }

  /** Service status document, or null when unreachable */
  async getApiStatus(): Promise<JsonObject | null> {
    try {
      const res = await this.executor.execute({ method: 'GET', path: '/status' });
      if (!res.ok) {
        this.logger.warn(`Status check failed: HTTP ${res.status}`);
        return null;
      }
      const parsed = jsonObjectSchema.safeParse(await res.json());
      return parsed.success ? parsed.data : null;
    } catch (err) {
      this.logger.error('Status check failed:', errorMessage(err));
      return null;
    }
  }

  async submitPrice(
    input: SubmitPriceInput,
    today: Date = new Date(),
  ): Promise<SubmitPriceResult> {
    if (!(input.price > 0) || !input.currency.trim() || !input.locationId) {
      return {
        ok: false,
        reason: 'invalid_input',
        message: 'price, currency and locationId are required',
      };
    }
    if (!this.session.getSession().accessToken) {
      return { ok: false, reason: 'unauthenticated' };
    }

    const body: Record<string, string | number> = {
      product_code: input.barcode,
      price: input.price,
      currency: input.currency.trim().toUpperCase(),
      location_osm_id: input.locationId,
      location_osm_type: input.locationType ?? 'NODE',
      date: toIsoDay(input.date ?? today),
    };
    if (input.proofUrl) body.proof = input.proofUrl;

    try {
      const res = await this.executor.execute({
        method: 'POST',
        path: '/prices',
        body,
      });
      if (res.status === 200 || res.status === 201) {
        this.logger.info(`Price submitted for ${input.barcode}`);
        return { ok: true, status: res.status };
      }
      this.logger.warn(
        `Price submission for ${input.barcode} rejected: HTTP ${res.status}`,
      );
      return {
        ok: false,
        reason: res.status === 401 ? 'unauthenticated' : 'rejected',
        status: res.status,
      };
    } catch (err) {
      this.logger.error('Price submission failed:', errorMessage(err));
      return { ok: false, reason: 'error', message: errorMessage(err) };
    }
  }
}
