/**
 * Authenticated request executor for Open Prices
 *
 * One logical call = at most two HTTP requests:
 * - expired login session: refresh before sending
 * - 401 with a login session: refresh once, resend the identical request once
 * Token sessions never retry. Other statuses are returned as they are;
 * network errors reject.
 */

import {
  withQuery,
  type FetchLike,
  type HttpMethod,
  type QueryParams,
} from '../http/fetch.types';
import { createLogger, type Logger } from '../logging/logger';
import type { AuthSessionManager } from './auth-session.manager';
import type { AuthSession } from './auth-session.types';

export type ExecuteRequest = {
  method: HttpMethod;
  /** Relative to the API base URL, e.g. "/prices" */
  path: string;
  query?: QueryParams;
  /** Sent as JSON */
  body?: unknown;
};

export type RequestExecutorOptions = {
  baseUrl: string;
  userAgent: string;
  fetch?: FetchLike;
  logger?: Logger;
};

/** Authorization headers for a session (empty when unauthenticated) */
export function authorizationHeaders(
  session: AuthSession,
): Record<string, string> {
  if (session.method === 'none') return {};
  if (session.method === 'loginPassword' && session.sessionCookie) {
    return { Cookie: `session=${session.sessionCookie}` };
  }
  if (session.accessToken) {
    return { Authorization: `Bearer ${session.accessToken}` };
  }
  return {};
}

export class AuthenticatedRequestExecutor {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(
    private readonly session: AuthSessionManager,
    private readonly options: RequestExecutorOptions,
  ) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? createLogger('OpenPrices:http');
  }

  async execute(request: ExecuteRequest): Promise<Response> {
    if (this.session.method === 'loginPassword' && this.session.isExpired()) {
      this.logger.info('Session expired, refreshing before request');
      await this.session.refresh();
    }

    const url = withQuery(`${this.baseUrl}${request.path}`, request.query);
    const body =
      request.body === undefined ? undefined : JSON.stringify(request.body);

    const first = await this.send(request.method, url, body);
    if (first.status !== 401 || this.session.method !== 'loginPassword') {
      return first;
    }

    this.logger.info(`401 from ${request.method} ${request.path}, refreshing`);
    const refreshed = await this.session.refresh();
    if (!refreshed) {
      return first;
    }
    return this.send(request.method, url, body);
  }

  private send(
    method: HttpMethod,
    url: string,
    body: string | undefined,
  ): Promise<Response> {
    const headers: Record<string, string> = {
      'User-Agent': this.options.userAgent,
      Accept: 'application/json',
      ...authorizationHeaders(this.session.getSession()),
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    return this.fetchImpl(url, { method, headers, body });
  }
}
