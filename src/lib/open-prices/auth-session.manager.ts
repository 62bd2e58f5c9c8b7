/**
 * Open Prices auth session manager
 *
 * Owns one session against the pricing service:
 * - API token: stored as the access token, never expires, refresh is local.
 * - Login/password: POST form (user_id, password, action=process) to the
 *   session endpoint; identifier from the `session=` cookie, else from the
 *   JSON body (access_token, token, session_id). Expires after the
 *   configured timeout; refresh logs in again with the stored credentials.
 *
 * configure/refresh are serialized: concurrent refreshes share one in-flight
 * login, and configure waits for any running transition. A login that
 * completes after reset() is discarded.
 */

import { z } from 'zod';
import type {
  AuthMethod,
  CredentialBundle,
} from '../credentials/credentials.types';
import type { FetchLike } from '../http/fetch.types';
import { createLogger, errorMessage, type Logger } from '../logging/logger';
import {
  emptySession,
  type AuthOutcome,
  type AuthSession,
  type AuthSessionState,
  type AuthStatus,
} from './auth-session.types';

type LoginCredentials = {
  username: string;
  password: string;
  sessionTimeoutSeconds: number;
};

export type AuthSessionManagerOptions = {
  sessionUrl: string;
  userAgent: string;
  fetch?: FetchLike;
  /** Epoch ms; Date.now by default */
  now?: () => number;
  logger?: Logger;
};

const SESSION_COOKIE_PATTERN = /(?:^|[;,\s])session=([^;,\s]+)/;

const tokenField = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .optional()
  .catch(undefined);

/** Body fields in priority order */
const loginBodySchema = z
  .object({
    access_token: tokenField,
    token: tokenField,
    session_id: tokenField,
  })
  .passthrough();

export function extractSessionCookie(
  setCookieHeader: string | null,
): string | null {
  if (!setCookieHeader) return null;
  const match = SESSION_COOKIE_PATTERN.exec(setCookieHeader);
  return match?.[1] ? match[1] : null;
}

export function extractBodyToken(bodyText: string): string | null {
  let json: unknown;
  try {
    json = JSON.parse(bodyText);
  } catch {
    return null;
  }
  const parsed = loginBodySchema.safeParse(json);
  if (!parsed.success) return null;
  const { access_token, token, session_id } = parsed.data;
  return access_token || token || session_id || null;
}

export class AuthSessionManager {
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private readonly logger: Logger;
  private session: AuthSession = emptySession('none');
  /** Kept apart from the session, which is cleared on refresh */
  private apiToken: string | null = null;
  private loginCredentials: LoginCredentials | null = null;
  private transition: 'authenticating' | 'refreshing' | null = null;
  private inflight: Promise<AuthOutcome> | null = null;
  /** Bumped by reset(); logins started before it may not write the session */
  private generation = 0;

  constructor(private readonly options: AuthSessionManagerOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('OpenPrices:auth');
  }

  get method(): AuthMethod {
    return this.session.method;
  }

  /** Copy of the current session */
  getSession(): AuthSession {
    return { ...this.session };
  }

  getState(): AuthSessionState {
    if (this.transition) return this.transition;
    if (this.session.accessToken == null) return 'unauthenticated';
    return this.isExpired() ? 'expired' : 'authenticated';
  }

  getStatus(): AuthStatus {
    return {
      authenticated: this.isAuthenticated(),
      method: this.session.method,
      expired: this.isExpired(),
      hasStoredCredentials:
        this.apiToken != null || this.loginCredentials != null,
    };
  }

  isExpired(): boolean {
    if (this.session.method !== 'loginPassword') return false;
    if (!this.session.expiresAt) return false;
    return this.now() > this.session.expiresAt.getTime();
  }

  isAuthenticated(): boolean {
    return this.session.accessToken != null && !this.isExpired();
  }

  async configure(bundle: CredentialBundle): Promise<boolean> {
    return (await this.authenticate(bundle)).ok;
  }

  /** configure() with the typed outcome */
  async authenticate(bundle: CredentialBundle): Promise<AuthOutcome> {
    while (this.inflight) {
      await this.inflight;
    }
    return this.track('authenticating', () => this.applyBundle(bundle));
  }

  async refresh(): Promise<boolean> {
    return (await this.refreshSession()).ok;
  }

  /** refresh() with the typed outcome; joins a refresh already in flight */
  refreshSession(): Promise<AuthOutcome> {
    if (this.inflight) return this.inflight;
    return this.track('refreshing', () => this.runRefresh());
  }

  /** Drop the session and every stored secret */
  reset(): void {
    this.generation += 1;
    this.session = emptySession('none');
    this.apiToken = null;
    this.loginCredentials = null;
  }

  private track(
    kind: 'authenticating' | 'refreshing',
    task: () => Promise<AuthOutcome>,
  ): Promise<AuthOutcome> {
    this.transition = kind;
    const run = task().finally(() => {
      this.transition = null;
      this.inflight = null;
    });
    this.inflight = run;
    return run;
  }

  private async applyBundle(bundle: CredentialBundle): Promise<AuthOutcome> {
    switch (bundle.method) {
      case 'apiToken':
        this.apiToken = bundle.token;
        this.loginCredentials = null;
        this.session = {
          method: 'apiToken',
          accessToken: bundle.token,
          expiresAt: null,
          sessionCookie: null,
        };
        this.logger.info('Configured API token authentication');
        return { ok: true, method: 'apiToken' };

      case 'loginPassword':
        this.apiToken = null;
        this.loginCredentials = {
          username: bundle.username,
          password: bundle.password,
          sessionTimeoutSeconds: bundle.sessionTimeoutSeconds,
        };
        this.session = emptySession('loginPassword');
        return this.login(this.loginCredentials);

      case 'none':
        this.reset();
        this.logger.info('No credentials: running in read-only mode');
        return { ok: false, reason: 'no_credentials' };
    }
  }

  private async runRefresh(): Promise<AuthOutcome> {
    if (this.session.method === 'apiToken' && this.apiToken) {
      this.session = {
        method: 'apiToken',
        accessToken: this.apiToken,
        expiresAt: null,
        sessionCookie: null,
      };
      return { ok: true, method: 'apiToken' };
    }

    if (this.loginCredentials) {
      this.session = emptySession('loginPassword');
      this.logger.info('Refreshing login session');
      return this.login(this.loginCredentials);
    }

    this.logger.warn('Cannot refresh: no stored credentials');
    return { ok: false, reason: 'no_credentials' };
  }

  private async login(credentials: LoginCredentials): Promise<AuthOutcome> {
    const generation = this.generation;
    const form = new URLSearchParams({
      user_id: credentials.username,
      password: credentials.password,
      action: 'process',
    });

    let res: Response;
    try {
      res = await this.fetchImpl(this.options.sessionUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'User-Agent': this.options.userAgent,
          Accept: 'application/json',
        },
        body: form.toString(),
      });
    } catch (err) {
      this.logger.error('Login request failed:', errorMessage(err));
      return {
        ok: false,
        reason: 'network_error',
        message: errorMessage(err),
      };
    }

    if (!res.ok) {
      this.logger.warn(`Login rejected: HTTP ${res.status}`);
      return { ok: false, reason: 'http_error', status: res.status };
    }

    if (generation !== this.generation) {
      this.logger.info('Session reset during login; discarding the response');
      return { ok: false, reason: 'cancelled' };
    }

    const cookie = extractSessionCookie(res.headers.get('set-cookie'));
    let identifier = cookie;
    if (!identifier) {
      let bodyText = '';
      try {
        bodyText = await res.text();
      } catch (err) {
        this.logger.warn('Could not read login response:', errorMessage(err));
      }
      identifier = extractBodyToken(bodyText);
    }

    if (generation !== this.generation) {
      this.logger.info('Session reset during login; discarding the response');
      return { ok: false, reason: 'cancelled' };
    }
    if (!identifier) {
      this.logger.warn('Login succeeded but no session identifier was found');
      return { ok: false, reason: 'no_session_identifier', status: res.status };
    }

    const timeoutMs = credentials.sessionTimeoutSeconds * 1000;
    this.session = {
      method: 'loginPassword',
      accessToken: identifier,
      sessionCookie: cookie,
      expiresAt: timeoutMs > 0 ? new Date(this.now() + timeoutMs) : null,
    };
    this.logger.info(
      `Login session established (${cookie ? 'cookie' : 'token'})`,
    );
    return { ok: true, method: 'loginPassword' };
  }
}
