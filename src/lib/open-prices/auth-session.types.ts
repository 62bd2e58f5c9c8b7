/**
 * Auth session types for the pricing service
 */

import type { AuthMethod } from '../credentials/credentials.types';

export type AuthSession = {
  method: AuthMethod;
  /** Bearer token or session identifier */
  accessToken: string | null;
  /** null = never expires (token auth, or login without a timeout) */
  expiresAt: Date | null;
  /** Set when the identifier came from a `session=` cookie */
  sessionCookie: string | null;
};

export type AuthSessionState =
  | 'unauthenticated'
  | 'authenticating'
  | 'authenticated'
  | 'expired'
  | 'refreshing';

/** Read-only snapshot, computed on demand */
export type AuthStatus = {
  authenticated: boolean;
  method: AuthMethod;
  expired: boolean;
  hasStoredCredentials: boolean;
};

export type AuthFailureReason =
  | 'no_credentials'
  | 'http_error'
  | 'network_error'
  | 'no_session_identifier'
  /** The session was reset while the login was in flight */
  | 'cancelled';

export type AuthOutcome =
  | { ok: true; method: Exclude<AuthMethod, 'none'> }
  | {
      ok: false;
      reason: AuthFailureReason;
      status?: number;
      message?: string;
    };

export function emptySession(method: AuthMethod): AuthSession {
  return { method, accessToken: null, expiresAt: null, sessionCookie: null };
}
