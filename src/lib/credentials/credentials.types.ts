/**
 * Credential types for the pricing service (Open Prices).
 */

/** How the pricing session authenticates */
export type AuthMethod = 'none' | 'apiToken' | 'loginPassword';

export const DEFAULT_SESSION_TIMEOUT_SECONDS = 3600;

/**
 * Resolved credentials. Only the fields of the selected method are set.
 */
export type CredentialBundle =
  | { readonly method: 'none'; readonly sessionTimeoutSeconds: number }
  | {
      readonly method: 'apiToken';
      readonly token: string;
      readonly sessionTimeoutSeconds: number;
    }
  | {
      readonly method: 'loginPassword';
      readonly username: string;
      readonly password: string;
      /** Seconds until a login session expires; not positive = no tracked expiry */
      readonly sessionTimeoutSeconds: number;
    };

/**
 * Raw values as found in a credential source, before precedence is applied.
 */
export type RawCredentials = {
  token?: string | null;
  username?: string | null;
  password?: string | null;
  sessionTimeoutSeconds?: number | null;
};

/**
 * Source of credentials for the session manager.
 * `resolve()` is synchronous; `load()` fills the store from its backing source.
 */
export interface CredentialStore {
  /** Human-readable origin for diagnostics (never contains secrets) */
  readonly origin: string;
  load(): Promise<void>;
  resolve(): CredentialBundle;
  /** True when a credential source was found and read */
  hasCredentials(): boolean;
  /** Drop everything held in memory */
  clear(): void;
}
