/**
 * In-memory and env-backed credential stores.
 *
 * File discovery lives in file-credential-store.ts.
 */

import { resolveCredentialBundle } from './auth-method';
import type {
  CredentialBundle,
  CredentialStore,
  RawCredentials,
} from './credentials.types';

/**
 * Holds credentials given in code (manual token, tests).
 */
export class StaticCredentialStore implements CredentialStore {
  readonly origin = 'static';
  private raw: RawCredentials | null;

  constructor(raw: RawCredentials | null = null) {
    this.raw = raw ? { ...raw } : null;
  }

  async load(): Promise<void> {
    // Nothing to read: values were given in the constructor
  }

  resolve(): CredentialBundle {
    return resolveCredentialBundle(this.raw ?? {});
  }

  hasCredentials(): boolean {
    return this.raw != null;
  }

  clear(): void {
    this.raw = null;
  }
}

/**
 * Reads OPEN_PRICES_AUTH_TOKEN, OPEN_PRICES_USERNAME, OPEN_PRICES_PASSWORD
 * and OPEN_PRICES_SESSION_TIMEOUT.
 */
export class EnvCredentialStore implements CredentialStore {
  readonly origin = 'env';
  private raw: RawCredentials | null = null;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async load(): Promise<void> {
    const timeout = parseInt(this.env.OPEN_PRICES_SESSION_TIMEOUT ?? '', 10);
    const raw: RawCredentials = {
      token: this.env.OPEN_PRICES_AUTH_TOKEN?.trim() || null,
      username: this.env.OPEN_PRICES_USERNAME?.trim() || null,
      password: this.env.OPEN_PRICES_PASSWORD || null,
      sessionTimeoutSeconds: Number.isFinite(timeout) ? timeout : null,
    };
    const found = raw.token != null || raw.username != null;
    this.raw = found ? raw : null;
  }

  resolve(): CredentialBundle {
    return resolveCredentialBundle(this.raw ?? {});
  }

  hasCredentials(): boolean {
    return this.raw != null;
  }

  clear(): void {
    this.raw = null;
  }
}

/**
 * First store (in the given order) that holds credentials with a usable method
 * wins; the others stay loaded for status reporting.
 */
export class ChainedCredentialStore implements CredentialStore {
  constructor(private readonly stores: readonly CredentialStore[]) {}

  get origin(): string {
    const active = this.activeStore();
    return active ? active.origin : this.stores.map((s) => s.origin).join('+');
  }

  async load(): Promise<void> {
    for (const store of this.stores) {
      await store.load();
    }
  }

  resolve(): CredentialBundle {
    const active = this.activeStore();
    if (active) return active.resolve();
    return this.stores[0]?.resolve() ?? resolveCredentialBundle({});
  }

  hasCredentials(): boolean {
    return this.stores.some((store) => store.hasCredentials());
  }

  clear(): void {
    for (const store of this.stores) store.clear();
  }

  private activeStore(): CredentialStore | undefined {
    return this.stores.find((store) => store.resolve().method !== 'none');
  }
}
