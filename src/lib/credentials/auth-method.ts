/**
 * Auth method precedence
 *
 * apiToken > loginPassword > none. Placeholder values from the credential
 * template never count as usable.
 */

import {
  DEFAULT_SESSION_TIMEOUT_SECONDS,
  type AuthMethod,
  type CredentialBundle,
  type RawCredentials,
} from './credentials.types';

/** Highest precedence first */
export const AUTH_METHOD_PRECEDENCE: readonly AuthMethod[] = [
  'apiToken',
  'loginPassword',
  'none',
];

/** Values written by the credential template; treated as absent */
export const PLACEHOLDER_VALUES = {
  token: 'your_api_token_here',
  username: 'your_openfoodfacts_username',
  password: 'your_openfoodfacts_password',
} as const;

/**
 * Negative when `a` takes precedence over `b`.
 */
export function compareAuthMethods(a: AuthMethod, b: AuthMethod): number {
  return AUTH_METHOD_PRECEDENCE.indexOf(a) - AUTH_METHOD_PRECEDENCE.indexOf(b);
}

function usable(
  value: string | null | undefined,
  placeholder: string,
): value is string {
  return value != null && value.trim() !== '' && value.trim() !== placeholder;
}

/** Every method the raw credentials could support */
export function availableAuthMethods(raw: RawCredentials): AuthMethod[] {
  const methods: AuthMethod[] = ['none'];
  if (usable(raw.token, PLACEHOLDER_VALUES.token)) methods.push('apiToken');
  if (
    usable(raw.username, PLACEHOLDER_VALUES.username) &&
    usable(raw.password, PLACEHOLDER_VALUES.password)
  ) {
    methods.push('loginPassword');
  }
  return methods.sort(compareAuthMethods);
}

export function resolveAuthMethod(raw: RawCredentials): AuthMethod {
  return availableAuthMethods(raw)[0] ?? 'none';
}

/**
 * Apply precedence and build the bundle the session manager consumes.
 * Token and username are trimmed; the password is passed as written.
 */
export function resolveCredentialBundle(
  raw: RawCredentials,
): CredentialBundle {
  const sessionTimeoutSeconds =
    raw.sessionTimeoutSeconds ?? DEFAULT_SESSION_TIMEOUT_SECONDS;
  const method = resolveAuthMethod(raw);
  const token = raw.token?.trim();
  const username = raw.username?.trim();

  if (method === 'apiToken' && token) {
    return { method, token, sessionTimeoutSeconds };
  }
  if (method === 'loginPassword' && username && raw.password) {
    return {
      method,
      username,
      password: raw.password,
      sessionTimeoutSeconds,
    };
  }
  return { method: 'none', sessionTimeoutSeconds };
}
