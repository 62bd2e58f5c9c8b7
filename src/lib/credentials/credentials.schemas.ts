/**
 * Credential document schema
 *
 * Shape of `open_prices_credentials.json`. Keys starting with `_` and the
 * `setup_guide` block are documentation and are ignored. Endpoints and the
 * app name come from ServiceConfig, not from this file.
 */

import { z } from 'zod';
import { PLACEHOLDER_VALUES } from './auth-method';
import { DEFAULT_SESSION_TIMEOUT_SECONDS } from './credentials.types';
import type { RawCredentials } from './credentials.types';

export const openPricesCredentialsSchema = z.object({
  username: z.string().nullable().optional(),
  password: z.string().nullable().optional(),
  auth_token: z.string().nullable().optional(),
  session_timeout: z.number().int().nullable().optional(),
});

export const credentialDocumentSchema = z
  .object({
    open_prices: openPricesCredentialsSchema.optional(),
  })
  .passthrough();

export type CredentialDocument = z.infer<typeof credentialDocumentSchema>;

export function documentToRawCredentials(
  doc: CredentialDocument,
): RawCredentials {
  const op = doc.open_prices;
  if (!op) return {};
  return {
    token: op.auth_token ?? null,
    username: op.username ?? null,
    password: op.password ?? null,
    sessionTimeoutSeconds: op.session_timeout ?? null,
  };
}

/**
 * Template written next to the project when no credential file exists.
 */
export function buildCredentialTemplate(
  fileName: string,
): Record<string, unknown> {
  return {
    _comment:
      'Open Prices API credentials - keep this file out of version control',
    _important_note:
      'Product lookups work without credentials. Only Open Prices features use them.',
    _instructions: {
      '1': 'Use your Open Food Facts account (same login for Open Prices)',
      '2': 'Replace the placeholder values below, or set auth_token instead',
      '3': `Add "${fileName}" to your .gitignore`,
    },
    open_prices: {
      username: PLACEHOLDER_VALUES.username,
      password: PLACEHOLDER_VALUES.password,
      auth_token: PLACEHOLDER_VALUES.token,
      session_timeout: DEFAULT_SESSION_TIMEOUT_SECONDS,
    },
  };
}
