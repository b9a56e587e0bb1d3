/**
 * Service Account Token Provider
 *
 * OAuth 2.0 JWT-bearer grant for a Google service account: signs an RS256
 * assertion with the account's private key, exchanges it at `token_uri`, and
 * caches the access token until shortly before it expires.
 *
 * @module auth/service-account
 */

import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { CompleteServiceAccount } from '../config/index.js';
import type { TokenProvider } from '../insights/client.js';

// ============================================================================
// Scopes
// ============================================================================

export const SCOPES = {
  spreadsheets: 'https://www.googleapis.com/auth/spreadsheets',
  driveReadonly: 'https://www.googleapis.com/auth/drive.readonly',
  cloudPlatform: 'https://www.googleapis.com/auth/cloud-platform',
} as const;

/** Scopes for the ledger */
export const SHEETS_SCOPES = [SCOPES.spreadsheets, SCOPES.driveReadonly] as const;

/** Scopes for Area Insights */
export const INSIGHTS_SCOPES = [SCOPES.cloudPlatform] as const;

// ============================================================================
// Types
// ============================================================================

export class AuthError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'AuthError';
  }
}

export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}

export type ServiceAccountCredentials = Pick<
  CompleteServiceAccount,
  'client_email' | 'private_key' | 'private_key_id' | 'token_uri'
>;

export interface ServiceAccountTokenProviderOptions {
  /** Injected for tests */
  fetchImpl?: typeof fetch;
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().default(3600),
  token_type: z.string().optional(),
});

const GRANT_TYPE = 'urn:ietf:params:oauth:grant-type:jwt-bearer';
const ASSERTION_LIFETIME_SECONDS = 3600;
const REFRESH_MARGIN_MS = 60_000;

// ============================================================================
// Provider
// ============================================================================

/**
 * @example
 * ```typescript
 * const tokens = new ServiceAccountTokenProvider(requireServiceAccount(), SHEETS_SCOPES);
 * const token = await tokens.getAccessToken();
 * ```
 */
export class ServiceAccountTokenProvider implements TokenProvider {
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private cached?: { token: string; expiresAt: number };

  constructor(
    private readonly account: ServiceAccountCredentials,
    private readonly scopes: readonly string[],
    options: ServiceAccountTokenProviderOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async getAccessToken(): Promise<string> {
    if (this.cached && this.now() < this.cached.expiresAt - REFRESH_MARGIN_MS) {
      return this.cached.token;
    }

    const issuedAtMs = this.now();
    const body = new URLSearchParams({
      grant_type: GRANT_TYPE,
      assertion: this.signAssertion(issuedAtMs),
    });

    let response: Response;
    try {
      response = await this.fetchImpl(this.account.token_uri, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: body.toString(),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthError(`Token request failed: ${message}`);
    }

    const text = await response.text();
    if (!response.ok) {
      throw new AuthError(`Token endpoint error (${response.status}): ${text}`, response.status);
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      throw new AuthError('Token endpoint returned non-JSON', response.status);
    }

    const parsed = TokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new AuthError('Token endpoint response has no access_token', response.status);
    }

    this.cached = {
      token: parsed.data.access_token,
      expiresAt: issuedAtMs + parsed.data.expires_in * 1000,
    };
    return this.cached.token;
  }

  private signAssertion(issuedAtMs: number): string {
    const iat = Math.floor(issuedAtMs / 1000);
    const payload = {
      iss: this.account.client_email,
      scope: this.scopes.join(' '),
      aud: this.account.token_uri,
      iat,
      exp: iat + ASSERTION_LIFETIME_SECONDS,
    };

    try {
      return jwt.sign(payload, this.account.private_key, {
        algorithm: 'RS256',
        keyid: this.account.private_key_id,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthError(`Cannot sign service account assertion: ${message}`);
    }
  }
}
