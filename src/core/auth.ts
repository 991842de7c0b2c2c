/**
 * corpus-sync - Remote Authentication
 *
 * Client-credentials flow against the Microsoft identity platform. The app
 * registration needs admin-consented Sites.Read.All + Files.Read.All.
 */

import { z } from 'zod';

import { TransientError } from './errors.js';

export interface TokenProvider {
  getToken(): Promise<string>;
}

export interface ClientCredentials {
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

const GRAPH_SCOPE = 'https://graph.microsoft.com/.default';

const TokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.coerce.number(),
});

const TokenErrorSchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional(),
});

// Refresh this long before the token actually expires
const EXPIRY_BUFFER_SECONDS = 60;

export class ClientCredentialsTokenProvider implements TokenProvider {
  private token: string | null = null;
  private expiresAt = 0;
  private pending: Promise<string> | null = null;

  constructor(
    private readonly credentials: ClientCredentials,
    private readonly options: { fetchImpl?: typeof fetch; timeoutMs?: number; now?: () => number } = {}
  ) {}

  async getToken(): Promise<string> {
    const now = this.now();
    if (this.token && this.expiresAt > now + EXPIRY_BUFFER_SECONDS) {
      return this.token;
    }

    // Concurrent workers share one in-flight exchange
    if (!this.pending) {
      this.pending = this.requestToken().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private now(): number {
    return Math.floor((this.options.now ?? Date.now)() / 1000);
  }

  private async requestToken(): Promise<string> {
    const { tenantId, clientId, clientSecret } = this.credentials;
    const fetchImpl = this.options.fetchImpl ?? fetch;
    const url = `https://login.microsoftonline.com/${encodeURIComponent(tenantId)}/oauth2/v2.0/token`;

    const body = new URLSearchParams({
      client_id: clientId,
      client_secret: clientSecret,
      scope: GRAPH_SCOPE,
      grant_type: 'client_credentials',
    });

    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body,
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 30_000),
      });
    } catch (error) {
      throw new TransientError(`Token request failed: ${error}`, { cause: error });
    }

    const json: unknown = await response.json().catch(() => null);
    if (!response.ok) {
      const err = TokenErrorSchema.safeParse(json);
      const detail = err.success ? err.data.error_description || err.data.error : undefined;
      throw new TransientError(`Authentication failed (${response.status}): ${detail ?? response.statusText}`, {
        status: response.status,
      });
    }

    const parsed = TokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new TransientError('Authentication failed: token response missing access_token');
    }

    this.token = parsed.data.access_token;
    this.expiresAt = this.now() + parsed.data.expires_in;
    return this.token;
  }
}
