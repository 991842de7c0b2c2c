/**
 * corpus-sync - Microsoft Graph Client
 *
 * Authenticated GET helpers plus site & drive resolution. Every request
 * carries its own timeout; nothing is retried here.
 *
 * Graph API docs: https://learn.microsoft.com/en-us/graph/api/overview
 */

import { z } from 'zod';

import type { TokenProvider } from './auth.js';
import { CursorExpiredError, NotFoundError, TransientError } from './errors.js';
import type { SyncLogger } from './logger.js';

export const GRAPH_BASE = 'https://graph.microsoft.com/v1.0';

export interface GraphClientOptions {
  tokenProvider: TokenProvider;
  siteHostname: string;
  sitePath: string;
  driveName: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  logger?: SyncLogger;
}

const GraphErrorSchema = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string().optional(),
  }),
});

const SiteSchema = z.object({ id: z.string() });

const DrivesSchema = z.object({
  value: z.array(z.object({ id: z.string(), name: z.string().optional() })),
});

async function describeFailure(response: Response): Promise<string> {
  const json: unknown = await response.json().catch(() => null);
  const parsed = GraphErrorSchema.safeParse(json);
  if (parsed.success) {
    const { code, message } = parsed.data.error;
    return [code, message].filter(Boolean).join(': ') || response.statusText;
  }
  return response.statusText;
}

export class GraphClient {
  private readonly fetchImpl: typeof fetch;
  private siteId: string | null = null;
  private driveId: string | null = null;

  constructor(private readonly options: GraphClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private async request(url: string, signal?: AbortSignal): Promise<Response> {
    const token = await this.options.tokenProvider.getToken();
    const timeout = AbortSignal.timeout(this.options.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { Authorization: `Bearer ${token}` },
        redirect: 'follow',
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      throw new TransientError(
        timedOut ? `Request timed out after ${this.options.timeoutMs}ms: ${url}` : `Request failed: ${url}: ${error}`,
        { cause: error }
      );
    }

    if (response.ok) return response;

    const detail = await describeFailure(response);
    if (response.status === 404) {
      throw new NotFoundError(`Not found: ${url} (${detail})`);
    }
    if (response.status === 410) {
      // Graph answers 410 Gone (resyncRequired) for delta tokens it no longer knows
      throw new CursorExpiredError(`Delta token rejected (${detail})`);
    }
    throw new TransientError(`Graph request failed (${response.status}): ${detail}`, { status: response.status });
  }

  async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const response = await this.request(url, signal);
    try {
      return await response.json();
    } catch (error) {
      throw new TransientError(`Malformed JSON from ${url}`, { cause: error });
    }
  }

  async getBytes(url: string, signal?: AbortSignal): Promise<Buffer> {
    const response = await this.request(url, signal);
    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw new TransientError(`Download interrupted: ${url}`, { cause: error });
    }
  }

  // ==========================================================================
  // Site & Drive Resolution
  // ==========================================================================

  async getSiteId(): Promise<string> {
    if (this.siteId) return this.siteId;

    const { siteHostname, sitePath } = this.options;
    const data = SiteSchema.parse(await this.getJson(`${GRAPH_BASE}/sites/${siteHostname}:${sitePath}`));
    this.siteId = data.id;
    this.options.logger?.('DEBUG', `Resolved site ID: ${this.siteId}`);
    return this.siteId;
  }

  async getDriveId(): Promise<string> {
    if (this.driveId) return this.driveId;

    const siteId = await this.getSiteId();
    const data = DrivesSchema.parse(await this.getJson(`${GRAPH_BASE}/sites/${siteId}/drives`));
    const wanted = this.options.driveName.toLowerCase();
    const drive = data.value.find((d) => (d.name ?? '').toLowerCase() === wanted);

    if (!drive) {
      const available = data.value.map((d) => d.name ?? d.id).join(', ');
      throw new Error(`Drive '${this.options.driveName}' not found. Available drives: ${available}`);
    }

    this.driveId = drive.id;
    this.options.logger?.('DEBUG', `Resolved drive '${drive.name}' → ID: ${this.driveId}`);
    return this.driveId;
  }
}
