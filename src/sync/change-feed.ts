/**
 * corpus-sync - Change Feed
 *
 * `open(cursor)` turns one logical "changes since cursor" call into a lazy
 * sequence of pages. The first page is fetched eagerly so a rejected cursor
 * surfaces from `open` as CursorExpiredError.
 *
 * Cursors are opaque: stored and forwarded, never parsed or compared.
 */

import { z } from 'zod';

import { GRAPH_BASE, type GraphClient } from '../core/graph-client.js';
import { TransientError } from '../core/errors.js';
import type { ChangePage, ChangeRecord, RemoteItem, SyncCursor } from '../core/types.js';

// ============================================================================
// Contract
// ============================================================================

/** Single-use: consuming every page exhausts the session. */
export type FeedSession = AsyncIterable<ChangePage>;

export interface ChangeFeedClient {
  /** `null` requests a full enumeration. */
  open(cursor: SyncCursor | null, options?: OpenFeedOptions): Promise<FeedSession>;
}

export interface OpenFeedOptions {
  signal?: AbortSignal;
}

// ============================================================================
// Graph Delta Payloads
// ============================================================================

const DeltaItemSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  eTag: z.string().optional(),
  cTag: z.string().optional(),
  lastModifiedDateTime: z.string().optional(),
  size: z.number().optional(),
  webUrl: z.string().optional(),
  deleted: z.object({}).passthrough().optional(),
  file: z.object({ mimeType: z.string().optional() }).passthrough().optional(),
  folder: z.object({}).passthrough().optional(),
  parentReference: z.object({ path: z.string().optional() }).passthrough().optional(),
});

const DeltaPageSchema = z.object({
  value: z.array(DeltaItemSchema),
  '@odata.nextLink': z.string().optional(),
  '@odata.deltaLink': z.string().optional(),
});

export type DeltaItem = z.infer<typeof DeltaItemSchema>;

// ============================================================================
// Folder Filtering
// ============================================================================

/**
 * Folder portion of a Graph parentReference.path:
 *   "/drives/{id}/root:/Memos/2026" → "Memos/2026"
 */
export function folderPathFromParent(parentPath: string | undefined): string {
  if (!parentPath) return '';
  const marker = '/root:';
  const idx = parentPath.indexOf(marker);
  const after = (idx === -1 ? parentPath : parentPath.slice(idx + marker.length)).replace(/^\/+/, '');
  try {
    return decodeURIComponent(after);
  } catch {
    return after;
  }
}

export function isInScanFolders(folderPath: string, scanFolders: string[]): boolean {
  if (scanFolders.length === 0) return true;
  return scanFolders.some((folder) => folderPath === folder || folderPath.startsWith(`${folder}/`));
}

/**
 * Map one delta entry to a change record, or null for folders and the root.
 * A file outside the scan folders becomes a delete: it may have been moved
 * out of scope, and removing an id that was never indexed is a no-op.
 */
export function toChangeRecord(item: DeltaItem, scanFolders: string[]): ChangeRecord | null {
  const folderPath = folderPathFromParent(item.parentReference?.path);

  if (item.deleted) {
    return { kind: 'delete', sourceItemId: item.id };
  }

  if (!item.file) return null;
  if (!isInScanFolders(folderPath, scanFolders)) {
    return { kind: 'delete', sourceItemId: item.id };
  }

  const remote: RemoteItem = {
    id: item.id,
    etag: item.eTag ?? item.cTag ?? '',
    lastModified: item.lastModifiedDateTime ?? '',
    name: item.name ?? item.id,
    contentType: item.file.mimeType ?? '',
    size: item.size ?? 0,
    webUrl: item.webUrl,
    folderPath,
  };
  return { kind: 'upsert', item: remote };
}

// ============================================================================
// Graph Delta Feed
// ============================================================================

export interface GraphChangeFeedOptions {
  scanFolders?: string[];
  now?: () => Date;
}

interface FetchedPage {
  page: ChangePage;
  nextUrl?: string;
}

export class GraphChangeFeed implements ChangeFeedClient {
  private readonly scanFolders: string[];
  private readonly now: () => Date;

  constructor(
    private readonly client: GraphClient,
    options: GraphChangeFeedOptions = {}
  ) {
    this.scanFolders = options.scanFolders ?? [];
    this.now = options.now ?? (() => new Date());
  }

  async open(cursor: SyncCursor | null, options: OpenFeedOptions = {}): Promise<FeedSession> {
    const url = cursor?.token ?? `${GRAPH_BASE}/drives/${await this.client.getDriveId()}/root/delta`;
    const first = await this.fetchPage(url, options.signal);
    return this.iterate(first, options.signal);
  }

  private async *iterate(first: FetchedPage, signal?: AbortSignal): AsyncGenerator<ChangePage> {
    let current = first;
    yield current.page;
    while (current.nextUrl) {
      current = await this.fetchPage(current.nextUrl, signal);
      yield current.page;
    }
  }

  private async fetchPage(url: string, signal?: AbortSignal): Promise<FetchedPage> {
    const parsed = DeltaPageSchema.safeParse(await this.client.getJson(url, signal));
    if (!parsed.success) {
      throw new TransientError(`Unexpected delta page shape from ${url}: ${parsed.error.message}`);
    }

    const data = parsed.data;
    const records: ChangeRecord[] = [];
    for (const item of data.value) {
      const record = toChangeRecord(item, this.scanFolders);
      if (record) records.push(record);
    }

    const nextLink = data['@odata.nextLink'];
    const deltaLink = data['@odata.deltaLink'];
    const token = nextLink ?? deltaLink;
    if (!token) {
      throw new TransientError(`Delta page from ${url} carried neither nextLink nor deltaLink`);
    }

    return {
      page: {
        records,
        nextCursor: { token, createdAt: this.now().toISOString() },
        hasMore: Boolean(nextLink),
      },
      nextUrl: nextLink,
    };
  }
}
