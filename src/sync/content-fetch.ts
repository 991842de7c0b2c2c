/**
 * corpus-sync - Content Fetch
 *
 * Raw bytes for one remote item. Fails with NotFoundError when the item is
 * gone, TransientError for anything worth trying again later.
 */

import { GRAPH_BASE, type GraphClient } from '../core/graph-client.js';
import type { RemoteItem } from '../core/types.js';

export interface ContentFetcher {
  fetch(item: RemoteItem): Promise<Buffer>;
}

export class GraphContentFetcher implements ContentFetcher {
  constructor(private readonly client: GraphClient) {}

  async fetch(item: RemoteItem): Promise<Buffer> {
    const driveId = await this.client.getDriveId();
    return this.client.getBytes(`${GRAPH_BASE}/drives/${driveId}/items/${encodeURIComponent(item.id)}/content`);
  }
}
