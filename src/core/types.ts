/**
 * corpus-sync - Core Types
 *
 * Data model shared by the change feed, the reconciler and the chunk index.
 */

// ============================================================================
// Remote Items & Change Records
// ============================================================================

export interface RemoteItem {
  id: string;              // Source-assigned, stable for the item's lifetime
  etag: string;            // Changes iff content changed
  lastModified: string;    // ISO timestamp
  name: string;            // File name, e.g. "Runbook.pdf"
  contentType: string;     // MIME type reported by the source (may be empty)
  size: number;            // Bytes
  webUrl?: string;
  folderPath: string;      // Path below the drive root, "" for root
}

export type ChangeRecord =
  | { kind: 'delete'; sourceItemId: string }
  | { kind: 'upsert'; item: RemoteItem };

export function changeRecordId(record: ChangeRecord): string {
  return record.kind === 'delete' ? record.sourceItemId : record.item.id;
}

// ============================================================================
// Cursor & Pages
// ============================================================================

/**
 * Opaque synchronization cursor. Everything before this point in the change
 * history has been durably applied to the index.
 */
export interface SyncCursor {
  token: string;
  createdAt: string;
}

export interface ChangePage {
  records: ChangeRecord[];
  nextCursor: SyncCursor;
  hasMore: boolean;
}

// ============================================================================
// Chunks
// ============================================================================

export interface ChunkMetadata {
  name?: string;
  etag?: string;
  lastModified?: string;
  webUrl?: string;
  folderPath?: string;
}

export interface StoredChunk {
  sourceItemId: string;
  sequenceIndex: number;   // 0-based position within the item
  text: string;
  embedding: number[];
  metadata: ChunkMetadata;
}

export interface ChunkSearchResult {
  sourceItemId: string;
  sequenceIndex: number;
  text: string;
  score: number;
  metadata: ChunkMetadata;
}

// ============================================================================
// Cycle Results
// ============================================================================

export type SyncMode = 'delta' | 'full';

export type ItemOutcome = 'added' | 'updated' | 'deleted' | 'skipped' | 'failed';

export interface ItemFailure {
  id: string;
  error: string;
}

export interface PageResult {
  added: number;
  updated: number;
  deleted: number;
  skipped: number;
  failed: number;
  failures: ItemFailure[];
  cursorAdvanced: boolean;
  cancelled: boolean;
}

export interface SyncCycleResult {
  mode: SyncMode;
  fellBackToFull: boolean;
  added: number;
  updated: number;
  deleted: number;
  skipped: number;
  failed: number;
  failures: ItemFailure[];
  pages: number;
  cursorAdvanced: boolean;
  cancelled: boolean;
  startedAt: string;
  finishedAt: string;
}
