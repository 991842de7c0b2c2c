/**
 * corpus-sync - Error Taxonomy
 *
 * Item-level errors (Transient, NotFound, Embed, Chunking) mark a single item
 * as failed. CursorExpired is recovered by a full resync. Storage is fatal to
 * the cycle.
 */

export type SyncErrorCode =
  | 'CURSOR_EXPIRED'
  | 'STORAGE'
  | 'TRANSIENT'
  | 'NOT_FOUND'
  | 'EMBED'
  | 'CHUNKING';

export class SyncError extends Error {
  readonly code: SyncErrorCode;

  constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The remote no longer accepts the supplied cursor. */
export class CursorExpiredError extends SyncError {
  constructor(message = 'Sync cursor expired or unknown to the remote', options?: { cause?: unknown }) {
    super('CURSOR_EXPIRED', message, options);
  }
}

export class StorageError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE', message, options);
  }
}

/** Network, auth, timeout or rate-limit failure on a remote call. */
export class TransientError extends SyncError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('TRANSIENT', message, options);
    this.status = options?.status;
  }
}

export class NotFoundError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NOT_FOUND', message, options);
  }
}

export class EmbedError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EMBED', message, options);
  }
}

export class ChunkingError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CHUNKING', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Errors worth retrying for the same item within a cycle. */
export function isRetryable(error: unknown): boolean {
  return error instanceof TransientError || error instanceof EmbedError;
}

export function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
