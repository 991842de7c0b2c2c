/**
 * corpus-sync - Cursor Store
 *
 * Persists the opaque delta cursor as { token, updated_at }. A missing or
 * corrupt file means "no cursor" (full resync); any other filesystem fault
 * is a StorageError.
 */

import { readFile, unlink } from 'fs/promises';
import { z } from 'zod';

import { writeFileAtomic } from '../core/atomic-write.js';
import { isErrno, StorageError } from '../core/errors.js';
import type { SyncLogger } from '../core/logger.js';
import type { SyncCursor } from '../core/types.js';

export interface CursorStore {
  load(): Promise<SyncCursor | null>;
  save(cursor: SyncCursor): Promise<void>;
  clear(): Promise<void>;
}

const CursorFileSchema = z.object({
  token: z.string().min(1),
  updated_at: z.string(),
});

export class FileCursorStore implements CursorStore {
  constructor(
    private readonly filePath: string,
    private readonly logger?: SyncLogger
  ) {}

  getPath(): string {
    return this.filePath;
  }

  async load(): Promise<SyncCursor | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrno(error, 'ENOENT')) return null;
      throw new StorageError(`Could not read cursor at ${this.filePath}: ${error}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.logger?.('WARN', `Cursor file ${this.filePath} is not valid JSON, ignoring it`);
      return null;
    }

    const parsed = CursorFileSchema.safeParse(json);
    if (!parsed.success) {
      this.logger?.('WARN', `Cursor file ${this.filePath} has an unexpected shape, ignoring it`);
      return null;
    }

    return { token: parsed.data.token, createdAt: parsed.data.updated_at };
  }

  async save(cursor: SyncCursor): Promise<void> {
    const record = { token: cursor.token, updated_at: cursor.createdAt };
    try {
      await writeFileAtomic(this.filePath, JSON.stringify(record, null, 2));
    } catch (error) {
      throw new StorageError(`Could not save cursor to ${this.filePath}: ${error}`, { cause: error });
    }
    this.logger?.('DEBUG', `Cursor saved to ${this.filePath}`);
  }

  async clear(): Promise<void> {
    try {
      await unlink(this.filePath);
    } catch (error) {
      if (isErrno(error, 'ENOENT')) return;
      throw new StorageError(`Could not remove cursor at ${this.filePath}: ${error}`, { cause: error });
    }
  }
}
