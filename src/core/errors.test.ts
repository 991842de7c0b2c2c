import { describe, expect, it } from 'vitest';

import {
  ChunkingError,
  CursorExpiredError,
  EmbedError,
  errorMessage,
  isErrno,
  isRetryable,
  NotFoundError,
  StorageError,
  SyncError,
  TransientError,
} from './errors.js';

describe('sync errors', () => {
  it('carry their code and class name', () => {
    const error = new CursorExpiredError();
    expect(error).toBeInstanceOf(SyncError);
    expect(error.code).toBe('CURSOR_EXPIRED');
    expect(error.name).toBe('CursorExpiredError');
  });

  it('keep the HTTP status on transient errors', () => {
    expect(new TransientError('busy', { status: 503 }).status).toBe(503);
  });

  it('only retry transient and embedding failures', () => {
    expect(isRetryable(new TransientError('x'))).toBe(true);
    expect(isRetryable(new EmbedError('x'))).toBe(true);
    expect(isRetryable(new NotFoundError('x'))).toBe(false);
    expect(isRetryable(new ChunkingError('x'))).toBe(false);
    expect(isRetryable(new StorageError('x'))).toBe(false);
    expect(isRetryable(new Error('x'))).toBe(false);
  });

  it('formats unknown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });

  it('matches errno codes', () => {
    const error = Object.assign(new Error('missing'), { code: 'ENOENT' });
    expect(isErrno(error, 'ENOENT')).toBe(true);
    expect(isErrno(error, 'EISDIR')).toBe(false);
    expect(isErrno('ENOENT', 'ENOENT')).toBe(false);
  });
});
