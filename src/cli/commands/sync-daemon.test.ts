import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { SyncCycleResult } from '../../core/types.js';
import { formatAgo, formatUptime, readStatus, toStatusResult, writeStatus } from './sync-daemon.js';

const RESULT: SyncCycleResult = {
  mode: 'delta',
  fellBackToFull: false,
  added: 2,
  updated: 1,
  deleted: 0,
  skipped: 0,
  failed: 1,
  failures: [{ id: 'x', error: '503' }],
  pages: 1,
  cursorAdvanced: false,
  cancelled: false,
  startedAt: '2026-01-01T00:00:00.000Z',
  finishedAt: '2026-01-01T00:00:03.000Z',
};

describe('daemon status file', () => {
  let dir: string;
  let statusFile: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'daemon-status-'));
    statusFile = path.join(dir, 'daemon.status.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null before anything was written', () => {
    expect(readStatus(statusFile)).toBeNull();
  });

  it('keeps the last sync when later updates only report an error', () => {
    const startedAt = '2026-01-01T00:00:00.000Z';
    writeStatus({}, { statusFile, startedAt });
    writeStatus({ last_sync: RESULT.finishedAt, last_sync_result: toStatusResult(RESULT) }, { statusFile, startedAt });
    writeStatus({ last_error: 'disk full' }, { statusFile, startedAt });

    expect(readStatus(statusFile)).toEqual({
      pid: process.pid,
      started_at: startedAt,
      last_sync: '2026-01-01T00:00:03.000Z',
      last_sync_result: {
        mode: 'delta',
        fell_back_to_full: false,
        added: 2,
        updated: 1,
        deleted: 0,
        skipped: 0,
        failed: 1,
        pages: 1,
        cursor_advanced: false,
      },
      last_error: 'disk full',
    });
  });

  it('ignores a corrupt status file', async () => {
    await writeFile(statusFile, 'not json');
    expect(readStatus(statusFile)).toBeNull();
  });
});

describe('formatUptime', () => {
  it('uses the two largest units', () => {
    expect(formatUptime(5_000)).toBe('5s');
    expect(formatUptime(90_000)).toBe('1m 30s');
    expect(formatUptime(2 * 3_600_000 + 5 * 60_000)).toBe('2h 5m');
    expect(formatUptime(26 * 3_600_000)).toBe('1d 2h');
  });
});

describe('formatAgo', () => {
  it('rounds down to the largest unit', () => {
    expect(formatAgo(30_000)).toBe('just now');
    expect(formatAgo(5 * 60_000)).toBe('5m ago');
    expect(formatAgo(3 * 3_600_000)).toBe('3h ago');
    expect(formatAgo(50 * 3_600_000)).toBe('2d ago');
  });
});
