/**
 * Sync - Daemon
 *
 * Background sync daemon: start, stop, status helpers.
 */

import { spawnSync } from 'child_process';
import { existsSync, readFileSync, rmSync, writeFileSync, unlinkSync } from 'fs';
import { mkdir } from 'fs/promises';
import path from 'path';
import os from 'os';
import { fileURLToPath } from 'url';
import { z } from 'zod';

import { getConfigDir } from '../../core/config.js';
import type { SyncCycleResult } from '../../core/types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Config directory for daemon files
export const CONFIG_DIR = getConfigDir();
export const PID_FILE = path.join(CONFIG_DIR, 'daemon.pid');
export const STATUS_FILE = path.join(CONFIG_DIR, 'daemon.status.json');
export const LOG_FILE = path.join(CONFIG_DIR, 'daemon.log');

const DaemonStatusSchema = z.object({
  pid: z.number(),
  started_at: z.string(),
  last_sync: z.string().optional(),
  last_sync_result: z
    .object({
      mode: z.enum(['delta', 'full']),
      fell_back_to_full: z.boolean(),
      added: z.number(),
      updated: z.number(),
      deleted: z.number(),
      skipped: z.number(),
      failed: z.number(),
      pages: z.number(),
      cursor_advanced: z.boolean(),
    })
    .optional(),
  last_error: z.string().optional(),
});

export type DaemonStatus = z.infer<typeof DaemonStatusSchema>;

export function toStatusResult(result: SyncCycleResult): NonNullable<DaemonStatus['last_sync_result']> {
  return {
    mode: result.mode,
    fell_back_to_full: result.fellBackToFull,
    added: result.added,
    updated: result.updated,
    deleted: result.deleted,
    skipped: result.skipped,
    failed: result.failed,
    pages: result.pages,
    cursor_advanced: result.cursorAdvanced,
  };
}

export async function ensureConfigDir(): Promise<void> {
  await mkdir(CONFIG_DIR, { recursive: true });
}

export function getPid(): number | null {
  if (!existsSync(PID_FILE)) return null;
  try {
    const pid = parseInt(readFileSync(PID_FILE, 'utf-8').trim(), 10);
    try {
      process.kill(pid, 0);
      return pid;
    } catch {
      // Stale PID file from a daemon that didn't exit cleanly
      unlinkSync(PID_FILE);
      return null;
    }
  } catch {
    return null;
  }
}

export function readStatus(statusFile: string = STATUS_FILE): DaemonStatus | null {
  if (!existsSync(statusFile)) return null;
  try {
    const parsed = DaemonStatusSchema.safeParse(JSON.parse(readFileSync(statusFile, 'utf-8')));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Merge `updates` into the status file. pid and started_at always describe
 * the current process; last sync details carry over from the previous file.
 */
export function writeStatus(
  updates: Partial<DaemonStatus>,
  options: { statusFile?: string; startedAt?: string } = {}
): DaemonStatus {
  const statusFile = options.statusFile ?? STATUS_FILE;
  const existing = readStatus(statusFile);

  const status: DaemonStatus = {
    pid: process.pid,
    started_at: options.startedAt ?? new Date().toISOString(),
  };
  if (existing?.last_sync) status.last_sync = existing.last_sync;
  if (existing?.last_sync_result) status.last_sync_result = existing.last_sync_result;
  if (existing?.last_error) status.last_error = existing.last_error;

  Object.assign(status, updates);
  writeFileSync(statusFile, JSON.stringify(status, null, 2));
  return status;
}

export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h`;
  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}

export function formatAgo(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return 'just now';
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ago`;
  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours}h ago`;
  const days = Math.floor(hours / 24);
  return `${days}d ago`;
}

/**
 * Start the background sync daemon process.
 * Returns { pid } on success, null on failure.
 * If already running, returns the existing PID.
 */
export async function startDaemonProcess(dataDir: string): Promise<{ pid: number; alreadyRunning: boolean } | null> {
  await ensureConfigDir();

  const existingPid = getPid();
  if (existingPid) {
    return { pid: existingPid, alreadyRunning: true };
  }

  const scriptPath = path.join(__dirname, '..', '..', 'daemon-runner.js');
  const nodePath = process.execPath;

  const tmpScript = path.join(os.tmpdir(), `corpus-sync-daemon-start-${Date.now()}.sh`);
  const scriptContent = `#!/bin/bash\nnohup "${nodePath}" "${scriptPath}" "${dataDir}" > /dev/null 2>&1 &\n`;
  writeFileSync(tmpScript, scriptContent, { mode: 0o755 });

  spawnSync('/bin/bash', [tmpScript], { stdio: 'ignore' });

  rmSync(tmpScript, { force: true });

  // Wait for daemon to start and write PID file
  await new Promise(resolve => setTimeout(resolve, 1000));

  try {
    const daemonPid = parseInt(readFileSync(PID_FILE, 'utf-8').trim(), 10);
    process.kill(daemonPid, 0); // Verify running
    return { pid: daemonPid, alreadyRunning: false };
  } catch {
    return null;
  }
}

/** Send SIGTERM to the daemon. Returns the stopped PID, or null if none was running. */
export function stopDaemonProcess(): number | null {
  const pid = getPid();
  if (!pid) return null;

  process.kill(pid, 'SIGTERM');
  if (existsSync(PID_FILE)) unlinkSync(PID_FILE);
  return pid;
}
