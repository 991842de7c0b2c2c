#!/usr/bin/env node
/**
 * Daemon Runner
 *
 * Runs as a background process driving scheduled delta syncs.
 * Writes logs to ~/.config/corpus-sync/daemon.log and status to daemon.status.json.
 */

import { writeFileSync, existsSync, unlinkSync } from 'fs';

import { loadCliConfig } from './cli/helpers.js';
import {
  ensureConfigDir,
  LOG_FILE,
  PID_FILE,
  toStatusResult,
  writeStatus,
  type DaemonStatus,
} from './cli/commands/sync-daemon.js';
import { errorMessage } from './core/errors.js';
import { createFileLogger } from './core/logger.js';
import { createSyncEngine } from './sync/engine.js';

// Data directory from command line arg (overrides config)
const dataDirArg = process.argv[2];

const startedAt = new Date().toISOString();

const log = createFileLogger(LOG_FILE, process.env.VERBOSE === 'true');

function updateStatus(updates: Partial<DaemonStatus>): void {
  try {
    writeStatus(updates, { startedAt });
  } catch (error) {
    log('ERROR', `Failed to update status: ${error}`);
  }
}

async function main(): Promise<void> {
  await ensureConfigDir();

  // Write PID file immediately so parent knows we started
  writeFileSync(PID_FILE, String(process.pid));

  // Also initialize status file with correct PID
  updateStatus({});

  log('INFO', `Daemon starting (PID: ${process.pid})`);

  const config = await loadCliConfig({ dataDir: dataDirArg });
  log('INFO', `Data directory: ${config.dataDir}`);

  const engine = createSyncEngine(config, { logger: log });
  const scheduler = engine.createScheduler({
    onCycle: (result) => {
      updateStatus({
        last_sync: result.finishedAt,
        last_sync_result: toStatusResult(result),
        last_error: undefined,
      });
    },
    onError: (error) => {
      updateStatus({ last_error: errorMessage(error) });
    },
  });

  scheduler.start();

  // Handle shutdown: let in-flight items finish, cursor stays at the last full page
  const shutdown = (signal: string) => {
    log('INFO', `Daemon stopping (${signal})`);
    scheduler.stop().then(
      () => {
        if (existsSync(PID_FILE)) unlinkSync(PID_FILE);
        process.exit(0);
      },
      (error: unknown) => {
        log('ERROR', `Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      }
    );
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error) => {
  log('ERROR', `Daemon failed to start: ${errorMessage(error)}`);
  process.exit(1);
});
