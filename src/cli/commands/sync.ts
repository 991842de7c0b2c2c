/**
 * Sync Command
 *
 * One-time sync (delta or full), foreground watch, and the background daemon.
 */

import type { Command } from 'commander';
import { spawn } from 'child_process';
import { existsSync, readFileSync } from 'fs';

import { createSyncEngine } from '../../sync/engine.js';
import { summarizeResult } from '../../sync/orchestrator.js';
import { c } from '../colors.js';
import { loadCliConfig, printCycleResult, reportError, type CommonOptions } from '../helpers.js';
import {
  LOG_FILE,
  formatAgo,
  formatUptime,
  getPid,
  readStatus,
  startDaemonProcess,
  stopDaemonProcess,
} from './sync-daemon.js';

interface SyncOptions extends CommonOptions {
  full?: boolean;
}

interface WatchOptions extends CommonOptions {
  initial?: boolean;
}

function getTimestamp(): string {
  return new Date().toLocaleTimeString('en-US', {
    hour12: false,
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });
}

export function registerSyncCommand(program: Command): void {
  const syncCmd = program
    .command('sync')
    .description('Sync the chunk index with the remote document library')
    .option('-d, --data-dir <dir>', 'Data directory')
    .option('--full', 'Clear the index and re-enumerate everything')
    .option('-v, --verbose', 'Log every item')
    .action(async (options: SyncOptions) => {
      try {
        const config = await loadCliConfig(options);
        const engine = createSyncEngine(config);

        console.log(`\n${c.title('corpus-sync')}`);
        console.log(`${c.dim('Data dir:')} ${config.dataDir}`);
        console.log(`${c.dim('Index:')}    ${engine.index.backend}`);

        // Ctrl+C lets in-flight items finish, then stops without advancing the cursor
        const controller = new AbortController();
        const onSigint = () => {
          console.error(c.warning('\nInterrupting after in-flight items finish...'));
          controller.abort();
        };
        process.once('SIGINT', onSigint);

        try {
          const result = await engine.orchestrator.runCycle(options.full ? 'full' : 'delta', {
            signal: controller.signal,
          });
          if (result) {
            printCycleResult(result);
            if (result.failed > 0) process.exitCode = 1;
          }
        } finally {
          process.off('SIGINT', onSigint);
        }
      } catch (error) {
        reportError('Sync failed', error);
      }
    });

  // Watch (foreground)
  syncCmd
    .command('watch')
    .description('Run scheduled delta syncs in the foreground (shows live output)')
    .option('-d, --data-dir <dir>', 'Data directory')
    .option('--no-initial', 'Skip the sync on startup')
    .option('-v, --verbose', 'Log every item')
    .action(async (options: WatchOptions) => {
      try {
        const config = await loadCliConfig(options);
        const engine = createSyncEngine(config);

        console.log('');
        console.log(c.title('  corpus-sync watch'));
        console.log('');
        console.log(`  ${c.dim('Data:')}     ${config.dataDir}`);
        console.log(`  ${c.dim('Interval:')} every ${config.syncIntervalHours}h`);
        console.log('');

        const scheduler = engine.createScheduler({
          runImmediately: options.initial !== false,
          onCycle: (result) => {
            const icon = result.failed > 0 ? c.warning('⚠') : c.success('✓');
            console.log(`  ${c.dim(getTimestamp())} ${icon} ${summarizeResult(result)}`);
          },
          onError: (error) => {
            console.log(`  ${c.dim(getTimestamp())} ${c.error('✗')} Sync failed: ${error}`);
          },
        });

        console.log(`  ${c.success('●')} Watching for changes... ${c.dim('(Ctrl+C to stop)')}`);
        console.log('');
        scheduler.start();

        await new Promise<void>((resolve) => {
          process.once('SIGINT', () => {
            console.log(c.dim('\n  Stopping...'));
            scheduler.stop().then(resolve, resolve);
          });
        });
      } catch (error) {
        reportError('Watch failed', error);
      }
    });

  // Start daemon
  syncCmd
    .command('start')
    .description('Start background sync daemon')
    .option('-d, --data-dir <dir>', 'Data directory')
    .action(async (options: CommonOptions) => {
      try {
        const config = await loadCliConfig(options);
        const result = await startDaemonProcess(config.dataDir);

        if (!result) {
          console.error('Failed to start daemon - check logs with: corpus-sync sync logs');
          process.exitCode = 1;
          return;
        }

        if (result.alreadyRunning) {
          console.log(`Daemon already running (PID: ${result.pid})`);
          console.log(`Use "corpus-sync sync status" to check status`);
          console.log(`Use "corpus-sync sync stop" to stop it`);
          return;
        }

        console.log(`Daemon started (PID: ${result.pid})`);
        console.log(`Log file: ${LOG_FILE}`);
        console.log(`Use "corpus-sync sync logs" to view activity`);
      } catch (error) {
        reportError('Failed to start daemon', error);
      }
    });

  // Stop daemon
  syncCmd
    .command('stop')
    .description('Stop background sync daemon')
    .action(() => {
      try {
        const pid = stopDaemonProcess();
        if (!pid) {
          console.log('Daemon is not running');
          return;
        }
        console.log(`Daemon stopped (PID: ${pid})`);
      } catch (error) {
        reportError('Failed to stop daemon', error);
      }
    });

  // Daemon status
  syncCmd
    .command('status')
    .description('Check sync daemon status')
    .action(() => {
      const pid = getPid();
      const status = readStatus();

      console.log('');
      console.log('Sync Daemon Status');
      console.log('==================');

      if (!pid) {
        console.log('Daemon: NOT RUNNING');
        console.log('');
        console.log('Start with: corpus-sync sync start');
        return;
      }

      console.log(`Daemon: RUNNING (PID: ${pid})`);

      if (status) {
        const started = new Date(status.started_at);
        console.log(`Uptime: ${formatUptime(Date.now() - started.getTime())}`);

        if (status.last_sync) {
          const lastSync = new Date(status.last_sync);
          console.log(`Last sync: ${formatAgo(Date.now() - lastSync.getTime())}`);

          if (status.last_sync_result) {
            const r = status.last_sync_result;
            console.log(`  Mode: ${r.mode}${r.fell_back_to_full ? ' (fallback)' : ''}`);
            console.log(`  Added: ${r.added}, updated: ${r.updated}, deleted: ${r.deleted}, skipped: ${r.skipped}`);
            if (r.failed > 0) {
              console.log(`  Failed: ${r.failed}`);
            }
          }
        } else {
          console.log('Last sync: (not yet synced)');
        }

        if (status.last_error) {
          console.log(`Last error: ${status.last_error}`);
        }
      }

      console.log('');
      console.log(`Log file: ${LOG_FILE}`);
      console.log('View logs: corpus-sync sync logs');
    });

  // Daemon logs
  syncCmd
    .command('logs')
    .description('View sync daemon logs')
    .option('-f, --follow', 'Follow log output (like tail -f)')
    .option('-n, --lines <n>', 'Number of lines to show', '50')
    .action(async (options: { follow?: boolean; lines: string }) => {
      if (!existsSync(LOG_FILE)) {
        console.log('No log file found. Daemon may not have run yet.');
        console.log(`Expected: ${LOG_FILE}`);
        return;
      }

      if (options.follow) {
        const tail = spawn('tail', ['-f', LOG_FILE], {
          stdio: 'inherit',
        });

        await new Promise<void>((resolve) => {
          process.once('SIGINT', () => {
            tail.kill();
            resolve();
          });
        });
        return;
      }

      const content = readFileSync(LOG_FILE, 'utf-8');
      const lines = content.trim().split('\n');
      const n = parseInt(options.lines, 10) || 50;
      const lastLines = lines.slice(-n);

      console.log(`Last ${Math.min(n, lastLines.length)} log entries:\n`);
      console.log(lastLines.join('\n'));
    });
}
