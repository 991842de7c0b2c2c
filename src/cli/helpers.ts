/**
 * CLI Helper Functions
 *
 * Shared utilities for CLI commands.
 */

import { loadConfigFile, resolveConfig, type ResolvedConfig } from '../core/config.js';
import { errorMessage } from '../core/errors.js';
import type { SyncCycleResult } from '../core/types.js';
import { c } from './colors.js';

export interface CommonOptions {
  dataDir?: string;
  verbose?: boolean;
}

/**
 * Resolve config for a command: flags > env > config.json > defaults.
 */
export async function loadCliConfig(options: CommonOptions = {}): Promise<ResolvedConfig> {
  const env: NodeJS.ProcessEnv = { ...process.env };
  if (options.dataDir) env.CORPUS_SYNC_DATA_DIR = options.dataDir;
  if (options.verbose) env.VERBOSE = 'true';
  return resolveConfig(env, await loadConfigFile());
}

/** Print a failure and mark the process as failed without exiting mid-flight. */
export function reportError(context: string, error: unknown): void {
  console.error(c.error(`${context}: ${errorMessage(error)}`));
  process.exitCode = 1;
}

export function printCycleResult(result: SyncCycleResult): void {
  const seconds = (Date.parse(result.finishedAt) - Date.parse(result.startedAt)) / 1000;
  const mode = result.fellBackToFull ? `${result.mode} (fallback)` : result.mode;

  console.log('');
  console.log(`${c.dim('Mode:')}     ${mode}`);
  console.log(`${c.dim('Pages:')}    ${result.pages}`);
  console.log(`${c.dim('Added:')}    ${result.added}`);
  console.log(`${c.dim('Updated:')}  ${result.updated}`);
  console.log(`${c.dim('Deleted:')}  ${result.deleted}`);
  console.log(`${c.dim('Skipped:')}  ${result.skipped}`);
  console.log(`${c.dim('Failed:')}   ${result.failed > 0 ? c.warning(String(result.failed)) : '0'}`);

  for (const failure of result.failures.slice(0, 10)) {
    console.log(`  ${c.warning('⚠')} ${failure.id}: ${failure.error}`);
  }
  if (result.failures.length > 10) {
    console.log(`  ... and ${result.failures.length - 10} more`);
  }

  if (result.cancelled) {
    console.log(c.warning('\nSync interrupted; the cursor stays at the last completed page.'));
  } else if (!result.cursorAdvanced && result.pages > 0) {
    console.log(c.warning('\nCursor not advanced; failed items will be retried next sync.'));
  }
  console.log(c.dim(`\nFinished in ${seconds.toFixed(1)}s`));
}
