/**
 * Status Command
 *
 * Chunk count, cursor age and index backend at a glance.
 */

import type { Command } from 'commander';

import { FileCursorStore } from '../../sync/cursor-store.js';
import { createChunkIndex, createEmbedder } from '../../sync/engine.js';
import { createConsoleLogger } from '../../core/logger.js';
import { c } from '../colors.js';
import { loadCliConfig, reportError, type CommonOptions } from '../helpers.js';
import { formatAgo } from './sync-daemon.js';

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show index size and sync cursor')
    .option('-d, --data-dir <dir>', 'Data directory')
    .action(async (options: CommonOptions) => {
      try {
        const config = await loadCliConfig(options);
        const logger = createConsoleLogger(config.verbose);
        const index = createChunkIndex(config, createEmbedder(config), logger);
        const cursor = await new FileCursorStore(config.cursorPath, logger).load();
        const { compatible } = await index.initialize();

        console.log('');
        console.log(c.title('Index Status'));
        console.log(`  Backend: ${index.backend}`);
        if (compatible) {
          console.log(`  Chunks:  ${await index.count()}`);
        } else {
          console.log(`  Chunks:  ${c.warning('no usable index (next sync runs in full)')}`);
        }

        if (cursor) {
          const age = formatAgo(Date.now() - Date.parse(cursor.createdAt));
          console.log(`  Cursor:  saved ${cursor.createdAt} (${age})`);
        } else {
          console.log(`  Cursor:  ${c.dim('(none, next sync runs in full)')}`);
        }
        console.log('');
      } catch (error) {
        reportError('Could not read status', error);
      }
    });
}
