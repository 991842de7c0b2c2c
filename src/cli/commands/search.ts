/**
 * Search Command
 *
 * Semantic search over the synced chunk index.
 */

import type { Command } from 'commander';

import { createChunkIndex, createEmbedder } from '../../sync/engine.js';
import { IndexVersion } from '../../core/chunk-index.js';
import { Retriever } from '../../core/retrieval.js';
import { createConsoleLogger } from '../../core/logger.js';
import { c } from '../colors.js';
import { loadCliConfig, reportError, type CommonOptions } from '../helpers.js';

interface SearchOptions extends CommonOptions {
  limit: string;
}

function snippet(text: string, max = 300): string {
  // Drop the "[Document: ...]" header; the result line already names the file
  const body = text.replace(/^\[Document: [^\]]*\]\n/, '').replace(/\s+/g, ' ').trim();
  return body.length > max ? `${body.slice(0, max)}…` : body;
}

export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Search the synced documents')
    .argument('<query>', 'Search query')
    .option('-l, --limit <limit>', 'Max results', '5')
    .option('-d, --data-dir <dir>', 'Data directory')
    .option('-v, --verbose', 'Verbose logging')
    .action(async (query: string, options: SearchOptions) => {
      try {
        const config = await loadCliConfig(options);
        const logger = createConsoleLogger(config.verbose);
        const embedder = createEmbedder(config);
        const index = createChunkIndex(config, embedder, logger);

        const { compatible } = await index.initialize();
        if (!compatible) {
          console.log('No usable index found. Run "corpus-sync sync" first.');
          process.exitCode = 1;
          return;
        }

        const retriever = new Retriever({ index, embedder, version: new IndexVersion() });
        const limit = parseInt(options.limit, 10) || 5;

        console.log(`\nSearching for: "${query}"\n`);
        const results = await retriever.search(query, limit);

        if (results.length === 0) {
          console.log('No results found.');
          return;
        }

        for (const result of results) {
          const { metadata } = result;
          console.log(`━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━`);
          console.log(`📄 ${c.file(metadata.name ?? result.sourceItemId)} ${c.dim(`(chunk ${result.sequenceIndex})`)}`);
          if (metadata.folderPath) console.log(`   ${c.dim('Folder:')} ${c.path(metadata.folderPath)}`);
          if (metadata.webUrl) console.log(`   ${c.dim('Link:')}   ${c.link(metadata.webUrl)}`);
          console.log(`   ${c.dim('Score:')}  ${result.score.toFixed(3)}`);
          console.log('');
          console.log(`   ${snippet(result.text)}`);
          console.log('');
        }
      } catch (error) {
        reportError('Search failed', error);
      }
    });
}
