/**
 * Config Command
 *
 * Show and edit ~/.config/corpus-sync/config.json. Secrets that grant access
 * (SP_CLIENT_SECRET, SUPABASE_SERVICE_KEY) come from the environment only.
 */

import type { Command } from 'commander';

import {
  getConfigPath,
  loadConfigFile,
  maskSecret,
  parseConfigAssignment,
  resolveConfig,
  saveConfigFile,
} from '../../core/config.js';
import { c } from '../colors.js';
import { reportError } from '../helpers.js';

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command('config')
    .description('Show or change configuration');

  configCmd
    .command('show')
    .description('Show the effective configuration (env > config file > defaults)')
    .action(async () => {
      try {
        const config = resolveConfig(process.env, await loadConfigFile());
        const { graph } = config;

        console.log('');
        console.log(c.title('Configuration'));
        console.log(c.dim(`File: ${getConfigPath()}`));
        console.log('');
        console.log(c.header('Remote library'));
        console.log(`  Tenant:        ${graph.tenantId ?? '(not set)'}`);
        console.log(`  Client ID:     ${graph.clientId ?? '(not set)'}`);
        console.log(`  Client secret: ${maskSecret(graph.clientSecret)}`);
        console.log(`  Site:          ${graph.siteHostname ?? '(not set)'}${graph.sitePath ?? ''}`);
        console.log(`  Drive:         ${graph.driveName ?? 'Documents'}`);
        console.log(`  Scan folders:  ${graph.scanFolders.length > 0 ? graph.scanFolders.join(', ') : '(all)'}`);
        console.log('');
        console.log(c.header('Index'));
        console.log(`  Backend:       ${config.indexBackend}`);
        if (config.indexBackend === 'local') {
          console.log(`  Index file:    ${config.indexPath}`);
        } else {
          console.log(`  Supabase URL:  ${config.supabaseUrl ?? '(not set)'}`);
          console.log(`  Service key:   ${maskSecret(config.supabaseServiceKey)}`);
          console.log(`  Table:         ${config.supabaseTable}`);
        }
        console.log(`  Cursor file:   ${config.cursorPath}`);
        console.log(`  OpenAI key:    ${maskSecret(config.openaiApiKey)}`);
        console.log(`  Model:         ${config.embeddingModel}`);
        console.log(`  Chunking:      ${config.chunkSize} chars, ${config.chunkOverlap} overlap`);
        console.log('');
        console.log(c.header('Sync'));
        console.log(`  Concurrency:   ${config.concurrency}`);
        console.log(`  Interval:      every ${config.syncIntervalHours}h`);
        console.log(`  Fetch timeout: ${config.fetchTimeoutMs}ms`);
        console.log(`  Item retries:  ${config.itemRetries} (base delay ${config.retryBaseDelayMs}ms)`);
        console.log('');
      } catch (error) {
        reportError('Could not load configuration', error);
      }
    });

  configCmd
    .command('set')
    .description('Set a value in the config file')
    .argument('<key>', 'Config key, e.g. site_hostname or chunk_size')
    .argument('<value>', 'Value (comma-separated for scan_folders)')
    .action(async (key: string, value: string) => {
      try {
        const update = parseConfigAssignment(key, value);
        const merged = await saveConfigFile(update);
        // Surface cross-field problems (e.g. overlap >= size) now rather than at sync time
        resolveConfig(process.env, merged);
        console.log(`${c.success('✓')} ${key} saved to ${getConfigPath()}`);
      } catch (error) {
        reportError('Could not update configuration', error);
      }
    });
}
