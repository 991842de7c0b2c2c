#!/usr/bin/env node

/**
 * corpus-sync CLI
 *
 * Commands:
 * - sync: Delta sync (or --full), watch, and the background daemon
 * - status: Index size and sync cursor
 * - search: Search the synced documents
 * - config: Show or change configuration
 */

// Load environment variables from .env files
// .env.local takes precedence over .env
import { existsSync, readFileSync } from 'fs';
import { parse } from 'dotenv';

// Load .env files silently (without the v17 logging)
function loadEnvFile(filePath: string, override = false): void {
  if (!existsSync(filePath)) return;
  try {
    const content = readFileSync(filePath, 'utf-8');
    const parsed = parse(content);
    for (const [key, value] of Object.entries(parsed)) {
      if (override || process.env[key] === undefined) {
        process.env[key] = value;
      }
    }
  } catch (error) {
    console.error(`[env] Could not read ${filePath}: ${error}`);
  }
}

// Load .env first, then .env.local (overrides)
loadEnvFile('.env');
loadEnvFile('.env.local', true);

import { Command } from 'commander';

import { registerConfigCommand } from './cli/commands/config.js';
import { registerSearchCommand } from './cli/commands/search.js';
import { registerStatusCommand } from './cli/commands/status.js';
import { registerSyncCommand } from './cli/commands/sync.js';

const program = new Command();

program
  .name('corpus-sync')
  .description('Keep a semantic chunk index in sync with a remote document library')
  .version('0.1.0');

registerSyncCommand(program);
registerStatusCommand(program);
registerSearchCommand(program);
registerConfigCommand(program);

program.parse();
