/**
 * corpus-sync - Centralized Config Loader
 *
 * Loads configuration from ~/.config/corpus-sync/config.json with env var overrides.
 * Resolution order: process.env > config.json > defaults
 *
 * Secrets that grant write access (SP_CLIENT_SECRET, SUPABASE_SERVICE_KEY) are
 * env-only and never stored in config.
 */

import { readFile, writeFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';

// ============================================================================
// Types
// ============================================================================

const FileConfigSchema = z.object({
  version: z.number().int().default(1),
  data_dir: z.string().optional(),
  cursor_path: z.string().optional(),
  index_backend: z.enum(['local', 'supabase']).optional(),
  index_path: z.string().optional(),
  tenant_id: z.string().optional(),
  client_id: z.string().optional(),
  site_hostname: z.string().optional(),
  site_path: z.string().optional(),
  drive_name: z.string().optional(),
  scan_folders: z.array(z.string()).optional(),
  supabase_url: z.string().optional(),
  supabase_table: z.string().optional(),
  openai_api_key: z.string().optional(),
  embedding_model: z.string().optional(),
  chunk_size: z.number().optional(),
  chunk_overlap: z.number().optional(),
  concurrency: z.number().optional(),
  sync_interval_hours: z.number().optional(),
  fetch_timeout_ms: z.number().optional(),
  item_retries: z.number().optional(),
  retry_base_delay_ms: z.number().optional(),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;

export type FileConfigKey = Exclude<keyof FileConfig, 'version'>;

export const FILE_CONFIG_KEYS = Object.keys(FileConfigSchema.shape).filter(
  (key): key is FileConfigKey => key !== 'version'
);

export interface GraphConfig {
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
  siteHostname?: string;
  sitePath?: string;
  driveName?: string;
  scanFolders: string[];
}

export interface ResolvedConfig {
  dataDir: string;
  cursorPath: string;
  indexBackend: 'local' | 'supabase';
  indexPath: string;
  graph: GraphConfig;
  supabaseUrl?: string;
  supabaseServiceKey?: string;
  supabaseTable: string;
  openaiApiKey?: string;
  embeddingModel: string;
  chunkSize: number;
  chunkOverlap: number;
  concurrency: number;
  syncIntervalHours: number;
  fetchTimeoutMs: number;
  itemRetries: number;
  retryBaseDelayMs: number;
  verbose: boolean;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULTS = {
  dataDir: './data',
  supabaseTable: 'document_chunks',
  embeddingModel: 'text-embedding-3-small',
  chunkSize: 1000,
  chunkOverlap: 200,
  concurrency: 4,
  syncIntervalHours: 6,
  fetchTimeoutMs: 60_000,
  itemRetries: 0,
  retryBaseDelayMs: 1000,
} as const;

// ============================================================================
// Paths
// ============================================================================

const CONFIG_DIR = path.join(os.homedir(), '.config', 'corpus-sync');
const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json');

export function getConfigPath(): string {
  return CONFIG_FILE;
}

export function getConfigDir(): string {
  return CONFIG_DIR;
}

export function expandPath(p: string): string {
  if (p.startsWith('~')) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

// ============================================================================
// Resolution
// ============================================================================

const ResolvedSchema = z
  .object({
    dataDir: z.string().min(1),
    cursorPath: z.string().optional(),
    indexBackend: z.enum(['local', 'supabase']),
    indexPath: z.string().optional(),
    chunkSize: z.coerce.number().int().positive().max(8000),
    chunkOverlap: z.coerce.number().int().min(0),
    concurrency: z.coerce.number().int().min(1).max(32),
    syncIntervalHours: z.coerce.number().positive(),
    fetchTimeoutMs: z.coerce.number().int().positive(),
    itemRetries: z.coerce.number().int().min(0).max(10),
    retryBaseDelayMs: z.coerce.number().int().min(0),
  })
  .refine((c) => c.chunkOverlap < c.chunkSize, {
    message: 'chunk overlap must be smaller than chunk size',
    path: ['chunkOverlap'],
  });

/** Treats unset and blank values alike. */
function pick(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}

function pickNumber(envValue: string | undefined, fileValue: number | undefined, fallback: number): string | number {
  return pick(envValue) ?? fileValue ?? fallback;
}

function parseList(raw: string | undefined): string[] | undefined {
  if (raw === undefined || !raw.trim()) return undefined;
  return raw.split(',').map((s) => s.trim()).filter(Boolean);
}

function parseFlag(raw: string | undefined): boolean {
  const v = (raw ?? '').trim().toLowerCase();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

/**
 * Merge env and file config into a validated, fully defaulted config.
 * Throws with every invalid setting listed.
 */
export function resolveConfig(env: NodeJS.ProcessEnv, file: FileConfig | null): ResolvedConfig {
  const backend = pick(env.INDEX_BACKEND, file?.index_backend) ?? 'local';

  const parsed = ResolvedSchema.safeParse({
    dataDir: pick(env.CORPUS_SYNC_DATA_DIR, file?.data_dir) ?? DEFAULTS.dataDir,
    cursorPath: pick(env.CURSOR_PATH, file?.cursor_path),
    indexBackend: backend,
    indexPath: pick(env.INDEX_PATH, file?.index_path),
    chunkSize: pickNumber(env.CHUNK_SIZE, file?.chunk_size, DEFAULTS.chunkSize),
    chunkOverlap: pickNumber(env.CHUNK_OVERLAP, file?.chunk_overlap, DEFAULTS.chunkOverlap),
    concurrency: pickNumber(env.SYNC_CONCURRENCY, file?.concurrency, DEFAULTS.concurrency),
    syncIntervalHours: pickNumber(env.SYNC_INTERVAL_HOURS, file?.sync_interval_hours, DEFAULTS.syncIntervalHours),
    fetchTimeoutMs: pickNumber(env.FETCH_TIMEOUT_MS, file?.fetch_timeout_ms, DEFAULTS.fetchTimeoutMs),
    itemRetries: pickNumber(env.ITEM_RETRIES, file?.item_retries, DEFAULTS.itemRetries),
    retryBaseDelayMs: pickNumber(env.RETRY_BASE_DELAY_MS, file?.retry_base_delay_ms, DEFAULTS.retryBaseDelayMs),
  });

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const base = parsed.data;
  const dataDir = expandPath(base.dataDir);

  return {
    dataDir,
    cursorPath: base.cursorPath ? expandPath(base.cursorPath) : path.join(dataDir, 'delta_token.json'),
    indexBackend: base.indexBackend,
    indexPath: base.indexPath ? expandPath(base.indexPath) : path.join(dataDir, 'chunk-index.json'),
    graph: {
      tenantId: pick(env.SP_TENANT_ID, file?.tenant_id),
      clientId: pick(env.SP_CLIENT_ID, file?.client_id),
      clientSecret: pick(env.SP_CLIENT_SECRET),
      siteHostname: pick(env.SP_SITE_HOSTNAME, file?.site_hostname),
      sitePath: pick(env.SP_SITE_PATH, file?.site_path),
      driveName: pick(env.SP_DRIVE_NAME, file?.drive_name),
      scanFolders: parseList(env.SP_SCAN_FOLDERS) ?? file?.scan_folders?.map((f) => f.trim()).filter(Boolean) ?? [],
    },
    supabaseUrl: pick(env.SUPABASE_URL, file?.supabase_url),
    supabaseServiceKey: pick(env.SUPABASE_SERVICE_KEY),
    supabaseTable: pick(env.SUPABASE_TABLE, file?.supabase_table) ?? DEFAULTS.supabaseTable,
    openaiApiKey: pick(env.OPENAI_API_KEY, file?.openai_api_key),
    embeddingModel: pick(env.OPENAI_EMBEDDING_MODEL, file?.embedding_model) ?? DEFAULTS.embeddingModel,
    chunkSize: base.chunkSize,
    chunkOverlap: base.chunkOverlap,
    concurrency: base.concurrency,
    syncIntervalHours: base.syncIntervalHours,
    fetchTimeoutMs: base.fetchTimeoutMs,
    itemRetries: base.itemRetries,
    retryBaseDelayMs: base.retryBaseDelayMs,
    verbose: parseFlag(env.VERBOSE),
  };
}

// ============================================================================
// Config File
// ============================================================================

/**
 * Load config from disk. Returns null if the file doesn't exist; a file that
 * exists but doesn't validate is an error.
 */
export async function loadConfigFile(configFile: string = CONFIG_FILE): Promise<FileConfig | null> {
  if (!existsSync(configFile)) {
    return null;
  }

  const content = await readFile(configFile, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new Error(`Config file ${configFile} is not valid JSON: ${error}`);
  }

  const parsed = FileConfigSchema.safeParse(json);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Config file ${configFile} is invalid: ${problems}`);
  }
  return parsed.data;
}

export async function loadConfig(configFile: string = CONFIG_FILE): Promise<ResolvedConfig> {
  const file = await loadConfigFile(configFile);
  return resolveConfig(process.env, file);
}

/**
 * Save config to disk, merged over what's already there.
 */
export async function saveConfigFile(
  updates: Partial<FileConfig>,
  configFile: string = CONFIG_FILE
): Promise<FileConfig> {
  await mkdir(path.dirname(configFile), { recursive: true });

  const existing = await loadConfigFile(configFile);
  const merged: FileConfig = {
    ...existing,
    ...updates,
    version: 1,
  };

  await writeFile(configFile, JSON.stringify(merged, null, 2) + '\n');
  return merged;
}

const NUMERIC_KEYS = new Set<FileConfigKey>([
  'chunk_size',
  'chunk_overlap',
  'concurrency',
  'sync_interval_hours',
  'fetch_timeout_ms',
  'item_retries',
  'retry_base_delay_ms',
]);

/**
 * Convert a `config set <key> <value>` pair into a typed partial config.
 */
export function parseConfigAssignment(key: string, value: string): Partial<FileConfig> {
  const configKey = FILE_CONFIG_KEYS.find((k) => k === key);
  if (!configKey) {
    throw new Error(`Unknown config key "${key}". Valid keys: ${FILE_CONFIG_KEYS.join(', ')}`);
  }

  let raw: unknown = value;
  if (NUMERIC_KEYS.has(configKey)) {
    raw = Number(value);
  } else if (configKey === 'scan_folders') {
    raw = parseList(value) ?? [];
  }

  const parsed = FileConfigSchema.partial().safeParse({ [configKey]: raw });
  if (!parsed.success || (NUMERIC_KEYS.has(configKey) && !Number.isFinite(raw))) {
    throw new Error(`Invalid value for ${configKey}: ${value}`);
  }
  return parsed.data;
}

export function maskSecret(value: string | undefined): string {
  if (!value) return '(not set)';
  if (value.length <= 8) return '****';
  return `${value.slice(0, 4)}…${value.slice(-4)}`;
}
