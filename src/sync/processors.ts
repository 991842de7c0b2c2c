/**
 * corpus-sync - Format Preprocessors & Chunking
 *
 * Converts raw item bytes to plain text, then to ordered chunk texts.
 * Formats are a strategy map keyed by content type, resolved once when the
 * chunker is built; supporting a new format means registering an extractor.
 * All processing is in memory.
 */

import path from 'path';
import ExcelJS from 'exceljs';
import mammoth from 'mammoth';
import { PDFParse } from 'pdf-parse';

import { ChunkingError, errorMessage } from '../core/errors.js';
import type { SyncLogger } from '../core/logger.js';
import { splitText } from './splitter.js';

// ============================================================================
// Types
// ============================================================================

export type TextExtractor = (content: Buffer) => Promise<string>;

export interface ChunkContext {
  name: string;
  folderPath: string;
}

export interface ContentChunker {
  /** Ordered chunk texts; empty when the format is unsupported or has no text. */
  chunk(content: Buffer, contentType: string, context: ChunkContext): Promise<string[]>;
}

// ============================================================================
// Content Types
// ============================================================================

export const CONTENT_TYPES = {
  pdf: 'application/pdf',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  text: 'text/plain',
  markdown: 'text/markdown',
  csv: 'text/csv',
  html: 'text/html',
  xml: 'application/xml',
  json: 'application/json',
} as const;

const EXTENSION_TYPES: Record<string, string> = {
  '.pdf': CONTENT_TYPES.pdf,
  '.xlsx': CONTENT_TYPES.xlsx,
  '.docx': CONTENT_TYPES.docx,
  '.txt': CONTENT_TYPES.text,
  '.md': CONTENT_TYPES.markdown,
  '.markdown': CONTENT_TYPES.markdown,
  '.csv': CONTENT_TYPES.csv,
  '.html': CONTENT_TYPES.html,
  '.htm': CONTENT_TYPES.html,
  '.xml': CONTENT_TYPES.xml,
  '.json': CONTENT_TYPES.json,
};

const TYPE_ALIASES: Record<string, string> = {
  'text/xml': CONTENT_TYPES.xml,
  'text/x-markdown': CONTENT_TYPES.markdown,
  'application/xhtml+xml': CONTENT_TYPES.html,
};

export function normalizeContentType(contentType: string): string {
  const base = contentType.split(';')[0].trim().toLowerCase();
  return TYPE_ALIASES[base] ?? base;
}

// ============================================================================
// Text Formats
// ============================================================================

function decode(content: Buffer): string {
  return content.toString('utf-8').replace(/^﻿/, '');
}

export function processCsv(content: string): string {
  const lines = content.split('\n').filter(line => line.trim());
  if (lines.length === 0) {
    return content;
  }

  // Parse header and data
  const header = lines[0].split(',').map(h => h.trim().replace(/^"|"$/g, ''));
  const rows = lines.slice(1);

  const formatted = rows.map((row, idx) => {
    const values = row.split(',').map(v => v.trim().replace(/^"|"$/g, ''));
    const pairs = header.map((h, i) => `${h}: ${values[i] || ''}`);
    return `Row ${idx + 1}:\n  ${pairs.join('\n  ')}`;
  }).join('\n\n');

  return `CSV Data (${rows.length} rows, ${header.length} columns)\n\nColumns: ${header.join(', ')}\n\n${formatted}`;
}

export function processHtml(content: string): string {
  return content
    // Remove scripts and styles
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '')
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '')
    // Convert common elements
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/p>/gi, '\n\n')
    .replace(/<\/div>/gi, '\n')
    .replace(/<\/h[1-6]>/gi, '\n\n')
    .replace(/<li>/gi, '• ')
    .replace(/<\/li>/gi, '\n')
    // Remove remaining tags
    .replace(/<[^>]+>/g, '')
    // Decode common entities
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&')
    // Clean up whitespace
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function processXml(content: string): string {
  const text = content
    .replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, '$1') // Unwrap CDATA
    .replace(/<[^>]+>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  return text ? `XML Document:\n\n${text}` : '';
}

export function processJson(content: string): string {
  try {
    return JSON.stringify(JSON.parse(content), null, 2);
  } catch {
    // Not valid JSON; index the raw text
    return content;
  }
}

// ============================================================================
// Binary Formats
// ============================================================================

async function extractPdf(content: Buffer): Promise<string> {
  const parser = new PDFParse({ data: content });
  try {
    const result = await parser.getText();
    return result.text;
  } finally {
    await parser.destroy();
  }
}

async function extractXlsx(content: Buffer): Promise<string> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(new Uint8Array(content).buffer);

  const sheets: string[] = [];
  workbook.eachSheet((sheet) => {
    const rows: string[] = [];
    sheet.eachRow((row) => {
      const cells: string[] = [];
      row.eachCell((cell) => {
        if (cell.text) cells.push(cell.text);
      });
      const line = cells.join('\t');
      if (line.trim()) rows.push(line);
    });
    if (rows.length > 0) {
      sheets.push(`Sheet: ${sheet.name}\n${rows.join('\n')}`);
    }
  });

  return sheets.join('\n\n');
}

async function extractDocx(content: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer: content });
  return result.value;
}

// ============================================================================
// Strategy Map
// ============================================================================

export function createDefaultExtractors(): Map<string, TextExtractor> {
  return new Map<string, TextExtractor>([
    [CONTENT_TYPES.pdf, extractPdf],
    [CONTENT_TYPES.xlsx, extractXlsx],
    [CONTENT_TYPES.docx, extractDocx],
    [CONTENT_TYPES.text, async (c) => decode(c)],
    [CONTENT_TYPES.markdown, async (c) => decode(c)],
    [CONTENT_TYPES.csv, async (c) => processCsv(decode(c))],
    [CONTENT_TYPES.html, async (c) => processHtml(decode(c))],
    [CONTENT_TYPES.xml, async (c) => processXml(decode(c))],
    [CONTENT_TYPES.json, async (c) => processJson(decode(c))],
  ]);
}

/**
 * Header prepended to every chunk so the file name and folder are part of the
 * indexed text, e.g. "[Document: Runbook.pdf | Folder: Ops/2026]\n".
 */
export function documentHeader(context: ChunkContext): string {
  let header = `[Document: ${context.name}`;
  if (context.folderPath) header += ` | Folder: ${context.folderPath}`;
  return `${header}]\n`;
}

export interface DocumentChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
  logger?: SyncLogger;
}

export class DocumentChunker implements ContentChunker {
  constructor(
    private readonly extractors: ReadonlyMap<string, TextExtractor>,
    private readonly options: DocumentChunkerOptions
  ) {}

  /** The registered content type for an item, trying the MIME type before the file extension. */
  resolveContentType(contentType: string, name: string): string | null {
    const normalized = normalizeContentType(contentType);
    if (this.extractors.has(normalized)) return normalized;

    const byExtension = EXTENSION_TYPES[path.extname(name).toLowerCase()];
    if (byExtension && this.extractors.has(byExtension)) return byExtension;

    return null;
  }

  async chunk(content: Buffer, contentType: string, context: ChunkContext): Promise<string[]> {
    const resolved = this.resolveContentType(contentType, context.name);
    const extractor = resolved ? this.extractors.get(resolved) : undefined;
    if (!extractor) {
      this.options.logger?.('DEBUG', `Skipping ${context.name}: unsupported content type "${contentType}"`);
      return [];
    }

    let text: string;
    try {
      text = await extractor(content);
    } catch (error) {
      throw new ChunkingError(`Failed to parse '${context.name}': ${errorMessage(error)}`, { cause: error });
    }

    if (!text.trim()) return [];

    const header = documentHeader(context);
    const pieces = splitText(text, {
      chunkSize: this.options.chunkSize,
      chunkOverlap: this.options.chunkOverlap,
    });
    return pieces.map((piece) => header + piece);
  }
}

export function createDefaultChunker(options: DocumentChunkerOptions): DocumentChunker {
  return new DocumentChunker(createDefaultExtractors(), options);
}
