import { describe, expect, it } from 'vitest';

import { splitText } from './splitter.js';

describe('splitText', () => {
  it('packs words up to the chunk size', () => {
    expect(splitText('aaa bbb ccc ddd', { chunkSize: 7, chunkOverlap: 0 })).toEqual(['aaa bbb', 'ccc ddd']);
  });

  it('carries trailing context into the next chunk', () => {
    expect(splitText('aaa bbb ccc ddd', { chunkSize: 7, chunkOverlap: 3 })).toEqual([
      'aaa bbb',
      'bbb ccc',
      'ccc ddd',
    ]);
  });

  it('keeps paragraphs together when they fit', () => {
    const text = 'para one\n\npara two';
    expect(splitText(text, { chunkSize: 100, chunkOverlap: 10 })).toEqual([text]);
  });

  it('falls back to characters for text without separators', () => {
    expect(splitText('abcdefghij', { chunkSize: 4, chunkOverlap: 0 })).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('splits oversized pieces with the finer separators', () => {
    expect(splitText('aa bb\n\ncccccccccc', { chunkSize: 6, chunkOverlap: 0 })).toEqual([
      'aa bb',
      'cccccc',
      'cccc',
    ]);
  });

  it('returns nothing for empty text', () => {
    expect(splitText('', { chunkSize: 10, chunkOverlap: 0 })).toEqual([]);
  });

  it('is deterministic', () => {
    const text = 'The quick brown fox jumps over the lazy dog.\n'.repeat(40);
    const options = { chunkSize: 120, chunkOverlap: 30 };
    expect(splitText(text, options)).toEqual(splitText(text, options));
  });

  it('never emits a chunk longer than the chunk size for word-separated text', () => {
    const text = Array.from({ length: 200 }, (_, i) => `word${i}`).join(' ');
    const chunks = splitText(text, { chunkSize: 50, chunkOverlap: 10 });
    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.length).toBeLessThanOrEqual(50);
    }
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => splitText('abc', { chunkSize: 5, chunkOverlap: 5 })).toThrow(
      'chunkOverlap (5) must be smaller than chunkSize (5)'
    );
  });
});
