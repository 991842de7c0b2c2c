/**
 * corpus-sync - Recursive Character Splitter
 *
 * Splits on the coarsest separator present ("\n\n", then "\n", then " ",
 * then single characters), packs pieces up to `chunkSize` characters and
 * carries up to `chunkOverlap` characters of trailing context into the
 * next chunk. Deterministic for identical input.
 */

export const DEFAULT_SEPARATORS = ['\n\n', '\n', ' ', ''];

export interface SplitOptions {
  chunkSize: number;
  chunkOverlap: number;
  separators?: string[];
}

export function splitText(text: string, options: SplitOptions): string[] {
  const { chunkSize, chunkOverlap } = options;
  if (chunkOverlap >= chunkSize) {
    throw new Error(`chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`);
  }
  return splitRecursive(text, options.separators ?? DEFAULT_SEPARATORS, chunkSize, chunkOverlap);
}

function splitRecursive(text: string, separators: string[], size: number, overlap: number): string[] {
  let separator = '';
  let remaining: string[] = [];
  for (let i = 0; i < separators.length; i++) {
    const candidate = separators[i];
    if (candidate === '' || text.includes(candidate)) {
      separator = candidate;
      remaining = separators.slice(i + 1);
      break;
    }
  }

  const pieces = (separator === '' ? Array.from(text) : text.split(separator)).filter((p) => p !== '');

  const out: string[] = [];
  let pending: string[] = [];
  for (const piece of pieces) {
    if (piece.length < size) {
      pending.push(piece);
      continue;
    }
    if (pending.length > 0) {
      out.push(...mergeSplits(pending, separator, size, overlap));
      pending = [];
    }
    if (remaining.length === 0) {
      out.push(piece);
    } else {
      out.push(...splitRecursive(piece, remaining, size, overlap));
    }
  }
  if (pending.length > 0) {
    out.push(...mergeSplits(pending, separator, size, overlap));
  }
  return out;
}

function mergeSplits(splits: string[], separator: string, size: number, overlap: number): string[] {
  const docs: string[] = [];
  const sepLen = separator.length;
  let current: string[] = [];
  let total = 0;

  const emit = () => {
    const doc = current.join(separator).trim();
    if (doc) docs.push(doc);
  };

  for (const split of splits) {
    const len = split.length;
    const joinCost = current.length > 0 ? sepLen : 0;

    if (total + len + joinCost > size && current.length > 0) {
      emit();
      // Drop from the front until only the overlap window remains
      while (total > overlap || (total > 0 && total + len + (current.length > 0 ? sepLen : 0) > size)) {
        total -= current[0].length + (current.length > 1 ? sepLen : 0);
        current.shift();
      }
    }

    current.push(split);
    total += len + (current.length > 1 ? sepLen : 0);
  }

  emit();
  return docs;
}
