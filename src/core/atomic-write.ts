/**
 * Atomic file replacement: write a sibling temp file, then rename over the
 * target. Readers see either the old file or the new one, never a partial write.
 */

import { mkdir, rename, unlink, writeFile } from 'fs/promises';
import path from 'path';

let tmpCounter = 0;

export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });

  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.${tmpCounter++}.tmp`;
  try {
    await writeFile(tmpPath, data, 'utf-8');
    await rename(tmpPath, filePath);
  } catch (error) {
    await unlink(tmpPath).catch(() => undefined);
    throw error;
  }
}
