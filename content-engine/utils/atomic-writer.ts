/**
 * Atomic file writes
 * Content goes to a uniquely named temp file in the target's directory and
 * is renamed into place, so readers see either the old file or the new one.
 */

import { writeFile, rename, rm, mkdir } from 'fs/promises';
import { join, dirname, basename, extname } from 'path';
import { randomBytes } from 'crypto';

export interface AtomicWriteResult {
  filePath: string;
  size: number;
}

export async function writeFileAtomic(targetPath: string, content: string | Uint8Array): Promise<AtomicWriteResult> {
  const tempPath = await generateTempPath(targetPath);

  try {
    await writeFile(tempPath, content);
    await rename(tempPath, targetPath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }

  return {
    filePath: targetPath,
    size: typeof content === 'string' ? Buffer.byteLength(content) : content.byteLength
  };
}

/**
 * Temp name beside the target: same directory keeps `rename` atomic.
 */
export async function generateTempPath(targetPath: string): Promise<string> {
  const ext = extname(targetPath);
  const baseName = basename(targetPath, ext);
  const dirPath = dirname(targetPath);

  await mkdir(dirPath, { recursive: true });

  const randomSuffix = randomBytes(8).toString('hex');
  return join(dirPath, `${baseName}.${randomSuffix}.tmp${ext}`);
}
