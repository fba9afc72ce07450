/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import { mkdir, writeFile, readFile, rename, rm } from 'node:fs/promises';
import { randomBytes } from 'node:crypto';
import { dirname, basename, join } from 'node:path';

/**
 * Write a file atomically: the content goes to a sibling temp file which is
 * then renamed over the target, so readers never see a half-written file.
 */
export async function safeWriteFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });

  const tmpPath = join(dir, `.${basename(filePath)}.${randomBytes(6).toString('hex')}.tmp`);
  try {
    await writeFile(tmpPath, content, 'utf8');
    await rename(tmpPath, filePath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

/**
 * Safely read a file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}
