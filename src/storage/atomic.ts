/**
 * Atomic File Operations for Storage Layer
 *
 * Temp file + rename, so a crash mid-write never leaves a truncated file.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Write text to a file atomically, creating parent directories.
 *
 * @throws Error naming the target path if the write fails
 */
export async function atomicWriteFile(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp.${Date.now()}`;

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, { cause: error });
  }
}
