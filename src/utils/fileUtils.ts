import { promises as fs } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { getErrorCode } from '../types/errors.js';

/**
 * File utilities for atomic operations and safe file handling
 */

export function isNotFound(error: unknown): boolean {
  return getErrorCode(error) === 'ENOENT';
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Write data to a file atomically: stage in a temp file next to the target,
 * then rename over it. Readers see the old or the new content, never a mix.
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  const tempPath = `${filePath}.${uuidv4()}.tmp`;

  try {
    await fs.writeFile(tempPath, data, 'utf8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await removeFileSafe(tempPath).catch(() => undefined);
    throw error;
  }
}

/**
 * Read a file safely, returning null if it doesn't exist
 */
export async function readFileSafe(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Check that a path exists and is a directory
 */
export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dirPath);
    return stats.isDirectory();
  } catch (error) {
    if (isNotFound(error) || getErrorCode(error) === 'ENOTDIR') {
      return false;
    }
    throw error;
  }
}

/**
 * List the names of sub-directories, sorted. Missing directory yields [].
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name)
      .sort();
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }
}

/**
 * Remove a file safely (no error if it doesn't exist)
 */
export async function removeFileSafe(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
  }
}

/**
 * Return the last `count` lines of a text. A trailing newline does not count
 * as an extra empty line; an unterminated last line does count.
 */
export function tailLines(text: string, count: number): string {
  if (count <= 0 || text.length === 0) {
    return '';
  }
  const body = text.endsWith('\n') ? text.slice(0, -1) : text;
  const lines = body.split('\n');
  return lines.slice(-count).join('\n');
}
