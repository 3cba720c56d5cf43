/**
 * File Operations
 */

import {
  mkdir,
  stat,
  rm,
  statfs,
  copyFile as fsCopyFile,
} from 'node:fs/promises';
import { dirname } from 'node:path';
import { logger } from './logger.js';
import { errorMessage, isObject } from './guards.js';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Get file size in bytes
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  const stats = await stat(filePath);
  return stats.size;
}

/**
 * Bytes available to unprivileged users on the filesystem holding `path`
 */
export async function getFreeDiskBytes(path: string): Promise<number> {
  const stats = await statfs(path);
  return stats.bavail * stats.bsize;
}

/**
 * Check whether a path exists
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isObject(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Copy a file to a new location
 */
export async function copyFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  await fsCopyFile(source, destination);
}

/**
 * Remove a file or directory tree. Failures are logged, not thrown.
 */
export async function removePath(path: string): Promise<boolean> {
  try {
    await rm(path, { recursive: true, force: true });
    return true;
  } catch (error) {
    logger.warn({ path, error: errorMessage(error) }, 'Failed to remove path');
    return false;
  }
}
