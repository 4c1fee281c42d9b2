/**
 * Filesystem helpers shared by the scheduler and the metadata store
 */

import fs from 'fs/promises';
import path from 'path';
import { randomBytes } from 'crypto';
import { errorCode, IoError, toError, UnsafePathError } from './errors.js';
import { Logger, silentLogger } from './logger.js';

const TEMP_SUFFIX = '.github-dl-tmp';

/**
 * Ensure path is safe (no directory traversal)
 */
export function sanitizePath(basePath: string, relativePath: string): string {
  const root = path.resolve(basePath);
  const fullPath = path.resolve(root, relativePath);
  if (fullPath === root || !fullPath.startsWith(root + path.sep)) {
    throw new UnsafePathError(relativePath);
  }
  return fullPath;
}

/**
 * Create a directory and its parents; an existing directory is not an error
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (error: unknown) {
    throw IoError.from(error, 'create directory', dirPath);
  }
}

/**
 * Write to a temporary sibling, then rename over the destination
 */
export async function writeFileAtomic(
  filePath: string,
  data: Uint8Array | string,
  log: Logger = silentLogger
): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${randomBytes(6).toString('hex')}${TEMP_SUFFIX}`);

  try {
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, filePath);
  } catch (error: unknown) {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (cleanupError: unknown) {
      log.warn(`Could not remove temporary file ${tempPath}: ${toError(cleanupError).message}`);
    }
    throw IoError.from(error, 'write', filePath);
  }
}

/**
 * True when the directory is missing or has no entries
 */
export async function isEmptyDir(dirPath: string): Promise<boolean> {
  try {
    const entries = await fs.readdir(dirPath);
    return entries.length === 0;
  } catch (error: unknown) {
    if (errorCode(error) === 'ENOENT') {
      return true;
    }
    throw IoError.from(error, 'read directory', dirPath);
  }
}
