/**
 * Refresh module - finds managed folders under a base directory and re-syncs each one
 */

import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { IoError, toError } from './errors.js';
import { syncFolder } from './downloader.js';
import type { SyncDependencies } from './downloader.js';
import { silentLogger } from './logger.js';
import { METADATA_FILE, readMetadata } from './metadata.js';
import { coordinateUrl, formatCoordinate } from './resolver.js';
import type { FolderMetadata, RefreshReport, SyncReport } from './types.js';

const SKIPPED_DIRECTORIES = new Set(['.git', 'node_modules']);

export interface RefreshDependencies extends SyncDependencies {
  /** Called before each folder is refreshed */
  onFolder?: (directory: string, index: number, total: number) => void;
}

/**
 * Recursively collect directories that hold a sidecar file, in sorted order.
 * Symlinked directories are not followed.
 */
export async function scanManagedFolders(baseDir: string): Promise<string[]> {
  const found: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    let dirents: Dirent[];
    try {
      dirents = await fs.readdir(dir, { withFileTypes: true });
    } catch (error: unknown) {
      throw IoError.from(error, 'read directory', dir);
    }

    dirents.sort((a, b) => a.name.localeCompare(b.name));
    if (dirents.some(dirent => dirent.isFile() && dirent.name === METADATA_FILE)) {
      found.push(dir);
    }

    for (const dirent of dirents) {
      if (dirent.isDirectory() && !SKIPPED_DIRECTORIES.has(dirent.name)) {
        await walk(path.join(dir, dirent.name));
      }
    }
  };

  await walk(path.resolve(baseDir));
  return found;
}

/**
 * Refresh one managed folder from the coordinate in its sidecar
 */
export async function refreshFolder(directory: string, deps: SyncDependencies): Promise<SyncReport> {
  const log = deps.logger ?? silentLogger;

  let metadata: FolderMetadata | null;
  try {
    metadata = await readMetadata(directory);
  } catch (error: unknown) {
    return { status: 'failed', destination: directory, error: toError(error) };
  }
  if (metadata === null) {
    return {
      status: 'failed',
      destination: directory,
      error: new Error(`${METADATA_FILE} disappeared from ${directory}`),
    };
  }

  log.debug(`Refreshing ${formatCoordinate(metadata.coordinate)} in ${directory}`);
  return syncFolder(metadata.coordinate, directory, deps, metadata.sourceUrl ?? coordinateUrl(metadata.coordinate));
}

/**
 * Refresh every managed folder under `baseDir`. Each folder is an independent unit:
 * one failing does not stop the others.
 */
export async function refreshAll(baseDir: string, deps: RefreshDependencies): Promise<RefreshReport> {
  const root = path.resolve(baseDir);
  const directories = await scanManagedFolders(root);
  const folders: SyncReport[] = [];

  for (const [index, directory] of directories.entries()) {
    deps.onFolder?.(directory, index, directories.length);
    folders.push(await refreshFolder(directory, deps));
  }

  return { baseDir: root, folders };
}
