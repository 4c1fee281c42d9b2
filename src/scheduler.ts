/**
 * Scheduler module - materializes a manifest on disk with bounded parallel downloads
 */

import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import pMap from 'p-map';
import { assertConcurrency, DEFAULT_CONCURRENCY } from './config.js';
import { errorCode, IoError, toError } from './errors.js';
import { ensureDir, sanitizePath, writeFileAtomic } from './files.js';
import { Logger, silentLogger } from './logger.js';
import { METADATA_FILE } from './metadata.js';
import type { DownloadTask, FileFailure, MaterializeResult, ProgressCallback, TreeEntry } from './types.js';

export interface MaterializeOptions {
  fetchBlob: (contentRef: string) => Promise<Uint8Array>;
  concurrency?: number;
  onProgress?: ProgressCallback;
  logger?: Logger;
  /**
   * Remove a local entry whose kind differs from the manifest's (a file where a
   * directory is listed, or the reverse) instead of failing on it
   */
  replaceConflicts?: boolean;
}

function parentOf(relativePath: string): string {
  const parent = path.posix.dirname(relativePath);
  return parent === '.' ? '' : parent;
}

function depth(relativePath: string): number {
  return relativePath.split('/').length;
}

/**
 * The entry's directory and all of its ancestors, nearest first, excluding the root
 */
function ancestors(relativePath: string): string[] {
  const result: string[] = [];
  for (let dir = parentOf(relativePath); dir !== ''; dir = parentOf(dir)) {
    result.push(dir);
  }
  return result;
}

async function isDirectoryOnDisk(fullPath: string): Promise<boolean | null> {
  try {
    const stats = await fs.lstat(fullPath);
    return stats.isDirectory();
  } catch (error: unknown) {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return null;
    }
    throw IoError.from(error, 'inspect', fullPath);
  }
}

async function removeEntry(fullPath: string): Promise<void> {
  try {
    await fs.rm(fullPath, { recursive: true, force: true });
  } catch (error: unknown) {
    throw IoError.from(error, 'remove', fullPath);
  }
}

/**
 * Write every entry of the manifest under `destinationRoot`.
 *
 * Directories are created in depth order before any file task is submitted, so a
 * file's parent always exists before its write. At most `concurrency` file tasks run
 * at once; a failing task is recorded and the rest still run.
 */
export async function materialize(
  entries: TreeEntry[],
  destinationRoot: string,
  options: MaterializeOptions
): Promise<MaterializeResult> {
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  assertConcurrency(concurrency);
  const log = options.logger ?? silentLogger;
  const root = path.resolve(destinationRoot);

  await ensureDir(root);

  const files = entries.filter(entry => entry.kind === 'file');
  const directories = new Set<string>();
  for (const entry of entries) {
    if (entry.kind === 'directory') {
      directories.add(entry.relativePath);
    }
    for (const dir of ancestors(entry.relativePath)) {
      directories.add(dir);
    }
  }

  const failures: FileFailure[] = [];
  const failedDirs = new Map<string, Error>();

  for (const dir of [...directories].sort((a, b) => depth(a) - depth(b) || a.localeCompare(b))) {
    const failedAncestor = ancestors(dir).find(ancestor => failedDirs.has(ancestor));
    if (failedAncestor !== undefined) {
      failedDirs.set(dir, failedDirs.get(failedAncestor) ?? new Error(`Parent directory ${failedAncestor} failed`));
      continue;
    }
    try {
      const target = sanitizePath(root, dir);
      if (options.replaceConflicts && (await isDirectoryOnDisk(target)) === false) {
        log.debug(`Replacing file ${dir} with a directory`);
        await removeEntry(target);
      }
      await ensureDir(target);
    } catch (error: unknown) {
      const failure = error instanceof Error ? error : IoError.from(error, 'create directory', dir);
      failedDirs.set(dir, failure);
      log.warn(`Could not create directory ${dir}: ${failure.message}`);
    }
  }

  // Empty directories that failed have no file to carry the error
  for (const [dir, error] of failedDirs) {
    const hasFiles = files.some(file => file.relativePath.startsWith(dir + '/'));
    if (!hasFiles) {
      failures.push({ relativePath: dir, error });
    }
  }

  const tasks: DownloadTask[] = [];
  for (const entry of files) {
    const blockedBy = ancestors(entry.relativePath).find(dir => failedDirs.has(dir));
    if (blockedBy !== undefined) {
      failures.push({
        relativePath: entry.relativePath,
        error: failedDirs.get(blockedBy) ?? new Error(`Directory ${blockedBy} could not be created`),
      });
      continue;
    }
    try {
      tasks.push({ entry, destinationPath: sanitizePath(root, entry.relativePath) });
    } catch (error: unknown) {
      failures.push({ relativePath: entry.relativePath, error: error instanceof Error ? error : new Error(String(error)) });
    }
  }

  let written = 0;
  await pMap(tasks, async task => {
    try {
      const bytes = await options.fetchBlob(task.entry.contentRef);
      if (options.replaceConflicts && (await isDirectoryOnDisk(task.destinationPath)) === true) {
        log.debug(`Replacing directory ${task.entry.relativePath} with a file`);
        await removeEntry(task.destinationPath);
      }
      await writeFileAtomic(task.destinationPath, bytes, log);
      written++;
      options.onProgress?.(written, files.length, task.entry.relativePath);
    } catch (error: unknown) {
      const failure = toError(error);
      log.debug(`Failed to download ${task.entry.relativePath}: ${failure.message}`);
      failures.push({ relativePath: task.entry.relativePath, error: failure });
    }
  }, { concurrency });

  failures.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
  return { total: files.length, written, failures };
}

async function containsMetadata(dirPath: string): Promise<boolean> {
  const sidecar = path.join(dirPath, METADATA_FILE);
  try {
    const stats = await fs.stat(sidecar);
    return stats.isFile();
  } catch (error: unknown) {
    if (errorCode(error) === 'ENOENT') {
      return false;
    }
    throw IoError.from(error, 'inspect', sidecar);
  }
}

/**
 * Remove local files and directories under `destinationRoot` that the manifest does not name.
 * Sidecar files and nested managed folders are kept. Call only once every write of the run
 * has settled: any temp file still present was left behind by an interrupted run.
 * Returns the removed relative paths, sorted.
 */
export async function pruneStale(destinationRoot: string, entries: TreeEntry[]): Promise<string[]> {
  const root = path.resolve(destinationRoot);
  const keepFiles = new Set(entries.filter(e => e.kind === 'file').map(e => e.relativePath));
  const keepDirs = new Set<string>();
  for (const entry of entries) {
    if (entry.kind === 'directory') keepDirs.add(entry.relativePath);
    for (const dir of ancestors(entry.relativePath)) keepDirs.add(dir);
  }

  const removed: string[] = [];

  const prune = async (absDir: string, relDir: string): Promise<void> => {
    let dirents: Dirent[];
    try {
      dirents = await fs.readdir(absDir, { withFileTypes: true });
    } catch (error: unknown) {
      throw IoError.from(error, 'read directory', absDir);
    }

    for (const dirent of dirents) {
      const relativePath = relDir ? `${relDir}/${dirent.name}` : dirent.name;
      const fullPath = path.join(absDir, dirent.name);

      if (dirent.isDirectory()) {
        if (keepDirs.has(relativePath)) {
          await prune(fullPath, relativePath);
          continue;
        }
        if (await containsMetadata(fullPath)) {
          continue;
        }
      } else if (dirent.name === METADATA_FILE || keepFiles.has(relativePath)) {
        continue;
      }

      try {
        await fs.rm(fullPath, { recursive: true, force: true });
      } catch (error: unknown) {
        throw IoError.from(error, 'remove', fullPath);
      }
      removed.push(relativePath);
    }
  };

  await prune(root, '');
  return removed.sort();
}
