/**
 * Tree module - recursively lists a repository subtree into a flat manifest
 */

import path from 'path';
import pMap from 'p-map';
import { assertConcurrency, DEFAULT_CONCURRENCY } from './config.js';
import { CycleError } from './errors.js';
import { Logger, silentLogger } from './logger.js';
import type { ContentSource, GitHubContentItem, RepoCoordinate, TreeEntry } from './types.js';

export interface ListTreeOptions {
  /** Directory listings allowed in flight at once */
  concurrency?: number;
  logger?: Logger;
}

function joinRepoPath(base: string, child: string): string {
  return base ? `${base}/${child}` : child;
}

/**
 * Path of `itemPath` below `rootPath`, or null when it is not strictly inside it
 */
function relativeTo(rootPath: string, itemPath: string): string | null {
  const relative = rootPath ? path.posix.relative(rootPath, itemPath) : itemPath;
  if (!relative || relative.startsWith('..') || path.posix.isAbsolute(relative)) {
    return null;
  }
  return relative;
}

/**
 * Walk the subtree at `coordinate.path` and return every file and directory under it.
 *
 * Directories are listed breadth-first, one level at a time, with at most `concurrency`
 * listings in flight, so deep trees do not grow the call stack. The returned manifest is
 * complete before it is returned; the first listing failure aborts the walk.
 */
export async function listTree(
  source: ContentSource,
  coordinate: RepoCoordinate,
  options: ListTreeOptions = {}
): Promise<TreeEntry[]> {
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  assertConcurrency(concurrency);
  const log = options.logger ?? silentLogger;
  const rootPath = coordinate.path.replace(/^\/+|\/+$/g, '');
  const entries = new Map<string, TreeEntry>();
  const visited = new Set<string>([rootPath]);

  const record = (entry: TreeEntry): void => {
    if (entries.has(entry.relativePath)) {
      throw new CycleError(joinRepoPath(rootPath, entry.relativePath), 'path reported more than once');
    }
    entries.set(entry.relativePath, entry);
  };

  let nextLevel: string[] = [];

  const visit = async (dirPath: string): Promise<void> => {
    const items = await source.listDirectory({ ...coordinate, path: dirPath });

    // Listing a file path returns the file itself
    if (dirPath === rootPath && items.length === 1 && items[0].type === 'file' && items[0].path === rootPath && rootPath) {
      record({ relativePath: path.posix.basename(rootPath), kind: 'file', contentRef: items[0].sha });
      return;
    }

    for (const item of items) {
      handleItem(dirPath, item);
    }
  };

  const handleItem = (dirPath: string, item: GitHubContentItem): void => {
    const itemPath = item.path.replace(/^\/+|\/+$/g, '');
    if (relativeTo(dirPath, itemPath) === null) {
      throw new CycleError(itemPath, `entry is not inside the listed directory "${dirPath}"`);
    }
    const relativePath = relativeTo(rootPath, itemPath);
    if (relativePath === null) {
      throw new CycleError(itemPath, `entry is outside "${rootPath}"`);
    }

    switch (item.type) {
      case 'file':
        record({ relativePath, kind: 'file', contentRef: item.sha });
        break;
      case 'dir':
        if (visited.has(itemPath)) {
          throw new CycleError(itemPath, 'directory was already visited');
        }
        visited.add(itemPath);
        record({ relativePath, kind: 'directory', contentRef: item.sha });
        nextLevel.push(itemPath);
        break;
      default:
        log.debug(`Skipping ${item.type} entry ${itemPath}`);
    }
  };

  let level = [rootPath];
  while (level.length > 0) {
    nextLevel = [];
    await pMap(level, visit, { concurrency });
    level = nextLevel;
  }

  log.debug(`Listed ${entries.size} entries under ${coordinate.owner}/${coordinate.repo}/${rootPath}`);
  return [...entries.values()];
}
