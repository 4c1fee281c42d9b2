/**
 * Downloader module - the list → materialize → record pipeline behind download and refresh
 */

import path from 'path';
import { OutputNotEmptyError, toError } from './errors.js';
import { isEmptyDir } from './files.js';
import { Logger, silentLogger } from './logger.js';
import { readMetadata, writeMetadata } from './metadata.js';
import { formatCoordinate, resolveCoordinate } from './resolver.js';
import { materialize, pruneStale } from './scheduler.js';
import { listTree } from './tree.js';
import type {
  ContentSource,
  DefaultBranchLookup,
  ProgressCallback,
  RepoCoordinate,
  SyncReport
} from './types.js';

export interface SyncDependencies {
  source: ContentSource;
  concurrency?: number;
  logger?: Logger;
  onProgress?: ProgressCallback;
  /** Called once the manifest is known, before any file is fetched */
  onListed?: (fileCount: number) => void;
  /**
   * Treat the destination as owned: replace entries whose kind changed upstream, and
   * remove entries missing upstream after a complete sync (default true)
   */
  prune?: boolean;
  now?: () => Date;
}

export interface DownloadDependencies extends SyncDependencies {
  source: ContentSource & DefaultBranchLookup;
  force?: boolean;
}

function sameCoordinate(a: RepoCoordinate, b: RepoCoordinate): boolean {
  return a.owner === b.owner && a.repo === b.repo && a.ref === b.ref && a.path === b.path;
}

/**
 * Mirror one coordinate into `destination` and record the sidecar.
 *
 * Listing errors mean the sync failed to start. File errors make it partial: the
 * files that did arrive stay on disk, and the sidecar is left as it was.
 */
export async function syncFolder(
  coordinate: RepoCoordinate,
  destination: string,
  deps: SyncDependencies,
  sourceUrl?: string
): Promise<SyncReport> {
  const log = deps.logger ?? silentLogger;
  const now = deps.now ?? (() => new Date());
  const root = path.resolve(destination);
  const prune = deps.prune ?? true;

  try {
    const entries = await listTree(deps.source, coordinate, { concurrency: deps.concurrency, logger: log });
    deps.onListed?.(entries.filter(entry => entry.kind === 'file').length);

    const result = await materialize(entries, root, {
      fetchBlob: contentRef => deps.source.fetchBlob(coordinate, contentRef),
      concurrency: deps.concurrency,
      onProgress: deps.onProgress,
      logger: log,
      replaceConflicts: prune,
    });

    if (result.failures.length > 0) {
      log.warn(`${result.failures.length} of ${result.total} files failed for ${formatCoordinate(coordinate)}`);
      return {
        status: 'partial',
        coordinate,
        destination: root,
        written: result.written,
        total: result.total,
        failures: result.failures,
      };
    }

    if (prune) {
      const removed = await pruneStale(root, entries);
      if (removed.length > 0) {
        log.debug(`Removed ${removed.length} stale entries from ${root}`, { removed });
      }
    }
    await writeMetadata(root, coordinate, now(), sourceUrl);

    return { status: 'succeeded', coordinate, destination: root, written: result.written, total: result.total };
  } catch (error: unknown) {
    return { status: 'failed', coordinate, destination: root, error: toError(error) };
  }
}

/**
 * Resolve a browsing URL and download the folder it names into `outputDir`.
 *
 * The output directory must be empty or already managed for the same coordinate,
 * unless `force` is set. Local files are only pruned in a directory this tool manages.
 */
export async function downloadFolder(url: string, outputDir: string, deps: DownloadDependencies): Promise<SyncReport> {
  const root = path.resolve(outputDir);

  let coordinate: RepoCoordinate;
  let prune = true;
  try {
    coordinate = await resolveCoordinate(url, deps.source);

    if (!(await isEmptyDir(root))) {
      const existing = await readMetadata(root);
      const managed = existing !== null && sameCoordinate(existing.coordinate, coordinate);
      if (!managed && !deps.force) {
        throw new OutputNotEmptyError(root);
      }
      prune = managed;
    }
  } catch (error: unknown) {
    return { status: 'failed', destination: root, error: toError(error) };
  }

  (deps.logger ?? silentLogger).debug(`Downloading ${formatCoordinate(coordinate)} to ${root}`);
  return syncFolder(coordinate, root, { ...deps, prune: (deps.prune ?? true) && prune }, url);
}
