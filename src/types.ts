/**
 * Type definitions for github-dl
 */

export interface RepoCoordinate {
  readonly owner: string;
  readonly repo: string;
  readonly ref: string;
  /** Path inside the repository, '' for the root. No leading or trailing slash. */
  readonly path: string;
}

export interface ParsedGitHubUrl {
  owner: string;
  repo: string;
  /** Undefined when the URL names no ref and the default branch must be looked up */
  ref?: string;
  path: string;
}

export type EntryKind = 'file' | 'directory';

export interface TreeEntry {
  /** POSIX path relative to the coordinate path that was listed */
  relativePath: string;
  kind: EntryKind;
  /** Git object SHA: the blob for files, the tree for directories */
  contentRef: string;
}

export interface DownloadTask {
  entry: TreeEntry;
  destinationPath: string;
}

export interface FolderMetadata {
  coordinate: RepoCoordinate;
  lastRefreshed: Date;
  sourceUrl?: string;
}

/**
 * One item of a GitHub contents listing, as returned by the API
 */
export interface GitHubContentItem {
  name: string;
  path: string;
  type: string;
  sha: string;
  size?: number;
  download_url?: string | null;
}

/**
 * Everything the tree lister and the scheduler need from the remote side
 */
export interface ContentSource {
  listDirectory(coordinate: RepoCoordinate): Promise<GitHubContentItem[]>;
  fetchBlob(coordinate: RepoCoordinate, contentRef: string): Promise<Buffer>;
}

export interface DefaultBranchLookup {
  getDefaultBranch(owner: string, repo: string): Promise<string>;
}

export type ProgressCallback = (current: number, total: number, file: string) => void;

export interface FileFailure {
  relativePath: string;
  error: Error;
}

export interface MaterializeResult {
  total: number;
  written: number;
  failures: FileFailure[];
}

export type SyncReport =
  | { status: 'succeeded'; coordinate: RepoCoordinate; destination: string; written: number; total: number }
  | { status: 'partial'; coordinate: RepoCoordinate; destination: string; written: number; total: number; failures: FileFailure[] }
  | { status: 'failed'; destination: string; coordinate?: RepoCoordinate; error: Error };

export interface RefreshReport {
  baseDir: string;
  folders: SyncReport[];
}

export interface DownloadCommandOptions {
  output: string;
  concurrency?: string;
  force?: boolean;
}

export interface RefreshCommandOptions {
  baseDir: string;
  concurrency?: string;
}
