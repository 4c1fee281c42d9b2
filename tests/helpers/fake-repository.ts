/**
 * In-memory stand-in for the GitHub API used by the pipeline tests
 */

import fs from 'fs/promises';
import path from 'path';
import { ApiError } from '../../src/errors.js';
import { METADATA_FILE } from '../../src/metadata.js';
import type { ContentSource, DefaultBranchLookup, GitHubContentItem, RepoCoordinate } from '../../src/types.js';

export function blobSha(repoPath: string, content: string): string {
  return `blob:${repoPath}:${content.length}:${content.slice(0, 16)}`;
}

export class FakeRepository implements ContentSource, DefaultBranchLookup {
  readonly listCalls: string[] = [];
  readonly blobCalls: string[] = [];
  /** Repo paths whose blob fetch fails with HTTP 500 */
  readonly failingFiles = new Set<string>();
  maxInFlight = 0;
  delayMs = 0;

  private inFlight = 0;
  private files = new Map<string, string>();
  private blobs = new Map<string, string>();

  constructor(files: Record<string, string>, readonly defaultBranch = 'main') {
    this.setFiles(files);
  }

  setFiles(files: Record<string, string>): void {
    this.files = new Map(Object.entries(files));
    this.blobs = new Map();
    for (const [repoPath, content] of this.files) {
      this.blobs.set(blobSha(repoPath, content), repoPath);
    }
  }

  async getDefaultBranch(): Promise<string> {
    return this.defaultBranch;
  }

  async listDirectory(coordinate: RepoCoordinate): Promise<GitHubContentItem[]> {
    this.listCalls.push(coordinate.path);
    const dir = coordinate.path;

    const single = this.files.get(dir);
    if (single !== undefined) {
      return [this.fileItem(dir, single)];
    }

    const prefix = dir ? `${dir}/` : '';
    const children = new Map<string, GitHubContentItem>();
    for (const [repoPath, content] of this.files) {
      if (!repoPath.startsWith(prefix)) continue;
      const [name, ...rest] = repoPath.slice(prefix.length).split('/');
      const childPath = prefix + name;
      if (rest.length === 0) {
        children.set(name, this.fileItem(childPath, content));
      } else if (!children.has(name)) {
        children.set(name, { name, path: childPath, type: 'dir', sha: `tree:${childPath}` });
      }
    }

    if (children.size === 0 && dir !== '') {
      throw new ApiError(`Not found while trying to list ${dir} (HTTP 404)`, 404);
    }
    return [...children.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  async fetchBlob(_coordinate: RepoCoordinate, contentRef: string): Promise<Buffer> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
      this.blobCalls.push(contentRef);
      const repoPath = this.blobs.get(contentRef);
      if (repoPath === undefined) {
        throw new ApiError(`Not found while trying to fetch blob ${contentRef} (HTTP 404)`, 404);
      }
      if (this.failingFiles.has(repoPath)) {
        throw new ApiError(`Failed to fetch blob ${contentRef}: HTTP 500`, 500);
      }
      return Buffer.from(this.files.get(repoPath) ?? '', 'utf-8');
    } finally {
      this.inFlight--;
    }
  }

  private fileItem(repoPath: string, content: string): GitHubContentItem {
    const name = repoPath.split('/').pop() ?? repoPath;
    return { name, path: repoPath, type: 'file', sha: blobSha(repoPath, content), size: content.length };
  }
}

/**
 * Every file under `dir`, relative to it, with its content. The sidecar is left out.
 */
export async function readTree(dir: string): Promise<Record<string, string>> {
  const result: Record<string, string> = {};

  const walk = async (current: string, relative: string): Promise<void> => {
    for (const dirent of await fs.readdir(current, { withFileTypes: true })) {
      const rel = relative ? `${relative}/${dirent.name}` : dirent.name;
      const full = path.join(current, dirent.name);
      if (dirent.isDirectory()) {
        await walk(full, rel);
      } else if (dirent.name !== METADATA_FILE) {
        result[rel] = await fs.readFile(full, 'utf-8');
      }
    }
  };

  await walk(dir, '');
  return result;
}
