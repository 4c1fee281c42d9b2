/**
 * Metadata module - the hidden sidecar that marks a folder as managed
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { errorCode, IoError, MetadataCorruptError } from './errors.js';
import { writeFileAtomic } from './files.js';
import type { FolderMetadata, RepoCoordinate } from './types.js';

export const METADATA_FILE = '.github-dl.json';
export const METADATA_VERSION = 1;

// Unknown keys are stripped, so sidecars written by newer versions still read
const sidecarSchema = z.object({
  version: z.number().int().positive().optional(),
  owner: z.string().min(1),
  repo: z.string().min(1),
  ref: z.string().min(1),
  path: z.string(),
  url: z.string().optional(),
  lastRefreshed: z.string().datetime({ offset: true }),
});

export type Sidecar = z.infer<typeof sidecarSchema>;

export function metadataPath(directory: string): string {
  return path.join(directory, METADATA_FILE);
}

export function serializeMetadata(metadata: FolderMetadata): string {
  const { owner, repo, ref, path: repoPath } = metadata.coordinate;
  const sidecar: Sidecar = {
    version: METADATA_VERSION,
    owner,
    repo,
    ref,
    path: repoPath,
    ...(metadata.sourceUrl ? { url: metadata.sourceUrl } : {}),
    lastRefreshed: metadata.lastRefreshed.toISOString(),
  };
  return JSON.stringify(sidecar, null, 2) + '\n';
}

export function parseMetadata(content: string, filePath: string): FolderMetadata {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error: unknown) {
    throw new MetadataCorruptError(filePath, `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = sidecarSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `"${issue.path.join('.')}": ` : '';
    throw new MetadataCorruptError(filePath, `Unexpected shape: ${where}${issue?.message ?? 'invalid value'}`);
  }

  const { owner, repo, ref, url, lastRefreshed } = parsed.data;
  const coordinate: RepoCoordinate = Object.freeze({
    owner,
    repo,
    ref,
    path: parsed.data.path.replace(/^\/+|\/+$/g, ''),
  });

  return {
    coordinate,
    lastRefreshed: new Date(lastRefreshed),
    ...(url ? { sourceUrl: url } : {}),
  };
}

/**
 * Write the sidecar for `directory`, replacing any existing one
 */
export async function writeMetadata(
  directory: string,
  coordinate: RepoCoordinate,
  timestamp: Date,
  sourceUrl?: string
): Promise<void> {
  const content = serializeMetadata({ coordinate, lastRefreshed: timestamp, sourceUrl });
  await writeFileAtomic(metadataPath(directory), content);
}

/**
 * Read the sidecar for `directory`; null when the folder is not managed
 */
export async function readMetadata(directory: string): Promise<FolderMetadata | null> {
  const filePath = metadataPath(directory);
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (errorCode(error) === 'ENOENT') {
      return null;
    }
    throw IoError.from(error, 'read', filePath);
  }
  return parseMetadata(content, filePath);
}
