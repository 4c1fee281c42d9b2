/**
 * Resolver module - turns a GitHub browsing URL into a repository coordinate
 */

import { InvalidUrlError } from './errors.js';
import type { DefaultBranchLookup, ParsedGitHubUrl, RepoCoordinate } from './types.js';

const GITHUB_HOSTS = new Set(['github.com', 'www.github.com']);

function decodeSegment(url: string, segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new InvalidUrlError(url, `Malformed escape sequence in "${segment}".`);
  }
}

/**
 * Parse a GitHub URL into owner, repo, optional ref and path.
 *
 * Accepts
 *   https://github.com/owner/repo
 *   https://github.com/owner/repo/tree/ref
 *   https://github.com/owner/repo/tree/ref/some/path
 * with or without the scheme, a trailing slash or a .git suffix.
 */
export function parseGitHubUrl(url: string): ParsedGitHubUrl {
  let cleanUrl = url.trim();
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(cleanUrl)) {
    cleanUrl = 'https://' + cleanUrl;
  }

  let parsed: URL;
  try {
    parsed = new URL(cleanUrl);
  } catch {
    throw new InvalidUrlError(url, 'The value is not a URL.');
  }

  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new InvalidUrlError(url, `Unsupported scheme "${parsed.protocol}".`);
  }
  if (!GITHUB_HOSTS.has(parsed.hostname.toLowerCase())) {
    throw new InvalidUrlError(url, `Host "${parsed.hostname}" is not github.com.`);
  }

  const segments = parsed.pathname
    .split('/')
    .filter(segment => segment.length > 0)
    .map(segment => decodeSegment(url, segment));

  if (segments.length < 2) {
    throw new InvalidUrlError(url, 'The URL must name both an owner and a repository.');
  }

  const [owner, rawRepo, marker, ref, ...rest] = segments;
  const repo = rawRepo.replace(/\.git$/, '');
  if (!repo) {
    throw new InvalidUrlError(url, 'The repository name is empty.');
  }

  if (segments.length === 2) {
    return { owner, repo, path: '' };
  }
  if (marker !== 'tree') {
    throw new InvalidUrlError(url, `Expected "tree" after the repository name, found "${marker}".`);
  }
  if (segments.length === 3) {
    throw new InvalidUrlError(url, 'A "tree" URL must name a branch, tag or commit.');
  }

  return { owner, repo, ref, path: rest.join('/') };
}

/**
 * Parse the URL and, when it names no ref, look up the repository's default branch
 */
export async function resolveCoordinate(url: string, lookup: DefaultBranchLookup): Promise<RepoCoordinate> {
  const { owner, repo, ref, path } = parseGitHubUrl(url);
  const resolvedRef = ref ?? await lookup.getDefaultBranch(owner, repo);
  return Object.freeze({ owner, repo, ref: resolvedRef, path });
}

export function formatCoordinate(coordinate: RepoCoordinate): string {
  const base = `${coordinate.owner}/${coordinate.repo}@${coordinate.ref}`;
  return coordinate.path ? `${base}:${coordinate.path}` : base;
}

/**
 * The browsing URL a coordinate came from
 */
export function coordinateUrl(coordinate: RepoCoordinate): string {
  const base = `https://github.com/${coordinate.owner}/${coordinate.repo}/tree/${coordinate.ref}`;
  return coordinate.path ? `${base}/${coordinate.path}` : base;
}
