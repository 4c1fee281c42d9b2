/**
 * Tests for the URL resolver
 */

import { describe, it, expect, vi } from 'vitest';
import { InvalidUrlError } from '../src/errors.js';
import { coordinateUrl, formatCoordinate, parseGitHubUrl, resolveCoordinate } from '../src/resolver.js';

describe('parseGitHubUrl', () => {
  it('should parse a tree URL with a nested path', () => {
    expect(parseGitHubUrl('https://github.com/rust-lang/book/tree/main/src/ch01-00-introduction')).toEqual({
      owner: 'rust-lang',
      repo: 'book',
      ref: 'main',
      path: 'src/ch01-00-introduction'
    });
  });

  it('should parse a tree URL without a path', () => {
    expect(parseGitHubUrl('https://github.com/owner/repo/tree/develop')).toEqual({
      owner: 'owner',
      repo: 'repo',
      ref: 'develop',
      path: ''
    });
  });

  it('should leave the ref undefined for a bare repository URL', () => {
    const result = parseGitHubUrl('https://github.com/owner/repo');
    expect(result).toEqual({ owner: 'owner', repo: 'repo', path: '' });
    expect(result.ref).toBeUndefined();
  });

  it('should handle URL without https', () => {
    expect(parseGitHubUrl('github.com/owner/repo/tree/v1.2.0/docs')).toEqual({
      owner: 'owner',
      repo: 'repo',
      ref: 'v1.2.0',
      path: 'docs'
    });
  });

  it('should handle trailing slash and .git suffix', () => {
    expect(parseGitHubUrl('https://github.com/owner/repo.git/')).toEqual({ owner: 'owner', repo: 'repo', path: '' });
    expect(parseGitHubUrl('https://www.github.com/owner/repo/tree/main/docs/')).toEqual({
      owner: 'owner',
      repo: 'repo',
      ref: 'main',
      path: 'docs'
    });
  });

  it('should decode percent-encoded path segments', () => {
    expect(parseGitHubUrl('https://github.com/owner/repo/tree/main/my%20docs/guide').path).toBe('my docs/guide');
  });

  it('should ignore query strings and fragments', () => {
    expect(parseGitHubUrl('https://github.com/owner/repo/tree/main/docs?tab=readme#intro').path).toBe('docs');
  });

  it('should throw InvalidUrlError for the wrong host', () => {
    expect(() => parseGitHubUrl('https://gitlab.com/owner/repo/tree/main')).toThrow(InvalidUrlError);
    expect(() => parseGitHubUrl('https://example.com/something')).toThrow('Invalid GitHub URL');
    expect(() => parseGitHubUrl('not-a-url')).toThrow(InvalidUrlError);
  });

  it('should throw InvalidUrlError when path segments are missing', () => {
    expect(() => parseGitHubUrl('https://github.com/owner')).toThrow(InvalidUrlError);
    expect(() => parseGitHubUrl('https://github.com/')).toThrow(InvalidUrlError);
    expect(() => parseGitHubUrl('https://github.com/owner/repo/tree')).toThrow(InvalidUrlError);
  });

  it('should reject URLs that do not point at a tree', () => {
    expect(() => parseGitHubUrl('https://github.com/owner/repo/blob/main/README.md')).toThrow(
      'Expected "tree" after the repository name, found "blob".'
    );
  });

  it('should reject non-http schemes', () => {
    expect(() => parseGitHubUrl('ftp://github.com/owner/repo')).toThrow(InvalidUrlError);
  });
});

describe('resolveCoordinate', () => {
  it('should use the ref from the URL without an API call', async () => {
    const lookup = { getDefaultBranch: vi.fn(async () => 'trunk') };

    const coordinate = await resolveCoordinate('https://github.com/owner/repo/tree/main/docs', lookup);

    expect(coordinate).toEqual({ owner: 'owner', repo: 'repo', ref: 'main', path: 'docs' });
    expect(lookup.getDefaultBranch).not.toHaveBeenCalled();
  });

  it('should look up the default branch when the URL names no ref', async () => {
    const lookup = { getDefaultBranch: vi.fn(async () => 'trunk') };

    const coordinate = await resolveCoordinate('https://github.com/owner/repo', lookup);

    expect(coordinate).toEqual({ owner: 'owner', repo: 'repo', ref: 'trunk', path: '' });
    expect(lookup.getDefaultBranch).toHaveBeenCalledWith('owner', 'repo');
  });

  it('should return a frozen coordinate', async () => {
    const coordinate = await resolveCoordinate('https://github.com/owner/repo/tree/main', {
      getDefaultBranch: async () => 'main'
    });
    expect(Object.isFrozen(coordinate)).toBe(true);
  });
});

describe('formatCoordinate', () => {
  it('should include the path only when present', () => {
    expect(formatCoordinate({ owner: 'o', repo: 'r', ref: 'main', path: '' })).toBe('o/r@main');
    expect(formatCoordinate({ owner: 'o', repo: 'r', ref: 'main', path: 'docs' })).toBe('o/r@main:docs');
  });

  it('should round-trip through coordinateUrl', () => {
    const coordinate = { owner: 'rust-lang', repo: 'book', ref: 'main', path: 'src/ch01-00-introduction' };
    expect(coordinateUrl(coordinate)).toBe('https://github.com/rust-lang/book/tree/main/src/ch01-00-introduction');
    expect(parseGitHubUrl(coordinateUrl(coordinate))).toEqual(coordinate);
  });
});
