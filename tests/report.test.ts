/**
 * Tests for CLI report formatting
 */

import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { ApiError } from '../src/errors.js';
import {
  describeOutcome,
  exitCodeFor,
  formatError,
  formatRefreshReport,
  formatSyncReport,
  summarizeRefresh
} from '../src/report.js';
import type { RepoCoordinate, SyncReport } from '../src/types.js';

beforeAll(() => {
  chalk.level = 0;
});

const coordinate: RepoCoordinate = { owner: 'octo', repo: 'demo', ref: 'main', path: 'docs' };

const succeeded: SyncReport = { status: 'succeeded', coordinate, destination: '/work/docs', written: 4, total: 4 };
const partial: SyncReport = {
  status: 'partial',
  coordinate,
  destination: '/work/docs',
  written: 3,
  total: 4,
  failures: [{ relativePath: 'guide/setup.md', error: new ApiError('Failed to fetch blob: HTTP 500\nretry later', 500) }]
};
const failed: SyncReport = {
  status: 'failed',
  destination: '/work/other',
  error: new Error('Invalid GitHub URL: "x"\n\nHost "x" is not github.com.')
};

describe('describeOutcome', () => {
  it('should distinguish the three outcomes', () => {
    expect(describeOutcome(succeeded)).toBe('fully succeeded');
    expect(describeOutcome(partial)).toBe('partially succeeded (1 of 4 files failed)');
    expect(describeOutcome(failed)).toBe('failed to start');
  });
});

describe('formatSyncReport', () => {
  it('should format a success on one line', () => {
    expect(formatSyncReport(succeeded)).toBe('✔ octo/demo@main:docs → /work/docs (4 files, fully succeeded)');
  });

  it('should list failed files with the first line of each error', () => {
    expect(formatSyncReport(partial)).toBe(
      '⚠ octo/demo@main:docs → /work/docs: partially succeeded (1 of 4 files failed)\n' +
      '   • guide/setup.md: Failed to fetch blob: HTTP 500'
    );
  });

  it('should fall back to the destination when no coordinate is known', () => {
    expect(formatSyncReport(failed)).toBe(
      '✖ /work/other → /work/other: failed to start\n' +
      '   Invalid GitHub URL: "x"\n' +
      '   Host "x" is not github.com.'
    );
  });

  it('should truncate long failure lists', () => {
    const many: SyncReport = {
      ...succeeded,
      status: 'partial',
      written: 0,
      total: 12,
      failures: Array.from({ length: 12 }, (_, i) => ({ relativePath: `f${i}.md`, error: new Error('boom') }))
    };

    const lines = formatSyncReport(many).split('\n');

    expect(lines).toHaveLength(12);
    expect(lines[11]).toBe('   ... and 2 more');
  });
});

describe('formatRefreshReport', () => {
  it('should summarize every folder', () => {
    const report = { baseDir: '/work', folders: [succeeded, partial, failed] };

    expect(summarizeRefresh(report)).toBe('3 folders: 1 succeeded, 1 partial, 1 failed');
    expect(formatRefreshReport(report).split('\n').pop()).toBe('3 folders: 1 succeeded, 1 partial, 1 failed');
  });

  it('should say when nothing was found', () => {
    expect(formatRefreshReport({ baseDir: '/work', folders: [] })).toBe('No downloaded folders found in /work');
  });
});

describe('formatError', () => {
  it('should mark the first line and indent the rest', () => {
    expect(formatError(new Error('Something broke\nDetails here'))).toBe('✖ Something broke\n  Details here');
  });
});

describe('exitCodeFor', () => {
  it('should be zero only when every unit succeeded', () => {
    expect(exitCodeFor([])).toBe(0);
    expect(exitCodeFor([succeeded])).toBe(0);
    expect(exitCodeFor([succeeded, partial])).toBe(1);
    expect(exitCodeFor([failed])).toBe(1);
  });
});
