/**
 * Tests for token discovery
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { discoverToken, findEnvFile } from '../src/token.js';

let testDir: string;

beforeEach(async () => {
  testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'github-dl-token-'));
});

afterEach(async () => {
  await fs.rm(testDir, { recursive: true, force: true });
});

describe('findEnvFile', () => {
  it('should find a .env file in an ancestor directory', async () => {
    const nested = path.join(testDir, 'a', 'b');
    await fs.mkdir(nested, { recursive: true });
    await fs.writeFile(path.join(testDir, '.env'), 'GITHUB_TOKEN=test-token\n');

    expect(await findEnvFile(nested)).toBe(path.join(testDir, '.env'));
  });

  it('should prefer the nearest .env file', async () => {
    const nested = path.join(testDir, 'a');
    await fs.mkdir(nested, { recursive: true });
    await fs.writeFile(path.join(testDir, '.env'), 'GITHUB_TOKEN=outer\n');
    await fs.writeFile(path.join(nested, '.env'), 'GITHUB_TOKEN=inner\n');

    expect(await findEnvFile(nested)).toBe(path.join(nested, '.env'));
  });

  it('should ignore a directory named .env', async () => {
    const nested = path.join(testDir, 'a');
    await fs.mkdir(path.join(nested, '.env'), { recursive: true });
    await fs.writeFile(path.join(testDir, '.env'), 'GITHUB_TOKEN=outer\n');

    expect(await findEnvFile(nested)).toBe(path.join(testDir, '.env'));
  });
});

describe('discoverToken', () => {
  it('should read the token from the environment first', async () => {
    await fs.writeFile(path.join(testDir, '.env'), 'GITHUB_TOKEN=from-file\n');

    expect(await discoverToken(testDir, { GITHUB_TOKEN: 'from-env' })).toBe('from-env');
  });

  it('should fall back to the .env file', async () => {
    await fs.writeFile(path.join(testDir, '.env'), '# comment\nOTHER=1\nGITHUB_TOKEN="test-token"\n');

    expect(await discoverToken(testDir, {})).toBe('test-token');
  });

  it('should treat an empty value as absent', async () => {
    await fs.writeFile(path.join(testDir, '.env'), 'GITHUB_TOKEN=\n');

    expect(await discoverToken(testDir, { GITHUB_TOKEN: '  ' })).toBeUndefined();
  });

  it('should return undefined when a .env file has no token', async () => {
    await fs.writeFile(path.join(testDir, '.env'), 'OTHER=1\n');

    expect(await discoverToken(testDir, {})).toBeUndefined();
  });
});
