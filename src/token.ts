/**
 * Token module - finds the GitHub token in the environment or a .env file
 */

import fs from 'fs/promises';
import path from 'path';
import { parse } from 'dotenv';
import { errorCode, IoError } from './errors.js';

export const TOKEN_KEY = 'GITHUB_TOKEN';

/**
 * Find the nearest .env file, starting in `startDir` and walking up to the filesystem root
 */
export async function findEnvFile(startDir: string): Promise<string | null> {
  let dir = path.resolve(startDir);

  while (true) {
    const candidate = path.join(dir, '.env');
    try {
      const stats = await fs.stat(candidate);
      if (stats.isFile()) {
        return candidate;
      }
    } catch (error: unknown) {
      const code = errorCode(error);
      if (code !== 'ENOENT' && code !== 'ENOTDIR') {
        throw IoError.from(error, 'inspect', candidate);
      }
    }

    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Resolve the bearer token once per invocation.
 * A value already in the environment wins over the .env file, as dotenv does when loading.
 */
export async function discoverToken(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): Promise<string | undefined> {
  const fromEnv = env[TOKEN_KEY]?.trim();
  if (fromEnv) {
    return fromEnv;
  }

  const envFile = await findEnvFile(cwd);
  if (!envFile) {
    return undefined;
  }

  let content: string;
  try {
    content = await fs.readFile(envFile, 'utf-8');
  } catch (error: unknown) {
    throw IoError.from(error, 'read', envFile);
  }

  const token = parse(content)[TOKEN_KEY]?.trim();
  return token ? token : undefined;
}
