/**
 * GitHub module - REST client for directory listings, blobs and repository info
 */

import axios from 'axios';
import type { AxiosAdapter, AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { z } from 'zod';
import { DEFAULT_API_URL } from './config.js';
import { ApiError, RateLimitError } from './errors.js';
import { Logger, silentLogger } from './logger.js';
import type { ContentSource, DefaultBranchLookup, GitHubContentItem, RepoCoordinate } from './types.js';

const contentItemSchema = z.object({
  name: z.string(),
  path: z.string(),
  type: z.string(),
  sha: z.string(),
  size: z.number().optional(),
  download_url: z.string().nullable().optional(),
});

const contentListingSchema = z.union([z.array(contentItemSchema), contentItemSchema]);

const repositorySchema = z.object({
  default_branch: z.string().min(1),
});

export interface GitHubClientOptions {
  token?: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Longest rate-limit reset worth sleeping through; longer waits fail immediately */
  maxRateLimitWaitMs?: number;
  logger?: Logger;
  /** Replaces the HTTP transport, e.g. with an in-process fake */
  adapter?: AxiosAdapter;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

function headerValue(response: AxiosResponse, name: string): string | undefined {
  const value: unknown = response.headers[name.toLowerCase()];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

/**
 * Parse an RFC 8288 Link header into a rel → URL map
 */
export function parseLinkHeader(header: string | undefined): Record<string, string> {
  const links: Record<string, string> = {};
  if (!header) return links;

  for (const part of header.split(',')) {
    const match = part.match(/<([^>]+)>\s*;\s*rel="?([^";]+)"?/);
    if (match) {
      for (const rel of match[2].trim().split(/\s+/)) {
        links[rel] = match[1];
      }
    }
  }
  return links;
}

function encodePath(repoPath: string): string {
  return repoPath
    .split('/')
    .filter(segment => segment.length > 0)
    .map(encodeURIComponent)
    .join('/');
}

function toBuffer(data: unknown): Buffer | null {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (typeof data === 'string') return Buffer.from(data, 'utf-8');
  return null;
}

/**
 * GitHub puts a human-readable `message` in every error body
 */
function extractMessage(data: unknown): string | undefined {
  let body = data;
  const bytes = typeof data === 'string' ? null : toBuffer(data);
  const text = typeof data === 'string' ? data : bytes?.toString('utf-8');
  if (text !== undefined) {
    try {
      body = JSON.parse(text);
    } catch {
      return text.trim() || undefined;
    }
  }
  if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
    return body.message;
  }
  return undefined;
}

export class GitHubClient implements ContentSource, DefaultBranchLookup {
  private readonly http: AxiosInstance;
  private readonly maxRateLimitWaitMs: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: GitHubClientOptions = {}) {
    const headers: Record<string, string> = {
      'Accept': 'application/vnd.github+json',
      'User-Agent': 'github-dl',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (options.token) {
      headers['Authorization'] = `Bearer ${options.token}`;
    }

    this.http = axios.create({
      baseURL: options.baseUrl ?? DEFAULT_API_URL,
      headers,
      timeout: options.timeoutMs ?? 30000,
      adapter: options.adapter,
      // Status codes are mapped to errors here, not by axios
      validateStatus: () => true,
    });
    this.maxRateLimitWaitMs = options.maxRateLimitWaitMs ?? 15 * 60_000;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * List one directory, following pagination. A path that names a file yields that file alone.
   */
  async listDirectory(coordinate: RepoCoordinate): Promise<GitHubContentItem[]> {
    const { owner, repo, ref } = coordinate;
    const repoPath = encodePath(coordinate.path);
    const first = `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/contents${repoPath ? '/' + repoPath : ''}`;

    const items: GitHubContentItem[] = [];
    let url: string | undefined = first;
    let config: AxiosRequestConfig = { params: { ref, per_page: 100 } };
    const seen = new Set<string>();
    const label = `${owner}/${repo}${coordinate.path ? '/' + coordinate.path : ''}`;

    while (url !== undefined) {
      seen.add(url);
      const response = await this.request(url, config, `list ${label}`);
      const parsed = contentListingSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new ApiError(
          `Unexpected directory listing for ${label}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
          response.status
        );
      }
      if (Array.isArray(parsed.data)) {
        items.push(...parsed.data);
      } else {
        items.push(parsed.data);
      }

      const next: string | undefined = parseLinkHeader(headerValue(response, 'link'))['next'];
      // Continuation links already carry the query string
      url = next !== undefined && !seen.has(next) ? next : undefined;
      config = {};
    }

    return items;
  }

  /**
   * Fetch the raw bytes of a blob by its SHA
   */
  async fetchBlob(coordinate: RepoCoordinate, contentRef: string): Promise<Buffer> {
    const { owner, repo } = coordinate;
    const url = `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/git/blobs/${encodeURIComponent(contentRef)}`;
    const response = await this.request(
      url,
      {
        headers: { 'Accept': 'application/vnd.github.raw+json' },
        responseType: 'arraybuffer',
      },
      `fetch blob ${contentRef} from ${owner}/${repo}`
    );

    const bytes = toBuffer(response.data);
    if (bytes === null) {
      throw new ApiError(`Unexpected blob payload for ${contentRef} in ${owner}/${repo}`, response.status);
    }
    return bytes;
  }

  async getDefaultBranch(owner: string, repo: string): Promise<string> {
    const url = `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
    const response = await this.request(url, {}, `look up ${owner}/${repo}`);
    const parsed = repositorySchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ApiError(`Unexpected repository response for ${owner}/${repo}`, response.status);
    }
    return parsed.data.default_branch;
  }

  /**
   * GET with one retry after a rate-limit reset; any other non-2xx becomes an ApiError
   */
  private async request(url: string, config: AxiosRequestConfig, description: string): Promise<AxiosResponse> {
    let response = await this.send(url, config, description);

    if (this.isRateLimited(response)) {
      const waitMs = this.rateLimitWait(response);
      if (waitMs > this.maxRateLimitWaitMs) {
        throw new RateLimitError(response.status, this.resetTime(response));
      }
      this.logger.warn(`Rate limit hit while trying to ${description}; retrying in ${Math.ceil(waitMs / 1000)}s`);
      await this.sleep(waitMs);
      response = await this.send(url, config, description);
      if (this.isRateLimited(response)) {
        throw new RateLimitError(response.status, this.resetTime(response));
      }
    }

    if (response.status < 200 || response.status >= 300) {
      throw this.toApiError(response, description);
    }
    return response;
  }

  private async send(url: string, config: AxiosRequestConfig, description: string): Promise<AxiosResponse> {
    this.logger.debug(`GET ${url}`);
    try {
      return await this.http.get(url, config);
    } catch (error: unknown) {
      if (axios.isAxiosError(error)) {
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
          throw new ApiError(
            `Connection timeout while trying to ${description}\n\n` +
            `Please check your internet connection and try again.`,
            0,
            { cause: error }
          );
        }
        throw new ApiError(`Failed to ${description}: ${error.message}`, 0, { cause: error });
      }
      throw error;
    }
  }

  private isRateLimited(response: AxiosResponse): boolean {
    if (response.status !== 403 && response.status !== 429) {
      return false;
    }
    if (headerValue(response, 'retry-after') !== undefined) {
      return true;
    }
    return headerValue(response, 'x-ratelimit-remaining') === '0'
      && headerValue(response, 'x-ratelimit-reset') !== undefined;
  }

  private resetTime(response: AxiosResponse): Date | null {
    const retryAfter = Number(headerValue(response, 'retry-after'));
    if (Number.isFinite(retryAfter)) {
      return new Date(this.now() + retryAfter * 1000);
    }
    const reset = Number(headerValue(response, 'x-ratelimit-reset'));
    return Number.isFinite(reset) ? new Date(reset * 1000) : null;
  }

  private rateLimitWait(response: AxiosResponse): number {
    const reset = this.resetTime(response);
    return reset === null ? 0 : Math.max(0, reset.getTime() - this.now());
  }

  private toApiError(response: AxiosResponse, description: string): ApiError {
    const detail = extractMessage(response.data);
    const status = response.status;

    if (status === 404) {
      return new ApiError(`Not found while trying to ${description} (HTTP 404)`, status);
    }
    if (status === 401) {
      return new ApiError(
        `GitHub authentication failed.\n\n` +
        `If using GITHUB_TOKEN, please check that it's valid.`,
        status
      );
    }
    return new ApiError(
      `Failed to ${description}: HTTP ${status}${detail ? ` (${detail})` : ''}`,
      status
    );
  }
}
