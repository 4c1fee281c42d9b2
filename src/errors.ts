/**
 * Error taxonomy for github-dl
 */

export class GitHubDlError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GitHubDlError';
  }
}

export class InvalidUrlError extends GitHubDlError {
  constructor(public readonly url: string, reason: string) {
    super(
      `Invalid GitHub URL: "${url}"\n\n` +
      `${reason}\n\n` +
      `Expected formats:\n` +
      `  • https://github.com/owner/repo\n` +
      `  • https://github.com/owner/repo/tree/ref/path`
    );
    this.name = 'InvalidUrlError';
  }
}

export class ApiError extends GitHubDlError {
  constructor(
    message: string,
    public readonly statusCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ApiError';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    statusCode: number,
    public readonly resetAt: Date | null
  ) {
    const resetDate = resetAt ? resetAt.toLocaleTimeString() : 'soon';
    super(
      `GitHub API rate limit exceeded.\n\n` +
      `The rate limit will reset at ${resetDate}.\n` +
      `To avoid rate limits, you can:\n` +
      `  • Wait a few minutes and try again\n` +
      `  • Authenticate with a GitHub token (set GITHUB_TOKEN in the environment or a .env file)`,
      statusCode
    );
    this.name = 'RateLimitError';
  }
}

export class CycleError extends GitHubDlError {
  constructor(public readonly path: string, reason: string) {
    super(`Unexpected repository listing at "${path}": ${reason}`);
    this.name = 'CycleError';
  }
}

export class IoError extends GitHubDlError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly code: string | undefined,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'IoError';
  }

  /**
   * Wrap a Node filesystem error, keeping its errno code
   */
  static from(error: unknown, action: string, path: string): IoError {
    if (error instanceof IoError) {
      return error;
    }
    const code = errorCode(error);
    const detail = error instanceof Error ? error.message : String(error);
    return new IoError(`Failed to ${action} ${path}: ${detail}`, path, code, { cause: error });
  }
}

export class MetadataCorruptError extends GitHubDlError {
  constructor(public readonly path: string, reason: string) {
    super(
      `Corrupt metadata file: ${path}\n\n` +
      `${reason}\n\n` +
      `Delete the file and download the folder again to start over.`
    );
    this.name = 'MetadataCorruptError';
  }
}

export class UnsafePathError extends GitHubDlError {
  constructor(public readonly relativePath: string) {
    super(`Invalid path detected: ${relativePath}`);
    this.name = 'UnsafePathError';
  }
}

export class OutputNotEmptyError extends GitHubDlError {
  constructor(public readonly directory: string) {
    super(
      `Output directory '${directory}' is not empty\n\n` +
      `Choose an empty directory, or pass --force to download into it anyway.`
    );
    this.name = 'OutputNotEmptyError';
  }
}

export class InvalidOptionError extends GitHubDlError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOptionError';
  }
}

export class ConfigError extends GitHubDlError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Read the errno-style code off an unknown thrown value
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
