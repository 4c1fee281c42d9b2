#!/usr/bin/env node

/**
 * github-dl - CLI tool to download GitHub folders and keep them refreshed
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig, parsePositiveInt } from './config.js';
import type { AppConfig } from './config.js';
import { downloadFolder } from './downloader.js';
import { toError } from './errors.js';
import { GitHubClient } from './github.js';
import { logger, LogLevel } from './logger.js';
import { refreshAll } from './refresh.js';
import { exitCodeFor, formatError, formatRefreshReport, formatSyncReport } from './report.js';
import { discoverToken } from './token.js';
import type { DownloadCommandOptions, RefreshCommandOptions } from './types.js';

interface Context {
  config: AppConfig;
  client: GitHubClient;
  concurrency: number;
}

const program = new Command();

/**
 * Load config and the token once, then build the API client
 */
async function createContext(concurrencyFlag: string | undefined): Promise<Context> {
  const config = loadConfig(process.env);
  logger.setLevel(program.opts<{ verbose?: boolean }>().verbose ? LogLevel.DEBUG : config.logLevel);

  const concurrency = parsePositiveInt(concurrencyFlag, config.concurrency, '--concurrency');
  const token = await discoverToken(process.cwd(), process.env);
  if (!token) {
    logger.debug('No GITHUB_TOKEN found; using unauthenticated requests');
  }

  const client = new GitHubClient({
    token,
    baseUrl: config.apiBaseUrl,
    timeoutMs: config.timeoutMs,
    maxRateLimitWaitMs: config.maxRateLimitWaitMs,
    logger: logger.child('api'),
  });

  return { config, client, concurrency };
}

function fail(error: unknown): never {
  console.error('\n' + formatError(toError(error)) + '\n');
  process.exit(1);
}

program
  .name('github-dl')
  .description('Download GitHub folders and refresh them from upstream')
  .version('1.0.0')
  .option('--verbose', 'Show debug output');

program
  .command('download <url>')
  .description('Download a GitHub folder (e.g. https://github.com/owner/repo/tree/ref/path)')
  .requiredOption('-o, --output <dir>', 'Output directory to save the folder')
  .option('-j, --concurrency <n>', 'Number of parallel file downloads')
  .option('--force', 'Download into a non-empty directory that is not already managed', false)
  .action(async (url: string, options: DownloadCommandOptions) => {
    try {
      const { client, concurrency } = await createContext(options.concurrency);
      const spinner = ora('Listing repository folder...').start();

      const report = await downloadFolder(url, options.output, {
        source: client,
        concurrency,
        force: options.force,
        logger: logger.child('download'),
        onListed: total => {
          spinner.text = `Downloading ${total} files...`;
        },
        onProgress: (current, total, file) => {
          spinner.text = `Downloading (${current}/${total}): ${file}`;
        },
      });

      if (report.status === 'succeeded') {
        spinner.succeed(`Downloaded ${chalk.green(report.written)} files to ${chalk.cyan(report.destination)}`);
        return;
      }

      spinner.fail(report.status === 'partial' ? 'Download incomplete' : 'Download failed');
      console.error('\n' + formatSyncReport(report) + '\n');
      if (report.status === 'partial') {
        console.error(chalk.dim('Run the same command with --force to retry.\n'));
      }
      process.exitCode = exitCodeFor([report]);
    } catch (error: unknown) {
      fail(error);
    }
  });

program
  .command('refresh')
  .description('Refresh all downloaded folders in the base directory')
  .option('-b, --base-dir <dir>', 'Base directory to search for downloaded folders', '.')
  .option('-j, --concurrency <n>', 'Number of parallel file downloads')
  .action(async (options: RefreshCommandOptions) => {
    try {
      const { client, concurrency } = await createContext(options.concurrency);
      const spinner = ora(`Scanning ${options.baseDir}...`).start();

      const report = await refreshAll(options.baseDir, {
        source: client,
        concurrency,
        logger: logger.child('refresh'),
        onFolder: (directory, index, total) => {
          spinner.text = `Refreshing (${index + 1}/${total}): ${directory}`;
        },
        onProgress: (current, total, file) => {
          spinner.text = `Refreshing: ${file} (${current}/${total})`;
        },
      });

      const code = exitCodeFor(report.folders);
      if (code === 0) {
        spinner.succeed(`Refreshed ${chalk.green(report.folders.length)} folders`);
        console.log(formatRefreshReport(report));
      } else {
        spinner.fail('Some folders could not be refreshed');
        console.error('\n' + formatRefreshReport(report) + '\n');
      }
      process.exitCode = code;
    } catch (error: unknown) {
      fail(error);
    }
  });

await program.parseAsync(process.argv);
