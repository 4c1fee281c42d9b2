/**
 * Report module - human-readable summaries of sync results for the CLI
 */

import chalk from 'chalk';
import { formatCoordinate } from './resolver.js';
import type { RefreshReport, SyncReport } from './types.js';

const MAX_LISTED_FAILURES = 10;

/**
 * Format error message for display
 */
export function formatError(error: Error): string {
  return error.message
    .split('\n')
    .map((line, i) => i === 0 ? chalk.red(`✖ ${line}`) : chalk.dim(`  ${line}`))
    .join('\n');
}

function firstLine(message: string): string {
  return message.split('\n')[0];
}

export function describeOutcome(report: SyncReport): string {
  switch (report.status) {
    case 'succeeded':
      return 'fully succeeded';
    case 'partial':
      return `partially succeeded (${report.failures.length} of ${report.total} files failed)`;
    case 'failed':
      return 'failed to start';
  }
}

export function formatSyncReport(report: SyncReport): string {
  const source = report.coordinate ? formatCoordinate(report.coordinate) : report.destination;

  switch (report.status) {
    case 'succeeded':
      return chalk.green(`✔ ${source}`) + chalk.dim(` → ${report.destination} (${report.written} files, ${describeOutcome(report)})`);

    case 'partial': {
      const lines = [chalk.yellow(`⚠ ${source}`) + chalk.dim(` → ${report.destination}: ${describeOutcome(report)}`)];
      for (const failure of report.failures.slice(0, MAX_LISTED_FAILURES)) {
        lines.push(chalk.dim(`   • ${failure.relativePath}: ${firstLine(failure.error.message)}`));
      }
      if (report.failures.length > MAX_LISTED_FAILURES) {
        lines.push(chalk.dim(`   ... and ${report.failures.length - MAX_LISTED_FAILURES} more`));
      }
      return lines.join('\n');
    }

    case 'failed':
      return chalk.red(`✖ ${source}`) + chalk.dim(` → ${report.destination}: ${describeOutcome(report)}`) + '\n' +
        report.error.message
          .split('\n')
          .filter(line => line.trim().length > 0)
          .map(line => chalk.dim(`   ${line}`))
          .join('\n');
  }
}

export function summarizeRefresh(report: RefreshReport): string {
  const count = (status: SyncReport['status']) => report.folders.filter(f => f.status === status).length;
  return `${report.folders.length} folders: ${count('succeeded')} succeeded, ${count('partial')} partial, ${count('failed')} failed`;
}

export function formatRefreshReport(report: RefreshReport): string {
  if (report.folders.length === 0) {
    return chalk.yellow(`No downloaded folders found in ${report.baseDir}`);
  }
  return [...report.folders.map(formatSyncReport), '', summarizeRefresh(report)].join('\n');
}

export function exitCodeFor(reports: SyncReport[]): number {
  return reports.every(report => report.status === 'succeeded') ? 0 : 1;
}
