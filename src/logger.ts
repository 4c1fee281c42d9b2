/**
 * Logger module - leveled diagnostic output on stderr
 *
 * User-facing progress goes through ora spinners in the CLI; this logger carries
 * the warnings and debug detail emitted by the library modules.
 */

import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_LABELS: Record<Exclude<LogLevel, LogLevel.SILENT>, () => string> = {
  [LogLevel.DEBUG]: () => chalk.gray('debug'),
  [LogLevel.INFO]: () => chalk.cyan('info'),
  [LogLevel.WARN]: () => chalk.yellow('warn'),
  [LogLevel.ERROR]: () => chalk.red('error'),
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    case 'silent': return LogLevel.SILENT;
    default: return undefined;
  }
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

export class Logger {
  constructor(
    private readonly context: string,
    private level: LogLevel = LogLevel.INFO,
    private readonly sink: LogSink = stderrSink
  ) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.level;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, meta);
  }

  /**
   * A logger for a sub-component; shares this logger's sink, starts at its level
   */
  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, this.level, this.sink);
  }

  private log(level: Exclude<LogLevel, LogLevel.SILENT>, message: string, meta?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    let line = `${LEVEL_LABELS[level]()} ${chalk.dim(`[${this.context}]`)} ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      line += ' ' + chalk.dim(JSON.stringify(meta));
    }
    this.sink(line);
  }
}

export const logger = new Logger('github-dl', parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO);

/** Logger that drops everything; the default for library calls made from tests */
export const silentLogger = new Logger('github-dl', LogLevel.SILENT);
