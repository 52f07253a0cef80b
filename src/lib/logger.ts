/**
 * Per-folder operation log: appends every entry to the folder's log file and
 * echoes entries above a minimum level to a caller-supplied sink
 */

import fs from 'fs';
import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 10,
  INFO = 20,
  WARNING = 30,
  ERROR = 40,
}

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  /** Ticket key the entry belongs to */
  source: string;
  message: string;
}

export type LogSink = (entry: LogEntry) => void;

export interface TicketLoggerOptions {
  logPath: string;
  source: string;
  sink?: LogSink;
  minLevel?: LogLevel;
  now?: () => Date;
}

export function levelName(level: LogLevel): string {
  return LogLevel[level];
}

/**
 * Format an entry the way it is shown to the user
 */
export function formatLogEntry(entry: LogEntry): string {
  return `[${levelName(entry.level)} ${entry.source}] ${entry.message}`;
}

/**
 * Default sink: colored console output
 */
export const consoleSink: LogSink = (entry) => {
  const line = formatLogEntry(entry);
  if (entry.level >= LogLevel.ERROR) {
    console.error(chalk.red(line));
  } else if (entry.level >= LogLevel.WARNING) {
    console.warn(chalk.yellow(line));
  } else if (entry.level >= LogLevel.INFO) {
    console.log(line);
  } else {
    console.log(chalk.gray(line));
  }
};

export class TicketLogger {
  private readonly logPath: string;
  private readonly source: string;
  private readonly sink: LogSink;
  private readonly minLevel: LogLevel;
  private readonly now: () => Date;

  constructor(options: TicketLoggerOptions) {
    this.logPath = options.logPath;
    this.source = options.source;
    this.sink = options.sink ?? consoleSink;
    this.minLevel = options.minLevel ?? LogLevel.INFO;
    this.now = options.now ?? (() => new Date());
  }

  log(level: LogLevel, message: string): void {
    const entry: LogEntry = {
      timestamp: this.now(),
      level,
      source: this.source,
      message,
    };

    fs.appendFileSync(
      this.logPath,
      `${entry.timestamp.toISOString()}\t${levelName(level)}\t${message.replace(/\n/g, '\\n')}\n`,
      'utf-8'
    );

    if (level >= this.minLevel) {
      this.sink(entry);
    }
  }

  debug(message: string): void {
    this.log(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.log(LogLevel.INFO, message);
  }

  warn(message: string): void {
    this.log(LogLevel.WARNING, message);
  }

  error(message: string): void {
    this.log(LogLevel.ERROR, message);
  }

  /**
   * Read the whole operation log
   */
  read(): string {
    return fs.readFileSync(this.logPath, 'utf-8');
  }
}
