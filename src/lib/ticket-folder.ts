/**
 * A ticket folder: the working tree, its metadata directory and both checkouts
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  CACHED_ISSUE_FILE,
  EXCLUDES_FILE,
  GIT_DIR,
  IGNORE_FILE,
  METADATA_DIR,
  SHADOW_DIR,
  TICKET_NEW_COMMENT,
  TICKET_OPERATION_LOG,
  VERSION_FILE,
} from './constants';
import { CannotInferTicketNumberFromFolderNameError, NotTicketFolderError } from './errors';
import { FieldCodec } from './field-codec';
import { readOptionalFile } from './fs-utils';
import { GitBackend } from './git-backend';
import { IgnoreGlobSet } from './ignore-globs';
import { IssueCache } from './issue-cache';
import { IssueTrackerClient, toIssueSnapshot } from './issue-tracker';
import { LogLevel, LogSink, TicketLogger } from './logger';
import { MigrationRunner, defaultMigrationRunner } from './migrations';
import { cachedIssueSnapshotSchema } from './schemas';
import { ShadowRepository } from './shadow-repository';
import { CachedIssueSnapshot, IssueSnapshot } from './types';
import { Checkout, RepositoryLayout, VersionControlBackend } from './version-control';

const TICKET_KEY_PATTERN = /^\w+-\d+$/;

export interface TicketFolderOptions {
  /** Resolves the tracker client on first use */
  client: () => IssueTrackerClient;
  backend?: VersionControlBackend;
  codec?: FieldCodec;
  sink?: LogSink;
  minLogLevel?: LogLevel;
  /** Directory holding the user-global ignore files */
  homeDir?: string;
  migrationRunner?: MigrationRunner;
}

export interface OpenOptions extends TicketFolderOptions {
  migrate?: boolean;
}

function resolveFolderPath(folderPath: string): string {
  const expanded = folderPath.startsWith('~')
    ? path.join(os.homedir(), folderPath.slice(1))
    : folderPath;
  const resolved = path.resolve(expanded);
  return fs.existsSync(resolved) ? fs.realpathSync(resolved) : resolved;
}

function isDirectory(target: string): boolean {
  return fs.existsSync(target) && fs.statSync(target).isDirectory();
}

/**
 * Ticket key from a folder name, e.g. `/work/proj-123` -> `PROJ-123`
 */
export function inferTicketKey(folderPath: string): string {
  const key = path.basename(folderPath).toUpperCase();
  if (!TICKET_KEY_PATTERN.test(key)) {
    throw new CannotInferTicketNumberFromFolderNameError(folderPath);
  }
  return key;
}

export class TicketFolder {
  readonly path: string;
  readonly ticketKey: string;
  readonly layout: RepositoryLayout;
  readonly backend: VersionControlBackend;
  readonly codec: FieldCodec;
  readonly logger: TicketLogger;
  readonly primary: Checkout;
  readonly shadow: ShadowRepository;
  readonly issues: IssueCache;
  readonly homeDir: string;

  private readonly clientFactory: () => IssueTrackerClient;
  private readonly migrationRunner: MigrationRunner;
  private client: IssueTrackerClient | null = null;

  constructor(folderPath: string, options: TicketFolderOptions) {
    this.path = resolveFolderPath(folderPath);

    if (!isDirectory(this.metadataDir)) {
      throw new NotTicketFolderError(folderPath);
    }

    this.ticketKey = inferTicketKey(this.path);
    this.clientFactory = options.client;
    this.backend = options.backend ?? new GitBackend();
    this.codec = options.codec ?? new FieldCodec();
    this.homeDir = options.homeDir ?? os.homedir();
    this.migrationRunner = options.migrationRunner ?? defaultMigrationRunner;

    this.logger = new TicketLogger({
      logPath: this.getMetadataPath(TICKET_OPERATION_LOG),
      source: this.ticketKey,
      sink: options.sink,
      minLevel: options.minLogLevel,
    });

    this.layout = {
      workTree: this.path,
      gitDir: this.getMetadataPath(GIT_DIR),
      shadowDir: this.getMetadataPath(SHADOW_DIR),
      excludesFile: this.getMetadataPath(EXCLUDES_FILE),
    };

    const onCommand = (args: string[]) => this.logger.debug(`Executing git command ${args.join(' ')}`);
    this.primary = this.backend.primary(this.layout, onCommand);
    this.shadow = new ShadowRepository(this.backend.shadow(this.layout, onCommand));

    this.issues = new IssueCache({
      fetchRemote: () => this.getClient().getIssue(this.ticketKey),
      readCached: () => this.readCachedIssue(),
      onCacheMiss: (reason) => this.logger.error(reason),
    });
  }

  /**
   * Open an existing folder, bringing its layout up to date
   */
  static async open(folderPath: string, options: OpenOptions): Promise<TicketFolder> {
    const folder = new TicketFolder(folderPath, options);
    if (options.migrate ?? true) {
      await folder.runMigrations();
    }
    folder.ensureNewCommentFile();
    return folder;
  }

  /**
   * Turn an existing directory into a ticket folder
   */
  static async initialize(folderPath: string, options: TicketFolderOptions): Promise<TicketFolder> {
    const resolved = resolveFolderPath(folderPath);
    inferTicketKey(resolved);

    const metadataDir = path.join(resolved, METADATA_DIR);
    fs.mkdirSync(metadataDir);

    const excludesFile = path.join(metadataDir, EXCLUDES_FILE);
    fs.writeFileSync(excludesFile, `${METADATA_DIR}\n`, 'utf-8');

    const backend = options.backend ?? new GitBackend();
    backend.initStore({
      workTree: resolved,
      gitDir: path.join(metadataDir, GIT_DIR),
      shadowDir: path.join(metadataDir, SHADOW_DIR),
      excludesFile,
    });

    const folder = new TicketFolder(resolved, { ...options, backend });
    folder.logger.info(`Ticket folder for issue ${folder.ticketKey} created at ${folder.path}`);
    folder.primary.commit('Initialized', { allowEmpty: true });
    await folder.runMigrations({ silent: true });
    folder.ensureNewCommentFile();

    return folder;
  }

  get metadataDir(): string {
    return path.join(this.path, METADATA_DIR);
  }

  getMetadataPath(filename: string): string {
    return path.join(this.metadataDir, filename);
  }

  getLocalPath(filename: string): string {
    return path.join(this.path, filename);
  }

  getShadowPath(filename: string): string {
    return this.shadow.getPath(filename);
  }

  get version(): number {
    const content = readOptionalFile(this.getMetadataPath(VERSION_FILE));
    if (content === null) {
      return 1;
    }
    const version = parseInt(content.trim(), 10);
    if (!Number.isInteger(version) || version < 1) {
      throw new Error(`Invalid version marker "${content.trim()}" in ${this.metadataDir}`);
    }
    return version;
  }

  setVersion(version: number): void {
    fs.writeFileSync(this.getMetadataPath(VERSION_FILE), String(version), 'utf-8');
  }

  runMigrations(options: { silent?: boolean } = {}): Promise<number[]> {
    return this.migrationRunner.run(this, options);
  }

  getClient(): IssueTrackerClient {
    if (!this.client) {
      this.client = this.clientFactory();
    }
    return this.client;
  }

  getIssue(): Promise<IssueSnapshot> {
    return this.issues.getIssue();
  }

  getCachedIssue(): Promise<IssueSnapshot> {
    return this.issues.getCachedIssue();
  }

  /**
   * Persist the remote issue so it can be rebuilt without a network call
   */
  async storeCachedIssue(): Promise<void> {
    const issue = await this.getIssue();
    const snapshot: CachedIssueSnapshot = {
      options: this.getClient().options,
      raw: issue.raw,
    };
    fs.writeFileSync(this.getMetadataPath(CACHED_ISSUE_FILE), JSON.stringify(snapshot), 'utf-8');
  }

  readCachedIssue(): IssueSnapshot | null {
    const content = readOptionalFile(this.getMetadataPath(CACHED_ISSUE_FILE));
    if (content === null) {
      return null;
    }
    const snapshot = cachedIssueSnapshotSchema.parse(JSON.parse(content));
    return toIssueSnapshot(snapshot.raw);
  }

  getIgnoreGlobs(which: string = IGNORE_FILE): IgnoreGlobSet {
    return IgnoreGlobSet.load({
      builtIn: this.codec.renderedFilenames,
      folderPath: this.path,
      which,
      homeDir: this.homeDir,
    });
  }

  /**
   * Pending comment text, stripped; optionally empties the buffer
   */
  getNewComment(options: { clear?: boolean } = {}): string {
    const commentPath = this.getLocalPath(TICKET_NEW_COMMENT);
    const content = readOptionalFile(commentPath);
    if (content === null) {
      return '';
    }
    if (options.clear) {
      fs.writeFileSync(commentPath, '', 'utf-8');
    }
    return content.trim();
  }

  getLog(): string {
    return this.logger.read();
  }

  private ensureNewCommentFile(): void {
    const commentPath = this.getLocalPath(TICKET_NEW_COMMENT);
    if (!fs.existsSync(commentPath)) {
      fs.writeFileSync(commentPath, '', 'utf-8');
    }
  }
}
