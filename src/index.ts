/**
 * ticketfs - Programmatic API
 *
 * Export all classes and types for programmatic usage
 */

export { FieldCodec, normalizeFieldValue } from './lib/field-codec';
export { GitBackend, GitCheckout } from './lib/git-backend';
export { IgnoreGlobSet, parseIgnoreFile } from './lib/ignore-globs';
export { IssueCache } from './lib/issue-cache';
export { toIssueSnapshot } from './lib/issue-tracker';
export type { IssueTrackerClient } from './lib/issue-tracker';
export { JiraClient } from './lib/jira-client';
export type { JiraCredentials } from './lib/jira-client';
export { TicketLogger, LogLevel, consoleSink, formatLogEntry } from './lib/logger';
export type { LogEntry, LogSink } from './lib/logger';
export { MigrationRunner, MIGRATIONS, validateMigrations } from './lib/migrations';
export type { Migration } from './lib/migrations';
export { RemoteFileMetadataStore } from './lib/remote-file-metadata';
export { ShadowRepository } from './lib/shadow-repository';
export { SyncEngine, cloneTicketFolder, openSyncEngine } from './lib/sync-engine';
export { TicketFolder, inferTicketKey } from './lib/ticket-folder';
export type { TicketFolderOptions, OpenOptions } from './lib/ticket-folder';
export * from './lib/errors';
export * from './lib/constants';
export * from './lib/types';
export * from './lib/version-control';
