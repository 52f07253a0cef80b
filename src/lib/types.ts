/**
 * Shared types for ticket folder sync
 */

export interface TrackerConnectionOptions {
  server: string;
}

export interface RemoteAttachment {
  id: string;
  filename: string;
  /** Change token: the attachment's creation timestamp */
  created: string;
  contentUrl: string;
}

export interface IssueComment {
  created: string;
  author: string;
  body: string;
}

export interface IssueSnapshot {
  key: string;
  fields: Record<string, unknown>;
  attachments: RemoteAttachment[];
  comments: IssueComment[];
  raw: unknown;
}

export interface CachedIssueSnapshot {
  options: TrackerConnectionOptions;
  raw: unknown;
}

/** Attachment filename -> change token recorded at the last sync */
export type RemoteFileMetadata = Record<string, string>;

/** [value at the last merge base, value on disk] */
export type FieldDiff = [original: string, local: string | null];

export interface TicketStatus {
  toUpload: string[];
  localDiffers: Record<string, FieldDiff>;
  newComment: string;
}

/** Filename -> contents, relative to a work tree */
export type FileTree = Record<string, string | Buffer>;

/** Reads a file by repository-relative name; null when it does not exist */
export type FileSource = (filename: string) => string | null;
