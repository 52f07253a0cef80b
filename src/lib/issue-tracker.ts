/**
 * Remote issue tracker seam and conversion of raw issue payloads
 */

import { jiraIssueFieldsSchema, jiraIssueSchema } from './schemas';
import { IssueSnapshot, RemoteAttachment, TrackerConnectionOptions } from './types';

export interface IssueTrackerClient {
  readonly options: TrackerConnectionOptions;

  getIssue(key: string): Promise<IssueSnapshot>;

  downloadAttachment(attachment: RemoteAttachment): Promise<Buffer>;

  addAttachment(key: string, filename: string, content: Buffer): Promise<RemoteAttachment>;

  deleteAttachment(attachment: RemoteAttachment): Promise<void>;

  updateIssue(key: string, fields: Record<string, string | null>): Promise<void>;

  addComment(key: string, body: string): Promise<void>;
}

/**
 * Build an issue snapshot from the raw REST payload
 */
export function toIssueSnapshot(raw: unknown): IssueSnapshot {
  const issue = jiraIssueSchema.parse(raw);
  const fields = jiraIssueFieldsSchema.parse(issue.fields);

  return {
    key: issue.key,
    fields: issue.fields,
    attachments: (fields.attachment ?? []).map((attachment) => ({
      id: attachment.id,
      filename: attachment.filename,
      created: attachment.created,
      contentUrl: attachment.content,
    })),
    comments: (fields.comment?.comments ?? []).map((comment) => ({
      created: comment.created,
      author: comment.author?.displayName ?? comment.author?.name ?? 'Unknown',
      body: comment.body ?? '',
    })),
    raw,
  };
}
