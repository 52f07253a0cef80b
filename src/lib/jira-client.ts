/**
 * Jira REST API (v2) client implementing the issue tracker seam
 */

import { TrackerRequestError } from './errors';
import { IssueTrackerClient, toIssueSnapshot } from './issue-tracker';
import { jiraAttachmentListSchema } from './schemas';
import { IssueSnapshot, RemoteAttachment, TrackerConnectionOptions } from './types';

export interface JiraCredentials {
  server: string;
  username: string;
  token: string;
}

type RequestBody = { json: unknown } | { form: FormData };

export class JiraClient implements IssueTrackerClient {
  readonly options: TrackerConnectionOptions;
  private readonly credentials: JiraCredentials;

  constructor(credentials: JiraCredentials) {
    this.credentials = credentials;
    this.options = { server: credentials.server.replace(/\/+$/, '') };
  }

  private getAuthHeader(): string {
    const encoded = Buffer.from(`${this.credentials.username}:${this.credentials.token}`).toString('base64');
    return `Basic ${encoded}`;
  }

  private buildUrl(path: string): string {
    return `${this.options.server}${path}`;
  }

  /**
   * Send a request and fail on any non-2xx response
   */
  private async request(method: string, url: string, body?: RequestBody): Promise<Response> {
    const headers: Record<string, string> = {
      Authorization: this.getAuthHeader(),
      Accept: 'application/json',
    };

    let payload: string | FormData | undefined;
    if (body && 'json' in body) {
      headers['Content-Type'] = 'application/json';
      payload = JSON.stringify(body.json);
    } else if (body) {
      // Attachment uploads are rejected without this header
      headers['X-Atlassian-Token'] = 'no-check';
      payload = body.form;
    }

    const response = await fetch(url, { method, headers, body: payload });
    if (!response.ok) {
      throw new TrackerRequestError(response.status, method, url, await response.text());
    }
    return response;
  }

  private issuePath(key: string): string {
    return `/rest/api/2/issue/${encodeURIComponent(key)}`;
  }

  async getIssue(key: string): Promise<IssueSnapshot> {
    const response = await this.request('GET', this.buildUrl(this.issuePath(key)));
    const raw: unknown = await response.json();
    return toIssueSnapshot(raw);
  }

  async downloadAttachment(attachment: RemoteAttachment): Promise<Buffer> {
    const response = await this.request('GET', attachment.contentUrl);
    return Buffer.from(await response.arrayBuffer());
  }

  async addAttachment(key: string, filename: string, content: Buffer): Promise<RemoteAttachment> {
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(content)]), filename);

    const response = await this.request('POST', this.buildUrl(`${this.issuePath(key)}/attachments`), {
      form,
    });
    const [attachment] = jiraAttachmentListSchema.parse(await response.json());

    return {
      id: attachment.id,
      filename: attachment.filename,
      created: attachment.created,
      contentUrl: attachment.content,
    };
  }

  async deleteAttachment(attachment: RemoteAttachment): Promise<void> {
    await this.request('DELETE', this.buildUrl(`/rest/api/2/attachment/${encodeURIComponent(attachment.id)}`));
  }

  async updateIssue(key: string, fields: Record<string, string | null>): Promise<void> {
    await this.request('PUT', this.buildUrl(this.issuePath(key)), { json: { fields } });
  }

  async addComment(key: string, body: string): Promise<void> {
    await this.request('POST', this.buildUrl(`${this.issuePath(key)}/comment`), { json: { body } });
  }
}
