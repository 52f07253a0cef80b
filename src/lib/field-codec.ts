/**
 * Bidirectional codec between ticket fields and the flat files of a ticket folder
 */

import {
  DETAIL_INDENT,
  FILE_FIELDS,
  NO_DETAIL_FIELDS,
  TICKET_COMMENTS,
  TICKET_DETAILS,
  fileFieldFilename,
} from './constants';
import { FileSource, IssueComment, IssueSnapshot } from './types';

export interface FieldCodecOptions {
  fileFields?: string[];
  noDetailFields?: string[];
}

const FIELD_HEADER = /^(\S.*)::$/;

export class FieldCodec {
  private readonly fileFields: string[];
  private readonly noDetailFields: string[];

  constructor(options: FieldCodecOptions = {}) {
    this.fileFields = options.fileFields ?? FILE_FIELDS;
    this.noDetailFields = options.noDetailFields ?? NO_DETAIL_FIELDS;
  }

  /**
   * Filenames produced by render() regardless of the issue content
   */
  get renderedFilenames(): string[] {
    return [
      TICKET_DETAILS,
      TICKET_COMMENTS,
      ...this.fileFields.map((field) => fileFieldFilename(field)),
    ];
  }

  /**
   * Render an issue into the details file, one file per file-valued field,
   * and the comments transcript
   */
  render(issue: IssueSnapshot): Record<string, string> {
    const files: Record<string, string> = {};
    let details = '';

    for (const field of Object.keys(issue.fields).sort()) {
      if (this.noDetailFields.includes(field)) {
        continue;
      }

      const value = normalizeFieldValue(issue.fields[field]);

      if (this.fileFields.includes(field)) {
        files[fileFieldFilename(field)] = `${value}\n`;
        continue;
      }

      details += renderBlock(`${field}::`, value);
    }

    files[TICKET_DETAILS] = details;
    files[TICKET_COMMENTS] = this.renderComments(issue.comments);

    return files;
  }

  /**
   * Read back every editable field from a rendered file set
   */
  parse(source: FileSource): Record<string, string> {
    const fields: Record<string, string> = {};

    const details = source(TICKET_DETAILS);
    if (details !== null) {
      Object.assign(fields, parseDetails(details));
    }

    for (const field of this.fileFields) {
      const content = source(fileFieldFilename(field));
      if (content !== null) {
        fields[field] = content.replace(/\r\n/g, '\n').trim();
      }
    }

    return fields;
  }

  private renderComments(comments: IssueComment[]): string {
    return comments
      .map((comment) =>
        renderBlock(`${comment.created}: ${comment.author}::`, comment.body.replace(/\r\n/g, '\n'))
      )
      .join('');
  }
}

function renderBlock(header: string, value: string): string {
  const lines = value.split('\n').map((line) => `${DETAIL_INDENT}${line}\n`);
  return `${header}\n\n${lines.join('')}\n`;
}

function parseDetails(content: string): Record<string, string> {
  const fields: Record<string, string> = {};
  let current: string | null = null;
  let lines: string[] = [];

  const flush = () => {
    if (current !== null) {
      fields[current] = lines.join('\n').trim();
    }
  };

  for (const line of content.replace(/\r\n/g, '\n').split('\n')) {
    const header = FIELD_HEADER.exec(line);
    if (header) {
      flush();
      current = header[1];
      lines = [];
    } else if (line.startsWith(DETAIL_INDENT)) {
      lines.push(line.slice(DETAIL_INDENT.length));
    } else if (line.trim() === '') {
      lines.push('');
    } else {
      lines.push(line);
    }
  }
  flush();

  return fields;
}

/**
 * Convert a raw field value to the text rendered for it
 */
export function normalizeFieldValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value.replace(/\r\n/g, '\n').trim();
  }
  return stringifyValue(value);
}

function stringifyValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => stringifyValue(item)).join(', ');
  }
  if (typeof value === 'object') {
    // Tracker resources (users, statuses, options) print by their label
    for (const label of ['displayName', 'name', 'value', 'key']) {
      const candidate: unknown = Reflect.get(value, label);
      if (typeof candidate === 'string') {
        return candidate;
      }
    }
  }
  return JSON.stringify(value);
}
