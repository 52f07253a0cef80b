/**
 * On-disk layout and rendering constants for ticket folders
 */

export const METADATA_DIR = '.ticketfs';

export const TICKET_DETAILS = 'fields.ticket.txt';
export const TICKET_COMMENTS = 'comments.read_only.ticket.txt';
export const TICKET_NEW_COMMENT = 'new_comment.ticket.txt';
export const TICKET_FILE_FIELD_TEMPLATE = '{field_name}.ticket.txt';

export const TICKET_OPERATION_LOG = 'operation.log';
export const VERSION_FILE = 'version';
export const CACHED_ISSUE_FILE = 'issue.json';
export const REMOTE_FILES_FILE = 'remote_files.json';
export const EXCLUDES_FILE = 'gitignore';
export const GIT_DIR = 'git';
export const SHADOW_DIR = 'shadow';

export const IGNORE_FILE = '.ticketfs_ignore';
export const REMOTE_IGNORE_FILE = '.ticketfs_remote_ignore';

// Fields written to their own file instead of the details file
export const FILE_FIELDS = ['description'];

// Fields never rendered into the details file
export const NO_DETAIL_FIELDS = ['comment', 'watches', 'attachment'];

export const TRACKING_REF = 'remote-state';

export const CURRENT_VERSION = 4;

export const DETAIL_INDENT = '    ';

export function fileFieldFilename(fieldName: string): string {
  return TICKET_FILE_FIELD_TEMPLATE.replace('{field_name}', fieldName);
}
