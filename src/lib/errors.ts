/**
 * Error types raised by ticket folders and the tracker client
 */

export class NotTicketFolderError extends Error {
  constructor(readonly folderPath: string) {
    super(`${folderPath} is not a synchronizable ticket folder`);
    this.name = 'NotTicketFolderError';
  }
}

export class CannotInferTicketNumberFromFolderNameError extends Error {
  constructor(readonly folderPath: string) {
    super(
      `Cannot infer ticket number from folder ${folderPath}. ` +
        'Please name ticket folders after the ticket they represent.'
    );
    this.name = 'CannotInferTicketNumberFromFolderNameError';
  }
}

export class MigrationTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MigrationTableError';
  }
}

export class MergeConflictError extends Error {
  constructor(readonly conflicts: string[]) {
    super(`Merge conflicts in ${conflicts.join(', ')}; resolve the conflict markers and commit before pushing`);
    this.name = 'MergeConflictError';
  }
}

export class TrackerRequestError extends Error {
  constructor(
    readonly status: number,
    readonly method: string,
    readonly url: string,
    readonly body: string
  ) {
    super(`${method} ${url} failed with status ${status}${body ? `: ${body}` : ''}`);
    this.name = 'TrackerRequestError';
  }
}
