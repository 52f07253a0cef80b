/**
 * Core sync engine: fetch remote state into the shadow tree, merge it into the
 * working tree, and push local edits back to the tracker
 */

import fs from 'fs';
import path from 'path';
import { REMOTE_IGNORE_FILE, TRACKING_REF } from './constants';
import { MergeConflictError } from './errors';
import { readOptionalFile } from './fs-utils';
import { RemoteFileMetadataStore } from './remote-file-metadata';
import { OpenOptions, TicketFolder, TicketFolderOptions } from './ticket-folder';
import { FieldDiff, TicketStatus } from './types';

const CONFLICT_MARKER = /^(<{7}|>{7}) /m;

export class SyncEngine {
  private readonly metadata: RemoteFileMetadataStore;

  constructor(readonly folder: TicketFolder) {
    this.metadata = new RemoteFileMetadataStore(folder.shadow);
  }

  /**
   * Files in the working tree that are new or modified and not ignored
   */
  getLocallyChanged(): string[] {
    const ignore = this.folder.getIgnoreGlobs();
    const candidates = [...this.folder.primary.listUntracked(), ...this.folder.primary.listModified()];

    const assets: string[] = [];
    for (const filename of candidates) {
      if (assets.includes(filename) || ignore.matches(filename)) {
        continue;
      }
      if (filename.startsWith('.')) {
        continue;
      }
      const localPath = this.folder.getLocalPath(filename);
      if (!fs.existsSync(localPath) || !fs.statSync(localPath).isFile()) {
        continue;
      }
      assets.push(filename);
    }

    return assets;
  }

  /**
   * Attachment filenames whose change token differs from the recorded one
   */
  async getRemotelyChanged(): Promise<string[]> {
    const ignore = this.folder.getIgnoreGlobs(REMOTE_IGNORE_FILE);
    const metadata = this.metadata.read();
    const issue = await this.folder.getIssue();

    return issue.attachments
      .filter((attachment) => !ignore.matches(attachment.filename))
      .filter((attachment) => RemoteFileMetadataStore.hasChanged(metadata, attachment))
      .map((attachment) => attachment.filename);
  }

  getLocalFields(): Record<string, string> {
    return this.folder.codec.parse((filename) => readOptionalFile(this.folder.getLocalPath(filename)));
  }

  /**
   * Field values as of the last merge of the tracking reference
   */
  getOriginalValues(): Record<string, string> {
    const mergeBase = this.folder.primary.mergeBase('HEAD', TRACKING_REF);
    if (!mergeBase) {
      return {};
    }
    return this.folder.codec.parse((filename) => this.folder.primary.readFileAt(mergeBase, filename));
  }

  /**
   * Fields that differ between disk and the last sync. Fields absent from the
   * last sync are never reported.
   */
  getLocalDifferingFields(): Record<string, FieldDiff> {
    const local = this.getLocalFields();
    const original = this.getOriginalValues();

    const differing: Record<string, FieldDiff> = {};
    for (const [field, value] of Object.entries(original)) {
      const localValue = field in local ? local[field] : null;
      if (localValue !== value) {
        differing[field] = [value, localValue];
      }
    }

    return differing;
  }

  status(): TicketStatus {
    return {
      toUpload: this.getLocallyChanged(),
      localDiffers: this.getLocalDifferingFields(),
      newComment: this.folder.getNewComment(),
    };
  }

  /**
   * Render the remote issue into the shadow tree and publish it on the
   * tracking reference
   */
  async fetch(): Promise<void> {
    const { folder } = this;
    const issue = await folder.issues.refresh();
    const client = folder.getClient();
    const fileMeta = this.metadata.read();

    const changed = await this.getRemotelyChanged();
    for (const attachment of issue.attachments) {
      if (!changed.includes(attachment.filename)) {
        continue;
      }
      folder.logger.info(`Download file "${attachment.filename}"`);
      const content = await client.downloadAttachment(attachment);
      folder.shadow.write({ [attachment.filename]: content });
      fileMeta[attachment.filename] = attachment.created;
    }

    this.metadata.write(fileMeta);
    folder.shadow.write(folder.codec.render(issue));
    await folder.storeCachedIssue();

    if (folder.shadow.commit('Pulled remote changes')) {
      folder.logger.debug('Committed remote changes to the shadow tree');
    }
    folder.shadow.pushTo(TRACKING_REF);
  }

  /**
   * Merge the tracking reference into the working tree, keeping uncommitted edits
   */
  merge(): void {
    const { primary, logger } = this.folder;

    const stashed = primary.stash();
    try {
      this.mergeTrackingRef();
    } finally {
      if (stashed && !primary.stashPop()) {
        logger.warn('Could not restore uncommitted local changes after merging');
      }
    }
  }

  /**
   * Throws MergeConflictError, leaving the markers in place, when the merge stops
   */
  private mergeTrackingRef(): void {
    const { conflicts } = this.folder.primary.mergeFrom(TRACKING_REF);
    if (conflicts.length > 0) {
      this.folder.logger.error(`Merge conflicts in ${conflicts.join(', ')}; resolve the conflict markers by hand`);
      throw new MergeConflictError(conflicts);
    }
  }

  /**
   * Files among `filenames` that still hold merge conflict markers
   */
  getUnresolvedFiles(filenames: string[]): string[] {
    return filenames.filter((filename) => {
      const content = readOptionalFile(this.folder.getLocalPath(filename));
      return content !== null && CONFLICT_MARKER.test(content);
    });
  }

  async pull(): Promise<void> {
    await this.fetch();
    this.merge();
  }

  /**
   * Upload local files, the pending comment and changed fields, then record
   * the result in both histories
   */
  async push(): Promise<void> {
    const { folder } = this;
    const status = this.status();

    const unresolved = this.getUnresolvedFiles([...folder.codec.renderedFilenames, ...status.toUpload]);
    if (unresolved.length > 0) {
      throw new MergeConflictError(unresolved);
    }

    const client = folder.getClient();
    const fileMeta = this.metadata.read();

    if (status.toUpload.length > 0) {
      const issue = await folder.getIssue();

      for (const filename of status.toUpload) {
        folder.logger.info(`Uploading file "${filename}"`);

        // Last write wins: replace any remote attachment with the same name
        for (const attachment of issue.attachments) {
          if (attachment.filename === filename) {
            await client.deleteAttachment(attachment);
          }
        }

        const content = fs.readFileSync(folder.getLocalPath(filename));
        const attachment = await client.addAttachment(folder.ticketKey, filename, content);
        fileMeta[attachment.filename] = attachment.created;
      }
    }

    const comment = folder.getNewComment({ clear: true });
    if (comment) {
      folder.logger.info(`Adding comment "${comment}"`);
      await client.addComment(folder.ticketKey, comment);
    }

    const updates: Record<string, string | null> = {};
    for (const [field, [, local]] of Object.entries(status.localDiffers)) {
      updates[field] = local;
    }
    if (Object.keys(updates).length > 0) {
      folder.logger.info(`Updating fields "${Object.keys(updates).join(', ')}"`);
      await client.updateIssue(folder.ticketKey, updates);
    }

    folder.primary.stageAll();
    folder.primary.commit('Pushed local changes');

    // Record uploaded file tokens so they are not fetched back as remote changes
    this.mergeTrackingRef();
    this.metadata.write(fileMeta);
    folder.shadow.commit('Pushed local changes');
    folder.shadow.pushTo(TRACKING_REF);
  }

  async sync(): Promise<void> {
    await this.pull();
    await this.push();
  }
}

/**
 * Create a ticket folder at `folderPath` and populate it from the tracker
 */
export async function cloneTicketFolder(folderPath: string, options: TicketFolderOptions): Promise<TicketFolder> {
  fs.mkdirSync(path.resolve(folderPath));
  const folder = await TicketFolder.initialize(folderPath, options);
  await new SyncEngine(folder).sync();
  return folder;
}

/**
 * Open a ticket folder and return an engine for it
 */
export async function openSyncEngine(folderPath: string, options: OpenOptions): Promise<SyncEngine> {
  return new SyncEngine(await TicketFolder.open(folderPath, options));
}
