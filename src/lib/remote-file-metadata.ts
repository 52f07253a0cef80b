/**
 * Change cursor for remote attachments, persisted inside the shadow tree
 */

import { z } from 'zod';
import { METADATA_DIR, REMOTE_FILES_FILE } from './constants';
import { ShadowRepository } from './shadow-repository';
import { RemoteAttachment, RemoteFileMetadata } from './types';

export const REMOTE_FILES_PATH = `${METADATA_DIR}/${REMOTE_FILES_FILE}`;

const remoteFileMetadataSchema = z.record(z.string(), z.string());

export class RemoteFileMetadataStore {
  constructor(private readonly shadow: ShadowRepository) {}

  read(): RemoteFileMetadata {
    const content = this.shadow.read(REMOTE_FILES_PATH);
    if (content === null) {
      return {};
    }
    return remoteFileMetadataSchema.parse(JSON.parse(content));
  }

  write(metadata: RemoteFileMetadata): void {
    this.shadow.write({ [REMOTE_FILES_PATH]: JSON.stringify(metadata) });
  }

  /**
   * Whether the attachment changed since its token was last recorded
   */
  static hasChanged(metadata: RemoteFileMetadata, attachment: RemoteAttachment): boolean {
    return metadata[attachment.filename] !== attachment.created;
  }
}
