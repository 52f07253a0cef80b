/**
 * Shadow tree holding the last-fetched remote rendering of a ticket
 */

import fs from 'fs';
import path from 'path';
import { readOptionalFile } from './fs-utils';
import { FileTree } from './types';
import { Checkout } from './version-control';

export class ShadowRepository {
  constructor(private readonly checkout: Checkout) {}

  get root(): string {
    return this.checkout.workTree;
  }

  getPath(filename: string): string {
    return path.join(this.root, filename);
  }

  read(filename: string): string | null {
    return readOptionalFile(this.getPath(filename));
  }

  /**
   * Write every file of the tree, replacing existing contents
   */
  write(files: FileTree): void {
    for (const [filename, content] of Object.entries(files)) {
      const target = this.getPath(filename);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, content);
    }
  }

  /**
   * Stage and commit everything; false when nothing changed
   */
  commit(message: string): boolean {
    this.checkout.stageAll();
    return this.checkout.commit(message);
  }

  pushTo(ref: string): void {
    this.checkout.pushRef(ref);
  }
}
