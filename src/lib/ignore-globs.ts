/**
 * Ignore patterns shared by local and remote change detection
 */

import os from 'os';
import path from 'path';
import { minimatch } from 'minimatch';
import { IGNORE_FILE, TICKET_NEW_COMMENT } from './constants';
import { readOptionalFile } from './fs-utils';

export interface IgnoreGlobSources {
  /** Filenames always ignored, e.g. the rendered field files */
  builtIn: string[];
  folderPath: string;
  /** Name of the ignore file looked up in the folder and the home directory */
  which?: string;
  homeDir?: string;
}

export class IgnoreGlobSet {
  constructor(readonly globs: string[]) {}

  /**
   * Collect built-in globs, then the folder's ignore file, then the user's
   */
  static load(sources: IgnoreGlobSources): IgnoreGlobSet {
    const which = sources.which ?? IGNORE_FILE;
    const homeDir = sources.homeDir ?? os.homedir();

    const globs = [...sources.builtIn, TICKET_NEW_COMMENT];
    for (const filepath of [path.join(sources.folderPath, which), path.join(homeDir, which)]) {
      const content = readOptionalFile(filepath);
      if (content !== null) {
        globs.push(...parseIgnoreFile(content));
      }
    }

    return new IgnoreGlobSet(globs);
  }

  matches(filename: string): boolean {
    return this.globs.some((glob) => minimatch(filename, glob, { dot: true, matchBase: true }));
  }
}

export function parseIgnoreFile(content: string): string[] {
  return content
    .split(/\r?\n/)
    .filter((line) => !line.startsWith('#') && line.trim() !== '')
    .map((line) => line.trim());
}
