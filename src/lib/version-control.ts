/**
 * Version-control seam: two checkouts bound to one shared history
 */

export interface RepositoryLayout {
  /** The ticket folder, work tree of the primary checkout */
  workTree: string;
  /** Object store shared by both checkouts */
  gitDir: string;
  /** Work tree of the shadow checkout */
  shadowDir: string;
  /** Patterns the primary checkout never reports as untracked */
  excludesFile: string;
}

export interface CommitOptions {
  allowEmpty?: boolean;
}

export interface MergeResult {
  /** Paths left with conflict markers */
  conflicts: string[];
}

export interface Checkout {
  readonly workTree: string;

  stageAll(): void;

  /** Returns false when there was nothing to commit */
  commit(message: string, options?: CommitOptions): boolean;

  mergeFrom(ref: string): MergeResult;

  /** Publish this checkout's HEAD as `ref` in the shared history */
  pushRef(ref: string): void;

  readFileAt(ref: string, filepath: string): string | null;

  mergeBase(first: string, second: string): string | null;

  listUntracked(): string[];

  listModified(): string[];

  /** Returns false when there was nothing to stash */
  stash(): boolean;

  /** Returns false when nothing could be restored */
  stashPop(): boolean;
}

export type CommandListener = (args: string[]) => void;

export interface VersionControlBackend {
  /** Create the shared history and the primary checkout */
  initStore(layout: RepositoryLayout): void;

  /** Create the shadow checkout on `trackingRef` and publish it */
  initShadow(layout: RepositoryLayout, trackingRef: string): void;

  primary(layout: RepositoryLayout, onCommand?: CommandListener): Checkout;

  shadow(layout: RepositoryLayout, onCommand?: CommandListener): Checkout;
}
