/**
 * Version-control backend driving the git executable
 *
 * The primary checkout uses a bare repository in the metadata directory with
 * the ticket folder as its work tree; the shadow checkout is a `--shared`
 * clone of that repository, so both read and write one object store.
 */

import fs from 'fs';
import path from 'path';
import { execFileSync } from 'child_process';
import {
  Checkout,
  CommandListener,
  CommitOptions,
  MergeResult,
  RepositoryLayout,
  VersionControlBackend,
} from './version-control';

interface GitCheckoutConfig {
  workTree: string;
  gitDir: string;
  /** Remote that pushRef() publishes to; unset publishes into gitDir itself */
  upstream?: string;
  onCommand?: CommandListener;
}

function splitLines(output: string | null): string[] {
  return (output ?? '').split('\n').filter((line) => line.length > 0);
}

export class GitCheckout implements Checkout {
  readonly workTree: string;
  private readonly gitDir: string;
  private readonly upstream?: string;
  private readonly onCommand?: CommandListener;

  constructor(config: GitCheckoutConfig) {
    this.workTree = config.workTree;
    this.gitDir = config.gitDir;
    this.upstream = config.upstream;
    this.onCommand = config.onCommand;
  }

  /**
   * Run a git command against this checkout; returns null instead of
   * throwing when failureOk is set
   */
  run(args: string[], options: { failureOk?: boolean } = {}): string | null {
    const cmd = [`--work-tree=${this.workTree}`, `--git-dir=${this.gitDir}`, ...args];
    this.onCommand?.(['git', ...cmd]);

    try {
      return execFileSync('git', cmd, {
        encoding: 'utf8',
        stdio: ['ignore', 'pipe', 'pipe'],
      }).trim();
    } catch (error) {
      if (options.failureOk) {
        return null;
      }
      throw error;
    }
  }

  stageAll(): void {
    this.run(['add', '-A']);
  }

  commit(message: string, options: CommitOptions = {}): boolean {
    if (options.allowEmpty) {
      this.run(['commit', '--allow-empty', '-m', message]);
      return true;
    }

    // `diff --cached --quiet` exits non-zero when something is staged
    const unchanged = this.run(['diff', '--cached', '--quiet'], { failureOk: true }) !== null;
    if (unchanged && !this.isMerging()) {
      return false;
    }

    this.run(['commit', '-m', message]);
    return true;
  }

  /**
   * Whether a stopped merge is waiting for its commit
   */
  isMerging(): boolean {
    return fs.existsSync(path.join(this.gitDir, 'MERGE_HEAD'));
  }

  mergeFrom(ref: string): MergeResult {
    try {
      this.run(['merge', '--no-edit', ref]);
      return { conflicts: [] };
    } catch (error) {
      const conflicts = splitLines(
        this.run(['diff', '--name-only', '--diff-filter=U'], { failureOk: true })
      );
      if (conflicts.length === 0) {
        throw error;
      }
      return { conflicts };
    }
  }

  pushRef(ref: string): void {
    if (this.upstream) {
      this.run(['push', this.upstream, `HEAD:refs/heads/${ref}`]);
    } else {
      this.run(['update-ref', `refs/heads/${ref}`, 'HEAD']);
    }
  }

  readFileAt(ref: string, filepath: string): string | null {
    return this.run(['show', `${ref}:${filepath}`], { failureOk: true });
  }

  mergeBase(first: string, second: string): string | null {
    return this.run(['merge-base', first, second], { failureOk: true });
  }

  listUntracked(): string[] {
    return splitLines(this.run(['ls-files', '--others', '--exclude-standard'], { failureOk: true }));
  }

  listModified(): string[] {
    return splitLines(this.run(['ls-files', '--modified'], { failureOk: true }));
  }

  stash(): boolean {
    const before = this.stashCount();
    this.run(['stash', 'push', '--include-untracked'], { failureOk: true });
    return this.stashCount() > before;
  }

  stashPop(): boolean {
    return this.run(['stash', 'pop'], { failureOk: true }) !== null;
  }

  private stashCount(): number {
    return splitLines(this.run(['stash', 'list'], { failureOk: true })).length;
  }
}

export class GitBackend implements VersionControlBackend {
  initStore(layout: RepositoryLayout): void {
    execFileSync('git', ['init', '--bare', '--quiet', layout.gitDir], { stdio: 'pipe' });
    execFileSync(
      'git',
      ['config', `--file=${path.join(layout.gitDir, 'config')}`, 'core.excludesfile', layout.excludesFile],
      { stdio: 'pipe' }
    );
  }

  initShadow(layout: RepositoryLayout, trackingRef: string): void {
    fs.mkdirSync(layout.shadowDir, { recursive: true });
    execFileSync('git', ['clone', '--quiet', '--shared', layout.gitDir, layout.shadowDir], {
      stdio: 'pipe',
    });

    const shadow = this.createShadow(layout);
    shadow.run(['checkout', '-b', trackingRef]);
    shadow.commit('Shadow created', { allowEmpty: true });
    shadow.pushRef(trackingRef);
  }

  primary(layout: RepositoryLayout, onCommand?: CommandListener): Checkout {
    return new GitCheckout({ workTree: layout.workTree, gitDir: layout.gitDir, onCommand });
  }

  shadow(layout: RepositoryLayout, onCommand?: CommandListener): Checkout {
    return this.createShadow(layout, onCommand);
  }

  private createShadow(layout: RepositoryLayout, onCommand?: CommandListener): GitCheckout {
    return new GitCheckout({
      workTree: layout.shadowDir,
      gitDir: path.join(layout.shadowDir, '.git'),
      upstream: 'origin',
      onCommand,
    });
  }
}
