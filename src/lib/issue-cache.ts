/**
 * Per-folder cache of the remote issue: live fetches and the persisted snapshot
 */

import { ZodError } from 'zod';
import { IssueSnapshot } from './types';

export interface IssueLoaders {
  /** Fetch the issue over the network */
  fetchRemote(): Promise<IssueSnapshot>;
  /** Rebuild the issue from the persisted snapshot; null when there is none */
  readCached(): IssueSnapshot | null;
  /** Called when the persisted snapshot could not be used */
  onCacheMiss(reason: string): void;
}

export class IssueCache {
  private remote: IssueSnapshot | null = null;
  private cached: IssueSnapshot | null = null;

  constructor(private readonly loaders: IssueLoaders) {}

  /**
   * Remote issue, fetched once per cache lifetime
   */
  async getIssue(): Promise<IssueSnapshot> {
    if (!this.remote) {
      this.remote = await this.loaders.fetchRemote();
    }
    return this.remote;
  }

  /**
   * Drop the memoized remote issue and fetch it again
   */
  async refresh(): Promise<IssueSnapshot> {
    this.remote = null;
    return this.getIssue();
  }

  /**
   * Issue from the persisted snapshot, falling back to the network
   */
  async getCachedIssue(): Promise<IssueSnapshot> {
    if (this.cached) {
      return this.cached;
    }

    let snapshot: IssueSnapshot | null = null;
    try {
      snapshot = this.loaders.readCached();
      if (!snapshot) {
        this.loaders.onCacheMiss('Cached issue snapshot does not exist');
      }
    } catch (error) {
      // Unreadable snapshot contents; other I/O failures propagate
      if (!(error instanceof SyntaxError || error instanceof ZodError)) {
        throw error;
      }
      this.loaders.onCacheMiss(`Error encountered while loading cached issue: ${error.message}`);
    }

    this.cached = snapshot ?? (await this.getIssue());
    return this.cached;
  }
}
