/**
 * Schema migrations for ticket folders
 *
 * A folder without a version marker is at version 1. Each migration brings a
 * folder from `version - 1` to `version` and writes the new version marker as
 * its last step, so an interrupted migration is retried from the same step.
 */

import { CURRENT_VERSION, TRACKING_REF } from './constants';
import { MigrationTableError } from './errors';
import { LogLevel } from './logger';
import { RemoteFileMetadataStore } from './remote-file-metadata';
import type { TicketFolder } from './ticket-folder';

export interface Migration {
  version: number;
  name: string;
  run(folder: TicketFolder): Promise<void>;
}

export const MIGRATIONS: Migration[] = [
  {
    version: 2,
    name: 'create-shadow-repository',
    async run(folder) {
      folder.backend.initShadow(folder.layout, TRACKING_REF);
      folder.setVersion(2);
    },
  },
  {
    version: 3,
    name: 'create-remote-file-metadata',
    async run(folder) {
      new RemoteFileMetadataStore(folder.shadow).write({});
      folder.shadow.commit('Remote file metadata created');
      folder.shadow.pushTo(TRACKING_REF);
      folder.primary.mergeFrom(TRACKING_REF);
      folder.setVersion(3);
    },
  },
  {
    version: 4,
    name: 'store-cached-issue',
    async run(folder) {
      await folder.storeCachedIssue();
      folder.setVersion(4);
    },
  },
];

/**
 * Ensure the table covers every version from 2 to `currentVersion` in order
 */
export function validateMigrations(migrations: Migration[], currentVersion: number): void {
  const expected = currentVersion - 1;
  if (migrations.length !== expected) {
    throw new MigrationTableError(
      `Expected ${expected} migration(s) up to version ${currentVersion}, found ${migrations.length}`
    );
  }

  migrations.forEach((migration, index) => {
    if (migration.version !== index + 2) {
      throw new MigrationTableError(
        `Migration "${migration.name}" is registered for version ${migration.version}, expected ${index + 2}`
      );
    }
  });
}

export class MigrationRunner {
  constructor(
    private readonly migrations: Migration[] = MIGRATIONS,
    readonly currentVersion: number = CURRENT_VERSION
  ) {
    validateMigrations(migrations, currentVersion);
  }

  /**
   * Apply every pending migration in ascending order; returns the versions applied
   */
  async run(folder: TicketFolder, options: { silent?: boolean } = {}): Promise<number[]> {
    const level = options.silent ? LogLevel.DEBUG : LogLevel.INFO;
    const applied: number[] = [];

    while (folder.version < this.currentVersion) {
      const migration = this.migrations[folder.version - 1];

      folder.logger.log(level, `${migration.name}: Migration started`);
      await migration.run(folder);
      if (folder.version !== migration.version) {
        throw new MigrationTableError(
          `Migration "${migration.name}" did not record version ${migration.version}`
        );
      }
      folder.logger.log(level, `${migration.name}: Migration finished`);

      applied.push(migration.version);
    }

    return applied;
  }
}

export const defaultMigrationRunner = new MigrationRunner();
