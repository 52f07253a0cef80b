#!/usr/bin/env node

/**
 * ticketfs CLI
 *
 * Edit issue tracker tickets as a folder of plain-text files
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { Ora } from 'ora';
import os from 'os';
import path from 'path';
import { config } from 'dotenv';
import { diffLines } from 'diff';
import { credentialsFromEnv, parseTicketTarget, resolveJiraCredentials } from './lib/config';
import { JiraClient, JiraCredentials } from './lib/jira-client';
import { LogSink, consoleSink } from './lib/logger';
import { SyncEngine, cloneTicketFolder } from './lib/sync-engine';
import { TicketFolder } from './lib/ticket-folder';
import { FieldDiff, TicketStatus } from './lib/types';

// Load environment variables from the working directory, then the user's defaults
config({ path: path.join(process.cwd(), '.env') });
config({ path: path.join(os.homedir(), '.ticketfs.env') });

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Log sink that keeps the active spinner below printed lines
 */
function spinnerSink(spinner: Ora): LogSink {
  return (entry) => {
    const spinning = spinner.isSpinning;
    if (spinning) {
      spinner.clear();
    }
    consoleSink(entry);
    if (spinning) {
      spinner.render();
    }
  };
}

/**
 * Open the folder given by --folder. Network commands resolve credentials up
 * front (asking for missing ones); local commands only use the environment.
 * Read-only commands skip migrations, which may need the tracker.
 */
async function openFolder(spinner: Ora, network: boolean, migrate = true): Promise<TicketFolder> {
  const folderPath = program.opts<{ folder: string }>().folder;
  const credentials: JiraCredentials | null = network ? await resolveJiraCredentials() : null;

  return TicketFolder.open(folderPath, {
    client: () => new JiraClient(credentials ?? credentialsFromEnv()),
    sink: spinnerSink(spinner),
    migrate,
  });
}

/**
 * Run one engine operation behind a spinner
 */
async function runOperation(
  label: string,
  network: boolean,
  operation: (engine: SyncEngine) => Promise<void> | void
): Promise<void> {
  const spinner = ora(`${label}...`);

  try {
    const folder = await openFolder(spinner, network);
    spinner.start(`${label} ${folder.ticketKey}...`);
    await operation(new SyncEngine(folder));
    spinner.succeed(`${label} complete`);
  } catch (error) {
    spinner.fail(`${label} failed`);
    console.error(chalk.red(`\nError: ${errorMessage(error)}`));
    process.exit(1);
  }
}

function printFieldDiff(field: string, [original, local]: FieldDiff): void {
  console.log(chalk.bold(`  ${field}`));
  for (const part of diffLines(original, local ?? '')) {
    const lines = part.value.replace(/\n$/, '').split('\n');
    for (const line of lines) {
      if (part.added) {
        console.log(chalk.green(`    + ${line}`));
      } else if (part.removed) {
        console.log(chalk.red(`    - ${line}`));
      } else {
        console.log(chalk.gray(`      ${line}`));
      }
    }
  }
}

/**
 * Print status summary
 */
function printStatus(ticketKey: string, summary: string, status: TicketStatus): void {
  console.log(chalk.bold('\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
  console.log(chalk.bold.cyan(`${ticketKey}: ${summary}`));
  console.log(chalk.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n'));

  const differing = Object.entries(status.localDiffers);

  if (status.toUpload.length === 0 && differing.length === 0 && !status.newComment) {
    console.log(chalk.green('✓ No local changes'));
    console.log();
    return;
  }

  if (status.toUpload.length > 0) {
    console.log(chalk.yellow(`${status.toUpload.length} file(s) to upload:`));
    for (const filename of status.toUpload) {
      console.log(chalk.gray(`  ${filename}`));
    }
    console.log();
  }

  if (differing.length > 0) {
    console.log(chalk.yellow(`${differing.length} field(s) changed:`));
    for (const [field, diff] of differing) {
      printFieldDiff(field, diff);
    }
    console.log();
  }

  if (status.newComment) {
    console.log(chalk.yellow('New comment:'));
    for (const line of status.newComment.split('\n')) {
      console.log(chalk.gray(`  ${line}`));
    }
    console.log();
  }
}

// Create CLI
const program = new Command();

program
  .name('ticketfs')
  .description('Edit issue tracker tickets as a folder of plain-text files')
  .version('1.0.0')
  .option('-C, --folder <path>', 'Ticket folder to operate on', process.cwd());

program
  .command('clone')
  .description('Create a ticket folder and populate it from the tracker')
  .argument('<ticket>', 'Ticket key (PROJ-123) or browse URL')
  .argument('[path]', 'Folder to create (defaults to the ticket key)')
  .action(async (ticket: string, folderPath: string | undefined) => {
    const target = parseTicketTarget(ticket);
    const spinner = ora(`Cloning ${target.key}...`);

    try {
      const credentials = await resolveJiraCredentials(process.env, { server: target.server });
      spinner.start();

      const folder = await cloneTicketFolder(folderPath ?? target.key, {
        client: () => new JiraClient(credentials),
        sink: spinnerSink(spinner),
      });

      spinner.succeed(`Cloned ${folder.ticketKey} into ${folder.path}`);
    } catch (error) {
      spinner.fail('Clone failed');
      console.error(chalk.red(`\nError: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

program
  .command('status')
  .description('Show local changes that would be pushed')
  .action(async () => {
    const spinner = ora('Checking status...');

    try {
      const folder = await openFolder(spinner, false, false);
      const engine = new SyncEngine(folder);
      const status = engine.status();
      const issue = await folder.getCachedIssue();
      const summary = typeof issue.fields.summary === 'string' ? issue.fields.summary : '';

      printStatus(folder.ticketKey, summary, status);
    } catch (error) {
      console.error(chalk.red(`\nError: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

program
  .command('fetch')
  .description('Fetch remote changes into the shadow tree without merging')
  .action(() => runOperation('Fetch', true, (engine) => engine.fetch()));

program
  .command('merge')
  .description('Merge fetched remote changes into the working tree')
  .action(() => runOperation('Merge', false, (engine) => engine.merge()));

program
  .command('pull')
  .description('Fetch and merge remote changes')
  .action(() => runOperation('Pull', true, (engine) => engine.pull()));

program
  .command('push')
  .description('Upload local files, comments and field changes')
  .action(() => runOperation('Push', true, (engine) => engine.push()));

program
  .command('sync', { isDefault: true })
  .description('Pull remote changes, then push local ones')
  .action(() => runOperation('Sync', true, (engine) => engine.sync()));

program
  .command('log')
  .description('Print the folder operation log')
  .action(async () => {
    try {
      const folder = await openFolder(ora(), false, false);
      process.stdout.write(folder.getLog());
    } catch (error) {
      console.error(chalk.red(`\nError: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

program
  .command('migrate')
  .description('Bring the folder layout up to the current version')
  .action(async () => {
    const spinner = ora('Migrating...');

    try {
      const credentials = await resolveJiraCredentials();
      const folder = await TicketFolder.open(program.opts<{ folder: string }>().folder, {
        client: () => new JiraClient(credentials),
        sink: spinnerSink(spinner),
        migrate: false,
      });

      spinner.start();
      const applied = await folder.runMigrations();
      if (applied.length === 0) {
        spinner.succeed(`Already at version ${folder.version}`);
      } else {
        spinner.succeed(`Applied migration(s) ${applied.join(', ')}; now at version ${folder.version}`);
      }
    } catch (error) {
      spinner.fail('Migration failed');
      console.error(chalk.red(`\nError: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

// Parse and execute
program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`\nError: ${errorMessage(error)}`));
  process.exit(1);
});
