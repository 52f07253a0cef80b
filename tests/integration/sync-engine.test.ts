import fs from 'fs';
import os from 'os';
import path from 'path';
import { MergeConflictError } from '../../src/lib/errors';
import { LogEntry } from '../../src/lib/logger';
import { RemoteFileMetadataStore } from '../../src/lib/remote-file-metadata';
import { SyncEngine, cloneTicketFolder, openSyncEngine } from '../../src/lib/sync-engine';
import { TicketFolder, TicketFolderOptions } from '../../src/lib/ticket-folder';
import { FakeTracker } from '../helpers/fake-tracker';
import { MemoryBackend } from '../helpers/memory-backend';

describe('SyncEngine', () => {
  let root: string;
  let folderPath: string;
  let tracker: FakeTracker;
  let backend: MemoryBackend;
  let sink: jest.Mock<void, [LogEntry]>;

  function options(): TicketFolderOptions {
    return { client: () => tracker, backend, sink, homeDir: path.join(root, 'home') };
  }

  function readLocal(folder: TicketFolder, filename: string): string {
    return fs.readFileSync(folder.getLocalPath(filename), 'utf-8');
  }

  function writeLocal(folder: TicketFolder, filename: string, content: string): void {
    fs.writeFileSync(folder.getLocalPath(filename), content);
  }

  async function clone(): Promise<{ folder: TicketFolder; engine: SyncEngine }> {
    const folder = await cloneTicketFolder(folderPath, options());
    return { folder, engine: new SyncEngine(folder) };
  }

  beforeEach(() => {
    root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'ticketfs-sync-')));
    folderPath = path.join(root, 'PROJ-123');
    backend = new MemoryBackend();
    sink = jest.fn<void, [LogEntry]>();
    tracker = new FakeTracker('PROJ-123', {
      summary: 'Fix login',
      description: 'A',
      status: { name: 'Open' },
    });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('clone', () => {
    it('should render the issue into the working tree', async () => {
      const { folder } = await clone();

      expect(readLocal(folder, 'fields.ticket.txt')).toBe('status::\n\n    Open\n\nsummary::\n\n    Fix login\n\n');
      expect(readLocal(folder, 'description.ticket.txt')).toBe('A\n');
      expect(readLocal(folder, 'comments.read_only.ticket.txt')).toBe('');
      expect(readLocal(folder, 'new_comment.ticket.txt')).toBe('');
    });

    it('should leave a clean status', async () => {
      const { engine } = await clone();

      expect(engine.status()).toEqual({ toUpload: [], localDiffers: {}, newComment: '' });
    });

    it('should refuse to clone into an existing directory', async () => {
      fs.mkdirSync(folderPath);

      await expect(cloneTicketFolder(folderPath, options())).rejects.toThrow();
    });
  });

  describe('fetch', () => {
    let folder: TicketFolder;
    let engine: SyncEngine;

    beforeEach(async () => {
      tracker.addRemoteAttachment('spec.pdf', 'pdf-bytes', 'T1');
      fs.mkdirSync(folderPath);
      folder = await TicketFolder.initialize(folderPath, options());
      engine = new SyncEngine(folder);
    });

    it('should download new attachments into the shadow tree only', async () => {
      await engine.fetch();

      expect(tracker.calls.downloads).toEqual(['spec.pdf']);
      expect(fs.readFileSync(folder.getShadowPath('spec.pdf'), 'utf-8')).toBe('pdf-bytes');
      expect(new RemoteFileMetadataStore(folder.shadow).read()).toEqual({ 'spec.pdf': 'T1' });
      expect(fs.existsSync(folder.getLocalPath('spec.pdf'))).toBe(false);
      expect(folder.getLog()).toContain('\tINFO\tDownload file "spec.pdf"\n');
    });

    it('should not download or commit anything when nothing changed remotely', async () => {
      await engine.fetch();
      const shadow = backend.shadow(folder.layout);
      const commits = shadow.commitCount;

      await engine.fetch();

      expect(tracker.calls.downloads).toEqual(['spec.pdf']);
      expect(shadow.commitCount).toBe(commits);
    });

    it('should download an attachment again when its token changes', async () => {
      await engine.fetch();
      tracker.addRemoteAttachment('spec.pdf', 'pdf-bytes v2', 'T2');

      await engine.fetch();

      expect(tracker.calls.downloads).toEqual(['spec.pdf', 'spec.pdf']);
      expect(fs.readFileSync(folder.getShadowPath('spec.pdf'), 'utf-8')).toBe('pdf-bytes v2');
      expect(new RemoteFileMetadataStore(folder.shadow).read()).toEqual({ 'spec.pdf': 'T2' });
    });

    it('should skip attachments matching the remote ignore file', async () => {
      writeLocal(folder, '.ticketfs_remote_ignore', '*.pdf\n');

      await engine.fetch();

      expect(tracker.calls.downloads).toEqual([]);
      expect(await engine.getRemotelyChanged()).toEqual([]);
    });

    it('should refresh the stored issue snapshot', async () => {
      tracker.fields.summary = 'Fix logout';

      await engine.fetch();

      const reopened = await TicketFolder.open(folderPath, options());
      const issue = await reopened.getCachedIssue();
      expect(issue.fields.summary).toBe('Fix logout');
    });
  });

  describe('merge', () => {
    it('should bring fetched files into the working tree', async () => {
      const { folder, engine } = await clone();
      tracker.addRemoteAttachment('spec.pdf', 'pdf-bytes', 'T1');
      tracker.fields.summary = 'Fix logout';

      await engine.pull();

      expect(readLocal(folder, 'spec.pdf')).toBe('pdf-bytes');
      expect(readLocal(folder, 'fields.ticket.txt')).toBe('status::\n\n    Open\n\nsummary::\n\n    Fix logout\n\n');
    });

    it('should keep uncommitted local edits', async () => {
      const { folder, engine } = await clone();
      writeLocal(folder, 'description.ticket.txt', 'B\n');
      writeLocal(folder, 'draft.txt', 'work in progress');
      tracker.fields.summary = 'Fix logout';

      await engine.pull();

      expect(readLocal(folder, 'description.ticket.txt')).toBe('B\n');
      expect(readLocal(folder, 'draft.txt')).toBe('work in progress');
      expect(readLocal(folder, 'fields.ticket.txt')).toContain('    Fix logout\n');
    });

    it('should restore uncommitted local edits when the merge fails', async () => {
      const { folder, engine } = await clone();
      writeLocal(folder, 'description.ticket.txt', 'B\n');
      writeLocal(folder, 'draft.txt', 'work in progress');
      jest.spyOn(folder.primary, 'mergeFrom').mockImplementation(() => {
        throw new Error('index.lock exists');
      });

      expect(() => engine.merge()).toThrow('index.lock exists');

      expect(readLocal(folder, 'description.ticket.txt')).toBe('B\n');
      expect(readLocal(folder, 'draft.txt')).toBe('work in progress');
    });
  });

  describe('merge conflicts', () => {
    async function conflictingDescription(): Promise<{ folder: TicketFolder; engine: SyncEngine }> {
      const cloned = await clone();
      writeLocal(cloned.folder, 'description.ticket.txt', 'B\n');
      await cloned.engine.push();
      tracker.fields.description = 'C';
      return cloned;
    }

    it('should stop the sync before pushing anything', async () => {
      const { folder, engine } = await conflictingDescription();

      await expect(engine.sync()).rejects.toBeInstanceOf(MergeConflictError);

      expect(tracker.calls.updates).toEqual([{ description: 'B' }]);
      expect(tracker.fields.description).toBe('C');
      expect(folder.getLog()).toContain('\tERROR\tMerge conflicts in description.ticket.txt');
    });

    it('should leave the conflict markers in the working tree', async () => {
      const { folder, engine } = await conflictingDescription();

      await expect(engine.pull()).rejects.toThrow('Merge conflicts in description.ticket.txt');

      expect(readLocal(folder, 'description.ticket.txt')).toBe(
        '<<<<<<< HEAD\nB\n=======\nC\n>>>>>>> remote-state\n'
      );
    });

    it('should refuse to push while conflict markers remain', async () => {
      const { engine } = await conflictingDescription();
      await expect(engine.pull()).rejects.toBeInstanceOf(MergeConflictError);

      await expect(engine.push()).rejects.toBeInstanceOf(MergeConflictError);

      expect(tracker.calls.updates).toEqual([{ description: 'B' }]);
    });

    it('should push the resolved value once the markers are removed', async () => {
      const { folder, engine } = await conflictingDescription();
      await expect(engine.pull()).rejects.toBeInstanceOf(MergeConflictError);
      writeLocal(folder, 'description.ticket.txt', 'D\n');

      await engine.push();

      expect(tracker.calls.updates).toEqual([{ description: 'B' }, { description: 'D' }]);
      expect(tracker.fields.description).toBe('D');
    });
  });

  describe('status', () => {
    it('should list new and modified files that are not ignored', async () => {
      const { folder, engine } = await clone();
      tracker.addRemoteAttachment('spec.pdf', 'pdf-bytes', 'T1');
      await engine.pull();

      writeLocal(folder, 'notes.txt', 'hello');
      writeLocal(folder, 'spec.pdf', 'edited');
      writeLocal(folder, 'debug.log', 'noise');
      writeLocal(folder, '.ticketfs_ignore', '*.log\n');

      expect(engine.status().toUpload.sort()).toEqual(['notes.txt', 'spec.pdf']);
    });

    it('should honor the user-global ignore file', async () => {
      const { folder, engine } = await clone();
      fs.mkdirSync(path.join(root, 'home'));
      fs.writeFileSync(path.join(root, 'home', '.ticketfs_ignore'), '*.tmp\n');

      writeLocal(folder, 'scratch.tmp', 'x');

      expect(engine.status().toUpload).toEqual([]);
    });

    it('should ignore matching files in subdirectories', async () => {
      const { folder, engine } = await clone();
      fs.mkdirSync(folder.getLocalPath('logs'));
      writeLocal(folder, 'logs/debug.log', 'noise');
      writeLocal(folder, '.ticketfs_ignore', '*.log\n');

      expect(engine.getLocallyChanged()).toEqual([]);
    });

    it('should report fields edited locally with their original value', async () => {
      const { folder, engine } = await clone();
      writeLocal(folder, 'description.ticket.txt', 'B\n');

      expect(engine.status().localDiffers).toEqual({ description: ['A', 'B'] });
    });

    it('should report a removed field as null', async () => {
      const { folder, engine } = await clone();
      writeLocal(folder, 'fields.ticket.txt', 'status::\n\n    Open\n\n');

      expect(engine.status().localDiffers).toEqual({ summary: ['Fix login', null] });
    });

    it('should ignore fields that did not exist remotely', async () => {
      const { folder, engine } = await clone();
      fs.appendFileSync(folder.getLocalPath('fields.ticket.txt'), 'severity::\n\n    High\n\n');

      expect(engine.status().localDiffers).toEqual({});
    });

    it('should include the pending comment', async () => {
      const { folder, engine } = await clone();
      writeLocal(folder, 'new_comment.ticket.txt', 'looks good\n');

      expect(engine.status().newComment).toBe('looks good');
    });
  });

  describe('push', () => {
    it('should upload a new file and not fetch it back', async () => {
      const { folder, engine } = await clone();
      writeLocal(folder, 'notes.txt', 'hello');

      await engine.push();

      expect(tracker.calls.uploads).toEqual(['notes.txt']);
      expect(new RemoteFileMetadataStore(folder.shadow).read()).toEqual({
        'notes.txt': '2024-01-01T00:00:01.000+0000',
      });
      expect(engine.status().toUpload).toEqual([]);

      await engine.pull();

      expect(tracker.calls.downloads).toEqual([]);
      expect(readLocal(folder, 'notes.txt')).toBe('hello');
    });

    it('should replace a remote attachment with the same name', async () => {
      tracker.addRemoteAttachment('spec.pdf', 'pdf-bytes', 'T1');
      const { folder, engine } = await clone();
      writeLocal(folder, 'spec.pdf', 'edited');

      await engine.push();

      expect(tracker.calls.deletions).toEqual(['spec.pdf']);
      expect(tracker.calls.uploads).toEqual(['spec.pdf']);
      expect(tracker.attachments.map((attachment) => attachment.content.toString())).toEqual(['edited']);

      await engine.fetch();

      expect(tracker.calls.downloads).toEqual(['spec.pdf']);
    });

    it('should post the pending comment and clear it', async () => {
      const { folder, engine } = await clone();
      writeLocal(folder, 'new_comment.ticket.txt', 'looks good\n');

      await engine.push();

      expect(tracker.calls.comments).toEqual(['looks good']);
      expect(readLocal(folder, 'new_comment.ticket.txt')).toBe('');
      expect(folder.getLog()).toContain('\tINFO\tAdding comment "looks good"\n');
    });

    it('should not post a whitespace-only comment', async () => {
      const { folder, engine } = await clone();
      writeLocal(folder, 'new_comment.ticket.txt', '  \n\n');

      await engine.push();

      expect(tracker.calls.comments).toEqual([]);
    });

    it('should show a posted comment in the transcript after the next pull', async () => {
      const { folder, engine } = await clone();
      writeLocal(folder, 'new_comment.ticket.txt', 'looks good\n');
      await engine.push();

      await engine.pull();

      expect(readLocal(folder, 'comments.read_only.ticket.txt')).toBe(
        '2024-01-01T00:00:01.000+0000: Test User::\n\n    looks good\n\n'
      );
    });

    it('should send changed fields in a single update', async () => {
      const { folder, engine } = await clone();
      writeLocal(folder, 'description.ticket.txt', 'B\n');
      writeLocal(folder, 'fields.ticket.txt', 'status::\n\n    Open\n\nsummary::\n\n    Fix logout\n\n');

      await engine.push();

      expect(tracker.calls.updates).toEqual([{ description: 'B', summary: 'Fix logout' }]);
      expect(folder.getLog()).toContain('\tINFO\tUpdating fields "summary, description"\n');
    });

    it('should make no tracker calls when nothing changed', async () => {
      const { engine } = await clone();

      await engine.push();

      expect(tracker.calls.uploads).toEqual([]);
      expect(tracker.calls.comments).toEqual([]);
      expect(tracker.calls.updates).toEqual([]);
    });
  });

  describe('sync', () => {
    it('should settle field edits once the tracker reflects them', async () => {
      const { folder, engine } = await clone();
      writeLocal(folder, 'description.ticket.txt', 'B\n');

      await engine.sync();
      await engine.sync();

      expect(tracker.fields.description).toBe('B');
      expect(tracker.calls.updates).toEqual([{ description: 'B' }]);
      expect(engine.status().localDiffers).toEqual({});
      expect(readLocal(folder, 'description.ticket.txt')).toBe('B\n');
    });
  });

  describe('openSyncEngine', () => {
    it('should open an existing folder', async () => {
      await clone();

      const engine = await openSyncEngine(folderPath, options());

      expect(engine.folder.ticketKey).toBe('PROJ-123');
      expect(engine.status().toUpload).toEqual([]);
    });
  });
});
