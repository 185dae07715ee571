import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { RecordAdapter } from './index';
import { FsRecordStore } from '../../record_store/fs/fs_record_store';
import { FsLockManager, defaultLockPath } from '../../lock/fs/fs_lock_manager';
import { MemoryGitModule } from '../../git';
import { SyncEngine } from '../../sync';
import { QueryEngine } from '../../query';
import { EventBus } from '../../event_bus';
import type { TaskdeckEvent } from '../../event_bus';
import { RecordNotFoundError, ValidationError } from '../../validation/errors';

const NOW = new Date(2025, 9, 15, 9, 30);

async function createAdapter(dataDir: string, git: MemoryGitModule = new MemoryGitModule()) {
  const store = new FsRecordStore({ dataDir });
  await store.load();
  const eventBus = new EventBus();
  const sync = new SyncEngine({
    store,
    git,
    eventBus,
    lock: new FsLockManager({ lockPath: defaultLockPath(dataDir), pollIntervalMs: 5 }),
    options: { batchWindowMs: 0 },
  });
  await sync.initialize();
  const adapter = new RecordAdapter({ store, sync, eventBus, query: new QueryEngine(store), now: () => NOW });
  return { adapter, store, eventBus, git, sync };
}

describe('RecordAdapter', () => {
  let root: string;
  let dataDir: string;
  let adapter: RecordAdapter;
  let eventBus: EventBus;
  let git: MemoryGitModule;
  let events: TaskdeckEvent[];

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'taskdeck-adapter-test-'));
    dataDir = path.join(root, 'tasks');
    ({ adapter, eventBus, git } = await createAdapter(dataDir));
    events = [];
    eventBus.subscribeToAll((event) => {
      if (event.type !== 'sync.phase.changed') events.push(event);
    });
  });

  afterEach(async () => {
    eventBus.clearSubscriptions();
    await fs.rm(root, { recursive: true, force: true });
  });

  // ─────────────────────────────────────────────────────────
  // create
  // ─────────────────────────────────────────────────────────

  describe('create', () => {
    it('should create an active record and report it synced', async () => {
      const { record, sync } = await adapter.create({ title: 'Draft Q4 Strategy', priority: 'high' });
      await eventBus.waitForIdle();

      expect(record).toMatchObject({ title: 'Draft Q4 Strategy', status: 'active', priority: 'high', kind: 'task' });
      expect(sync).toEqual({ status: 'synced', phase: 'Idle' });
      expect(git.commits[0]?.message).toBe('taskdeck: create task "Draft Q4 Strategy"');
      expect(events.map((e) => e.type)).toEqual(['record.created']);
    });

    it('should reject a blank title before touching the store', async () => {
      await expect(adapter.create({ title: '   ' })).rejects.toBeInstanceOf(ValidationError);
      expect(git.calls).toEqual([]);
    });

    it('should store priority the same way patch does', async () => {
      const { record } = await adapter.create({ title: 'Shouty', priority: ' HIGH ' });
      const { record: patched } = await adapter.patch(record.id, 'priority', ' Low ');

      expect(record.priority).toBe('high');
      expect(patched.priority).toBe('low');
      expect((await adapter.readDetail(record.id)).priority).toBe('low');
    });

    it('should reject a priority outside high, medium and low', async () => {
      await expect(adapter.create({ title: 'Odd', priority: 'urgent' })).rejects.toBeInstanceOf(ValidationError);
      expect(adapter.list()).toEqual([]);
    });
  });

  // ─────────────────────────────────────────────────────────
  // patch
  // ─────────────────────────────────────────────────────────

  describe('patch', () => {
    it('should update one field and publish record.updated', async () => {
      const { record } = await adapter.create({ title: 'Plan trip' });

      const result = await adapter.patch(record.id, 'due_date', '2025-11-01');
      await eventBus.waitForIdle();

      expect(result.record.dueDate).toBe('2025-11-01');
      expect(events.at(-1)).toMatchObject({ type: 'record.updated', payload: { recordId: record.id, field: 'due_date' } });
      expect(git.commits.at(-1)?.message).toBe(`taskdeck: update ${record.id} due_date`);
    });

    it('should append notes to the body', async () => {
      const { record } = await adapter.create({ title: 'Call bank', body: 'Ask about fees.' });

      const { record: patched } = await adapter.patch(record.id, 'notes', 'Left a voicemail.');

      expect(patched.body).toBe('Ask about fees.\n\nLeft a voicemail.');
    });

    it('should refuse unknown and immutable fields', async () => {
      const { record } = await adapter.create({ title: 'Fixed' });

      await expect(adapter.patch(record.id, 'created_at', '2020-01-01T00:00:00Z')).rejects.toThrow(
        'Validation failed: field: must be one of title, status, priority, tags, due_date, parent_goal_id, body, notes',
      );
    });

    it('should surface NotFound for an unknown id', async () => {
      await expect(adapter.patch('missing', 'title', 'x')).rejects.toBeInstanceOf(RecordNotFoundError);
    });

    it('should publish a status change once', async () => {
      const { record } = await adapter.create({ title: 'Review PR' });

      await adapter.patch(record.id, 'status', 'next');
      await adapter.patch(record.id, 'status', 'next');
      await eventBus.waitForIdle();

      const statusEvents = events.filter((e) => e.type === 'record.status.changed');
      expect(statusEvents).toHaveLength(1);
      expect(statusEvents[0]).toMatchObject({ payload: { oldStatus: 'active', newStatus: 'next', archived: false } });
    });
  });

  // ─────────────────────────────────────────────────────────
  // complete / archive
  // ─────────────────────────────────────────────────────────

  describe('complete', () => {
    it('should be idempotent after a status patch to done', async () => {
      const { record } = await adapter.create({ title: 'Send invoice' });

      await adapter.patch(record.id, 'status', 'done');
      const { record: completed } = await adapter.complete(record.id);

      expect(completed.status).toBe('done');
      expect((await adapter.readDetail(record.id)).status).toBe('done');
    });

    it('should move the record to the archive area on request', async () => {
      const { record } = await adapter.create({ title: 'Old chore' });

      await adapter.complete(record.id, { archive: true });
      const detail = await adapter.readDetail(record.id);

      expect(detail).toMatchObject({ status: 'done', location: 'archive' });
      await expect(fs.access(path.join(dataDir, 'archive', `${record.id}.md`))).resolves.toBeUndefined();
      expect(adapter.list().map((h) => h.id)).toEqual([]);
      expect(adapter.list({ includeArchived: true }).map((h) => h.id)).toEqual([record.id]);
    });

    it('should archive with status archived', async () => {
      const { record } = await adapter.create({ title: 'Someday' });

      const { record: archived } = await adapter.archive(record.id);
      await eventBus.waitForIdle();

      expect(archived.status).toBe('archived');
      expect(events.at(-1)).toMatchObject({
        type: 'record.status.changed',
        payload: { oldStatus: 'active', newStatus: 'archived', archived: true },
      });
    });
  });

  // ─────────────────────────────────────────────────────────
  // reads
  // ─────────────────────────────────────────────────────────

  describe('reads', () => {
    it('should read full detail including the body', async () => {
      const { record } = await adapter.create({ title: 'Write essay', body: 'Outline first.' });

      const detail = await adapter.readDetail(record.id);

      expect(detail).toEqual({ ...record, location: 'active' });
    });

    it('should compute the daily summary for the injected clock', async () => {
      await adapter.create({ title: 'Due today', priority: 'high', dueDate: '2025-10-15' });
      await adapter.create({ title: 'Late', dueDate: '2025-10-01' });
      await adapter.create({ title: 'Later', dueDate: '2025-12-01' });

      const summary = adapter.dailySummary();

      expect(summary.date).toBe('2025-10-15');
      expect(summary.highPriority.map((h) => h.title)).toEqual(['Due today']);
      expect(summary.dueToday.map((h) => h.title)).toEqual(['Due today']);
      expect(summary.overdue.map((h) => h.title)).toEqual(['Late']);
      expect(summary.totalActive).toBe(3);
    });

    it('should expose sync state without touching git', async () => {
      const callsBefore = git.calls.length;

      expect(adapter.syncStatus()).toMatchObject({ phase: 'Idle', mode: 'remote' });
      expect(git.calls.length).toBe(callsBefore);
    });

    it('should report pending while the remote is unreachable', async () => {
      git.setPushFailure({ kind: 'network' });

      const { sync } = await adapter.create({ title: 'Offline edit' });

      expect(sync.status).toBe('pending');
      git.setPushFailure(null);
      expect((await adapter.syncNow()).status).toBe('synced');
    });
  });

  // ─────────────────────────────────────────────────────────
  // Two processes
  // ─────────────────────────────────────────────────────────

  describe('concurrent writers', () => {
    it('should keep both notes when two instances append at once', async () => {
      const { record } = await adapter.create({ title: 'Shared' });
      const second = await createAdapter(dataDir, new MemoryGitModule({ repository: false }));

      await Promise.all([
        adapter.patch(record.id, 'notes', 'from the board'),
        second.adapter.patch(record.id, 'notes', 'from the agent'),
      ]);

      const body = (await adapter.readDetail(record.id)).body;
      expect(body.split('\n\n').sort()).toEqual(['from the agent', 'from the board']);
    });

    it('should see records created by the other instance after reload', async () => {
      const second = await createAdapter(dataDir, new MemoryGitModule({ repository: false }));
      const { record } = await second.adapter.create({ title: 'From elsewhere' });

      const report = await adapter.reload();

      expect(report.added).toEqual([record.id]);
      expect(adapter.list().map((h) => h.title)).toEqual(['From elsewhere']);
    });
  });
});
