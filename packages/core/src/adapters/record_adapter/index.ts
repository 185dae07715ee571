import type { IRecordStore, ReloadReport } from '../../record_store';
import type { ISyncEngine, SyncOutcome, SyncState } from '../../sync';
import type { QueryEngine, DailySummary, ListQuery } from '../../query';
import type { IEventStream } from '../../event_bus';
import {
  isPatchField,
  PATCH_FIELDS,
  toHeader,
  type RecordHeader,
  type RecordLocation,
  type RecordStatus,
  type TaskdeckRecord,
} from '../../record_types';
import { ValidationError } from '../../validation/errors';
import { toCalendarDate } from '../../utils/date_utils';
import type {
  CompleteOptions,
  CreateRecordInput,
  IRecordAdapter,
  MutationResult,
  RecordAdapterDependencies,
  RecordDetail,
} from './record_adapter.types';

export type {
  CompleteOptions,
  CreateRecordInput,
  IRecordAdapter,
  MutationResult,
  RecordAdapterDependencies,
  RecordDetail,
} from './record_adapter.types';

const SOURCE = 'record_adapter';

/**
 * RecordAdapter - the Tool Facade
 *
 * Every mutation goes through the sync engine, which runs it under the
 * lock inside a pull/commit/push cycle. Callers get the record and the
 * sync outcome together; sync trouble never fails the call.
 */
export class RecordAdapter implements IRecordAdapter {
  private store: IRecordStore;
  private query: QueryEngine;
  private sync: ISyncEngine;
  private eventBus: IEventStream;
  private now: () => Date;

  constructor(dependencies: RecordAdapterDependencies) {
    this.store = dependencies.store;
    this.query = dependencies.query;
    this.sync = dependencies.sync;
    this.eventBus = dependencies.eventBus;
    this.now = dependencies.now ?? (() => new Date());
  }

  async create(input: CreateRecordInput): Promise<MutationResult> {
    if (typeof input.title !== 'string' || !input.title.trim()) {
      throw ValidationError.forField('title', 'must not be empty', input.title);
    }

    const { value: record, outcome } = await this.sync.submit({
      summary: `create ${input.kind ?? 'task'} "${input.title.trim()}"`,
      apply: () => this.store.create(input),
    });

    this.eventBus.publish({
      type: 'record.created',
      timestamp: this.now().getTime(),
      source: SOURCE,
      payload: { recordId: record.id, header: toHeader(record) },
    });

    return { record, sync: outcome };
  }

  async patch(id: string, field: string, value: unknown): Promise<MutationResult> {
    if (!isPatchField(field)) {
      throw ValidationError.forField('field', `must be one of ${PATCH_FIELDS.join(', ')}`, field);
    }

    const { value: change, outcome } = await this.sync.submit({
      summary: `update ${id} ${field}`,
      apply: async () => {
        const before = await this.snapshot(id);
        const after = await this.store.patch(id, field, value);
        return { before, after };
      },
    });

    if (field === 'status') {
      this.publishStatusChange(change.before, change.after);
    } else {
      this.eventBus.publish({
        type: 'record.updated',
        timestamp: this.now().getTime(),
        source: SOURCE,
        payload: { recordId: id, field },
      });
    }

    return { record: change.after, sync: outcome };
  }

  list(query: ListQuery = {}): RecordHeader[] {
    return this.query.list(query);
  }

  async readDetail(id: string): Promise<RecordDetail> {
    const record = await this.store.read(id);
    return { ...record, location: this.store.locate(id) ?? 'active' };
  }

  async complete(id: string, options: CompleteOptions = {}): Promise<MutationResult> {
    return this.transition(id, 'done', options.archive === true, `complete ${id}`);
  }

  async archive(id: string): Promise<MutationResult> {
    return this.transition(id, 'archived', true, `archive ${id}`);
  }

  dailySummary(today?: string): DailySummary {
    return this.query.dailySummary(today ?? toCalendarDate(this.now()));
  }

  syncStatus(): SyncState {
    return this.sync.getState();
  }

  syncNow(): Promise<SyncOutcome> {
    return this.sync.syncNow();
  }

  reload(): Promise<ReloadReport> {
    return this.store.reload();
  }

  // ─────────────────────────────────────────────────────────
  // Private helpers
  // ─────────────────────────────────────────────────────────

  private async transition(
    id: string,
    status: RecordStatus,
    archive: boolean,
    summary: string,
  ): Promise<MutationResult> {
    const { value: change, outcome } = await this.sync.submit({
      summary,
      apply: async () => {
        const before = await this.snapshot(id);
        const after = await this.store.transitionStatus(id, status, { archive });
        return { before, after };
      },
    });

    this.publishStatusChange(change.before, change.after);
    return { record: change.after, sync: outcome };
  }

  private async snapshot(id: string): Promise<{ status: RecordStatus; location: RecordLocation | null }> {
    const record = await this.store.read(id);
    return { status: record.status, location: this.store.locate(id) };
  }

  /** Only real transitions are published; a repeated complete is silent. */
  private publishStatusChange(
    before: { status: RecordStatus; location: RecordLocation | null },
    record: TaskdeckRecord,
  ): void {
    const location = this.store.locate(record.id);
    if (before.status === record.status && before.location === location) return;

    this.eventBus.publish({
      type: 'record.status.changed',
      timestamp: this.now().getTime(),
      source: SOURCE,
      payload: {
        recordId: record.id,
        oldStatus: before.status,
        newStatus: record.status,
        archived: location === 'archive',
      },
    });
  }
}
