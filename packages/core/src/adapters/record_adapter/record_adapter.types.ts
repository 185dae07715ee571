import type { IRecordStore, ReloadReport } from '../../record_store';
import type { ISyncEngine, SyncOutcome, SyncState } from '../../sync';
import type { QueryEngine, DailySummary, ListQuery } from '../../query';
import type { IEventStream } from '../../event_bus';
import type {
  PatchField,
  RecordDraft,
  RecordHeader,
  RecordLocation,
  TaskdeckRecord,
} from '../../record_types';

/**
 * RecordAdapter Dependencies - Facade + Dependency Injection Pattern
 */
export interface RecordAdapterDependencies {
  // Data Layer
  store: IRecordStore;
  query: QueryEngine;

  // Infrastructure Layer
  sync: ISyncEngine;
  eventBus: IEventStream;
  now?: () => Date;
}

export type CreateRecordInput = RecordDraft;

/** A record as returned by reads: full content plus where it lives. */
export type RecordDetail = TaskdeckRecord & { location: RecordLocation };

/** Every mutation reports the record and the sync side as one outcome. */
export interface MutationResult {
  record: TaskdeckRecord;
  sync: SyncOutcome;
}

export interface CompleteOptions {
  /** Also move the record into the archive area. */
  archive?: boolean;
}

/**
 * RecordAdapter Interface - the operations offered to the board, the CLI
 * and the agent interface.
 */
export interface IRecordAdapter {
  create(input: CreateRecordInput): Promise<MutationResult>;

  /** One field at a time; see PATCH_FIELDS. */
  patch(id: string, field: PatchField | string, value: unknown): Promise<MutationResult>;

  list(query?: ListQuery): RecordHeader[];

  readDetail(id: string): Promise<RecordDetail>;

  /** Sets status to done. Completing a done record succeeds without a write. */
  complete(id: string, options?: CompleteOptions): Promise<MutationResult>;

  archive(id: string): Promise<MutationResult>;

  /** `today` defaults to the local calendar date. */
  dailySummary(today?: string): DailySummary;

  syncStatus(): SyncState;

  syncNow(): Promise<SyncOutcome>;

  reload(): Promise<ReloadReport>;
}
