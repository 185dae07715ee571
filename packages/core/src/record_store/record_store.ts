import type {
  PatchField,
  RecordDraft,
  RecordHeader,
  RecordLocation,
  RecordStatus,
  TaskdeckRecord,
} from "../record_types";

export interface StoreWarning {
  filePath: string;
  message: string;
  /** Offending header key, when the file failed to decode. */
  field?: string;
}

export interface ReloadReport {
  added: string[];
  updated: string[];
  removed: string[];
  warnings: StoreWarning[];
}

export interface TransitionOptions {
  /** Relocate into the archive area even when the new status is not `archived`. */
  archive?: boolean;
}

/**
 * IRecordStore - owns one data directory of record files and the index
 * built from it.
 *
 * Writes are atomic per file but take no lock: callers that may race
 * with another process wrap them in the lock (the sync engine does).
 * Reads never lock; `listHeaders` answers from the last loaded index.
 */
export interface IRecordStore {
  /** Builds the index from disk. Safe to call again; same as reload. */
  load(): Promise<ReloadReport>;

  create(draft: RecordDraft): Promise<TaskdeckRecord>;

  /** Reads the current file from disk. Throws RecordNotFoundError. */
  read(id: string): Promise<TaskdeckRecord>;

  /**
   * Applies one field change, re-validates, writes. `status` delegates to
   * transitionStatus; `notes` appends to the body.
   */
  patch(id: string, field: PatchField, value: unknown): Promise<TaskdeckRecord>;

  transitionStatus(
    id: string,
    status: RecordStatus,
    options?: TransitionOptions,
  ): Promise<TaskdeckRecord>;

  listHeaders(options?: { includeArchived?: boolean }): RecordHeader[];

  /** Where a record currently lives, or null when it is not indexed. */
  locate(id: string): RecordLocation | null;

  /** Rescans the directory and reconciles the index with what is on disk. */
  reload(): Promise<ReloadReport>;

  /** Files skipped by the last reload. */
  getWarnings(): StoreWarning[];

  getDataDir(): string;
}
