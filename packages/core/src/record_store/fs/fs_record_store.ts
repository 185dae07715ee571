import * as path from "path";
import { decodeRecord, encodeRecord } from "../../record_codec";
import { RecordIndex } from "../../record_index";
import type { IndexEntry } from "../../record_index";
import { calculateContentHash } from "../../crypto/checksum";
import { generateRecordId, isValidRecordId } from "../../utils/id_generator";
import { uniqueInOrder } from "../../utils/array_utils";
import { hasErrorCode, errorMessage } from "../../utils/fs_errors";
import { validateRecordForWrite } from "../../record_validations/record_validator";
import { ParseError, RecordNotFoundError, ValidationError } from "../../validation/errors";
import { createLogger } from "../../logger";
import type { Logger } from "../../logger";
import {
  DEFAULT_KIND,
  DEFAULT_PRIORITY,
  DEFAULT_STATUS,
  isRecordStatus,
  toHeader,
} from "../../record_types";
import type {
  PatchField,
  RecordDraft,
  RecordHeader,
  RecordLocation,
  RecordStatus,
  TaskdeckRecord,
} from "../../record_types";
import { applyPatch, normalizeBody, normalizePriority } from "../record_patch";
import { StoreIOError } from "../record_store.errors";
import { isTempFileName, nodeFileSystem, writeFileAtomic } from "./store_file_system";
import type { FileStats, StoreFileSystem } from "./store_file_system";
import type {
  IRecordStore,
  ReloadReport,
  StoreWarning,
  TransitionOptions,
} from "../record_store";

export const RECORD_EXTENSION = ".md";
export const ARCHIVE_DIR = "archive";

/**
 * Options for FsRecordStore
 */
export interface FsRecordStoreOptions {
  /** Data directory holding one `<id>.md` per active record. */
  dataDir: string;
  /** Replaces the real file system, for failure injection in tests. */
  fileSystem?: StoreFileSystem;
  logger?: Logger;
  /** Clock used for `created_at`. */
  now?: () => Date;
  idGenerator?: () => string;
}

interface ScannedFile {
  filePath: string;
  fileName: string;
  location: RecordLocation;
}

/**
 * FsRecordStore - filesystem implementation of IRecordStore.
 *
 * Active records live in `<dataDir>/<id>.md`, archived ones in
 * `<dataDir>/archive/<id>.md`. Every write goes through a temporary
 * file and a rename.
 *
 * @example
 * const store = new FsRecordStore({ dataDir: './tasks' });
 * await store.load();
 * const task = await store.create({ title: 'Draft Q4 Strategy', priority: 'high' });
 */
export class FsRecordStore implements IRecordStore {
  private readonly dataDir: string;
  private readonly archiveDir: string;
  private readonly fileSystem: StoreFileSystem;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly idGenerator: () => string;
  private readonly index = new RecordIndex();
  private warnings: StoreWarning[] = [];

  constructor(options: FsRecordStoreOptions) {
    this.dataDir = options.dataDir;
    this.archiveDir = path.join(options.dataDir, ARCHIVE_DIR);
    this.fileSystem = options.fileSystem ?? nodeFileSystem;
    this.logger = options.logger ?? createLogger("[Store] ");
    this.now = options.now ?? (() => new Date());
    this.idGenerator = options.idGenerator ?? generateRecordId;
  }

  getDataDir(): string {
    return this.dataDir;
  }

  getWarnings(): StoreWarning[] {
    return [...this.warnings];
  }

  async load(): Promise<ReloadReport> {
    await this.fileSystem.mkdir(this.dataDir, { recursive: true });
    return this.reload();
  }

  // ─────────────────────────────────────────────────────────
  // Writes
  // ─────────────────────────────────────────────────────────

  async create(draft: RecordDraft): Promise<TaskdeckRecord> {
    const status = draft.status ?? DEFAULT_STATUS;
    const record: TaskdeckRecord = {
      id: await this.allocateId(),
      kind: draft.kind ?? DEFAULT_KIND,
      title: draft.title.trim(),
      status,
      priority: draft.priority === undefined ? DEFAULT_PRIORITY : normalizePriority(draft.priority),
      tags: uniqueInOrder(draft.tags ?? []),
      createdAt: this.now().toISOString(),
      extra: {},
      body: normalizeBody(draft.body ?? ""),
    };
    if (draft.dueDate !== undefined) record.dueDate = draft.dueDate;
    if (draft.parentGoalId !== undefined) record.parentGoalId = draft.parentGoalId;

    this.assertValid(record);
    await this.writeRecord(record, status === "archived" ? "archive" : "active");
    this.logger.debug(`Created ${record.kind} ${record.id}`);
    return record;
  }

  async patch(id: string, field: PatchField, value: unknown): Promise<TaskdeckRecord> {
    if (field === "status") {
      if (!isRecordStatus(value)) {
        throw ValidationError.forField("status", "must be one of active, next, waiting, done, archived", value);
      }
      return this.transitionStatus(id, value);
    }

    const { record, location } = await this.readWithLocation(id);
    const next = applyPatch(record, field, value);
    this.assertValid(next);
    await this.writeRecord(next, location);
    return next;
  }

  async transitionStatus(
    id: string,
    status: RecordStatus,
    options: TransitionOptions = {},
  ): Promise<TaskdeckRecord> {
    if (!isRecordStatus(status)) {
      throw ValidationError.forField("status", "unknown status", status);
    }

    const { record, location } = await this.readWithLocation(id);
    const target: RecordLocation = status === "archived" || options.archive ? "archive" : "active";

    if (record.status === status && location === target) {
      return record;
    }

    const next: TaskdeckRecord = { ...record, status };
    this.assertValid(next);

    // Rewrite in place, then move: a single file carries the id at every step.
    await this.writeRecord(next, location);
    if (location !== target) {
      await this.relocate(next, location, target);
    }
    this.logger.debug(`${id}: ${record.status} -> ${status}${location !== target ? ` (moved to ${target})` : ""}`);
    return next;
  }

  // ─────────────────────────────────────────────────────────
  // Reads
  // ─────────────────────────────────────────────────────────

  async read(id: string): Promise<TaskdeckRecord> {
    const { record } = await this.readWithLocation(id);
    return record;
  }

  listHeaders(options: { includeArchived?: boolean } = {}): RecordHeader[] {
    return this.index.headers(options);
  }

  locate(id: string): RecordLocation | null {
    return this.index.get(id)?.location ?? null;
  }

  /**
   * Rescans both areas. Files whose size and mtime match the index are
   * not re-read; re-read files with an unchanged hash keep their entry.
   */
  async reload(): Promise<ReloadReport> {
    const previous = new Map<string, IndexEntry>();
    for (const entry of this.index.values()) {
      previous.set(entry.filePath, entry);
    }
    const previousIds = new Set(this.index.values().map((entry) => entry.header.id));

    const next = new Map<string, IndexEntry>();
    const warnings: StoreWarning[] = [];
    const updated: string[] = [];

    for (const file of await this.scanFiles()) {
      const entry = await this.refreshEntry(file, previous.get(file.filePath), warnings, updated);
      if (!entry) continue;

      const claimed = next.get(entry.header.id);
      if (claimed) {
        const keep = claimed.location === "active" ? claimed : entry;
        const drop = keep === claimed ? entry : claimed;
        warnings.push({
          filePath: drop.filePath,
          message: `duplicate id ${entry.header.id}; using ${keep.filePath}`,
        });
        next.set(entry.header.id, keep);
        continue;
      }
      next.set(entry.header.id, entry);
    }

    this.index.replaceAll(next.values());
    this.warnings = warnings;
    for (const warning of warnings) {
      this.logger.warn(`Skipped ${warning.filePath}: ${warning.message}`);
    }

    const added = [...next.keys()].filter((id) => !previousIds.has(id));
    const removed = [...previousIds].filter((id) => !next.has(id));
    return {
      added,
      updated: updated.filter((id) => previousIds.has(id) && next.has(id)),
      removed,
      warnings,
    };
  }

  // ─────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────

  private getFilePath(id: string, location: RecordLocation): string {
    if (!isValidRecordId(id)) {
      throw ValidationError.forField("id", "must be a safe filename stem", id);
    }
    const dir = location === "archive" ? this.archiveDir : this.dataDir;
    return path.join(dir, `${id}${RECORD_EXTENSION}`);
  }

  private async allocateId(): Promise<string> {
    for (let attempt = 0; attempt < 5; attempt++) {
      const id = this.idGenerator();
      if (this.index.has(id)) continue;
      const onDisk = await this.findOnDisk(id);
      if (!onDisk) return id;
    }
    throw new Error("Could not allocate a unique record id");
  }

  private assertValid(record: TaskdeckRecord): void {
    const result = validateRecordForWrite(record);
    if (!result.isValid) {
      throw new ValidationError(result.errors);
    }
  }

  private async writeRecord(record: TaskdeckRecord, location: RecordLocation): Promise<void> {
    const filePath = this.getFilePath(record.id, location);
    const content = encodeRecord(record);
    await writeFileAtomic(this.fileSystem, filePath, content, this.logger);
    await this.indexWritten(record, location, filePath, content);
  }

  private async relocate(
    record: TaskdeckRecord,
    from: RecordLocation,
    to: RecordLocation,
  ): Promise<void> {
    const source = this.getFilePath(record.id, from);
    const target = this.getFilePath(record.id, to);
    try {
      await this.fileSystem.mkdir(path.dirname(target), { recursive: true });
      await this.fileSystem.rename(source, target);
    } catch (error) {
      throw new StoreIOError(target, error);
    }
    await this.indexWritten(record, to, target, encodeRecord(record));
  }

  /** Records our own write so the next reload does not re-read it. */
  private async indexWritten(
    record: TaskdeckRecord,
    location: RecordLocation,
    filePath: string,
    content: string,
  ): Promise<void> {
    const stats = await this.fileSystem.stat(filePath);
    this.index.set({
      header: toHeader(record),
      location,
      filePath,
      mtimeMs: stats.mtimeMs,
      size: stats.size,
      hash: calculateContentHash(content),
    });
  }

  private async readWithLocation(
    id: string,
  ): Promise<{ record: TaskdeckRecord; location: RecordLocation }> {
    const indexed = this.index.get(id);
    const candidates: RecordLocation[] = indexed
      ? [indexed.location, indexed.location === "active" ? "archive" : "active"]
      : ["active", "archive"];

    for (const location of candidates) {
      const filePath = this.getFilePath(id, location);
      const content = await this.readIfExists(filePath);
      if (content === null) continue;
      const record = decodeRecord(content, filePath);
      if (record.id !== id) {
        throw new ParseError("id", `header id ${record.id} does not match the file name`, filePath);
      }
      return { record, location };
    }

    if (indexed) this.index.delete(id);
    throw new RecordNotFoundError(id);
  }

  private async findOnDisk(id: string): Promise<RecordLocation | null> {
    for (const location of ["active", "archive"] as const) {
      if ((await this.readIfExists(this.getFilePath(id, location))) !== null) {
        return location;
      }
    }
    return null;
  }

  private async readIfExists(filePath: string): Promise<string | null> {
    try {
      return await this.fileSystem.readFile(filePath, "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return null;
      throw error;
    }
  }

  private async scanFiles(): Promise<ScannedFile[]> {
    const files: ScannedFile[] = [];
    for (const [dir, location] of [
      [this.dataDir, "active"],
      [this.archiveDir, "archive"],
    ] as const) {
      let names: string[];
      try {
        names = await this.fileSystem.readdir(dir);
      } catch (error) {
        if (hasErrorCode(error, "ENOENT")) continue;
        throw error;
      }
      for (const fileName of names.sort()) {
        if (!fileName.endsWith(RECORD_EXTENSION)) continue;
        if (fileName.startsWith(".") || isTempFileName(fileName)) continue;
        files.push({ filePath: path.join(dir, fileName), fileName, location });
      }
    }
    return files;
  }

  private async refreshEntry(
    file: ScannedFile,
    previous: IndexEntry | undefined,
    warnings: StoreWarning[],
    updated: string[],
  ): Promise<IndexEntry | null> {
    let stats: FileStats;
    try {
      stats = await this.fileSystem.stat(file.filePath);
    } catch (error) {
      // Removed between readdir and stat.
      if (hasErrorCode(error, "ENOENT")) return null;
      throw error;
    }
    if (!stats.isFile()) return null;

    if (previous && previous.mtimeMs === stats.mtimeMs && previous.size === stats.size) {
      return previous;
    }

    let content: string;
    try {
      content = await this.fileSystem.readFile(file.filePath, "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return null;
      warnings.push({ filePath: file.filePath, message: errorMessage(error) });
      return null;
    }

    const hash = calculateContentHash(content);
    if (previous && previous.hash === hash) {
      return { ...previous, mtimeMs: stats.mtimeMs, size: stats.size };
    }

    let record: TaskdeckRecord;
    try {
      record = decodeRecord(content, file.filePath);
    } catch (error) {
      if (error instanceof ParseError) {
        warnings.push({ filePath: file.filePath, message: error.message, field: error.field });
        return null;
      }
      throw error;
    }

    const stem = file.fileName.slice(0, -RECORD_EXTENSION.length);
    if (record.id !== stem) {
      warnings.push({
        filePath: file.filePath,
        message: `header id ${record.id} does not match the file name`,
        field: "id",
      });
      return null;
    }

    updated.push(record.id);
    return {
      header: toHeader(record),
      location: file.location,
      filePath: file.filePath,
      mtimeMs: stats.mtimeMs,
      size: stats.size,
      hash,
    };
  }
}
