import { toHeader } from "../record_types";
import type { RecordHeader, RecordLocation } from "../record_types";

export interface IndexEntry {
  header: RecordHeader;
  location: RecordLocation;
  filePath: string;
  /** Modification time and size seen when the entry was last refreshed. */
  mtimeMs: number;
  size: number;
  /** SHA-256 of the file content. */
  hash: string;
}

/**
 * In-memory projection of every record header, keyed by id.
 * Process-local: each process builds its own from disk.
 */
export class RecordIndex {
  private entries = new Map<string, IndexEntry>();

  get(id: string): IndexEntry | undefined {
    return this.entries.get(id);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  set(entry: IndexEntry): void {
    this.entries.set(entry.header.id, entry);
  }

  delete(id: string): boolean {
    return this.entries.delete(id);
  }

  values(): IndexEntry[] {
    return Array.from(this.entries.values());
  }

  /** Swaps in a freshly built set of entries. */
  replaceAll(entries: Iterable<IndexEntry>): void {
    this.entries = new Map();
    for (const entry of entries) {
      this.entries.set(entry.header.id, entry);
    }
  }

  /**
   * Header projections. Records in the archive area are left out unless
   * `includeArchived` is set. Each call returns fresh copies.
   */
  headers(options: { includeArchived?: boolean } = {}): RecordHeader[] {
    const headers: RecordHeader[] = [];
    for (const entry of this.entries.values()) {
      if (!options.includeArchived && isArchivedEntry(entry)) continue;
      headers.push(toHeader(entry.header));
    }
    return headers;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

export function isArchivedEntry(entry: IndexEntry): boolean {
  return entry.location === "archive" || entry.header.status === "archived";
}
