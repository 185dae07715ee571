import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as path from "path";
import * as os from "os";
import { FsRecordStore } from "./fs_record_store";
import { nodeFileSystem } from "./store_file_system";
import type { StoreFileSystem } from "./store_file_system";
import { StoreIOError } from "../record_store.errors";
import { ParseError, RecordNotFoundError, ValidationError } from "../../validation/errors";
import { decodeRecord } from "../../record_codec";

const VALID_HEADER = (id: string, title: string, extra = "") =>
  `---\nid: ${id}\ntype: task\ntitle: ${title}\nstatus: active\ntags: [work]\ncreated_at: 2025-09-01T09:00:00Z\n${extra}---\n\nbody of ${id}`;

describe("FsRecordStore", () => {
  let dataDir: string;
  let store: FsRecordStore;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "taskdeck-store-test-"));
    store = new FsRecordStore({ dataDir });
    await store.load();
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  async function filesIn(dir: string): Promise<string[]> {
    try {
      return (await fs.readdir(dir)).sort();
    } catch {
      return [];
    }
  }

  // ─────────────────────────────────────────────────────────
  // create / read
  // ─────────────────────────────────────────────────────────

  describe("create", () => {
    it("should create an active record with a fresh id and the call time", async () => {
      const before = Date.now();
      const record = await store.create({ title: "Draft Q4 Strategy", priority: "high" });
      const after = Date.now();

      expect(record.status).toBe("active");
      expect(record.kind).toBe("task");
      expect(record.priority).toBe("high");
      expect(record.id).toMatch(/^[0-9a-f-]{36}$/);
      const createdAt = Date.parse(record.createdAt);
      expect(createdAt).toBeGreaterThanOrEqual(before);
      expect(createdAt).toBeLessThanOrEqual(after);

      const onDisk = await fs.readFile(path.join(dataDir, `${record.id}.md`), "utf-8");
      expect(decodeRecord(onDisk)).toEqual(record);
    });

    it("should give every record its own id", async () => {
      const first = await store.create({ title: "One" });
      const second = await store.create({ title: "Two" });

      expect(first.id).not.toBe(second.id);
      expect(store.listHeaders().map((h) => h.id).sort()).toEqual([first.id, second.id].sort());
    });

    it("should apply defaults and keep provided optional fields", async () => {
      const record = await store.create({
        title: "  Plan trip ",
        kind: "goal",
        tags: ["personal", "personal", "travel"],
        dueDate: "2025-12-01",
        body: "line one\r\nline two",
      });

      expect(record.title).toBe("Plan trip");
      expect(record.priority).toBe("medium");
      expect(record.tags).toEqual(["personal", "travel"]);
      expect(record.dueDate).toBe("2025-12-01");
      expect(record.body).toBe("line one\nline two");
    });

    it("should reject invalid drafts without writing anything", async () => {
      await expect(store.create({ title: "   " })).rejects.toBeInstanceOf(ValidationError);
      await expect(store.create({ title: "X", priority: "urgent" })).rejects.toBeInstanceOf(ValidationError);
      await expect(store.create({ title: "X", dueDate: "2025-02-30" })).rejects.toBeInstanceOf(ValidationError);

      expect(await filesIn(dataDir)).toEqual([]);
    });
  });

  describe("read", () => {
    it("should return the full record including body", async () => {
      const created = await store.create({ title: "Read me", body: "details" });

      const record = await store.read(created.id);

      expect(record.body).toBe("details");
      expect(record.title).toBe("Read me");
    });

    it("should throw RecordNotFoundError for an unknown id", async () => {
      await expect(store.read("missing-id")).rejects.toBeInstanceOf(RecordNotFoundError);
    });

    it("should refuse ids that are not safe file names", async () => {
      await expect(store.read("../outside")).rejects.toBeInstanceOf(ValidationError);
    });

    it("should find a record written by another process before any reload", async () => {
      await fs.writeFile(path.join(dataDir, "ext-1.md"), VALID_HEADER("ext-1", "External"));

      const record = await store.read("ext-1");

      expect(record.title).toBe("External");
    });
  });

  // ─────────────────────────────────────────────────────────
  // patch / transitionStatus
  // ─────────────────────────────────────────────────────────

  describe("patch", () => {
    it("should change one field and persist it", async () => {
      const created = await store.create({ title: "Old title" });

      const patched = await store.patch(created.id, "title", "New title");

      expect(patched.title).toBe("New title");
      expect((await store.read(created.id)).title).toBe("New title");
      expect(store.listHeaders()[0]?.title).toBe("New title");
    });

    it("should append notes to the body with a blank line", async () => {
      const created = await store.create({ title: "Notes", body: "first" });

      await store.patch(created.id, "notes", "second");
      const record = await store.patch(created.id, "notes", "third");

      expect(record.body).toBe("first\n\nsecond\n\nthird");
    });

    it("should accept comma-separated tags and clear the due date with null", async () => {
      const created = await store.create({ title: "Tags", dueDate: "2025-10-10" });

      await store.patch(created.id, "tags", "work, q4, work");
      const record = await store.patch(created.id, "due_date", null);

      expect(record.tags).toEqual(["work", "q4"]);
      expect(record.dueDate).toBeUndefined();
    });

    it("should reject an invalid value and leave the file unchanged", async () => {
      const created = await store.create({ title: "Stable" });
      const before = await fs.readFile(path.join(dataDir, `${created.id}.md`), "utf-8");

      await expect(store.patch(created.id, "due_date", "next week")).rejects.toBeInstanceOf(ValidationError);
      await expect(store.patch(created.id, "priority", "critical")).rejects.toBeInstanceOf(ValidationError);
      await expect(store.patch(created.id, "status", "someday")).rejects.toBeInstanceOf(ValidationError);

      expect(await fs.readFile(path.join(dataDir, `${created.id}.md`), "utf-8")).toBe(before);
    });

    it("should throw RecordNotFoundError for an unknown id", async () => {
      await expect(store.patch("nope", "title", "x")).rejects.toBeInstanceOf(RecordNotFoundError);
    });

    it("should refuse to patch a file whose header id differs from the file name", async () => {
      const before = VALID_HEADER("name-b", "Mismatch");
      await fs.writeFile(path.join(dataDir, "name-a.md"), before);

      await expect(store.patch("name-a", "title", "Renamed")).rejects.toBeInstanceOf(ParseError);
      expect(await filesIn(dataDir)).toEqual(["name-a.md"]);
      expect(await fs.readFile(path.join(dataDir, "name-a.md"), "utf-8")).toBe(before);
    });

    it("should keep unknown header keys through a patch", async () => {
      await fs.writeFile(path.join(dataDir, "ext-2.md"), VALID_HEADER("ext-2", "Keep extras", "area: Career\n"));
      await store.reload();

      await store.patch("ext-2", "title", "Renamed");

      expect((await store.read("ext-2")).extra).toEqual({ area: "Career" });
    });
  });

  describe("transitionStatus", () => {
    it("should be idempotent when the status does not change", async () => {
      const created = await store.create({ title: "Finish" });

      await store.patch(created.id, "status", "done");
      const again = await store.transitionStatus(created.id, "done");

      expect(again.status).toBe("done");
      expect(store.locate(created.id)).toBe("active");
    });

    it("should move archived records into the archive area and exclude them from listings", async () => {
      const created = await store.create({ title: "Old" });

      await store.transitionStatus(created.id, "archived");

      expect(await filesIn(dataDir)).toEqual(["archive"]);
      expect(await filesIn(path.join(dataDir, "archive"))).toEqual([`${created.id}.md`]);
      expect(store.listHeaders()).toEqual([]);
      expect(store.listHeaders({ includeArchived: true }).map((h) => h.id)).toEqual([created.id]);
      expect((await store.read(created.id)).status).toBe("archived");
    });

    it("should move a record back when it leaves the archived status", async () => {
      const created = await store.create({ title: "Revive" });
      await store.transitionStatus(created.id, "archived");

      await store.transitionStatus(created.id, "next");

      expect(await filesIn(path.join(dataDir, "archive"))).toEqual([]);
      expect(store.locate(created.id)).toBe("active");
      expect(store.listHeaders().map((h) => h.status)).toEqual(["next"]);
    });

    it("should archive a completed record without changing its status when asked", async () => {
      const created = await store.create({ title: "Done and filed" });

      const record = await store.transitionStatus(created.id, "done", { archive: true });

      expect(record.status).toBe("done");
      expect(store.locate(created.id)).toBe("archive");
      expect(store.listHeaders()).toEqual([]);
    });
  });

  // ─────────────────────────────────────────────────────────
  // Atomicity
  // ─────────────────────────────────────────────────────────

  describe("atomic writes", () => {
    it("should leave the previous version intact when a write is interrupted", async () => {
      const created = await store.create({ title: "Original title" });
      const crashingFs: StoreFileSystem = {
        ...nodeFileSystem,
        writeFile: async (filePath, data, encoding) => {
          await fs.writeFile(filePath, data.slice(0, 12), encoding);
          throw new Error("EIO: simulated crash");
        },
      };
      const crashing = new FsRecordStore({ dataDir, fileSystem: crashingFs });
      await crashing.load();

      await expect(crashing.patch(created.id, "title", "Half written")).rejects.toBeInstanceOf(StoreIOError);

      expect((await store.read(created.id)).title).toBe("Original title");
      expect(await filesIn(dataDir)).toEqual([`${created.id}.md`]);
    });

    it("should leave the previous version intact when the rename fails", async () => {
      const created = await store.create({ title: "Before rename" });
      const failingFs: StoreFileSystem = {
        ...nodeFileSystem,
        rename: async () => {
          throw new Error("EXDEV: simulated");
        },
      };
      const failing = new FsRecordStore({ dataDir, fileSystem: failingFs });
      await failing.load();

      const error = await failing.patch(created.id, "title", "After rename").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StoreIOError);
      expect((await store.read(created.id)).title).toBe("Before rename");
      expect(await filesIn(dataDir)).toEqual([`${created.id}.md`]);
    });
  });

  // ─────────────────────────────────────────────────────────
  // reload
  // ─────────────────────────────────────────────────────────

  describe("reload", () => {
    it("should pick up external additions, edits and removals", async () => {
      const kept = await store.create({ title: "Kept" });
      const edited = await store.create({ title: "Edited" });
      const removed = await store.create({ title: "Removed" });

      const editedPath = path.join(dataDir, `${edited.id}.md`);
      const text = await fs.readFile(editedPath, "utf-8");
      await fs.writeFile(editedPath, text.replace("title: Edited", "title: Edited elsewhere"));
      await fs.unlink(path.join(dataDir, `${removed.id}.md`));
      await fs.writeFile(path.join(dataDir, "ext-3.md"), VALID_HEADER("ext-3", "Pulled in"));

      const report = await store.reload();

      expect(report.added).toEqual(["ext-3"]);
      expect(report.updated).toEqual([edited.id]);
      expect(report.removed).toEqual([removed.id]);
      const titles = store.listHeaders().map((h) => h.title).sort();
      expect(titles).toEqual(["Edited elsewhere", "Kept", "Pulled in"]);
      expect(store.locate(kept.id)).toBe("active");
    });

    it("should skip malformed files with a warning and stay usable", async () => {
      await fs.writeFile(
        path.join(dataDir, "bad.md"),
        "---\nid: bad\ntype: task\ntitle: Bad\nstatus: someday\ncreated_at: 2025-09-01T09:00:00Z\n---\n",
      );

      const report = await store.reload();

      expect(report.warnings).toHaveLength(1);
      expect(report.warnings[0]?.field).toBe("status");
      expect(store.getWarnings()).toEqual(report.warnings);
      expect(store.listHeaders()).toEqual([]);
      await expect(store.read("bad")).rejects.toBeInstanceOf(ParseError);

      const created = await store.create({ title: "Still works" });
      expect(store.listHeaders().map((h) => h.id)).toEqual([created.id]);
    });

    it("should skip files whose header id differs from the file name", async () => {
      await fs.writeFile(path.join(dataDir, "name-a.md"), VALID_HEADER("name-b", "Mismatch"));

      const report = await store.reload();

      expect(report.warnings.map((w) => w.field)).toEqual(["id"]);
      expect(store.listHeaders()).toEqual([]);
    });

    it("should index one entry per id when a copy exists in both areas", async () => {
      const created = await store.create({ title: "Twin" });
      await fs.mkdir(path.join(dataDir, "archive"), { recursive: true });
      await fs.copyFile(
        path.join(dataDir, `${created.id}.md`),
        path.join(dataDir, "archive", `${created.id}.md`),
      );

      const fresh = new FsRecordStore({ dataDir });
      const report = await fresh.load();

      expect(report.warnings).toHaveLength(1);
      expect(fresh.locate(created.id)).toBe("active");
      expect(fresh.listHeaders({ includeArchived: true })).toHaveLength(1);
    });

    it("should ignore temporary and non-record files", async () => {
      await fs.writeFile(path.join(dataDir, ".x.md.123.abcd.tmp"), "partial");
      await fs.writeFile(path.join(dataDir, ".taskdeck.yaml"), "workstreams: []\n");
      await fs.writeFile(path.join(dataDir, "README.txt"), "hello");

      const report = await store.reload();

      expect(report).toEqual({ added: [], updated: [], removed: [], warnings: [] });
    });
  });
});
