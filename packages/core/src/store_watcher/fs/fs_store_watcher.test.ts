import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { realpathSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { EventBus } from "../../event_bus";
import type { StoreChangedEvent } from "../../event_bus";
import { FsRecordStore } from "../../record_store/fs/fs_record_store";
import { FsStoreWatcher } from "./fs_store_watcher";
import { DataDirNotFoundError } from "../store_watcher.errors";

const TEST_DEBOUNCE = 50;

async function waitFor(condition: () => boolean, timeoutMs = 3000): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeoutMs) {
      throw new Error("condition not met in time");
    }
    await new Promise((resolve) => setTimeout(resolve, 20));
  }
}

describe("FsStoreWatcher", () => {
  let dataDir: string;
  let eventBus: EventBus;
  let store: FsRecordStore;
  let watcher: FsStoreWatcher;
  let events: StoreChangedEvent[];

  beforeEach(async () => {
    dataDir = realpathSync(await mkdtemp(join(tmpdir(), "taskdeck-watcher-test-")));
    eventBus = new EventBus();
    events = [];
    eventBus.subscribe("store.changed", (event) => {
      events.push(event);
    });
    store = new FsRecordStore({ dataDir });
    await store.load();
    watcher = new FsStoreWatcher({ store, eventBus, options: { debounceMs: TEST_DEBOUNCE } });
  });

  afterEach(async () => {
    await watcher.stop();
    eventBus.clearSubscriptions();
    await rm(dataDir, { recursive: true, force: true });
  });

  it("should fail to start on a missing directory", async () => {
    const missing = new FsRecordStore({ dataDir: join(dataDir, "nope") });
    const orphan = new FsStoreWatcher({ store: missing, eventBus });

    await expect(orphan.start()).rejects.toBeInstanceOf(DataDirNotFoundError);
    expect(orphan.isRunning()).toBe(false);
  });

  it("should reload and publish when another process adds a record", async () => {
    await watcher.start();
    const other = new FsRecordStore({ dataDir });
    await other.load();

    const created = await other.create({ title: "Written by the agent" });
    await waitFor(() => events.length > 0);

    expect(events[0]?.payload.added).toEqual([created.id]);
    expect(store.listHeaders().map((h) => h.id)).toEqual([created.id]);
    expect(watcher.getStatus().eventsEmitted).toBe(1);
  });

  it("should stay quiet about this process's own writes", async () => {
    await watcher.start();

    await store.create({ title: "Written here" });
    await waitFor(() => watcher.getStatus().reloads > 0);

    expect(events).toHaveLength(0);
  });

  it("should ignore files that are not records", async () => {
    await watcher.start();

    await writeFile(join(dataDir, "README.txt"), "not a record");
    await new Promise((resolve) => setTimeout(resolve, TEST_DEBOUNCE * 4));

    expect(watcher.getStatus().reloads).toBe(0);
  });

  it("should report its status", async () => {
    await watcher.start();

    expect(watcher.getStatus()).toMatchObject({ isRunning: true, watchedPath: dataDir, eventsEmitted: 0 });

    await watcher.stop();
    expect(watcher.isRunning()).toBe(false);
  });
});
