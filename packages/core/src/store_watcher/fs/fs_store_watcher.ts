/**
 * FsStoreWatcher — chokidar watcher over the data directory
 *
 * Any add/change/unlink of a record file schedules one debounced reload;
 * a reload that changed the index is published as `store.changed`.
 */

import { watch, type FSWatcher } from "chokidar";
import { existsSync } from "fs";
import { basename } from "path";
import { createLogger, type Logger } from "../../logger";
import type { IEventStream } from "../../event_bus";
import type { IRecordStore } from "../../record_store";
import type { IStoreWatcher } from "../store_watcher";
import type { StoreWatcherDependencies, StoreWatcherStatus } from "../store_watcher.types";
import { DataDirNotFoundError } from "../store_watcher.errors";
import { RECORD_EXTENSION } from "../../record_store/fs/fs_record_store";

const DEFAULT_DEBOUNCE_MS = 300;

function isRecordFile(filePath: string): boolean {
  const name = basename(filePath);
  return !name.startsWith(".") && name.endsWith(RECORD_EXTENSION);
}

export class FsStoreWatcher implements IStoreWatcher {
  private readonly store: IRecordStore;
  private readonly eventBus: IEventStream;
  private readonly debounceMs: number;
  private readonly logger: Logger;
  private watcher: FSWatcher | null = null;
  private debounceTimer: NodeJS.Timeout | null = null;
  private reloading: Promise<void> | null = null;
  private reloads = 0;
  private eventsEmitted = 0;
  private lastError: Error | undefined;

  constructor(deps: StoreWatcherDependencies) {
    this.store = deps.store;
    this.eventBus = deps.eventBus;
    this.debounceMs = deps.options?.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.logger = deps.logger ?? createLogger("[StoreWatcher] ");
  }

  async start(): Promise<void> {
    if (this.watcher) return;

    const dataDir = this.store.getDataDir();
    if (!existsSync(dataDir)) {
      throw new DataDirNotFoundError(dataDir);
    }

    const watcher = watch(dataDir, {
      ignoreInitial: true,
      // The data directory plus archive/
      depth: 1,
      ignored: (path: string) => basename(path).startsWith(".") && path !== dataDir,
    });

    watcher.on("add", (fp) => this.onFileChange(fp));
    watcher.on("change", (fp) => this.onFileChange(fp));
    watcher.on("unlink", (fp) => this.onFileChange(fp));
    watcher.on("error", (error) => {
      this.lastError = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Watcher error: ${this.lastError.message}`);
    });

    await new Promise<void>((resolve) => watcher.once("ready", () => resolve()));
    this.watcher = watcher;
  }

  async stop(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }

    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
    if (this.reloading) {
      await this.reloading;
    }
  }

  isRunning(): boolean {
    return this.watcher !== null;
  }

  getStatus(): StoreWatcherStatus {
    return {
      isRunning: this.isRunning(),
      watchedPath: this.store.getDataDir(),
      reloads: this.reloads,
      eventsEmitted: this.eventsEmitted,
      lastError: this.lastError,
    };
  }

  private onFileChange(filePath: string): void {
    if (!isRecordFile(filePath)) return;

    if (this.debounceTimer) clearTimeout(this.debounceTimer);
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.reloading = this.reload().finally(() => {
        this.reloading = null;
      });
    }, this.debounceMs);
  }

  private async reload(): Promise<void> {
    try {
      const report = await this.store.reload();
      this.reloads++;
      const changed = report.added.length + report.updated.length + report.removed.length;
      if (changed === 0) return;

      this.logger.debug(`Reloaded ${changed} record(s) changed on disk`);
      this.eventBus.publish({
        type: "store.changed",
        timestamp: Date.now(),
        source: "store_watcher",
        payload: {
          added: report.added,
          updated: report.updated,
          removed: report.removed,
          warnings: report.warnings.length,
        },
      });
      this.eventsEmitted++;
    } catch (error) {
      this.lastError = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Reload failed: ${this.lastError.message}`);
    }
  }
}
