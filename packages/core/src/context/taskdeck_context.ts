/**
 * Wires one data directory into a ready-to-use set of components.
 * Each call builds its own instances; nothing is shared between contexts.
 */

import { RecordAdapter } from "../adapters/record_adapter";
import { ConfigManager, type TaskdeckConfig } from "../config_manager";
import { FsConfigStore } from "../config_store/fs/fs_config_store";
import { EventBus } from "../event_bus";
import { LocalGitModule, createExecCommand, type IGitModule } from "../git";
import { FsLockManager, defaultLockPath } from "../lock/fs/fs_lock_manager";
import { createLogger, type Logger } from "../logger";
import { QueryEngine } from "../query";
import { FsRecordStore } from "../record_store/fs/fs_record_store";
import { FsStoreWatcher } from "../store_watcher/fs/fs_store_watcher";
import { SyncEngine } from "../sync";
import { ensureDataDir, resolveDataDir } from "../utils/data_dir";

export interface FsContextOptions {
  /** Falls back to TASKDECK_DATA_DIR, then ./tasks. */
  dataDir?: string;
  /** Replaces the git CLI, e.g. with MemoryGitModule in tests. */
  git?: IGitModule;
  /** Starts the store watcher right away. */
  watch?: boolean;
  logger?: Logger;
  now?: () => Date;
}

export interface TaskdeckContext {
  dataDir: string;
  config: TaskdeckConfig;
  configManager: ConfigManager;
  store: FsRecordStore;
  lock: FsLockManager;
  git: IGitModule;
  eventBus: EventBus;
  sync: SyncEngine;
  query: QueryEngine;
  adapter: RecordAdapter;
  watcher: FsStoreWatcher;
  /** Flushes queued writes and stops the watcher. */
  close(): Promise<void>;
}

export async function createFsContext(options: FsContextOptions = {}): Promise<TaskdeckContext> {
  const logger = options.logger ?? createLogger("[Taskdeck] ");
  const dataDir = await ensureDataDir(resolveDataDir(options.dataDir));

  const configManager = new ConfigManager(new FsConfigStore(dataDir));
  const config = await configManager.loadConfig();

  const store = new FsRecordStore({ dataDir, ...(options.now ? { now: options.now } : {}) });
  const report = await store.load();
  for (const warning of report.warnings) {
    logger.warn(`Skipped ${warning.filePath}: ${warning.message}`);
  }

  const lock = new FsLockManager({
    lockPath: defaultLockPath(dataDir),
    timeoutMs: config.lock.timeoutMs,
    staleMs: config.lock.staleMs,
    pollIntervalMs: config.lock.pollIntervalMs,
  });
  const git = options.git ?? new LocalGitModule({ workDir: dataDir, execCommand: createExecCommand(dataDir) });
  const eventBus = new EventBus();

  const sync = new SyncEngine({
    store,
    lock,
    git,
    eventBus,
    options: { ...config.sync, lockTimeoutMs: config.lock.timeoutMs },
    ...(options.now ? { now: options.now } : {}),
  });
  await sync.initialize();

  const query = new QueryEngine(store);
  const adapter = new RecordAdapter({ store, query, sync, eventBus, ...(options.now ? { now: options.now } : {}) });
  const watcher = new FsStoreWatcher({ store, eventBus });
  if (options.watch) {
    await watcher.start();
  }

  return {
    dataDir,
    config,
    configManager,
    store,
    lock,
    git,
    eventBus,
    sync,
    query,
    adapter,
    watcher,
    async close() {
      await sync.close();
      await watcher.stop();
      eventBus.clearSubscriptions();
    },
  };
}
