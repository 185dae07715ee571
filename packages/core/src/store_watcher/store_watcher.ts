/**
 * IStoreWatcher - notices writes from other processes
 *
 * Watches the data directory and reloads the store when files change.
 * Changes that came from this process's own store are already indexed,
 * so they produce an empty reload and no event.
 *
 * @module store_watcher
 */

import type { StoreWatcherStatus } from "./store_watcher.types";

export interface IStoreWatcher {
  start(): Promise<void>;

  /** Stops watching and cancels a pending reload. */
  stop(): Promise<void>;

  isRunning(): boolean;

  getStatus(): StoreWatcherStatus;
}
