export type { IStoreWatcher } from "./store_watcher";
export type { StoreWatcherDependencies, StoreWatcherOptions, StoreWatcherStatus } from "./store_watcher.types";
export { DataDirNotFoundError } from "./store_watcher.errors";
