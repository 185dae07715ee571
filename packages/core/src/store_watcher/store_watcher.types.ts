import type { IEventStream } from "../event_bus";
import type { IRecordStore } from "../record_store";
import type { Logger } from "../logger";

export interface StoreWatcherOptions {
  debounceMs?: number; // default: 300
}

export interface StoreWatcherDependencies {
  store: IRecordStore;
  eventBus: IEventStream;
  logger?: Logger;
  options?: StoreWatcherOptions;
}

export interface StoreWatcherStatus {
  isRunning: boolean;
  watchedPath: string;
  reloads: number;
  eventsEmitted: number;
  lastError: Error | undefined;
}
