/**
 * Event Bus types for the record store's event-driven seams
 */
import type { RecordHeader, RecordStatus } from '../record_types';

/**
 * Base event structure
 */
export type BaseEvent = {
  /** Event type identifier */
  type: string;
  /** Event timestamp */
  timestamp: number;
  /** Event payload */
  payload: unknown;
  /** Component that emitted the event */
  source: string;
};

/**
 * Record events, published by the Record Adapter after a mutation
 */
export type RecordCreatedEvent = BaseEvent & {
  type: 'record.created';
  payload: {
    recordId: string;
    header: RecordHeader;
  };
};

export type RecordUpdatedEvent = BaseEvent & {
  type: 'record.updated';
  payload: {
    recordId: string;
    field: string;
  };
};

export type RecordStatusChangedEvent = BaseEvent & {
  type: 'record.status.changed';
  payload: {
    recordId: string;
    oldStatus: RecordStatus;
    newStatus: RecordStatus;
    archived: boolean;
  };
};

/**
 * Emitted when the store index changed because of writes from outside this process.
 */
export type StoreChangedEvent = BaseEvent & {
  type: 'store.changed';
  payload: {
    added: string[];
    updated: string[];
    removed: string[];
    warnings: number;
  };
};

/**
 * Sync engine phase transitions
 */
export type SyncPhaseChangedEvent = BaseEvent & {
  type: 'sync.phase.changed';
  payload: {
    from: string;
    to: string;
    pendingChanges: number;
    error?: string;
  };
};

export type TaskdeckEvent =
  | RecordCreatedEvent
  | RecordUpdatedEvent
  | RecordStatusChangedEvent
  | StoreChangedEvent
  | SyncPhaseChangedEvent;

/**
 * Event handler function type
 */
export type EventHandler<T extends BaseEvent = BaseEvent> = (event: T) => void | Promise<void>;

/**
 * Event subscription details
 */
export type EventSubscription = {
  /** Unique subscription identifier */
  id: string;
  /** Event type being subscribed to */
  eventType: string;
  /** Handler function as registered on the emitter */
  handler: (event: BaseEvent) => void;
  metadata?: {
    createdAt: number;
  };
};
