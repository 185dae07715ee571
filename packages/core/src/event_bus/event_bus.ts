import { EventEmitter } from 'events';
import { randomBytes } from 'crypto';

import type {
  BaseEvent,
  EventHandler,
  EventSubscription,
  TaskdeckEvent,
} from './types';
import { createLogger } from '../logger';

const logger = createLogger('[EventBus] ');

export type TaskdeckEventType = TaskdeckEvent['type'];
export type EventOfType<K extends TaskdeckEventType> = Extract<TaskdeckEvent, { type: K }>;

function generateSubscriptionId(): string {
  return `subscription:${Date.now()}-${randomBytes(4).toString('hex')}`;
}

function isEventOfType<K extends TaskdeckEventType>(event: BaseEvent, type: K): event is EventOfType<K> {
  return event.type === type;
}

/**
 * Event Stream interface
 */
export interface IEventStream {
  publish(event: TaskdeckEvent): void;

  subscribe<K extends TaskdeckEventType>(
    eventType: K,
    handler: EventHandler<EventOfType<K>>
  ): EventSubscription;

  /** Receives every event; for logging and the interactive board. */
  subscribeToAll(handler: EventHandler<TaskdeckEvent>): EventSubscription;

  unsubscribe(subscriptionId: string): boolean;

  getSubscriptions(): EventSubscription[];

  clearSubscriptions(): void;

  /**
   * Wait for all pending event handlers to complete (for testing)
   */
  waitForIdle(options?: { timeout?: number }): Promise<void>;
}

/**
 * In-process EventBus on top of Node's EventEmitter.
 *
 * Handlers run fire-and-forget: publish() never waits for them and a
 * throwing handler is logged, never propagated to the publisher. One bus
 * is created per context; there is no process-wide instance.
 */
export class EventBus implements IEventStream {
  private emitter: EventEmitter;
  private subscriptions: Map<string, EventSubscription>;
  private pendingHandlers: Set<Promise<void>>;

  constructor() {
    this.emitter = new EventEmitter();
    this.subscriptions = new Map();
    this.pendingHandlers = new Set();
    this.emitter.setMaxListeners(100);
  }

  /**
   * Publish an event to all subscribers
   */
  publish(event: TaskdeckEvent): void {
    if (!event.type || typeof event.type !== 'string') {
      throw new Error('Event must have a valid type string');
    }

    if (!event.timestamp || typeof event.timestamp !== 'number') {
      throw new Error('Event must have a valid timestamp number');
    }

    if (!event.source || typeof event.source !== 'string') {
      throw new Error('Event must have a valid source string');
    }

    this.emitter.emit(event.type, event);
    this.emitter.emit('*', event);
  }

  subscribe<K extends TaskdeckEventType>(
    eventType: K,
    handler: EventHandler<EventOfType<K>>
  ): EventSubscription {
    return this.register(eventType, (event) => {
      if (isEventOfType(event, eventType)) {
        return handler(event);
      }
    });
  }

  subscribeToAll(handler: EventHandler<TaskdeckEvent>): EventSubscription {
    return this.register('*', (event) => {
      if (isTaskdeckEvent(event)) {
        return handler(event);
      }
    });
  }

  /**
   * @returns true if subscription was found and removed, false otherwise
   */
  unsubscribe(subscriptionId: string): boolean {
    const subscription = this.subscriptions.get(subscriptionId);
    if (!subscription) {
      return false;
    }

    this.emitter.removeListener(subscription.eventType, subscription.handler);
    this.subscriptions.delete(subscriptionId);
    return true;
  }

  getSubscriptions(): EventSubscription[] {
    return Array.from(this.subscriptions.values());
  }

  clearSubscriptions(): void {
    this.emitter.removeAllListeners();
    this.subscriptions.clear();
  }

  getSubscriptionCount(eventType: string): number {
    return this.emitter.listenerCount(eventType);
  }

  /**
   * Wait for all pending event handlers to complete.
   *
   * @example
   * ```typescript
   * await adapter.create({ title: 'Write report' });
   * await eventBus.waitForIdle();
   * expect(received).toHaveLength(1);
   * ```
   */
  async waitForIdle(options: { timeout?: number } = {}): Promise<void> {
    const timeout = options.timeout ?? 5000;
    const startTime = Date.now();

    while (this.pendingHandlers.size > 0) {
      if (Date.now() - startTime > timeout) {
        logger.warn(`waitForIdle() timeout after ${timeout}ms with ${this.pendingHandlers.size} handlers still pending`);
        break;
      }

      await Promise.race([
        Promise.all(Array.from(this.pendingHandlers)),
        new Promise((resolve) => setTimeout(resolve, 10)),
      ]);
    }
  }

  private register(eventType: string, handler: EventHandler<BaseEvent>): EventSubscription {
    const subscriptionId = generateSubscriptionId();

    // Wrap handler to catch errors and track it until it settles
    const wrappedHandler = (event: BaseEvent): void => {
      const handlerPromise = (async () => {
        try {
          await handler(event);
        } catch (error) {
          logger.error(`Error in event handler for ${eventType}:`, error);
        }
      })();

      this.pendingHandlers.add(handlerPromise);
      void handlerPromise.finally(() => {
        this.pendingHandlers.delete(handlerPromise);
      });
    };

    const subscription: EventSubscription = {
      id: subscriptionId,
      eventType,
      handler: wrappedHandler,
      metadata: {
        createdAt: Date.now(),
      },
    };

    this.emitter.on(eventType, wrappedHandler);
    this.subscriptions.set(subscriptionId, subscription);

    return subscription;
  }
}

const EVENT_TYPES: ReadonlySet<string> = new Set<TaskdeckEventType>([
  'record.created',
  'record.updated',
  'record.status.changed',
  'store.changed',
  'sync.phase.changed',
]);

function isTaskdeckEvent(event: BaseEvent): event is TaskdeckEvent {
  return EVENT_TYPES.has(event.type);
}
