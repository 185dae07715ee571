export { EventBus } from './event_bus';
export type { IEventStream, TaskdeckEventType, EventOfType } from './event_bus';
export type * from './types';
