/**
 * Event Routing Module
 *
 * - Scoped event records and typed definitions (ScopedEvent, defineEvent)
 * - Scope-based routing between a local and a distributed broker (EventBus)
 * - Global handler registration with a pre-init backlog (eventHandler, initEventBus)
 */

export {
  ScopedEvent,
  EventScope,
  EventRecordSchema,
  SPEC_VERSION,
  EVENT_CHANNEL_PREFIX,
  channelForEventType,
  defineEvent,
  type FlatRecord,
  type RoutableEvent,
  type EventInit,
  type DataSchema,
  type EventDefinition,
  type EventDefinitionOptions,
  type TypedEventInit,
} from './event.js';

export {
  EventBus,
  type EventBusOptions,
  type RecordHandler,
  type TypedEventHandler,
  type HandlerInfo,
  type EventSubscription,
} from './bus.js';

export {
  eventHandler,
  initEventBus,
  getEventBus,
  resetEventBus,
  pendingHandlerCount,
} from './handlers.js';
