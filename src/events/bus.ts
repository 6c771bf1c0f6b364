/**
 * Scope-Based Event Bus
 *
 * Routes events to one of two broker collaborators by their scope:
 * - process-scoped events go to the local broker
 * - app-scoped events go to the distributed broker
 *
 * Every handler is registered on both brokers, so it receives an event type
 * whichever scope it was published with. Publishing is fire-and-forget at this
 * layer: broker failures are logged and never reach the caller.
 */

import { getLogger, describeError, type Logger } from '../logging/logger.js';
import {
  BrokerStopError,
  BusErrorCode,
  ConfigurationError,
  EventValidationError,
} from '../broker/errors.js';
import type { BrokerLike, SubscribeOptions } from '../broker/types.js';
import {
  EventScope,
  channelForEventType,
  type EventDefinition,
  type FlatRecord,
  type RoutableEvent,
  type ScopedEvent,
} from './event.js';

/**
 * Handler for untyped events; receives the flat record
 */
export type RecordHandler = (record: FlatRecord) => unknown;

/**
 * Handler for a typed event definition
 */
export type TypedEventHandler<TData> = (event: ScopedEvent<TData>) => unknown;

export interface EventBusOptions {
  logger?: Logger;
}

export interface HandlerInfo {
  handler: string;
  channel: string;
}

export interface EventSubscription {
  eventType: string;
  channel: string;
  name: string;
}

interface RegisteredHandler {
  name: string;
  channel: string;
  handler: RecordHandler;
}

export class EventBus {
  private readonly local: BrokerLike;
  private readonly distributed: BrokerLike;
  private readonly logger: Logger;
  private handlers: Map<string, RegisteredHandler[]> = new Map();

  /**
   * @param local Broker for process-scoped events
   * @param distributed Broker for app-scoped events
   * @throws ConfigurationError if either broker is missing
   */
  constructor(local: BrokerLike | null | undefined, distributed: BrokerLike | null | undefined, options: EventBusOptions = {}) {
    if (!local) {
      throw new ConfigurationError(BusErrorCode.MISSING_COLLABORATOR, 'local broker cannot be null');
    }
    if (!distributed) {
      throw new ConfigurationError(BusErrorCode.MISSING_COLLABORATOR, 'distributed broker cannot be null');
    }

    this.local = local;
    this.distributed = distributed;
    this.logger = options.logger ?? getLogger();
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Start the local broker, then the distributed one. If the distributed
   * broker fails, the local broker is stopped again before rethrowing.
   */
  async start(): Promise<void> {
    this.logger.info('Starting EventBus...');

    try {
      await this.local.start();
      this.logger.info('Local broker started');
    } catch (error) {
      this.logger.error(`Failed to start local broker: ${describeError(error)}`);
      throw error;
    }

    try {
      await this.distributed.start();
      this.logger.info('Distributed broker started');
    } catch (error) {
      this.logger.error(`Failed to start distributed broker: ${describeError(error)}`);
      try {
        await this.local.stop();
      } catch (rollbackError) {
        this.logger.error(`Failed to stop local broker during rollback: ${describeError(rollbackError)}`);
      }
      throw error;
    }

    this.logger.info('EventBus started successfully');
  }

  /**
   * Stop both brokers, even if the first one fails
   *
   * @throws BrokerStopError listing every failure
   */
  async stop(): Promise<void> {
    this.logger.info('Stopping EventBus...');
    const errors: unknown[] = [];

    try {
      await this.local.stop();
      this.logger.info('Local broker stopped');
    } catch (error) {
      this.logger.error(`Failed to stop local broker: ${describeError(error)}`);
      errors.push(error);
    }

    try {
      await this.distributed.stop();
      this.logger.info('Distributed broker stopped');
    } catch (error) {
      this.logger.error(`Failed to stop distributed broker: ${describeError(error)}`);
      errors.push(error);
    }

    if (errors.length > 0) {
      this.logger.error(`EventBus stopped with ${errors.length} error(s)`);
      throw new BrokerStopError(errors);
    }

    this.logger.info('EventBus stopped successfully');
  }

  /**
   * Start the bus, run `fn`, and stop the bus however `fn` ends
   */
  async run<T>(fn: (bus: this) => Promise<T>): Promise<T> {
    await this.start();
    try {
      return await fn(this);
    } finally {
      await this.stop();
    }
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Register a handler for an event type on both brokers
   *
   * @param eventType Event type, e.g. "order.created"
   * @param handler Receives the event's flat record
   */
  subscribe(eventType: string, handler: RecordHandler, options: SubscribeOptions = {}): EventSubscription {
    if (!eventType) {
      throw new ConfigurationError(BusErrorCode.MISSING_CHANNEL, 'event type is required');
    }

    const channel = channelForEventType(eventType);
    const name = options.name || handler.name || 'anonymous';

    // Brokers deliver opaque payloads; records are checked once, here
    const deliver = (payload: unknown): unknown => handler(toFlatRecord(payload, eventType));

    this.local.subscribe(channel, deliver, { name });
    this.distributed.subscribe(channel, deliver, { name });

    const list = this.handlers.get(eventType);
    const entry: RegisteredHandler = { name, channel, handler };
    if (list) {
      list.push(entry);
    } else {
      this.handlers.set(eventType, [entry]);
    }

    this.logger.info(`Registered handler '${name}' for event '${eventType}'`);
    return { eventType, channel, name };
  }

  /**
   * Register a handler for a typed event. Each record is decoded with the
   * definition before the handler sees it.
   */
  on<TData>(definition: EventDefinition<TData>, handler: TypedEventHandler<TData>, options: SubscribeOptions = {}): EventSubscription {
    const name = options.name || handler.name || 'anonymous';
    return this.subscribe(
      definition.type,
      (record) => handler(definition.decode(record)),
      { name }
    );
  }

  // ==========================================================================
  // Publishing
  // ==========================================================================

  /**
   * Route an event by scope. Failures are logged, not thrown.
   */
  async publish(event: RoutableEvent): Promise<void> {
    const channel = event.channelName();

    if (event.scope === EventScope.PROCESS) {
      this.logger.info(`Processing ${event.scope} event '${event.type}' via local broker`);
      try {
        await this.local.publish(event.toFlatRecord(), channel);
      } catch (error) {
        this.logger.error(`Failed to publish event to local broker: ${describeError(error)}`);
      }
      return;
    }

    this.logger.info(`Publishing ${event.scope} event '${event.type}' to channel '${channel}'`);
    try {
      await this.distributed.publish(event.toFlatRecord(), channel);
    } catch (error) {
      this.logger.error(`Failed to publish event to distributed broker: ${describeError(error)}`);
    }
  }

  // ==========================================================================
  // Introspection
  // ==========================================================================

  /**
   * Snapshot of registered handlers by event type
   */
  getHandlers(): Record<string, HandlerInfo[]> {
    const result: Record<string, HandlerInfo[]> = {};
    for (const [eventType, list] of this.handlers) {
      result[eventType] = list.map(entry => ({ handler: entry.name, channel: entry.channel }));
    }
    return result;
  }
}

function toFlatRecord(payload: unknown, eventType: string): FlatRecord {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new EventValidationError(
      `Expected a flat record for event '${eventType}', got ${Array.isArray(payload) ? 'array' : typeof payload}`
    );
  }
  return Object.fromEntries(Object.entries(payload));
}
