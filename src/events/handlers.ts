/**
 * Global Event Handler Registration
 *
 * Lets modules declare typed handlers before the application has built its
 * event bus. Declarations made before initEventBus() are buffered and flushed
 * into the bus when it is created; later ones register immediately.
 *
 * Passing an EventBus around explicitly is preferred. This module exists for
 * code that registers handlers at import time.
 */

import type { Logger } from '../logging/logger.js';
import type { BrokerLike } from '../broker/types.js';
import { EventBus, type TypedEventHandler } from './bus.js';
import type { EventDefinition } from './event.js';

/**
 * Deferred registration against the global bus
 */
type PendingRegistration = (bus: EventBus) => void;

let globalEventBus: EventBus | null = null;
let pendingHandlers: PendingRegistration[] = [];

/**
 * Register a typed handler with the global bus, or buffer it until
 * initEventBus() runs. The handler is returned unchanged.
 */
export function eventHandler<TData>(
  definition: EventDefinition<TData>,
  handler: TypedEventHandler<TData>
): TypedEventHandler<TData> {
  const register: PendingRegistration = (bus) => {
    bus.on(definition, handler);
  };

  if (globalEventBus) {
    register(globalEventBus);
  } else {
    pendingHandlers.push(register);
  }

  return handler;
}

/**
 * Create the global event bus and flush buffered handlers into it
 */
export function initEventBus(
  local: BrokerLike,
  distributed: BrokerLike,
  options: { logger?: Logger } = {}
): EventBus {
  const bus = new EventBus(local, distributed, options);

  const backlog = pendingHandlers;
  pendingHandlers = [];
  for (const register of backlog) {
    register(bus);
  }

  globalEventBus = bus;
  return bus;
}

/**
 * Get the global event bus, or null before initEventBus()
 */
export function getEventBus(): EventBus | null {
  return globalEventBus;
}

/**
 * Forget the global bus and any buffered handlers (useful for testing)
 */
export function resetEventBus(): void {
  globalEventBus = null;
  pendingHandlers = [];
}

export function pendingHandlerCount(): number {
  return pendingHandlers.length;
}
