/**
 * Broker Type Definitions
 *
 * Envelopes, handlers, publish results and the capability contract shared by
 * every broker the event bus can route to.
 */

import type { Logger } from '../logging/logger.js';

// ============================================================================
// Envelopes
// ============================================================================

/** Header naming the channel a handler's result is published to */
export const REPLY_TO_HEADER = 'reply_to';

/** Header carrying the request's correlation identifier */
export const CORRELATION_ID_HEADER = 'correlation_id';

/**
 * Message headers. Only `reply_to` and `correlation_id` are interpreted.
 */
export interface MessageHeaders {
  reply_to?: string;
  correlation_id?: string;
  [key: string]: string | undefined;
}

/**
 * One message instance in transit
 */
export interface MessageEnvelope<T = unknown> {
  readonly payload: T;
  readonly headers: Readonly<MessageHeaders>;
}

// ============================================================================
// Handlers and registrations
// ============================================================================

/**
 * Channel handler. A non-empty result is sent back when the envelope carries
 * a `reply_to` header.
 */
export type MessageHandler<TPayload = unknown> = (payload: TPayload) => unknown;

export interface SubscribeOptions {
  /** Identity used in logs and diagnostics (defaults to the function name) */
  name?: string;
}

/**
 * Registered handler as stored by the subscription registry
 */
export interface Subscriber {
  readonly id: string;
  readonly channel: string;
  readonly name: string;
  readonly handler: MessageHandler;
}

/**
 * Returned by subscribe(); the handler itself is left untouched
 */
export interface SubscriptionHandle {
  readonly id: string;
  readonly channel: string;
  readonly name: string;
}

export interface SubscriberInfo {
  handler: string;
  channel: string;
}

// ============================================================================
// Publishing
// ============================================================================

export enum PublishOutcome {
  /** Envelope accepted by the channel queue */
  DELIVERED = 'delivered',
  /** Channel has no registered handler; nothing was enqueued */
  NO_SUBSCRIBERS = 'no-subscribers',
  /** Channel queue at capacity; envelope dropped */
  QUEUE_FULL = 'queue-full',
}

export interface PublishResult {
  outcome: PublishOutcome;
  /** Handlers that will receive the message (0 unless delivered) */
  recipients: number;
}

export interface RequestOptions {
  /** Milliseconds to wait for the reply */
  timeout?: number;
}

// ============================================================================
// Diagnostics
// ============================================================================

export interface BrokerStats {
  running: boolean;
  published: number;
  consumed: number;
  errors: number;
  channels: number;
  subscribers: number;
  /** Consumer loops currently alive */
  consumers: number;
  pendingRequests: number;
  queueSizes: Record<string, number>;
}

/**
 * Payload of the broker's `handler-error` event
 */
export interface HandlerErrorEvent {
  channel: string;
  handler: string;
  error: unknown;
}

/**
 * Payload of the broker's `message-dropped` event
 */
export interface MessageDroppedEvent {
  channel: string;
  reason: PublishOutcome.QUEUE_FULL;
  queueSize: number;
}

// ============================================================================
// Broker contract
// ============================================================================

/**
 * Capability contract the event bus needs from a broker. The in-memory
 * MessageBroker implements it; a distributed broker only has to match it.
 */
export interface BrokerLike {
  start(): Promise<void>;
  stop(): Promise<void>;
  subscribe(channel: string, handler: MessageHandler, options?: SubscribeOptions): unknown;
  publish(payload: unknown, channel: string, headers?: MessageHeaders): Promise<unknown>;
}

export interface BrokerOptions {
  /** Name used in log lines, e.g. "process" or "app" */
  name?: string;
  /** Capacity of every channel queue */
  maxQueueSize?: number;
  /** Consumer loop wait on an empty queue, in milliseconds */
  pollInterval?: number;
  /** Default request() timeout, in milliseconds */
  requestTimeout?: number;
  logger?: Logger;
}
