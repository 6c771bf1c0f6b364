/**
 * In-Memory Broker Module
 *
 * - Bounded per-channel queues (ChannelQueue)
 * - Ordered handler registrations (SubscriptionRegistry)
 * - One consumer loop per channel (ConsumerLoop)
 * - RPC correlation (CorrelationManager)
 * - The composed broker (MessageBroker)
 */

export { MessageBroker, MAX_TIMER_DELAY } from './broker.js';
export { ChannelQueue } from './channel-queue.js';
export { SubscriptionRegistry } from './subscription-registry.js';
export { ConsumerLoop, type ConsumerContext } from './consumer-loop.js';
export {
  CorrelationManager,
  REPLY_CHANNEL_PREFIX,
  replyChannelFor,
  type PendingRequest,
} from './correlation.js';
export {
  BusError,
  BusErrorCode,
  ConfigurationError,
  BrokerNotRunningError,
  RequestTimeoutError,
  EventValidationError,
  BrokerStopError,
  assertChannel,
} from './errors.js';
export {
  REPLY_TO_HEADER,
  CORRELATION_ID_HEADER,
  PublishOutcome,
  type MessageHeaders,
  type MessageEnvelope,
  type MessageHandler,
  type SubscribeOptions,
  type Subscriber,
  type SubscriptionHandle,
  type SubscriberInfo,
  type PublishResult,
  type RequestOptions,
  type BrokerStats,
  type HandlerErrorEvent,
  type MessageDroppedEvent,
  type BrokerLike,
  type BrokerOptions,
} from './types.js';
