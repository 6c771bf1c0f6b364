/**
 * In-Memory Message Broker
 *
 * Channel-based publish/subscribe broker for a single process:
 * - One bounded queue and one consumer loop per channel
 * - Non-blocking publish with distinct outcomes for "no subscribers" and "queue full"
 * - Request/response (RPC) over ephemeral reply channels with correlation ids
 * - Diagnostics snapshot and `handler-error` / `message-dropped` events
 *
 * Exposes the same start/stop/subscribe/publish surface a distributed broker
 * offers, so the event bus can use it for either scope.
 */

import { EventEmitter } from 'events';
import { getLogger, describeError, type Logger } from '../logging/logger.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { AppConfig } from '../config/schema.js';
import { ChannelQueue } from './channel-queue.js';
import { ConsumerLoop, type ConsumerContext } from './consumer-loop.js';
import { CorrelationManager } from './correlation.js';
import {
  BrokerNotRunningError,
  BusErrorCode,
  ConfigurationError,
  assertChannel,
} from './errors.js';
import { SubscriptionRegistry } from './subscription-registry.js';
import {
  CORRELATION_ID_HEADER,
  PublishOutcome,
  REPLY_TO_HEADER,
  type BrokerLike,
  type BrokerOptions,
  type BrokerStats,
  type HandlerErrorEvent,
  type MessageDroppedEvent,
  type MessageEnvelope,
  type MessageHandler,
  type MessageHeaders,
  type PublishResult,
  type RequestOptions,
  type SubscribeOptions,
  type SubscriberInfo,
  type SubscriptionHandle,
} from './types.js';

/** Largest delay setTimeout honours; longer ones fire after 1 ms */
export const MAX_TIMER_DELAY = 2_147_483_647;

export class MessageBroker extends EventEmitter implements BrokerLike {
  readonly name: string;
  readonly maxQueueSize: number;
  readonly pollInterval: number;
  readonly requestTimeout: number;

  private readonly logger: Logger;
  private readonly registry = new SubscriptionRegistry();
  private readonly correlations = new CorrelationManager();
  private readonly queues: Map<string, ChannelQueue<MessageEnvelope>> = new Map();
  private readonly loops: Map<string, ConsumerLoop> = new Map();
  private readonly consumerContext: ConsumerContext;
  private running = false;
  private stopping: Promise<void> | null = null;

  private counters = {
    published: 0,
    consumed: 0,
    errors: 0,
  };

  constructor(options: BrokerOptions = {}) {
    super();

    this.name = options.name ?? 'broker';
    this.maxQueueSize = positiveOption('maxQueueSize', options.maxQueueSize ?? DEFAULT_CONFIG.broker.maxQueueSize, true);
    this.pollInterval = delayOption('pollInterval', options.pollInterval ?? DEFAULT_CONFIG.broker.pollInterval);
    this.requestTimeout = delayOption('requestTimeout', options.requestTimeout ?? DEFAULT_CONFIG.rpc.timeout);
    this.logger = options.logger ?? getLogger();

    this.consumerContext = {
      handlersFor: (channel) => this.registry.handlersFor(channel),
      reply: (result, channel) => this.publish(result, channel),
      onConsumed: () => {
        this.counters.consumed++;
      },
      onHandlerError: (subscriber, error) => {
        this.counters.errors++;
        this.logger.error(
          `[${this.name}] Error in handler '${subscriber.name}' for channel '${subscriber.channel}': ${describeError(error)}`
        );
        const event: HandlerErrorEvent = { channel: subscriber.channel, handler: subscriber.name, error };
        this.emit('handler-error', event);
      },
    };
  }

  /**
   * Build a broker from loaded configuration
   */
  static fromConfig(config: AppConfig, options: Pick<BrokerOptions, 'name' | 'logger'> = {}): MessageBroker {
    return new MessageBroker({
      ...options,
      maxQueueSize: config.broker.maxQueueSize,
      pollInterval: config.broker.pollInterval,
      requestTimeout: config.rpc.timeout,
    });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Start the broker and launch a consumer loop for every registered channel
   */
  async start(): Promise<void> {
    // Loops of the previous run must be gone before new ones are launched
    if (this.stopping) {
      await this.stopping;
    }
    if (this.running) {
      return;
    }
    this.running = true;

    for (const channel of this.registry.channelNames()) {
      this.ensureConsumer(channel);
    }

    this.logger.debug(`[${this.name}] Broker started with ${this.loops.size} channel(s)`);
  }

  /**
   * Stop every consumer loop and drop queued envelopes. Registrations are
   * kept, so a later start() resumes delivery. A call made while a stop is
   * in flight waits for that same stop.
   */
  async stop(): Promise<void> {
    if (this.stopping) {
      return this.stopping;
    }
    if (!this.running) {
      return;
    }
    this.running = false;

    this.stopping = this.shutdown().finally(() => {
      this.stopping = null;
    });
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    await Promise.all(Array.from(this.loops.values(), loop => loop.stop()));

    let dropped = 0;
    for (const queue of this.queues.values()) {
      dropped += queue.clear();
    }
    this.loops.clear();
    this.queues.clear();

    this.logger.debug(`[${this.name}] Broker stopped (${dropped} undelivered message(s) dropped)`);
  }

  /**
   * Alias of start()
   */
  async connect(): Promise<void> {
    await this.start();
  }

  async ping(): Promise<boolean> {
    return this.running;
  }

  /**
   * Start the broker, run `fn`, and stop the broker however `fn` ends
   */
  async run<T>(fn: (broker: this) => Promise<T>): Promise<T> {
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
   * Append a handler to a channel. Starts the channel's consumer loop right
   * away when the broker is running.
   */
  subscribe(channel: string, handler: MessageHandler, options: SubscribeOptions = {}): SubscriptionHandle {
    assertChannel(channel);

    const subscriber = this.registry.add(channel, handler, options.name);
    if (this.running) {
      this.ensureConsumer(channel);
    }

    this.logger.debug(`[${this.name}] Registered handler '${subscriber.name}' on channel '${channel}'`);
    return { id: subscriber.id, channel, name: subscriber.name };
  }

  /**
   * Wrap `fn` so that every non-empty result it produces is published to `channel`
   */
  publisher<TArgs extends unknown[], TResult>(
    channel: string,
    fn: (...args: TArgs) => TResult | Promise<TResult>
  ): (...args: TArgs) => Promise<TResult> {
    assertChannel(channel);

    return async (...args: TArgs): Promise<TResult> => {
      const result = await fn(...args);
      if (result !== undefined && result !== null) {
        await this.publish(result, channel);
      }
      return result;
    };
  }

  // ==========================================================================
  // Publishing
  // ==========================================================================

  /**
   * Enqueue a message on a channel without waiting for delivery
   *
   * @throws BrokerNotRunningError if the broker is stopped
   * @throws ConfigurationError if channel is empty
   */
  async publish(payload: unknown, channel: string, headers: MessageHeaders = {}): Promise<PublishResult> {
    if (!this.running) {
      throw new BrokerNotRunningError('publish');
    }
    assertChannel(channel);

    const recipients = this.registry.count(channel);
    if (recipients === 0) {
      return { outcome: PublishOutcome.NO_SUBSCRIBERS, recipients: 0 };
    }

    const queue = this.ensureConsumer(channel);
    const envelope: MessageEnvelope = Object.freeze({
      payload,
      headers: Object.freeze({ ...headers }),
    });

    if (!queue.offer(envelope)) {
      this.counters.errors++;
      this.logger.warn(`[${this.name}] Queue full for channel '${channel}' (${queue.capacity}); message dropped`);
      const event: MessageDroppedEvent = {
        channel,
        reason: PublishOutcome.QUEUE_FULL,
        queueSize: queue.size,
      };
      this.emit('message-dropped', event);
      return { outcome: PublishOutcome.QUEUE_FULL, recipients: 0 };
    }

    this.counters.published++;
    return { outcome: PublishOutcome.DELIVERED, recipients };
  }

  /**
   * Publish a request and wait for the first reply
   *
   * @throws RequestTimeoutError if no reply arrives within the timeout
   */
  async request(payload: unknown, channel: string, options: RequestOptions = {}): Promise<unknown> {
    if (!this.running) {
      throw new BrokerNotRunningError('request');
    }
    assertChannel(channel);
    const timeout = delayOption('timeout', options.timeout ?? this.requestTimeout);

    const pending = this.correlations.open(channel);
    const fulfillReply = (response: unknown): void => {
      this.correlations.fulfill(pending.correlationId, response);
    };
    this.subscribe(pending.replyChannel, fulfillReply, { name: 'rpc-reply' });

    try {
      await this.publish(payload, channel, {
        [REPLY_TO_HEADER]: pending.replyChannel,
        [CORRELATION_ID_HEADER]: pending.correlationId,
      });
      return await this.correlations.awaitResponse(pending, timeout);
    } finally {
      // No-op unless publish itself failed
      this.correlations.discard(pending.correlationId);
      await this.releaseChannel(pending.replyChannel);
    }
  }

  // ==========================================================================
  // Diagnostics
  // ==========================================================================

  getStats(): BrokerStats {
    const queueSizes: Record<string, number> = {};
    for (const [channel, queue] of this.queues) {
      queueSizes[channel] = queue.size;
    }

    return {
      running: this.running,
      published: this.counters.published,
      consumed: this.counters.consumed,
      errors: this.counters.errors,
      channels: this.registry.channelCount,
      subscribers: this.registry.subscriberCount,
      consumers: this.loops.size,
      pendingRequests: this.correlations.size,
      queueSizes,
    };
  }

  getSubscribers(): Record<string, SubscriberInfo[]> {
    return this.registry.describe();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private ensureConsumer(channel: string): ChannelQueue<MessageEnvelope> {
    const existing = this.queues.get(channel);
    if (existing) {
      return existing;
    }

    const queue = new ChannelQueue<MessageEnvelope>(this.maxQueueSize);
    const loop = new ConsumerLoop(channel, queue, this.consumerContext, this.pollInterval);
    this.queues.set(channel, queue);
    this.loops.set(channel, loop);
    loop.start();

    return queue;
  }

  /**
   * Tear down a single channel (ephemeral reply channels only)
   */
  private async releaseChannel(channel: string): Promise<void> {
    this.registry.removeChannel(channel);

    const loop = this.loops.get(channel);
    this.loops.delete(channel);
    this.queues.get(channel)?.clear();
    this.queues.delete(channel);

    if (loop) {
      await loop.stop();
    }
  }
}

function positiveOption(name: string, value: number, integer = false): number {
  const valid = integer ? Number.isInteger(value) && value > 0 : Number.isFinite(value) && value > 0;
  if (!valid) {
    throw new ConfigurationError(
      BusErrorCode.INVALID_OPTION,
      `${name} must be a positive ${integer ? 'integer' : 'number'}, got ${value}`,
      { [name]: value }
    );
  }
  return value;
}

/**
 * Positive number usable as a timer delay
 */
function delayOption(name: string, value: number): number {
  positiveOption(name, value);
  if (value > MAX_TIMER_DELAY) {
    throw new ConfigurationError(
      BusErrorCode.INVALID_OPTION,
      `${name} must not exceed ${MAX_TIMER_DELAY}ms, got ${value}`,
      { [name]: value }
    );
  }
  return value;
}
