/**
 * Consumer Loop
 *
 * One loop per channel. Drains the channel queue and invokes every registered
 * handler for each envelope, sequentially and in registration order. A handler
 * fault is counted and logged, and never stops delivery to its siblings.
 *
 * States: waiting-for-message -> dispatching -> waiting-for-message, until stop().
 */

import { ChannelQueue } from './channel-queue.js';
import type { MessageEnvelope, Subscriber } from './types.js';

/**
 * What a loop needs from its owning broker
 */
export interface ConsumerContext {
  handlersFor(channel: string): Subscriber[];
  reply(result: unknown, channel: string): Promise<unknown>;
  onConsumed(subscriber: Subscriber): void;
  onHandlerError(subscriber: Subscriber, error: unknown): void;
}

export class ConsumerLoop {
  private stopping = false;
  private task: Promise<void> | null = null;

  constructor(
    public readonly channel: string,
    private readonly queue: ChannelQueue<MessageEnvelope>,
    private readonly context: ConsumerContext,
    private readonly pollInterval: number
  ) {}

  get running(): boolean {
    return this.task !== null && !this.stopping;
  }

  start(): void {
    if (this.task) {
      return;
    }
    this.stopping = false;
    this.task = this.run();
  }

  /**
   * Signal the loop and wait until it exits. An in-flight handler is allowed
   * to finish; envelopes still queued are left for the broker to drop.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    this.queue.interrupt();

    const task = this.task;
    if (task) {
      await task;
    }
    this.task = null;
  }

  private async run(): Promise<void> {
    while (!this.stopping) {
      const envelope = await this.queue.take(this.pollInterval);
      if (envelope === null) {
        continue;
      }
      await this.dispatch(envelope);
    }
  }

  private async dispatch(envelope: MessageEnvelope): Promise<void> {
    const replyTo = envelope.headers.reply_to;

    for (const subscriber of this.context.handlersFor(this.channel)) {
      if (this.stopping) {
        return;
      }

      try {
        const result = await subscriber.handler(envelope.payload);
        this.context.onConsumed(subscriber);

        if (replyTo && result !== undefined && result !== null) {
          await this.context.reply(result, replyTo);
        }
      } catch (error) {
        this.context.onHandlerError(subscriber, error);
      }
    }
  }
}
