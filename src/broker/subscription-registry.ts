/**
 * Subscription Registry
 *
 * Maps channel names to their ordered handler lists. Registration order is
 * invocation order; the same handler may be registered more than once.
 */

import { v4 as uuidv4 } from 'uuid';
import type { MessageHandler, Subscriber, SubscriberInfo } from './types.js';

export class SubscriptionRegistry {
  private channels: Map<string, Subscriber[]> = new Map();

  /**
   * Append a handler to a channel, creating the channel on first use
   */
  add(channel: string, handler: MessageHandler, name?: string): Subscriber {
    const subscriber: Subscriber = {
      id: uuidv4(),
      channel,
      name: name || handler.name || 'anonymous',
      handler,
    };

    const list = this.channels.get(channel);
    if (list) {
      list.push(subscriber);
    } else {
      this.channels.set(channel, [subscriber]);
    }

    return subscriber;
  }

  /**
   * Snapshot of a channel's handlers in registration order
   */
  handlersFor(channel: string): Subscriber[] {
    return [...(this.channels.get(channel) ?? [])];
  }

  count(channel: string): number {
    return this.channels.get(channel)?.length ?? 0;
  }

  has(channel: string): boolean {
    return this.channels.has(channel);
  }

  /**
   * Forget a channel and all of its handlers
   *
   * @returns True if the channel existed
   */
  removeChannel(channel: string): boolean {
    return this.channels.delete(channel);
  }

  channelNames(): string[] {
    return Array.from(this.channels.keys());
  }

  get channelCount(): number {
    return this.channels.size;
  }

  get subscriberCount(): number {
    let total = 0;
    for (const list of this.channels.values()) {
      total += list.length;
    }
    return total;
  }

  describe(): Record<string, SubscriberInfo[]> {
    const result: Record<string, SubscriberInfo[]> = {};
    for (const [channel, list] of this.channels) {
      result[channel] = list.map(sub => ({ handler: sub.name, channel: sub.channel }));
    }
    return result;
  }
}
