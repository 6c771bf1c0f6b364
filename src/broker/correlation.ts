/**
 * Correlation Manager
 *
 * Tracks in-flight request/response exchanges. Each request gets a UUID
 * correlation id, an ephemeral reply channel and a one-shot completion slot.
 * An entry leaves the table exactly once: fulfilled, expired or discarded.
 */

import { v4 as uuidv4 } from 'uuid';
import { RequestTimeoutError } from './errors.js';

/** Prefix of every ephemeral reply channel */
export const REPLY_CHANNEL_PREFIX = '_reply.';

export interface PendingRequest {
  readonly correlationId: string;
  readonly replyChannel: string;
  readonly channel: string;
  readonly createdAt: string;
  /** Settles with the first reply; never rejects */
  readonly response: Promise<unknown>;
}

interface PendingEntry {
  request: PendingRequest;
  resolve: (value: unknown) => void;
}

export function replyChannelFor(correlationId: string): string {
  return `${REPLY_CHANNEL_PREFIX}${correlationId}`;
}

export class CorrelationManager {
  private pending: Map<string, PendingEntry> = new Map();

  /**
   * Register a new exchange for a request sent on `channel`
   */
  open(channel: string): PendingRequest {
    const correlationId = uuidv4();

    let resolve: (value: unknown) => void = () => {};
    const response = new Promise<unknown>((res) => {
      resolve = res;
    });

    const request: PendingRequest = {
      correlationId,
      replyChannel: replyChannelFor(correlationId),
      channel,
      createdAt: new Date().toISOString(),
      response,
    };

    this.pending.set(correlationId, { request, resolve });
    return request;
  }

  /**
   * Complete an exchange. A second reply for the same id is ignored.
   *
   * @returns True if a pending entry was fulfilled
   */
  fulfill(correlationId: string, value: unknown): boolean {
    const entry = this.pending.get(correlationId);
    if (!entry) {
      return false;
    }
    this.pending.delete(correlationId);
    entry.resolve(value);
    return true;
  }

  /**
   * Remove an exchange without completing it
   *
   * @returns True if the entry was still pending
   */
  discard(correlationId: string): boolean {
    return this.pending.delete(correlationId);
  }

  /**
   * Wait for the reply, expiring the entry after timeoutMs
   *
   * @throws RequestTimeoutError when no reply arrives in time
   */
  async awaitResponse(request: PendingRequest, timeoutMs: number): Promise<unknown> {
    let timer: NodeJS.Timeout | undefined;

    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        this.discard(request.correlationId);
        reject(new RequestTimeoutError(request.channel, request.correlationId, timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([request.response, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  has(correlationId: string): boolean {
    return this.pending.has(correlationId);
  }

  get size(): number {
    return this.pending.size;
  }

  correlationIds(): string[] {
    return Array.from(this.pending.keys());
  }
}
