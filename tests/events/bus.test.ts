/**
 * Event Bus Tests
 * Scope routing, dual registration, lifecycle rollback and stop aggregation
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { z } from 'zod';
import { MessageBroker } from '../../src/broker/broker.js';
import { BrokerStopError, BusErrorCode, ConfigurationError } from '../../src/broker/errors.js';
import type { BrokerLike } from '../../src/broker/types.js';
import { EventBus } from '../../src/events/bus.js';
import { EventScope, ScopedEvent, defineEvent } from '../../src/events/event.js';
import { createLogger } from '../../src/logging/logger.js';

const logger = createLogger({ silent: true });

interface FakeBroker extends BrokerLike {
  start: Mock;
  stop: Mock;
  subscribe: Mock;
  publish: Mock;
}

function fakeBroker(): FakeBroker {
  return {
    start: vi.fn().mockResolvedValue(undefined),
    stop: vi.fn().mockResolvedValue(undefined),
    subscribe: vi.fn(),
    publish: vi.fn().mockResolvedValue(undefined),
  };
}

describe('EventBus', () => {
  let local: MessageBroker;
  let distributed: MessageBroker;
  let bus: EventBus;

  beforeEach(() => {
    local = new MessageBroker({ name: 'process', pollInterval: 20, logger });
    distributed = new MessageBroker({ name: 'app', pollInterval: 20, logger });
    bus = new EventBus(local, distributed, { logger });
  });

  afterEach(async () => {
    await local.stop();
    await distributed.stop();
  });

  describe('construction', () => {
    it('should require both brokers', () => {
      expect(() => new EventBus(null, distributed, { logger })).toThrow('local broker cannot be null');
      expect(() => new EventBus(local, undefined, { logger })).toThrow('distributed broker cannot be null');

      const error = (() => {
        try {
          return new EventBus(null, null, { logger });
        } catch (err) {
          return err;
        }
      })();
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ code: BusErrorCode.MISSING_COLLABORATOR });
    });
  });

  describe('subscribe', () => {
    it('should register the handler on both brokers', () => {
      const subscription = bus.subscribe('order.created', () => undefined, { name: 'audit' });

      const expected = { 'events.order.created': [{ handler: 'audit', channel: 'events.order.created' }] };
      expect(local.getSubscribers()).toEqual(expected);
      expect(distributed.getSubscribers()).toEqual(expected);
      expect(subscription).toEqual({ eventType: 'order.created', channel: 'events.order.created', name: 'audit' });
    });

    it('should name handlers after the function when no name is given', () => {
      bus.subscribe('order.created', function sendReceipt() {});

      expect(bus.getHandlers()).toEqual({
        'order.created': [{ handler: 'sendReceipt', channel: 'events.order.created' }],
      });
    });

    it('should list handlers per event type', () => {
      bus.subscribe('order.created', () => undefined, { name: 'audit' });
      bus.subscribe('order.created', () => undefined, { name: 'billing' });
      bus.subscribe('user.created', () => undefined, { name: 'welcome' });

      expect(bus.getHandlers()).toEqual({
        'order.created': [
          { handler: 'audit', channel: 'events.order.created' },
          { handler: 'billing', channel: 'events.order.created' },
        ],
        'user.created': [{ handler: 'welcome', channel: 'events.user.created' }],
      });
    });

    it('should refuse an empty event type', () => {
      expect(() => bus.subscribe('', () => undefined)).toThrow('event type is required');
    });
  });

  describe('publish', () => {
    it('should route process-scoped events to the local broker only', async () => {
      const handler = vi.fn();
      bus.subscribe('cache.cleared', handler);
      await bus.start();

      const event = new ScopedEvent({ source: '/cache', type: 'cache.cleared', scope: EventScope.PROCESS });
      await bus.publish(event);

      await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(1));
      expect(handler).toHaveBeenCalledWith(event.toFlatRecord());
      expect(local.getStats().published).toBe(1);
      expect(distributed.getStats().published).toBe(0);
    });

    it('should route app-scoped events to the distributed broker only', async () => {
      const handler = vi.fn();
      bus.subscribe('order.created', handler);
      await bus.start();

      const event = new ScopedEvent({ source: '/orders', type: 'order.created', data: { orderId: 'A1' } });
      await bus.publish(event);

      await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(1));
      expect(handler).toHaveBeenCalledWith(event.toFlatRecord());
      expect(local.getStats().published).toBe(0);
      expect(distributed.getStats().published).toBe(1);
    });

    it('should log and swallow broker failures', async () => {
      bus.subscribe('order.created', () => undefined);
      const errorSpy = vi.spyOn(logger, 'error');

      // Brokers were never started, so both publish calls throw
      await expect(bus.publish(new ScopedEvent({ source: '/orders', type: 'order.created' }))).resolves.toBeUndefined();
      await expect(bus.publish(new ScopedEvent({
        source: '/cache',
        type: 'order.created',
        scope: EventScope.PROCESS,
      }))).resolves.toBeUndefined();

      expect(errorSpy).toHaveBeenCalledWith(
        'Failed to publish event to distributed broker: Broker is not running. Call start() before publish().'
      );
      expect(errorSpy).toHaveBeenCalledWith(
        'Failed to publish event to local broker: Broker is not running. Call start() before publish().'
      );
    });
  });

  describe('typed handlers', () => {
    const OrderCreated = defineEvent({
      type: 'order.created',
      data: z.object({ orderId: z.string() }),
      source: '/orders',
    });

    it('should hand the decoded event to the handler', async () => {
      const received: string[] = [];
      bus.on(OrderCreated, (event) => {
        if (event.data) {
          received.push(event.data.orderId);
        }
      });
      await bus.start();

      await bus.publish(OrderCreated.create({ data: { orderId: 'A7' } }));

      await vi.waitFor(() => expect(received).toEqual(['A7']));
    });

    it('should count a record that fails decoding as a handler error', async () => {
      const handler = vi.fn();
      bus.on(OrderCreated, handler, { name: 'typed' });
      await bus.start();

      await bus.publish(new ScopedEvent({
        source: '/orders',
        type: 'order.created',
        data: { orderId: 7 },
        scope: EventScope.PROCESS,
      }));

      await vi.waitFor(() => expect(local.getStats().errors).toBe(1));
      expect(handler).not.toHaveBeenCalled();
      expect(local.getSubscribers()['events.order.created']).toEqual([
        { handler: 'typed', channel: 'events.order.created' },
      ]);
    });
  });

  describe('lifecycle', () => {
    it('should start and stop both brokers', async () => {
      await bus.start();
      expect(local.isRunning).toBe(true);
      expect(distributed.isRunning).toBe(true);

      await bus.stop();
      expect(local.isRunning).toBe(false);
      expect(distributed.isRunning).toBe(false);
    });

    it('should stop the local broker when the distributed one fails to start', async () => {
      const failing = fakeBroker();
      failing.start.mockRejectedValue(new Error('connection refused'));
      const rollbackBus = new EventBus(local, failing, { logger });
      rollbackBus.subscribe('order.created', () => undefined);

      await expect(rollbackBus.start()).rejects.toThrow('connection refused');

      expect(local.isRunning).toBe(false);
      expect(local.getStats().consumers).toBe(0);
      expect(failing.subscribe).toHaveBeenCalledTimes(1);
    });

    it('should rethrow the start failure when the rollback also fails', async () => {
      const stuckLocal = fakeBroker();
      stuckLocal.stop.mockRejectedValue(new Error('local stuck'));
      const failing = fakeBroker();
      failing.start.mockRejectedValue(new Error('connection refused'));
      const errorSpy = vi.spyOn(logger, 'error');

      await expect(new EventBus(stuckLocal, failing, { logger }).start()).rejects.toThrow('connection refused');

      expect(stuckLocal.stop).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledWith('Failed to stop local broker during rollback: local stuck');
    });

    it('should not start the distributed broker when the local one fails', async () => {
      const failingLocal = fakeBroker();
      failingLocal.start.mockRejectedValue(new Error('local unavailable'));
      const remote = fakeBroker();

      await expect(new EventBus(failingLocal, remote, { logger }).start()).rejects.toThrow('local unavailable');
      expect(remote.start).not.toHaveBeenCalled();
    });

    it('should attempt both stops and report every failure', async () => {
      const first = fakeBroker();
      const second = fakeBroker();
      first.stop.mockRejectedValue(new Error('local down'));
      second.stop.mockRejectedValue(new Error('remote down'));

      const error = await new EventBus(first, second, { logger }).stop().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(BrokerStopError);
      expect(error).toMatchObject({
        message: 'Failed to stop 2 broker(s): local down; remote down',
        code: BusErrorCode.STOP_FAILED,
      });
      expect(second.stop).toHaveBeenCalledTimes(1);
    });

    it('should report a single stop failure', async () => {
      const first = fakeBroker();
      const second = fakeBroker();
      second.stop.mockRejectedValue(new Error('remote down'));

      await expect(new EventBus(first, second, { logger }).stop()).rejects.toThrow(
        'Failed to stop 1 broker(s): remote down'
      );
      expect(first.stop).toHaveBeenCalledTimes(1);
    });

    it('should stop after run()', async () => {
      const result = await bus.run(async () => {
        expect(local.isRunning).toBe(true);
        return 'ok';
      });

      expect(result).toBe('ok');
      expect(local.isRunning).toBe(false);
      expect(distributed.isRunning).toBe(false);
    });
  });
});
