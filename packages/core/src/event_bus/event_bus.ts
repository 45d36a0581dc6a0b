import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';

import type {
  TrustEvent,
  TrustEventType,
  TrustEventOf,
  EventHandler,
  EventSubscription,
} from './types';
import { createLogger } from '../logger';

const logger = createLogger('[EventBus] ');

const WILDCARD = '*';

function isTrustEvent(event: unknown): event is TrustEvent {
  return typeof event === 'object' && event !== null
    && 'type' in event && typeof event.type === 'string'
    && 'timestamp' in event && typeof event.timestamp === 'number'
    && 'source' in event && typeof event.source === 'string';
}

function isEventOf<K extends TrustEventType>(type: K, event: TrustEvent): event is TrustEventOf<K> {
  return event.type === type;
}

/**
 * Event Stream interface
 */
export interface IEventStream {
  publish(event: TrustEvent): void;

  subscribe<K extends TrustEventType>(eventType: K, handler: EventHandler<TrustEventOf<K>>): EventSubscription;

  /**
   * Receives every event (monitoring, logging).
   */
  subscribeToAll(handler: EventHandler<TrustEvent>): EventSubscription;

  unsubscribe(subscriptionId: string): boolean;

  getSubscriptions(): EventSubscription[];

  clearSubscriptions(): void;

  /**
   * Wait for all pending event handlers to complete (for testing)
   */
  waitForIdle(options?: { timeout?: number }): Promise<void>;
}

/**
 * In-process EventBus on Node's EventEmitter.
 *
 * Handlers run asynchronously and their failures are logged, never thrown
 * back at the publisher.
 */
export class EventBus implements IEventStream {
  private emitter: EventEmitter;
  private subscriptions: Map<string, { subscription: EventSubscription; listener: (event: unknown) => void }>;
  private pendingHandlers: Set<Promise<void>>;

  constructor() {
    this.emitter = new EventEmitter();
    this.subscriptions = new Map();
    this.pendingHandlers = new Set();
    this.emitter.setMaxListeners(100);
  }

  publish(event: TrustEvent): void {
    if (!isTrustEvent(event) || !event.type || !event.source) {
      throw new Error('Event must have a type, a numeric timestamp and a source');
    }

    this.emitter.emit(event.type, event);
    this.emitter.emit(WILDCARD, event);
  }

  subscribe<K extends TrustEventType>(eventType: K, handler: EventHandler<TrustEventOf<K>>): EventSubscription {
    return this.register(eventType, (event) => (isEventOf(eventType, event) ? handler(event) : undefined));
  }

  subscribeToAll(handler: EventHandler<TrustEvent>): EventSubscription {
    return this.register(WILDCARD, handler);
  }

  unsubscribe(subscriptionId: string): boolean {
    const entry = this.subscriptions.get(subscriptionId);
    if (!entry) {
      return false;
    }

    this.emitter.removeListener(entry.subscription.eventType, entry.listener);
    this.subscriptions.delete(subscriptionId);
    return true;
  }

  getSubscriptions(): EventSubscription[] {
    return Array.from(this.subscriptions.values(), entry => entry.subscription);
  }

  clearSubscriptions(): void {
    this.emitter.removeAllListeners();
    this.subscriptions.clear();
  }

  getSubscriptionCount(eventType: TrustEventType | '*'): number {
    return this.emitter.listenerCount(eventType);
  }

  /**
   * Wait for all pending event handlers to complete.
   *
   * @example
   * ```typescript
   * await session.publish();
   * await eventBus.waitForIdle();
   * expect(handler).toHaveBeenCalled();
   * ```
   */
  async waitForIdle(options: { timeout?: number } = {}): Promise<void> {
    const timeout = options.timeout ?? 5000;
    const startTime = Date.now();

    while (this.pendingHandlers.size > 0) {
      if (Date.now() - startTime > timeout) {
        logger.warn(`waitForIdle() timeout after ${timeout}ms with ${this.pendingHandlers.size} handlers still pending`);
        break;
      }

      await Promise.race([
        Promise.all(Array.from(this.pendingHandlers)),
        new Promise(resolve => setTimeout(resolve, 10)),
      ]);
    }
  }

  private register(eventType: TrustEventType | '*', handler: EventHandler<TrustEvent>): EventSubscription {
    const subscription: EventSubscription = {
      id: `subscription:${randomUUID()}`,
      eventType,
      metadata: { createdAt: Date.now() },
    };

    const listener = (event: unknown): void => {
      if (!isTrustEvent(event)) {
        return;
      }
      const handlerPromise = (async () => {
        try {
          await handler(event);
        } catch (error) {
          logger.error(`Error in event handler for ${eventType}:`, error);
        }
      })();

      this.pendingHandlers.add(handlerPromise);
      void handlerPromise.finally(() => {
        this.pendingHandlers.delete(handlerPromise);
      });
    };

    this.emitter.on(eventType, listener);
    this.subscriptions.set(subscription.id, { subscription, listener });
    return subscription;
  }
}
