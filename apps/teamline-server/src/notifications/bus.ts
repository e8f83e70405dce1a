import { EventEmitter } from "node:events";
import type { Redis } from "ioredis";

export type BusListener = (message: string) => void;

/** Fire-and-forget pub/sub between the processes that produce and deliver notifications */
export interface NotificationBus {
  publish(channel: string, message: string): Promise<void>;
  /** Resolves with an unsubscribe function once the subscription is live */
  subscribe(channel: string, listener: BusListener): Promise<() => Promise<void>>;
  close(): Promise<void>;
}

/** Bus for a single process (or several components sharing one instance) */
export class LocalNotificationBus implements NotificationBus {
  private emitter = new EventEmitter();

  async publish(channel: string, message: string): Promise<void> {
    this.emitter.emit(channel, message);
  }

  async subscribe(channel: string, listener: BusListener): Promise<() => Promise<void>> {
    this.emitter.on(channel, listener);
    return async () => {
      this.emitter.off(channel, listener);
    };
  }

  async close(): Promise<void> {
    this.emitter.removeAllListeners();
  }
}

/**
 * Redis PUBLISH/SUBSCRIBE. A connection in subscriber mode cannot issue other
 * commands, so subscriptions run on a duplicate of the given client.
 */
export class RedisNotificationBus implements NotificationBus {
  private subscriber: Redis | null = null;
  private listeners = new Map<string, Set<BusListener>>();

  constructor(private readonly redis: Redis) {}

  async publish(channel: string, message: string): Promise<void> {
    await this.redis.publish(channel, message);
  }

  async subscribe(channel: string, listener: BusListener): Promise<() => Promise<void>> {
    const subscriber = this.ensureSubscriber();
    const existing = this.listeners.get(channel);
    const listeners = existing ?? new Set<BusListener>();
    if (!existing) {
      this.listeners.set(channel, listeners);
      await subscriber.subscribe(channel);
    }
    listeners.add(listener);

    return async () => {
      listeners.delete(listener);
      if (listeners.size === 0 && this.listeners.get(channel) === listeners) {
        this.listeners.delete(channel);
        await subscriber.unsubscribe(channel);
      }
    };
  }

  async close(): Promise<void> {
    this.listeners.clear();
    if (this.subscriber) {
      await this.subscriber.quit();
      this.subscriber = null;
    }
    await this.redis.quit();
  }

  private ensureSubscriber(): Redis {
    if (this.subscriber) return this.subscriber;

    const subscriber = this.redis.duplicate();
    subscriber.on("message", (channel: string, message: string) => {
      for (const listener of this.listeners.get(channel) ?? []) {
        listener(message);
      }
    });
    subscriber.on("error", (err: Error) => {
      console.warn("[bridge] Redis subscriber error:", err.message);
    });
    this.subscriber = subscriber;
    return subscriber;
  }
}
