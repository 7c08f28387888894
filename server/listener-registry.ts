/**
 * Listener Registry
 *
 * Process-wide set of event subscribers. Created once at startup and handed
 * to every connection session (which registers itself) and to every
 * component that publishes events (which broadcasts through it).
 *
 * Consistency: the registry lives on the event loop, so `register` and
 * `unregister` are atomic with respect to each other. `broadcast` takes a
 * snapshot of the subscribers and calls every sink before its first await;
 * a subscriber removed after that point may still receive the envelope
 * already handed to it, and one removed before it never does.
 *
 * Delivery: each sink is called independently and bounded by
 * `sendTimeoutMs`. A sink that throws, rejects or times out is reported in
 * the result and logged; it is not removed. Removal belongs to the session
 * that owns the subscription.
 */

import { randomUUID } from 'crypto';
import type { EventEnvelope } from '@shared/gateway-protocol';
import { createLogger, type Logger } from './logger';

export type EventSink = (envelope: EventEnvelope) => void | Promise<void>;

export type SubscriberId = string;

export interface BroadcastReport {
  delivered: number;
  failed: SubscriberId[];
}

export interface ListenerRegistryOptions {
  /** Upper bound for one sink delivery. */
  sendTimeoutMs?: number;
  logger?: Logger;
  /** Id generator; defaults to random UUIDs. */
  generateId?: () => SubscriberId;
}

export const DEFAULT_SEND_TIMEOUT_MS = 5000;

class SinkTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`sink did not complete within ${timeoutMs}ms`);
    this.name = 'SinkTimeoutError';
  }
}

export class ListenerRegistry {
  private readonly listeners = new Map<SubscriberId, EventSink>();
  private readonly sendTimeoutMs: number;
  private readonly logger: Logger;
  private readonly generateId: () => SubscriberId;

  constructor(options: ListenerRegistryOptions = {}) {
    this.sendTimeoutMs = options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger('Listeners');
    this.generateId = options.generateId ?? randomUUID;
  }

  register(sink: EventSink): SubscriberId {
    let id = this.generateId();
    // A custom generator may repeat itself; never hand out a live id twice.
    while (this.listeners.has(id)) {
      id = this.generateId();
    }
    this.listeners.set(id, sink);
    this.logger.debug(`Registered listener ${id} (${this.listeners.size} active)`);
    return id;
  }

  /** Remove a subscriber. Unknown or already-removed ids are ignored. */
  unregister(id: SubscriberId | null | undefined): void {
    if (id == null) return;
    if (this.listeners.delete(id)) {
      this.logger.debug(`Removed listener ${id} (${this.listeners.size} active)`);
    }
  }

  has(id: SubscriberId): boolean {
    return this.listeners.has(id);
  }

  get size(): number {
    return this.listeners.size;
  }

  async broadcast(envelope: EventEnvelope): Promise<BroadcastReport> {
    const snapshot = Array.from(this.listeners.entries());
    const deliveries = snapshot.map(([id, sink]) => this.deliver(id, sink, envelope));
    const outcomes = await Promise.all(deliveries);

    const failed = snapshot.filter((_, index) => !outcomes[index]).map(([id]) => id);
    return { delivered: snapshot.length - failed.length, failed };
  }

  /** Resolves true when the sink accepted the envelope in time. */
  private async deliver(id: SubscriberId, sink: EventSink, envelope: EventEnvelope): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new SinkTimeoutError(this.sendTimeoutMs)), this.sendTimeoutMs);
      });
      await Promise.race([sink(envelope), timeout]);
      return true;
    } catch (error) {
      this.logger.warn(
        `Delivery of "${envelope.message}" to listener ${id} failed: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
      return false;
    } finally {
      clearTimeout(timer);
    }
  }
}
