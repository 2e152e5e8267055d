/**
 * In-process transport. An `InMemoryBus` stands in for the MQTT broker:
 * topic matching, retained messages, per-publish asynchronous delivery and
 * last-will publication when a connection is dropped uncleanly.
 */

import { BrokerError } from '../broker/errors.js';
import { errorMessage, silentLogger, type Logger } from '../logging/logger.js';
import { topicMatches } from './topics.js';
import type {
  LastWill,
  MessageHandler,
  PublishOptions,
  Transport,
  TransportOptions,
  Unsubscribe,
} from './types.js';

type BusSubscription = {
  pattern: string;
  handler: MessageHandler;
  owner: InMemoryTransport;
};

export class InMemoryBus {
  private readonly retained = new Map<string, string>();
  private readonly subscriptions = new Set<BusSubscription>();
  private readonly connections = new Map<string, InMemoryTransport>();
  private readonly inflight = new Set<Promise<void>>();
  private pending = 0;

  constructor(private readonly logger: Logger = silentLogger()) {}

  attach(transport: InMemoryTransport): void {
    const existing = this.connections.get(transport.clientId);
    if (existing && existing !== transport) {
      // Session takeover by client id.
      this.detach(existing, { publishWill: false });
      existing.markDisconnected();
    }
    this.connections.set(transport.clientId, transport);
  }

  detach(transport: InMemoryTransport, options: { publishWill: boolean }): void {
    if (this.connections.get(transport.clientId) === transport) {
      this.connections.delete(transport.clientId);
    }
    for (const sub of [...this.subscriptions]) {
      if (sub.owner === transport) {
        this.subscriptions.delete(sub);
      }
    }
    if (options.publishWill && transport.will) {
      this.publish(transport.will.topic, encode(transport.will.payload), transport.will.retain);
    }
  }

  /**
   * Simulates a network drop: the broker side notices the client is gone
   * and publishes its last will.
   */
  dropConnection(clientId: string): void {
    const transport = this.connections.get(clientId);
    if (!transport) return;
    this.detach(transport, { publishWill: true });
    transport.markDisconnected();
  }

  isAttached(clientId: string): boolean {
    return this.connections.has(clientId);
  }

  publish(topic: string, encoded: string, retain: boolean): void {
    if (retain) {
      this.retained.set(topic, encoded);
    }
    for (const sub of [...this.subscriptions]) {
      if (topicMatches(sub.pattern, topic)) {
        this.deliver(sub, topic, encoded, false);
      }
    }
  }

  subscribe(sub: BusSubscription): () => void {
    this.subscriptions.add(sub);
    for (const [topic, encoded] of this.retained) {
      if (topicMatches(sub.pattern, topic)) {
        this.deliver(sub, topic, encoded, true);
      }
    }
    return () => {
      this.subscriptions.delete(sub);
    };
  }

  retainedPayload(topic: string): unknown {
    const encoded = this.retained.get(topic);
    return encoded === undefined ? undefined : JSON.parse(encoded);
  }

  /**
   * Resolves once every message published so far (and everything those
   * deliveries published in turn) has been handled.
   */
  async flush(): Promise<void> {
    while (this.pending > 0 || this.inflight.size > 0) {
      if (this.inflight.size > 0) {
        await Promise.allSettled([...this.inflight]);
      }
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
  }

  private deliver(sub: BusSubscription, topic: string, encoded: string, retained: boolean): void {
    this.pending += 1;
    queueMicrotask(() => {
      this.pending -= 1;
      if (!this.subscriptions.has(sub)) return;
      let payload: unknown;
      try {
        payload = JSON.parse(encoded);
      } catch (err) {
        this.logger.warn({ topic, err: errorMessage(err) }, 'Dropping malformed message');
        return;
      }
      const task = (async () => {
        try {
          await sub.handler({ topic, payload, retained });
        } catch (err) {
          this.logger.error({ topic, clientId: sub.owner.clientId, err: errorMessage(err) }, 'Message handler failed');
        }
      })();
      this.inflight.add(task);
      void task.finally(() => this.inflight.delete(task));
    });
  }
}

function encode(payload: unknown): string {
  return JSON.stringify(payload ?? null);
}

export class InMemoryTransport implements Transport {
  readonly clientId: string;
  readonly will: LastWill | undefined;
  private connected = false;
  private readonly listeners = new Set<(connected: boolean) => void>();

  constructor(
    private readonly bus: InMemoryBus,
    options: TransportOptions,
  ) {
    this.clientId = options.clientId;
    this.will = options.will;
  }

  async connect(): Promise<void> {
    if (this.connected) return;
    this.bus.attach(this);
    this.setConnected(true);
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    this.bus.detach(this, { publishWill: false });
    this.setConnected(false);
  }

  isConnected(): boolean {
    return this.connected;
  }

  async publish(topic: string, payload: unknown, options: PublishOptions = {}): Promise<void> {
    this.assertConnected();
    this.bus.publish(topic, encode(payload), options.retain === true);
  }

  async subscribe(pattern: string, handler: MessageHandler): Promise<Unsubscribe> {
    this.assertConnected();
    const remove = this.bus.subscribe({ pattern, handler, owner: this });
    return async () => {
      remove();
    };
  }

  onConnectionChange(listener: (connected: boolean) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Called by the bus when the connection is taken away. */
  markDisconnected(): void {
    this.setConnected(false);
  }

  private setConnected(connected: boolean): void {
    if (this.connected === connected) return;
    this.connected = connected;
    for (const listener of [...this.listeners]) {
      listener(connected);
    }
  }

  private assertConnected(): void {
    if (!this.connected) {
      throw new BrokerError('TRANSPORT_UNAVAILABLE', `Transport ${this.clientId} is not connected`);
    }
  }
}
