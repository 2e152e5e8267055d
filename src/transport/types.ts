/**
 * Transport abstraction: topic-based publish/subscribe with at-least-once
 * delivery, retained "last known state" per topic and a last-will message
 * published by the transport when a client drops off without disconnecting.
 *
 * Payloads are JSON values; implementations own the encoding.
 */

export type QoS = 0 | 1 | 2;

export interface PublishOptions {
  /** Keep as the topic's last known state and replay to later subscribers. */
  retain?: boolean;
  /** Delivery guarantee (default: 1, at-least-once). */
  qos?: QoS;
}

export interface TransportMessage {
  topic: string;
  payload: unknown;
  /** True when replayed from retained state rather than freshly published. */
  retained: boolean;
}

export type MessageHandler = (message: TransportMessage) => void | Promise<void>;

export interface LastWill {
  topic: string;
  payload: unknown;
  retain: boolean;
}

export type Unsubscribe = () => Promise<void>;

export interface Transport {
  readonly clientId: string;
  connect(): Promise<void>;
  /** Clean disconnect; the last will is not published. */
  disconnect(): Promise<void>;
  isConnected(): boolean;
  publish(topic: string, payload: unknown, options?: PublishOptions): Promise<void>;
  /** `pattern` may use the `+` (one level) and `#` (remaining levels) wildcards. */
  subscribe(pattern: string, handler: MessageHandler): Promise<Unsubscribe>;
  onConnectionChange(listener: (connected: boolean) => void): () => void;
}

export interface TransportOptions {
  clientId: string;
  will?: LastWill;
}
