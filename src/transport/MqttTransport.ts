/**
 * MQTT transport over mqtt.js. JSON payloads, QoS 1, retained flag passed
 * through, last will registered at connect time.
 */

import { connect, type IClientOptions, type MqttClient } from 'mqtt';
import { BrokerError } from '../broker/errors.js';
import { errorMessage, silentLogger, type Logger } from '../logging/logger.js';
import { topicMatches } from './topics.js';
import type { MessageHandler, PublishOptions, Transport, TransportOptions, Unsubscribe } from './types.js';

export interface MqttTransportOptions extends TransportOptions {
  host: string;
  port: number;
  username?: string;
  password?: string;
  /** Wait for the first CONNACK before giving up (default: 10000) */
  connectTimeoutMs?: number;
  logger?: Logger;
}

type Subscription = {
  pattern: string;
  handler: MessageHandler;
};

export class MqttTransport implements Transport {
  readonly clientId: string;
  private client: MqttClient | null = null;
  private readonly subscriptions = new Set<Subscription>();
  private readonly listeners = new Set<(connected: boolean) => void>();
  private readonly logger: Logger;

  constructor(private readonly options: MqttTransportOptions) {
    this.clientId = options.clientId;
    this.logger = options.logger ?? silentLogger();
  }

  async connect(): Promise<void> {
    if (this.client) return;
    const { host, port, will } = this.options;
    const clientOptions: IClientOptions = {
      clientId: this.clientId,
      clean: true,
      reconnectPeriod: 2_000,
      connectTimeout: this.options.connectTimeoutMs ?? 10_000,
      ...(this.options.username !== undefined ? { username: this.options.username } : {}),
      ...(this.options.password !== undefined ? { password: this.options.password } : {}),
      ...(will
        ? { will: { topic: will.topic, payload: Buffer.from(JSON.stringify(will.payload)), qos: 1 as const, retain: will.retain } }
        : {}),
    };

    const client = connect(`mqtt://${host}:${port}`, clientOptions);
    this.client = client;

    client.on('message', (topic, payload, packet) => {
      this.dispatch(topic, payload, packet.retain);
    });
    client.on('connect', () => {
      this.logger.info({ host, port, clientId: this.clientId }, 'MQTT connected');
      this.notify(true);
    });
    client.on('close', () => this.notify(false));
    client.on('error', (err) => {
      this.logger.warn({ err: err.message }, 'MQTT client error');
    });

    await new Promise<void>((resolve, reject) => {
      const onConnect = () => {
        client.off('error', onError);
        resolve();
      };
      const onError = (err: Error) => {
        client.off('connect', onConnect);
        reject(new BrokerError('TRANSPORT_UNAVAILABLE', `Cannot reach MQTT broker at ${host}:${port}: ${err.message}`));
      };
      client.once('connect', onConnect);
      client.once('error', onError);
    }).catch(async (err: unknown) => {
      this.client = null;
      await client.endAsync(true);
      throw err;
    });
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    this.subscriptions.clear();
    await client.endAsync();
    this.notify(false);
  }

  isConnected(): boolean {
    return this.client?.connected === true;
  }

  async publish(topic: string, payload: unknown, options: PublishOptions = {}): Promise<void> {
    const client = this.requireClient();
    await client.publishAsync(topic, JSON.stringify(payload ?? null), {
      qos: options.qos ?? 1,
      retain: options.retain === true,
    });
  }

  async subscribe(pattern: string, handler: MessageHandler): Promise<Unsubscribe> {
    const client = this.requireClient();
    const sub: Subscription = { pattern, handler };
    this.subscriptions.add(sub);
    await client.subscribeAsync(pattern, { qos: 1 });
    return async () => {
      this.subscriptions.delete(sub);
      const stillWanted = [...this.subscriptions].some((other) => other.pattern === pattern);
      if (!stillWanted && this.client) {
        await this.client.unsubscribeAsync(pattern);
      }
    };
  }

  onConnectionChange(listener: (connected: boolean) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private dispatch(topic: string, raw: Buffer, retained: boolean): void {
    let payload: unknown;
    try {
      payload = JSON.parse(raw.toString('utf8'));
    } catch (err) {
      this.logger.warn({ topic, err: errorMessage(err) }, 'Dropping malformed message');
      return;
    }
    for (const sub of [...this.subscriptions]) {
      if (!topicMatches(sub.pattern, topic)) continue;
      void Promise.resolve()
        .then(() => sub.handler({ topic, payload, retained }))
        .catch((err: unknown) => {
          this.logger.error({ topic, err: errorMessage(err) }, 'Message handler failed');
        });
    }
  }

  private notify(connected: boolean): void {
    for (const listener of [...this.listeners]) {
      listener(connected);
    }
  }

  private requireClient(): MqttClient {
    if (!this.client) {
      throw new BrokerError('TRANSPORT_UNAVAILABLE', `Transport ${this.clientId} is not connected`);
    }
    return this.client;
  }
}
