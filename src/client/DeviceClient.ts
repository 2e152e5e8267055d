import { randomUUID } from 'node:crypto';
import { BrokerError } from '../broker/errors.js';
import { DeviceStateStore, type DeviceState } from '../devices/DeviceStateStore.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { deviceReplySchema, type DeviceCommandMessage, type DeviceReplyMessage } from '../protocol/messages.js';
import { Topics, TopicPatterns } from '../transport/topics.js';
import type { Transport, TransportMessage, Unsubscribe } from '../transport/types.js';
import { WaitTable } from './WaitTable.js';

/**
 * Request/response access to auxiliary devices. Devices are not reserved;
 * any client may send a command at any time.
 */
export class DeviceClient {
  private readonly waits = new WaitTable<DeviceReplyMessage>();
  private readonly store: DeviceStateStore;
  private readonly subscriptions: Unsubscribe[] = [];
  private readonly logger: Logger;

  constructor(
    private readonly transport: Transport,
    options: { logger?: Logger } = {},
  ) {
    this.logger = options.logger ?? silentLogger();
    this.store = new DeviceStateStore(this.logger);
  }

  async start(): Promise<void> {
    await this.transport.connect();
    this.subscriptions.push(
      await this.transport.subscribe(TopicPatterns.deviceReply, (msg) => this.onReply(msg)),
      await this.store.attach(this.transport),
    );
  }

  async stop(): Promise<void> {
    this.waits.rejectAll(new BrokerError('TRANSPORT_UNAVAILABLE', 'Device client stopped'));
    if (this.transport.isConnected()) {
      await Promise.all(this.subscriptions.splice(0, this.subscriptions.length).map((unsubscribe) => unsubscribe()));
    }
  }

  /**
   * Sends a command and waits for the correlated reply. A reply with
   * `ok: false` rejects with INVOCATION_FAILED.
   */
  async request(device: string, command: string, args: Record<string, unknown> | undefined, timeoutMs: number): Promise<unknown> {
    const requestId = randomUUID();
    const reply = this.waits.open(requestId, {
      timeoutMs,
      onTimeout: () => new BrokerError('TIMEOUT', `Device ${device} did not answer ${command} within ${timeoutMs}ms`),
    });
    const message: DeviceCommandMessage = { requestId, command, ...(args ? { args } : {}) };
    try {
      await this.transport.publish(Topics.deviceCommand(device), message);
    } catch (err) {
      this.waits.reject(
        requestId,
        err instanceof BrokerError ? err : new BrokerError('TRANSPORT_UNAVAILABLE', `Cannot reach device ${device}`),
      );
    }
    const answer = await reply;
    if (!answer.ok) {
      throw new BrokerError('INVOCATION_FAILED', answer.error ?? `Device ${device} rejected ${command}`);
    }
    return answer.result ?? null;
  }

  state(device: string): DeviceState | undefined {
    return this.store.get(device);
  }

  states(): DeviceState[] {
    return this.store.list();
  }

  private onReply(msg: TransportMessage): void {
    const parsed = deviceReplySchema.safeParse(msg.payload);
    if (!parsed.success) {
      this.logger.warn({ topic: msg.topic }, 'Malformed device reply');
      return;
    }
    this.waits.resolve(parsed.data.requestId, parsed.data);
  }
}
