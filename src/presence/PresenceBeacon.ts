import { hostname } from 'node:os';
import { systemClock, type Clock } from '../core/clock.js';
import { errorMessage, silentLogger, type Logger } from '../logging/logger.js';
import type { PresenceMessage } from '../protocol/messages.js';
import { PRESENCE_TOPIC } from '../transport/topics.js';
import type { LastWill, Transport } from '../transport/types.js';

export interface PresenceBeaconOptions {
  intervalMs: number;
  /** Channel ids advertised with each beat */
  channels: () => string[];
  clock?: Clock;
  logger?: Logger;
}

/**
 * Retained offline message the broker registers as its last will, so
 * clients learn about a crash without waiting for the beacon to lapse.
 * The will is fixed at connect time: its `timestamp` is when it was
 * registered, not when the connection was lost.
 */
export function presenceWill(clock: Clock = systemClock): LastWill {
  const payload: PresenceMessage = {
    processId: process.pid,
    hostname: hostname(),
    state: 'offline',
    timestamp: new Date(clock.wallMs()).toISOString(),
  };
  return { topic: PRESENCE_TOPIC, payload, retain: true };
}

/**
 * Retained heartbeat on broker/presence.
 */
export class PresenceBeacon {
  private timer: NodeJS.Timeout | null = null;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private beats = 0;

  constructor(
    private readonly transport: Transport,
    private readonly options: PresenceBeaconOptions,
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger();
  }

  async start(): Promise<void> {
    if (this.timer) return;
    await this.beat();
    this.timer = setInterval(() => {
      void this.beat().catch((err: unknown) => {
        this.logger.warn({ err: errorMessage(err) }, 'Presence beat failed');
      });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.transport.isConnected()) {
      await this.transport.publish(PRESENCE_TOPIC, this.message('offline'), { retain: true });
    }
  }

  async beat(): Promise<void> {
    await this.transport.publish(PRESENCE_TOPIC, this.message('online'), { retain: true });
    this.beats += 1;
  }

  beatCount(): number {
    return this.beats;
  }

  private message(state: 'online' | 'offline'): PresenceMessage {
    return {
      processId: process.pid,
      hostname: hostname(),
      state,
      timestamp: new Date(this.clock.wallMs()).toISOString(),
      channels: this.options.channels(),
    };
  }
}
