import { silentLogger, type Logger } from '../logging/logger.js';
import { deviceStateSchema, describeIssues } from '../protocol/messages.js';
import { topicSubject, TopicPatterns } from '../transport/topics.js';
import type { Transport, Unsubscribe } from '../transport/types.js';

export interface DeviceState {
  name: string;
  online: boolean;
  fields: Record<string, unknown>;
  updatedAt: string;
}

/**
 * Last known state of the auxiliary devices (pump, ultrasonic bath, heater,
 * pH probe), fed by their retained `device/<name>/state` messages.
 * Read-only; devices are not reserved.
 */
export class DeviceStateStore {
  private readonly states = new Map<string, DeviceState>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? silentLogger();
  }

  attach(transport: Transport): Promise<Unsubscribe> {
    return transport.subscribe(TopicPatterns.deviceState, (message) => {
      const name = topicSubject(message.topic);
      if (name) this.apply(name, message.payload);
    });
  }

  apply(name: string, payload: unknown): DeviceState | null {
    const parsed = deviceStateSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.warn({ device: name, issues: describeIssues(parsed.error) }, 'Ignoring malformed device state');
      return null;
    }
    const { online, updatedAt, ...fields } = parsed.data;
    const state: DeviceState = {
      name,
      online,
      fields,
      updatedAt: updatedAt ?? new Date().toISOString(),
    };
    this.states.set(name, state);
    return state;
  }

  get(name: string): DeviceState | undefined {
    return this.states.get(name);
  }

  list(): DeviceState[] {
    return [...this.states.values()].sort((a, b) => a.name.localeCompare(b.name));
  }
}
