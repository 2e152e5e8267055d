import { hostname } from 'node:os';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ManualClock } from '../core/clock.js';
import { InMemoryBus, InMemoryTransport } from '../transport/InMemoryTransport.js';
import { PRESENCE_TOPIC } from '../transport/topics.js';
import { PresenceBeacon, presenceWill } from './PresenceBeacon.js';

async function setup() {
  const bus = new InMemoryBus();
  const clock = new ManualClock();
  const transport = new InMemoryTransport(bus, { clientId: 'instrument-broker', will: presenceWill(clock) });
  await transport.connect();
  const beacon = new PresenceBeacon(transport, { intervalMs: 1_000, channels: () => ['chan-1', 'chan-2'], clock });
  return { bus, clock, transport, beacon };
}

describe('PresenceBeacon', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('publishes a retained online beat on start', async () => {
    const { bus, beacon } = await setup();
    await beacon.start();

    expect(bus.retainedPayload(PRESENCE_TOPIC)).toEqual({
      processId: process.pid,
      hostname: hostname(),
      state: 'online',
      timestamp: '2025-01-01T00:00:00.000Z',
      channels: ['chan-1', 'chan-2'],
    });
    expect(beacon.beatCount()).toBe(1);
    await beacon.stop();
  });

  it('beats on its interval', async () => {
    vi.useFakeTimers();
    const { bus, clock, beacon } = await setup();
    await beacon.start();
    clock.advance(3_000);
    await vi.advanceTimersByTimeAsync(3_000);

    expect(beacon.beatCount()).toBe(4);
    expect(bus.retainedPayload(PRESENCE_TOPIC)).toMatchObject({ state: 'online', timestamp: '2025-01-01T00:00:03.000Z' });
    await beacon.stop();
  });

  it('publishes offline on a clean stop', async () => {
    const { bus, beacon } = await setup();
    await beacon.start();
    await beacon.stop();
    expect(bus.retainedPayload(PRESENCE_TOPIC)).toMatchObject({ state: 'offline' });
  });

  it('leaves the last will, stamped with its registration time, to announce a crash', async () => {
    const { bus, clock, beacon } = await setup();
    await beacon.start();
    clock.advance(5_000);
    bus.dropConnection('instrument-broker');

    expect(bus.retainedPayload(PRESENCE_TOPIC)).toEqual({
      processId: process.pid,
      hostname: hostname(),
      state: 'offline',
      timestamp: '2025-01-01T00:00:00.000Z',
    });
    await beacon.stop();
  });
});
