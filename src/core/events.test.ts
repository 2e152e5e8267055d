import { describe, expect, it, vi } from 'vitest';
import { silentLogger } from '../logging/logger.js';
import { TypedEventEmitter } from './events.js';

type Events = {
  granted: { channelId: string };
  released: { channelId: string };
};

describe('TypedEventEmitter', () => {
  it('delivers to listeners of the emitted event only', () => {
    const emitter = new TypedEventEmitter<Events>();
    const granted: string[] = [];
    const released: string[] = [];
    emitter.on('granted', ({ channelId }) => granted.push(channelId));
    emitter.on('released', ({ channelId }) => released.push(channelId));

    emitter.emit('granted', { channelId: 'chan-1' });

    expect(granted).toEqual(['chan-1']);
    expect(released).toEqual([]);
  });

  it('stops delivering after the returned unsubscribe runs', () => {
    const emitter = new TypedEventEmitter<Events>();
    const handler = vi.fn();
    const off = emitter.on('granted', handler);
    expect(emitter.listenerCount('granted')).toBe(1);

    off();
    emitter.emit('granted', { channelId: 'chan-1' });

    expect(handler).not.toHaveBeenCalled();
    expect(emitter.listenerCount('granted')).toBe(0);
  });

  it('logs a throwing listener and keeps delivering', () => {
    const logger = silentLogger();
    const errorSpy = vi.spyOn(logger, 'error');
    const emitter = new TypedEventEmitter<Events>(logger);
    const after = vi.fn();
    emitter.on('granted', () => {
      throw new Error('listener broke');
    });
    emitter.on('granted', after);

    emitter.emit('granted', { channelId: 'chan-2' });

    expect(after).toHaveBeenCalledWith({ channelId: 'chan-2' });
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
