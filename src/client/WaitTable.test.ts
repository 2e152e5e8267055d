import { describe, expect, it } from 'vitest';
import { BrokerError } from '../broker/errors.js';
import { WaitTable } from './WaitTable.js';

const timeout = () => new BrokerError('TIMEOUT', 'no reply');

describe('WaitTable', () => {
  it('resolves a wait once', async () => {
    const table = new WaitTable<string>();
    const wait = table.open('r1', { timeoutMs: 1_000, onTimeout: timeout });

    expect(table.resolve('r1', 'first')).toBe(true);
    expect(table.resolve('r1', 'second')).toBe(false);
    await expect(wait).resolves.toBe('first');
    expect(table.size).toBe(0);
  });

  it('times out', async () => {
    const table = new WaitTable<string>();
    await expect(table.open('r1', { timeoutMs: 10, onTimeout: timeout })).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'no reply',
    });
    expect(table.has('r1')).toBe(false);
  });

  it('refuses a duplicate key', async () => {
    const table = new WaitTable<string>();
    const first = table.open('r1', { timeoutMs: 1_000, onTimeout: timeout });
    await expect(table.open('r1', { timeoutMs: 1_000, onTimeout: timeout })).rejects.toThrow('Duplicate wait key: r1');
    table.resolve('r1', 'ok');
    await first;
  });

  it('rejects waits by channel or all at once', async () => {
    const table = new WaitTable<string>();
    const a = table.open('a', { channelId: 'chan-1', timeoutMs: 1_000, onTimeout: timeout });
    const b = table.open('b', { channelId: 'chan-2', timeoutMs: 1_000, onTimeout: timeout });
    const c = table.open('c', { timeoutMs: 1_000, onTimeout: timeout });

    expect(table.rejectChannel('chan-1', new BrokerError('REVOKED', 'revoked'))).toBe(1);
    await expect(a).rejects.toMatchObject({ code: 'REVOKED' });

    expect(table.rejectAll(new BrokerError('TRANSPORT_UNAVAILABLE', 'gone'))).toBe(2);
    await expect(b).rejects.toMatchObject({ code: 'TRANSPORT_UNAVAILABLE' });
    await expect(c).rejects.toMatchObject({ code: 'TRANSPORT_UNAVAILABLE' });
  });
});
