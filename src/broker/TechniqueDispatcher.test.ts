import { beforeEach, describe, expect, it } from 'vitest';
import { ManualClock } from '../core/clock.js';
import {
  abortedError,
  InstrumentError,
  type InstrumentDriver,
  type InstrumentJob,
  type RunContext,
} from '../instrument/InstrumentDriver.js';
import { ChannelRegistry } from './ChannelRegistry.js';
import { ReservationManager } from './ReservationManager.js';
import { TechniqueDispatcher, type Invocation } from './TechniqueDispatcher.js';

type ScriptedRun = {
  job: InstrumentJob;
  context: RunContext;
  resolve: (result: unknown) => void;
  reject: (err: unknown) => void;
};

/** Driver whose runs finish only when the test says so. */
class ScriptedDriver implements InstrumentDriver {
  readonly kind = 'scripted';
  readonly runs: ScriptedRun[] = [];

  run(job: InstrumentJob, context: RunContext): Promise<unknown> {
    return new Promise((resolve, reject) => {
      context.signal.addEventListener('abort', () => reject(abortedError(job)), { once: true });
      this.runs.push({ job, context, resolve, reject });
    });
  }

  last(): ScriptedRun {
    const run = this.runs[this.runs.length - 1];
    if (!run) throw new Error('no run started');
    return run;
  }
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

function setup(historyLimit?: number) {
  const registry = new ChannelRegistry();
  registry.create('chan-1', { instrumentChannel: 4, usbPort: 'USB2' });
  registry.create('chan-2');
  const clock = new ManualClock();
  const manager = new ReservationManager(registry, { defaultLeaseMs: 10_000, maxLeaseMs: 60_000, clock });
  const driver = new ScriptedDriver();
  const dispatcher = new TechniqueDispatcher(registry, manager, {
    driver,
    clock,
    ...(historyLimit !== undefined ? { historyLimit } : {}),
  });
  const statuses: Array<{ id: string; status: string; errorCode?: string; progress?: unknown }> = [];
  dispatcher.events.on('status', ({ invocation, progress }) => {
    statuses.push({
      id: invocation.invocationId,
      status: invocation.status,
      ...(invocation.errorCode ? { errorCode: invocation.errorCode } : {}),
      ...(progress !== undefined ? { progress } : {}),
    });
  });
  return { registry, clock, manager, driver, dispatcher, statuses };
}

function terminalCount(statuses: Array<{ id: string; status: string }>, id: string): number {
  return statuses.filter((s) => s.id === id && ['succeeded', 'failed', 'cancelled'].includes(s.status)).length;
}

describe('TechniqueDispatcher', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(async () => {
    ctx = setup();
    await ctx.manager.requestReservation('chan-1', 'wf-a');
  });

  it('runs an invocation and reports progress then success', async () => {
    const pending = ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-1', { techniques: [{ name: 'OCV' }] });
    expect(pending.status).toBe('pending');

    await tick();
    const run = ctx.driver.last();
    expect(run.job).toEqual({
      invocationId: 'inv-1',
      channelId: 'chan-1',
      instrumentChannel: 4,
      usbPort: 'USB2',
      parameters: { techniques: [{ name: 'OCV' }] },
    });
    expect(ctx.registry.lookup('chan-1')?.state).toBe('running');

    run.context.onData({ point: 0 });
    run.resolve({ points: 1 });
    const settled = await ctx.dispatcher.whenSettled('inv-1');

    expect(settled).toMatchObject({ status: 'succeeded', result: { points: 1 }, progressCount: 1 });
    expect(ctx.statuses).toEqual([
      { id: 'inv-1', status: 'pending' },
      { id: 'inv-1', status: 'running' },
      { id: 'inv-1', status: 'running', progress: { point: 0 } },
      { id: 'inv-1', status: 'succeeded' },
    ]);
    expect(ctx.registry.lookup('chan-1')?.state).toBe('reserved');
  });

  it('refuses a client that does not hold the channel', () => {
    expect(() => ctx.dispatcher.submit('chan-1', 'wf-b', 'inv-1', {})).toThrow(
      'Client wf-b does not hold channel chan-1',
    );
    expect(() => ctx.dispatcher.submit('chan-2', 'wf-a', 'inv-1', {})).toThrow(
      'Client wf-a does not hold channel chan-2',
    );
    expect(ctx.dispatcher.get('inv-1')).toBeUndefined();
  });

  it('runs a repeated invocation id only once', async () => {
    ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-1', {});
    const again = ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-1', {});
    await tick();

    expect(again.status).toBe('pending');
    expect(ctx.driver.runs).toHaveLength(1);
    expect(() => ctx.dispatcher.submit('chan-2', 'wf-a', 'inv-1', {})).toThrow('Invocation id inv-1 is already in use');
  });

  it('runs invocations on one channel one at a time', async () => {
    ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-1', {});
    ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-2', {});
    await tick();
    expect(ctx.driver.runs.map((run) => run.job.invocationId)).toEqual(['inv-1']);
    expect(ctx.dispatcher.get('inv-2')?.status).toBe('pending');

    ctx.driver.last().resolve(null);
    await tick();
    expect(ctx.driver.runs.map((run) => run.job.invocationId)).toEqual(['inv-1', 'inv-2']);
  });

  it('maps instrument failures to failed', async () => {
    ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-1', {});
    await tick();
    ctx.driver.last().reject(new InstrumentError('CURRENT_OVERLOAD', 'overload'));
    expect(await ctx.dispatcher.whenSettled('inv-1')).toMatchObject({
      status: 'failed',
      errorCode: 'CURRENT_OVERLOAD',
      message: 'overload',
    });

    ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-2', {});
    await tick();
    ctx.driver.last().reject(new Error('driver crashed'));
    expect(await ctx.dispatcher.whenSettled('inv-2')).toMatchObject({
      status: 'failed',
      errorCode: 'INSTRUMENT_ERROR',
      message: 'driver crashed',
    });
  });

  describe('cancel', () => {
    it('cancels a pending invocation before it starts', async () => {
      ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-1', {});
      ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-2', {});
      ctx.dispatcher.cancel('chan-1', 'wf-a', 'inv-2');

      expect(ctx.dispatcher.get('inv-2')).toMatchObject({ status: 'cancelled', errorCode: 'CANCELLED' });
      await tick();
      ctx.driver.last().resolve(null);
      await ctx.dispatcher.drain();
      expect(ctx.driver.runs).toHaveLength(1);
      expect(terminalCount(ctx.statuses, 'inv-2')).toBe(1);
    });

    it('aborts a running invocation', async () => {
      ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-1', {});
      await tick();
      ctx.dispatcher.cancel('chan-1', 'wf-a', 'inv-1');

      expect(await ctx.dispatcher.whenSettled('inv-1')).toMatchObject({ status: 'cancelled', errorCode: 'CANCELLED' });
      expect(ctx.registry.lookup('chan-1')?.state).toBe('reserved');
    });

    it('rejects unknown ids and other clients', () => {
      ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-1', {});
      expect(() => ctx.dispatcher.cancel('chan-1', 'wf-a', 'inv-9')).toThrow('Unknown invocation: inv-9');
      expect(() => ctx.dispatcher.cancel('chan-1', 'wf-b', 'inv-1')).toThrow('Invocation inv-1 belongs to another client');
    });
  });

  describe('reservation ending mid-run', () => {
    it('cancels with LEASE_EXPIRED when the lease lapses', async () => {
      await ctx.manager.requestReservation('chan-1', 'wf-b');
      ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-1', {});
      await tick();

      ctx.clock.advance(10_000);
      await ctx.manager.sweepOnce();

      expect(await ctx.dispatcher.whenSettled('inv-1')).toMatchObject({
        status: 'cancelled',
        errorCode: 'LEASE_EXPIRED',
      });
      expect(terminalCount(ctx.statuses, 'inv-1')).toBe(1);
      expect(ctx.registry.lookup('chan-1')?.reservation?.clientId).toBe('wf-b');
      expect(ctx.registry.lookup('chan-1')?.state).toBe('reserved');
    });

    it('cancels queued work with the same code', async () => {
      ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-1', {});
      ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-2', {});
      await tick();
      await ctx.manager.revoke('chan-1', 'maintenance');

      expect((await ctx.dispatcher.whenSettled('inv-1')).errorCode).toBe('REVOKED');
      expect((await ctx.dispatcher.whenSettled('inv-2')).errorCode).toBe('REVOKED');
      expect(ctx.driver.runs).toHaveLength(1);
    });

    it('uses RELEASED for an explicit release and LEASE_EXPIRED for a disconnect', async () => {
      ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-1', {});
      await tick();
      await ctx.manager.release('chan-1', 'wf-a');
      expect((await ctx.dispatcher.whenSettled('inv-1')).errorCode).toBe('RELEASED');

      await ctx.manager.requestReservation('chan-2', 'wf-a');
      ctx.dispatcher.submit('chan-2', 'wf-a', 'inv-2', {});
      await tick();
      await ctx.manager.handleDisconnect('wf-a');
      expect((await ctx.dispatcher.whenSettled('inv-2')).errorCode).toBe('LEASE_EXPIRED');
    });

    it('cancels with BROKER_SHUTDOWN and refuses new work', async () => {
      ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-1', {});
      await tick();
      await ctx.manager.releaseAll('shutdown');
      await ctx.dispatcher.drain();

      expect(ctx.dispatcher.get('inv-1')).toMatchObject({ status: 'cancelled', errorCode: 'BROKER_SHUTDOWN' });
      expect(() => ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-2', {})).toThrow('Broker is shutting down');
    });

    it('keeps the first terminal status when the driver finishes after an abort', async () => {
      ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-1', {});
      await tick();
      const run = ctx.driver.last();
      await ctx.manager.revoke('chan-1', 'maintenance');
      run.resolve({ late: true });
      await ctx.dispatcher.drain();

      expect(ctx.dispatcher.get('inv-1')).toMatchObject({ status: 'cancelled', errorCode: 'REVOKED' });
      expect(terminalCount(ctx.statuses, 'inv-1')).toBe(1);
    });
  });

  it('lists invocations with filters', async () => {
    await ctx.manager.requestReservation('chan-2', 'wf-a');
    ctx.dispatcher.submit('chan-1', 'wf-a', 'inv-1', {});
    ctx.dispatcher.submit('chan-2', 'wf-a', 'inv-2', {});
    await tick();
    ctx.driver.runs[0]?.resolve(null);
    await ctx.dispatcher.whenSettled('inv-1');

    const ids = (list: Invocation[]) => list.map((inv) => inv.invocationId);
    expect(ids(ctx.dispatcher.list())).toEqual(['inv-1', 'inv-2']);
    expect(ids(ctx.dispatcher.list({ channelId: 'chan-2' }))).toEqual(['inv-2']);
    expect(ids(ctx.dispatcher.list({ status: 'succeeded' }))).toEqual(['inv-1']);
    expect(ctx.dispatcher.runningCount()).toBe(1);
  });

  it('prunes the oldest finished invocations past the history limit', async () => {
    const small = setup(2);
    await small.manager.requestReservation('chan-1', 'wf-a');
    for (const id of ['inv-1', 'inv-2', 'inv-3']) {
      small.dispatcher.submit('chan-1', 'wf-a', id, {});
      await tick();
      small.driver.last().resolve(null);
      await small.dispatcher.whenSettled(id);
    }

    expect(small.dispatcher.list().map((inv) => inv.invocationId)).toEqual(['inv-2', 'inv-3']);
  });

  it('rejects whenSettled for unknown ids', async () => {
    await expect(ctx.dispatcher.whenSettled('inv-9')).rejects.toMatchObject({ code: 'INVOCATION_NOT_FOUND' });
  });
});
