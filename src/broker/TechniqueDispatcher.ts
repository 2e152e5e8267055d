import { systemClock, type Clock } from '../core/clock.js';
import { TypedEventEmitter } from '../core/events.js';
import { SerialLanes } from '../core/SerialLanes.js';
import { ABORTED, InstrumentError, type InstrumentDriver } from '../instrument/InstrumentDriver.js';
import { errorMessage, silentLogger, type Logger } from '../logging/logger.js';
import type { ChannelRegistry, Reservation } from './ChannelRegistry.js';
import { BrokerError } from './errors.js';
import type { ReservationManager } from './ReservationManager.js';

export type InvocationStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';
export type TerminalStatus = 'succeeded' | 'failed' | 'cancelled';

export interface Invocation {
  invocationId: string;
  channelId: string;
  clientId: string;
  reservationId: string;
  parameters: unknown;
  status: InvocationStatus;
  result?: unknown;
  errorCode?: string;
  message?: string;
  progressCount: number;
  createdAt: string;
  startedAt?: string;
  finishedAt?: string;
}

export type DispatcherEvents = {
  /** Every status transition, plus one `running` event per data chunk. */
  status: { invocation: Invocation; progress?: unknown };
};

type TerminalOutcome =
  | { status: 'succeeded'; result: unknown }
  | { status: 'failed' | 'cancelled'; errorCode: string; message: string };

type ActiveRun = {
  invocationId: string;
  reservationId: string;
  controller: AbortController;
  cancelCode: string | null;
};

type SettleWaiter = {
  promise: Promise<Invocation>;
  resolve: (invocation: Invocation) => void;
};

export interface TechniqueDispatcherOptions {
  driver: InstrumentDriver;
  historyLimit?: number;
  clock?: Clock;
  logger?: Logger;
}

const TERMINAL: ReadonlySet<InvocationStatus> = new Set<InvocationStatus>(['succeeded', 'failed', 'cancelled']);

export function isTerminal(status: InvocationStatus): status is TerminalStatus {
  return TERMINAL.has(status);
}

/**
 * Runs technique invocations on held channels, one at a time per channel,
 * and reports exactly one terminal status for each.
 */
export class TechniqueDispatcher {
  readonly events: TypedEventEmitter<DispatcherEvents>;
  private readonly invocations = new Map<string, Invocation>();
  private readonly waiters = new Map<string, SettleWaiter>();
  private readonly active = new Map<string, ActiveRun>();
  private readonly runs = new Set<Promise<void>>();
  private readonly lanes = new SerialLanes();
  private readonly driver: InstrumentDriver;
  private readonly historyLimit: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly detach: Array<() => void>;

  constructor(
    private readonly registry: ChannelRegistry,
    private readonly manager: ReservationManager,
    options: TechniqueDispatcherOptions,
  ) {
    this.driver = options.driver;
    this.historyLimit = options.historyLimit ?? 500;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger();
    this.events = new TypedEventEmitter<DispatcherEvents>(this.logger);

    this.detach = [
      manager.events.on('expired', ({ reservation }) => this.reservationEnded(reservation, 'LEASE_EXPIRED')),
      manager.events.on('revoked', ({ reservation, code }) => this.reservationEnded(reservation, code)),
      manager.events.on('released', ({ reservation, cause }) =>
        this.reservationEnded(reservation, cause === 'disconnect' ? 'LEASE_EXPIRED' : 'RELEASED'),
      ),
    ];
  }

  /**
   * Accepts an invocation from the channel holder. The returned record is
   * pending; progress and the terminal status arrive through `events`.
   * A known `invocationId` returns the existing record and never runs twice.
   */
  submit(channelId: string, clientId: string, invocationId: string, parameters: unknown): Invocation {
    const existing = this.invocations.get(invocationId);
    if (existing) {
      if (existing.channelId !== channelId || existing.clientId !== clientId) {
        throw new BrokerError('BAD_REQUEST', `Invocation id ${invocationId} is already in use`);
      }
      this.logger.debug({ invocationId, status: existing.status }, 'Duplicate invocation request');
      this.events.emit('status', { invocation: { ...existing } });
      return { ...existing };
    }

    if (this.manager.isShuttingDown()) {
      throw new BrokerError('BROKER_SHUTDOWN', 'Broker is shutting down');
    }
    const reservation = this.manager.assertHolder(channelId, clientId);

    const invocation: Invocation = {
      invocationId,
      channelId,
      clientId,
      reservationId: reservation.reservationId,
      parameters,
      status: 'pending',
      progressCount: 0,
      createdAt: this.now(),
    };
    this.invocations.set(invocationId, invocation);
    this.prune();
    this.events.emit('status', { invocation: { ...invocation } });

    const run = this.lanes.run(channelId, () => this.execute(invocation)).catch((err: unknown) => {
      this.logger.error({ invocationId, err: errorMessage(err) }, 'Invocation run failed unexpectedly');
    });
    this.runs.add(run);
    void run.finally(() => this.runs.delete(run));

    return { ...invocation };
  }

  /**
   * Best effort. A pending invocation is cancelled at once; a running one
   * is asked to abort and may still finish with another terminal status.
   */
  cancel(channelId: string, clientId: string, invocationId: string): Invocation {
    const invocation = this.invocations.get(invocationId);
    if (!invocation || invocation.channelId !== channelId) {
      throw new BrokerError('INVOCATION_NOT_FOUND', `Unknown invocation: ${invocationId}`);
    }
    if (invocation.clientId !== clientId) {
      throw new BrokerError('NOT_HOLDER', `Invocation ${invocationId} belongs to another client`);
    }

    if (invocation.status === 'pending') {
      this.finalize(invocation, { status: 'cancelled', errorCode: 'CANCELLED', message: 'Cancelled before start' });
    } else if (invocation.status === 'running') {
      const run = this.active.get(channelId);
      if (run && run.invocationId === invocationId) {
        if (run.cancelCode === null) run.cancelCode = 'CANCELLED';
        run.controller.abort();
        this.logger.info({ channelId, invocationId }, 'Cancel requested for running invocation');
      }
    }
    return { ...invocation };
  }

  get(invocationId: string): Invocation | undefined {
    const invocation = this.invocations.get(invocationId);
    return invocation ? { ...invocation } : undefined;
  }

  list(filter: { channelId?: string; status?: InvocationStatus } = {}): Invocation[] {
    return [...this.invocations.values()]
      .filter((inv) => (filter.channelId ? inv.channelId === filter.channelId : true))
      .filter((inv) => (filter.status ? inv.status === filter.status : true))
      .map((inv) => ({ ...inv }));
  }

  /**
   * Resolves with the invocation once it reaches a terminal status.
   */
  whenSettled(invocationId: string): Promise<Invocation> {
    const invocation = this.invocations.get(invocationId);
    if (!invocation) {
      return Promise.reject(new BrokerError('INVOCATION_NOT_FOUND', `Unknown invocation: ${invocationId}`));
    }
    if (isTerminal(invocation.status)) {
      return Promise.resolve({ ...invocation });
    }
    return this.waiterFor(invocationId).promise;
  }

  runningCount(): number {
    return this.active.size;
  }

  /**
   * Waits for every accepted invocation to settle.
   */
  async drain(): Promise<void> {
    while (this.runs.size > 0) {
      await Promise.allSettled([...this.runs]);
    }
  }

  close(): void {
    for (const off of this.detach) off();
  }

  private async execute(invocation: Invocation): Promise<void> {
    if (invocation.status !== 'pending') return;

    const { channelId, clientId, invocationId, reservationId } = invocation;
    const channel = this.registry.lookup(channelId);
    if (!channel || !this.manager.markRunning(channelId, clientId, reservationId)) {
      this.finalize(invocation, {
        status: 'cancelled',
        errorCode: 'LEASE_EXPIRED',
        message: `Reservation on ${channelId} ended before the invocation started`,
      });
      return;
    }

    const run: ActiveRun = { invocationId, reservationId, controller: new AbortController(), cancelCode: null };
    this.active.set(channelId, run);
    invocation.status = 'running';
    invocation.startedAt = this.now();
    this.logger.info({ channelId, clientId, invocationId }, 'Invocation started');
    this.events.emit('status', { invocation: { ...invocation } });

    let outcome: TerminalOutcome;
    try {
      const result = await this.driver.run(
        {
          invocationId,
          channelId,
          instrumentChannel: channel.instrumentChannel,
          usbPort: channel.usbPort,
          parameters: invocation.parameters,
        },
        {
          signal: run.controller.signal,
          onData: (chunk) => {
            if (invocation.status !== 'running') return;
            invocation.progressCount += 1;
            this.events.emit('status', { invocation: { ...invocation }, progress: chunk });
          },
        },
      );
      outcome = { status: 'succeeded', result: result ?? null };
    } catch (err) {
      outcome = failureOutcome(err, run.cancelCode);
    }

    this.active.delete(channelId);
    this.manager.markIdle(channelId, reservationId);
    this.finalize(invocation, outcome);
  }

  private reservationEnded(reservation: Reservation, code: string): void {
    for (const invocation of this.invocations.values()) {
      if (invocation.reservationId === reservation.reservationId && invocation.status === 'pending') {
        this.finalize(invocation, {
          status: 'cancelled',
          errorCode: code,
          message: `Reservation on ${invocation.channelId} ended before the invocation started`,
        });
      }
    }
    const run = this.active.get(reservation.channelId);
    if (run && run.reservationId === reservation.reservationId) {
      if (run.cancelCode === null) run.cancelCode = code;
      run.controller.abort();
      this.logger.warn(
        { channelId: reservation.channelId, invocationId: run.invocationId, code },
        'Aborting invocation after reservation ended',
      );
    }
  }

  private finalize(invocation: Invocation, outcome: TerminalOutcome): void {
    if (isTerminal(invocation.status)) return;

    invocation.status = outcome.status;
    invocation.finishedAt = this.now();
    if (outcome.status === 'succeeded') {
      invocation.result = outcome.result;
    } else {
      invocation.errorCode = outcome.errorCode;
      invocation.message = outcome.message;
    }

    this.logger.info(
      {
        channelId: invocation.channelId,
        invocationId: invocation.invocationId,
        status: invocation.status,
        ...(invocation.errorCode ? { errorCode: invocation.errorCode } : {}),
      },
      'Invocation finished',
    );
    this.events.emit('status', { invocation: { ...invocation } });

    const waiter = this.waiters.get(invocation.invocationId);
    if (waiter) {
      this.waiters.delete(invocation.invocationId);
      waiter.resolve({ ...invocation });
    }
  }

  private waiterFor(invocationId: string): SettleWaiter {
    const existing = this.waiters.get(invocationId);
    if (existing) return existing;
    let resolve: (invocation: Invocation) => void = () => undefined;
    const promise = new Promise<Invocation>((res) => {
      resolve = res;
    });
    const waiter = { promise, resolve };
    this.waiters.set(invocationId, waiter);
    return waiter;
  }

  private prune(): void {
    if (this.invocations.size <= this.historyLimit) return;
    for (const [id, invocation] of this.invocations) {
      if (this.invocations.size <= this.historyLimit) break;
      if (isTerminal(invocation.status)) {
        this.invocations.delete(id);
      }
    }
  }

  private now(): string {
    return new Date(this.clock.wallMs()).toISOString();
  }
}

function failureOutcome(err: unknown, cancelCode: string | null): TerminalOutcome {
  if (err instanceof InstrumentError) {
    if (err.code === ABORTED) {
      return { status: 'cancelled', errorCode: cancelCode ?? 'CANCELLED', message: err.message };
    }
    return { status: 'failed', errorCode: err.code, message: err.message };
  }
  return { status: 'failed', errorCode: 'INSTRUMENT_ERROR', message: errorMessage(err) };
}
