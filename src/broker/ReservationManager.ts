import { randomUUID } from 'node:crypto';
import { systemClock, type Clock } from '../core/clock.js';
import { TypedEventEmitter } from '../core/events.js';
import { SerialLanes } from '../core/SerialLanes.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { Channel, ChannelRegistry, QueueEntry, Reservation } from './ChannelRegistry.js';
import { BrokerError } from './errors.js';

export type ReleaseCause = 'release' | 'disconnect';
export type WithdrawCause = 'release' | 'disconnect' | 'shutdown';
export type RevokeCode = 'REVOKED' | 'BROKER_SHUTDOWN';

export type ReservationEvents = {
  granted: { reservation: Reservation; requestId?: string; duplicate: boolean };
  queued: { channelId: string; entry: QueueEntry; position: number; duplicate: boolean };
  released: { reservation: Reservation; cause: ReleaseCause; requestId?: string };
  withdrawn: { channelId: string; entry: QueueEntry; cause: WithdrawCause; requestId?: string };
  expired: { reservation: Reservation };
  revoked: { reservation: Reservation; code: RevokeCode; reason: string };
};

export interface RequestOptions {
  leaseMs?: number;
  requestId?: string;
  /** When false a busy channel is refused with CHANNEL_BUSY instead of queueing. */
  queue?: boolean;
}

export type RequestOutcome =
  | { outcome: 'granted'; reservation: Reservation; duplicate: boolean }
  | { outcome: 'queued'; position: number; duplicate: boolean };

export type ReleaseOutcome =
  | { outcome: 'released'; reservation: Reservation; nextHolder?: string }
  | { outcome: 'withdrawn' }
  | { outcome: 'not-holder' };

export interface SweepSummary {
  scanned: number;
  expired: Array<{ channelId: string; clientId: string }>;
  timestamp: string;
}

export interface ReservationManagerOptions {
  defaultLeaseMs: number;
  maxLeaseMs: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Mutual exclusion over instrument channels.
 *
 * Every decision on a channel runs in that channel's serial lane, so
 * concurrent requests are decided in the order they arrived. State changes
 * are announced through `events`; callers publish them.
 */
export class ReservationManager {
  readonly events: TypedEventEmitter<ReservationEvents>;
  private readonly lanes = new SerialLanes();
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly defaultLeaseMs: number;
  private readonly maxLeaseMs: number;
  private shuttingDown = false;

  constructor(
    private readonly registry: ChannelRegistry,
    options: ReservationManagerOptions,
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger();
    this.defaultLeaseMs = options.defaultLeaseMs;
    this.maxLeaseMs = options.maxLeaseMs;
    this.events = new TypedEventEmitter<ReservationEvents>(this.logger);
  }

  requestReservation(channelId: string, clientId: string, options: RequestOptions = {}): Promise<RequestOutcome> {
    return this.lanes.run(channelId, (): RequestOutcome => {
      if (this.shuttingDown) {
        throw new BrokerError('BROKER_SHUTDOWN', 'Broker is shutting down');
      }
      const channel = this.requireChannel(channelId);
      const leaseMs = this.resolveLease(options.leaseMs);
      const requestId = options.requestId;

      if (channel.reservation?.clientId === clientId) {
        const reservation = { ...channel.reservation };
        this.events.emit('granted', { reservation, ...(requestId ? { requestId } : {}), duplicate: true });
        return { outcome: 'granted', reservation, duplicate: true };
      }

      const index = channel.queue.findIndex((entry) => entry.clientId === clientId);
      const queuedEntry = channel.queue[index];
      if (queuedEntry) {
        this.events.emit('queued', { channelId, entry: { ...queuedEntry }, position: index + 1, duplicate: true });
        return { outcome: 'queued', position: index + 1, duplicate: true };
      }

      if (channel.state === 'free') {
        const reservation = this.grant(channel, clientId, leaseMs, requestId);
        return { outcome: 'granted', reservation, duplicate: false };
      }

      if (options.queue === false) {
        throw new BrokerError('CHANNEL_BUSY', `Channel ${channelId} is held by another client`);
      }

      const entry: QueueEntry = {
        clientId,
        leaseMs,
        queuedAt: this.clock.wallMs(),
        ...(requestId ? { requestId } : {}),
      };
      channel.queue.push(entry);
      const position = channel.queue.length;
      this.logger.info({ channelId, clientId, position }, 'Reservation queued');
      this.events.emit('queued', { channelId, entry: { ...entry }, position, duplicate: false });
      return { outcome: 'queued', position, duplicate: false };
    });
  }

  renewReservation(channelId: string, clientId: string): Promise<Reservation> {
    return this.lanes.run(channelId, () => {
      const channel = this.requireChannel(channelId);
      const reservation = channel.reservation;
      if (!reservation || reservation.clientId !== clientId) {
        throw new BrokerError('NOT_HOLDER', `Client ${clientId} does not hold channel ${channelId}`);
      }
      reservation.deadline = this.clock.monotonicMs() + reservation.leaseMs;
      reservation.expiresAt = this.clock.wallMs() + reservation.leaseMs;
      reservation.renewals += 1;
      this.logger.debug({ channelId, clientId, renewals: reservation.renewals }, 'Reservation renewed');
      return { ...reservation };
    });
  }

  /**
   * Ends the caller's hold on a channel and grants it to the queue head in
   * the same step. A queued caller is withdrawn from the queue instead. Any
   * other caller is a no-op.
   */
  release(channelId: string, clientId: string, requestId?: string): Promise<ReleaseOutcome> {
    return this.lanes.run(channelId, (): ReleaseOutcome => {
      const channel = this.requireChannel(channelId);
      const reservation = channel.reservation;

      if (reservation && reservation.clientId === clientId) {
        this.endReservation(channel);
        this.logger.info({ channelId, clientId }, 'Reservation released');
        this.events.emit('released', { reservation, cause: 'release', ...(requestId ? { requestId } : {}) });
        const next = this.promote(channel);
        return { outcome: 'released', reservation, ...(next ? { nextHolder: next.clientId } : {}) };
      }

      const entry = this.removeFromQueue(channel, clientId);
      if (entry) {
        this.logger.info({ channelId, clientId }, 'Queued request withdrawn');
        this.events.emit('withdrawn', { channelId, entry, cause: 'release', ...(requestId ? { requestId } : {}) });
        return { outcome: 'withdrawn' };
      }

      this.logger.debug({ channelId, clientId }, 'Release from non-holder ignored');
      return { outcome: 'not-holder' };
    });
  }

  /**
   * Expires every reservation past its deadline and promotes the next
   * waiter on each affected channel.
   */
  async sweepOnce(): Promise<SweepSummary> {
    const channels = this.registry.list();
    const results = await Promise.all(
      channels.map((channel) =>
        this.lanes.run(channel.id, () => {
          const reservation = channel.reservation;
          if (!reservation || this.clock.monotonicMs() < reservation.deadline) {
            return null;
          }
          this.endReservation(channel);
          this.logger.warn(
            { channelId: channel.id, clientId: reservation.clientId, leaseMs: reservation.leaseMs },
            'Reservation expired',
          );
          this.events.emit('expired', { reservation });
          this.promote(channel);
          return { channelId: channel.id, clientId: reservation.clientId };
        }),
      ),
    );

    return {
      scanned: channels.length,
      expired: results.filter((result): result is { channelId: string; clientId: string } => result !== null),
      timestamp: new Date(this.clock.wallMs()).toISOString(),
    };
  }

  /**
   * Implicit release of everything a vanished client held or waited for.
   */
  async handleDisconnect(clientId: string): Promise<{ released: string[]; withdrawn: string[] }> {
    const released: string[] = [];
    const withdrawn: string[] = [];

    await Promise.all(
      this.registry.list().map((channel) =>
        this.lanes.run(channel.id, () => {
          const reservation = channel.reservation;
          if (reservation && reservation.clientId === clientId) {
            this.endReservation(channel);
            released.push(channel.id);
            this.events.emit('released', { reservation, cause: 'disconnect' });
            this.promote(channel);
          }
          const entry = this.removeFromQueue(channel, clientId);
          if (entry) {
            withdrawn.push(channel.id);
            this.events.emit('withdrawn', { channelId: channel.id, entry, cause: 'disconnect' });
          }
        }),
      ),
    );

    if (released.length > 0 || withdrawn.length > 0) {
      this.logger.warn({ clientId, released, withdrawn }, 'Client disconnected; reservations dropped');
    }
    return { released, withdrawn };
  }

  /**
   * Operator revoke: ends the current reservation and promotes the next
   * waiter. Returns the revoked reservation, or null if the channel was free.
   */
  revoke(channelId: string, reason: string): Promise<Reservation | null> {
    return this.lanes.run(channelId, (): Reservation | null => {
      const channel = this.requireChannel(channelId);
      const reservation = channel.reservation;
      if (!reservation) return null;
      this.endReservation(channel);
      this.logger.warn({ channelId, clientId: reservation.clientId, reason }, 'Reservation revoked');
      this.events.emit('revoked', { reservation, code: 'REVOKED', reason });
      this.promote(channel);
      return reservation;
    });
  }

  /**
   * Shutdown path: ends every reservation, empties every queue and refuses
   * further requests.
   */
  async releaseAll(reason: string): Promise<number> {
    this.shuttingDown = true;
    let affected = 0;
    await Promise.all(
      this.registry.list().map((channel) =>
        this.lanes.run(channel.id, () => {
          const reservation = channel.reservation;
          if (reservation) {
            this.endReservation(channel);
            affected += 1;
            this.events.emit('revoked', { reservation, code: 'BROKER_SHUTDOWN', reason });
          }
          const waiting = channel.queue.splice(0, channel.queue.length);
          for (const entry of waiting) {
            affected += 1;
            this.events.emit('withdrawn', { channelId: channel.id, entry, cause: 'shutdown' });
          }
        }),
      ),
    );
    this.logger.info({ affected, reason }, 'All reservations released');
    return affected;
  }

  /**
   * Throws unless `clientId` currently holds `channelId`.
   */
  assertHolder(channelId: string, clientId: string): Reservation {
    const channel = this.requireChannel(channelId);
    const reservation = channel.reservation;
    if (!reservation || reservation.clientId !== clientId) {
      throw new BrokerError('NOT_HOLDER', `Client ${clientId} does not hold channel ${channelId}`);
    }
    return { ...reservation };
  }

  /**
   * reserved → running, only while the given reservation is still current.
   */
  markRunning(channelId: string, clientId: string, reservationId: string): boolean {
    const channel = this.registry.lookup(channelId);
    const reservation = channel?.reservation;
    if (!channel || !reservation || reservation.reservationId !== reservationId || reservation.clientId !== clientId) {
      return false;
    }
    if (channel.state !== 'reserved') return false;
    channel.state = 'running';
    return true;
  }

  /**
   * running → reserved. Never frees the channel.
   */
  markIdle(channelId: string, reservationId: string): void {
    const channel = this.registry.lookup(channelId);
    if (!channel || channel.state !== 'running' || channel.reservation?.reservationId !== reservationId) {
      return;
    }
    channel.state = 'reserved';
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  private grant(channel: Channel, clientId: string, leaseMs: number, requestId: string | undefined): Reservation {
    const reservation: Reservation = {
      reservationId: randomUUID(),
      channelId: channel.id,
      clientId,
      grantedAt: this.clock.wallMs(),
      deadline: this.clock.monotonicMs() + leaseMs,
      expiresAt: this.clock.wallMs() + leaseMs,
      leaseMs,
      renewals: 0,
      ...(requestId ? { requestId } : {}),
    };
    channel.reservation = reservation;
    channel.state = 'reserved';
    this.logger.info({ channelId: channel.id, clientId, leaseMs }, 'Reservation granted');
    this.events.emit('granted', { reservation: { ...reservation }, ...(requestId ? { requestId } : {}), duplicate: false });
    return { ...reservation };
  }

  private promote(channel: Channel): Reservation | null {
    if (channel.state !== 'free') return null;
    const next = channel.queue.shift();
    if (!next) return null;
    return this.grant(channel, next.clientId, next.leaseMs, next.requestId);
  }

  private endReservation(channel: Channel): void {
    channel.reservation = null;
    channel.state = 'free';
  }

  private removeFromQueue(channel: Channel, clientId: string): QueueEntry | null {
    const index = channel.queue.findIndex((entry) => entry.clientId === clientId);
    if (index < 0) return null;
    const [entry] = channel.queue.splice(index, 1);
    return entry ?? null;
  }

  private requireChannel(channelId: string): Channel {
    const channel = this.registry.lookup(channelId);
    if (!channel) {
      throw new BrokerError('CHANNEL_NOT_FOUND', `Unknown channel: ${channelId}`);
    }
    return channel;
  }

  private resolveLease(leaseMs: number | undefined): number {
    if (leaseMs === undefined) return this.defaultLeaseMs;
    if (!Number.isFinite(leaseMs) || leaseMs <= 0) {
      throw new BrokerError('BAD_REQUEST', 'leaseSeconds must be a positive number');
    }
    return Math.min(leaseMs, this.maxLeaseMs);
  }
}
