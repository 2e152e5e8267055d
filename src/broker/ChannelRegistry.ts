/**
 * In-memory table of reservable instrument channels.
 *
 * The registry only stores channels; every state transition is made by the
 * ReservationManager, which serializes access per channel.
 */

export type ChannelState = 'free' | 'reserved' | 'running';

export interface Reservation {
  reservationId: string;
  channelId: string;
  clientId: string;
  /** Wall-clock grant time (ms since epoch) */
  grantedAt: number;
  /** Monotonic deadline (ms) */
  deadline: number;
  /** Wall-clock equivalent of `deadline`, for clients */
  expiresAt: number;
  leaseMs: number;
  renewals: number;
  /** Request that produced the grant */
  requestId?: string;
}

export interface QueueEntry {
  clientId: string;
  requestId?: string;
  leaseMs: number;
  /** Wall-clock enqueue time (ms since epoch) */
  queuedAt: number;
}

export interface Channel {
  id: string;
  usbPort: string;
  instrumentChannel: number;
  state: ChannelState;
  reservation: Reservation | null;
  queue: QueueEntry[];
}

export interface ChannelOptions {
  usbPort?: string;
  instrumentChannel?: number;
}

export interface ChannelSnapshot {
  id: string;
  usbPort: string;
  instrumentChannel: number;
  state: ChannelState;
  holder?: string;
  reservationId?: string;
  grantedAt?: string;
  expiresAt?: string;
  renewals?: number;
  queue: Array<{ clientId: string; position: number; queuedAt: string }>;
}

export const DEFAULT_USB_PORT = 'USB0';

export class ChannelRegistry {
  private readonly channels = new Map<string, Channel>();

  lookup(channelId: string): Channel | undefined {
    return this.channels.get(channelId);
  }

  /**
   * Registers a channel. Creating an existing id returns the existing
   * channel untouched.
   */
  create(channelId: string, options: ChannelOptions = {}): Channel {
    const existing = this.channels.get(channelId);
    if (existing) return existing;

    const channel: Channel = {
      id: channelId,
      usbPort: options.usbPort ?? DEFAULT_USB_PORT,
      instrumentChannel: options.instrumentChannel ?? this.channels.size + 1,
      state: 'free',
      reservation: null,
      queue: [],
    };
    this.channels.set(channelId, channel);
    return channel;
  }

  has(channelId: string): boolean {
    return this.channels.has(channelId);
  }

  list(): Channel[] {
    return [...this.channels.values()];
  }

  get size(): number {
    return this.channels.size;
  }
}

export function snapshotChannel(channel: Channel): ChannelSnapshot {
  const reservation = channel.reservation;
  return {
    id: channel.id,
    usbPort: channel.usbPort,
    instrumentChannel: channel.instrumentChannel,
    state: channel.state,
    ...(reservation
      ? {
          holder: reservation.clientId,
          reservationId: reservation.reservationId,
          grantedAt: new Date(reservation.grantedAt).toISOString(),
          expiresAt: new Date(reservation.expiresAt).toISOString(),
          renewals: reservation.renewals,
        }
      : {}),
    queue: channel.queue.map((entry, index) => ({
      clientId: entry.clientId,
      position: index + 1,
      queuedAt: new Date(entry.queuedAt).toISOString(),
    })),
  };
}
