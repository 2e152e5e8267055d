import { systemClock, type Clock } from '../core/clock.js';
import { errorMessage, silentLogger, type Logger } from '../logging/logger.js';
import {
  clientStatusSchema,
  describeIssues,
  invokeCancelSchema,
  invokeRequestSchema,
  requestIdOf,
  reserveReleaseSchema,
  reserveRenewSchema,
  reserveRequestSchema,
  senderOf,
  type InvokeStatusMessage,
  type ReserveGrantMessage,
  type ReserveReplyMessage,
} from '../protocol/messages.js';
import { Topics, TopicPatterns, topicSubject } from '../transport/topics.js';
import type { MessageHandler, Transport, TransportMessage, Unsubscribe } from '../transport/types.js';
import type { Reservation } from './ChannelRegistry.js';
import { BrokerError } from './errors.js';
import type { ReservationManager } from './ReservationManager.js';
import type { Invocation, TechniqueDispatcher } from './TechniqueDispatcher.js';

export interface BrokerHostOptions {
  transport: Transport;
  manager: ReservationManager;
  dispatcher: TechniqueDispatcher;
  clock?: Clock;
  logger?: Logger;
}

type ReplyFields = Omit<ReserveReplyMessage, 'channelId' | 'clientId'>;

/**
 * Binds the reservation and invocation topics to the manager and the
 * dispatcher. Inbound messages are validated before they touch state;
 * outbound notices are published from the manager and dispatcher events.
 *
 * Handlers call into the manager before their first `await` so that the
 * arrival order of messages is the order in which they are decided.
 */
export class BrokerHost {
  private readonly transport: Transport;
  private readonly manager: ReservationManager;
  private readonly dispatcher: TechniqueDispatcher;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly subscriptions: Unsubscribe[] = [];
  private readonly listeners: Array<() => void> = [];
  private readonly publishes = new Set<Promise<void>>();
  private started = false;

  constructor(options: BrokerHostOptions) {
    this.transport = options.transport;
    this.manager = options.manager;
    this.dispatcher = options.dispatcher;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger();
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    this.bindEvents();

    const routes: Array<[string, MessageHandler]> = [
      [TopicPatterns.reserveRequest, (msg) => this.onReserveRequest(msg)],
      [TopicPatterns.reserveRenew, (msg) => this.onReserveRenew(msg)],
      [TopicPatterns.reserveRelease, (msg) => this.onReserveRelease(msg)],
      [TopicPatterns.invokeRequest, (msg) => this.onInvokeRequest(msg)],
      [TopicPatterns.invokeCancel, (msg) => this.onInvokeCancel(msg)],
      [TopicPatterns.clientStatus, (msg) => this.onClientStatus(msg)],
    ];
    for (const [pattern, handler] of routes) {
      this.subscriptions.push(await this.transport.subscribe(pattern, handler));
    }
    this.logger.info({ topics: routes.map(([pattern]) => pattern) }, 'Broker host listening');
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    const subscriptions = this.subscriptions.splice(0, this.subscriptions.length);
    if (this.transport.isConnected()) {
      await Promise.all(subscriptions.map((unsubscribe) => unsubscribe()));
    }
    await this.flush();
    for (const off of this.listeners.splice(0, this.listeners.length)) off();
  }

  /**
   * Resolves once every outbound notice queued so far has been handed to the
   * transport.
   */
  async flush(): Promise<void> {
    while (this.publishes.size > 0) {
      await Promise.allSettled([...this.publishes]);
    }
  }

  // ---------------------------------------------------------------------------
  // Inbound
  // ---------------------------------------------------------------------------

  private async onReserveRequest(msg: TransportMessage): Promise<void> {
    const channelId = this.channelOf(msg);
    if (!channelId) return;
    const parsed = reserveRequestSchema.safeParse(msg.payload);
    if (!parsed.success) {
      this.rejectMalformed(channelId, msg, describeIssues(parsed.error));
      return;
    }
    const { requestId, clientId, leaseSeconds, queue } = parsed.data;
    try {
      await this.manager.requestReservation(channelId, clientId, {
        requestId,
        ...(leaseSeconds !== undefined ? { leaseMs: leaseSeconds * 1000 } : {}),
        ...(queue !== undefined ? { queue } : {}),
      });
    } catch (err) {
      const outcome = err instanceof BrokerError && (err.code === 'CHANNEL_BUSY' || err.code === 'BROKER_SHUTDOWN') ? 'denied' : 'error';
      this.replyFailure(channelId, clientId, requestId, outcome, err);
    }
  }

  private async onReserveRenew(msg: TransportMessage): Promise<void> {
    const channelId = this.channelOf(msg);
    if (!channelId) return;
    const parsed = reserveRenewSchema.safeParse(msg.payload);
    if (!parsed.success) {
      this.rejectMalformed(channelId, msg, describeIssues(parsed.error));
      return;
    }
    const { requestId, clientId } = parsed.data;
    try {
      const reservation = await this.manager.renewReservation(channelId, clientId);
      this.reply(channelId, clientId, { requestId, outcome: 'renewed', deadline: iso(reservation.expiresAt) });
    } catch (err) {
      const outcome = err instanceof BrokerError && err.code === 'NOT_HOLDER' ? 'not-holder' : 'error';
      this.replyFailure(channelId, clientId, requestId, outcome, err);
    }
  }

  private async onReserveRelease(msg: TransportMessage): Promise<void> {
    const channelId = this.channelOf(msg);
    if (!channelId) return;
    const parsed = reserveReleaseSchema.safeParse(msg.payload);
    if (!parsed.success) {
      this.rejectMalformed(channelId, msg, describeIssues(parsed.error));
      return;
    }
    const { requestId, clientId } = parsed.data;
    try {
      const result = await this.manager.release(channelId, clientId, requestId);
      if (result.outcome === 'not-holder') {
        this.reply(channelId, clientId, {
          ...(requestId ? { requestId } : {}),
          outcome: 'not-holder',
          code: 'NOT_HOLDER',
        });
      }
    } catch (err) {
      this.replyFailure(channelId, clientId, requestId, 'error', err);
    }
  }

  private onInvokeRequest(msg: TransportMessage): void {
    const channelId = this.channelOf(msg);
    if (!channelId) return;
    const parsed = invokeRequestSchema.safeParse(msg.payload);
    if (!parsed.success) {
      this.rejectMalformedInvocation(channelId, msg, describeIssues(parsed.error));
      return;
    }
    const { invocationId, clientId, parameters } = parsed.data;
    try {
      this.dispatcher.submit(channelId, clientId, invocationId, parameters ?? null);
    } catch (err) {
      this.logger.warn({ channelId, clientId, invocationId, err: errorMessage(err) }, 'Invocation rejected');
      this.send(Topics.invokeStatus(channelId), {
        invocationId,
        channelId,
        clientId,
        status: 'rejected',
        errorCode: codeOf(err),
        message: errorMessage(err),
        timestamp: this.now(),
      } satisfies InvokeStatusMessage);
    }
  }

  private onInvokeCancel(msg: TransportMessage): void {
    const channelId = this.channelOf(msg);
    if (!channelId) return;
    const parsed = invokeCancelSchema.safeParse(msg.payload);
    if (!parsed.success) {
      this.logger.warn({ topic: msg.topic, issues: describeIssues(parsed.error) }, 'Malformed cancel ignored');
      return;
    }
    const { invocationId, clientId } = parsed.data;
    try {
      this.dispatcher.cancel(channelId, clientId, invocationId);
    } catch (err) {
      this.logger.warn({ channelId, clientId, invocationId, err: errorMessage(err) }, 'Cancel ignored');
    }
  }

  private async onClientStatus(msg: TransportMessage): Promise<void> {
    const parsed = clientStatusSchema.safeParse(msg.payload);
    if (!parsed.success) {
      this.logger.warn({ topic: msg.topic, issues: describeIssues(parsed.error) }, 'Malformed client status ignored');
      return;
    }
    if (parsed.data.state !== 'offline') return;
    const clientId = topicSubject(msg.topic) ?? parsed.data.clientId;
    await this.manager.handleDisconnect(clientId);
  }

  // ---------------------------------------------------------------------------
  // Outbound
  // ---------------------------------------------------------------------------

  private bindEvents(): void {
    const events = this.manager.events;
    this.listeners.push(
      events.on('granted', ({ reservation, requestId }) => {
        this.send(Topics.reserveGrant(reservation.channelId), this.grantMessage(reservation, requestId));
      }),
      events.on('queued', ({ channelId, entry, position }) => {
        this.reply(channelId, entry.clientId, {
          ...(entry.requestId ? { requestId: entry.requestId } : {}),
          outcome: 'queued',
          position,
        });
      }),
      events.on('released', ({ reservation, cause, requestId }) => {
        if (cause !== 'release') return;
        this.reply(reservation.channelId, reservation.clientId, {
          ...(requestId ? { requestId } : {}),
          outcome: 'released',
        });
      }),
      events.on('withdrawn', ({ channelId, entry, cause, requestId }) => {
        if (cause === 'release') {
          this.reply(channelId, entry.clientId, { ...(requestId ? { requestId } : {}), outcome: 'withdrawn' });
        } else if (cause === 'shutdown') {
          this.reply(channelId, entry.clientId, {
            ...(entry.requestId ? { requestId: entry.requestId } : {}),
            outcome: 'denied',
            code: 'BROKER_SHUTDOWN',
            message: 'Broker is shutting down',
          });
        }
      }),
      events.on('expired', ({ reservation }) => {
        this.reply(reservation.channelId, reservation.clientId, {
          outcome: 'expired',
          code: 'LEASE_EXPIRED',
          message: `Lease on ${reservation.channelId} expired`,
        });
      }),
      events.on('revoked', ({ reservation, code, reason }) => {
        this.reply(reservation.channelId, reservation.clientId, { outcome: 'revoked', code, message: reason });
      }),
      this.dispatcher.events.on('status', ({ invocation, progress }) => {
        this.send(Topics.invokeStatus(invocation.channelId), this.statusMessage(invocation, progress));
      }),
    );
  }

  private grantMessage(reservation: Reservation, requestId: string | undefined): ReserveGrantMessage {
    const effectiveRequestId = requestId ?? reservation.requestId;
    return {
      channelId: reservation.channelId,
      clientId: reservation.clientId,
      reservationId: reservation.reservationId,
      ...(effectiveRequestId ? { requestId: effectiveRequestId } : {}),
      grantedAt: iso(reservation.grantedAt),
      deadline: iso(reservation.expiresAt),
      leaseSeconds: reservation.leaseMs / 1000,
    };
  }

  private statusMessage(invocation: Invocation, progress: unknown): InvokeStatusMessage {
    return {
      invocationId: invocation.invocationId,
      channelId: invocation.channelId,
      clientId: invocation.clientId,
      status: invocation.status,
      ...(progress !== undefined ? { progress } : {}),
      ...(invocation.status === 'succeeded' ? { result: invocation.result ?? null } : {}),
      ...(invocation.errorCode ? { errorCode: invocation.errorCode } : {}),
      ...(invocation.message ? { message: invocation.message } : {}),
      timestamp: this.now(),
    };
  }

  private reply(channelId: string, clientId: string, fields: ReplyFields): void {
    const message: ReserveReplyMessage = { channelId, clientId, ...fields };
    this.send(Topics.reserveReply(channelId), message);
  }

  private replyFailure(
    channelId: string,
    clientId: string,
    requestId: string | undefined,
    outcome: 'denied' | 'not-holder' | 'error',
    err: unknown,
  ): void {
    this.logger.warn({ channelId, clientId, outcome, err: errorMessage(err) }, 'Reservation message refused');
    this.reply(channelId, clientId, {
      ...(requestId ? { requestId } : {}),
      outcome,
      code: codeOf(err),
      message: errorMessage(err),
    });
  }

  private rejectMalformed(channelId: string, msg: TransportMessage, issues: string): void {
    const clientId = senderOf(msg.payload);
    this.logger.warn({ topic: msg.topic, clientId, issues }, 'Malformed reservation message');
    if (!clientId) return;
    const requestId = requestIdOf(msg.payload);
    this.reply(channelId, clientId, {
      ...(requestId ? { requestId } : {}),
      outcome: 'error',
      code: 'BAD_REQUEST',
      message: issues,
    });
  }

  private rejectMalformedInvocation(channelId: string, msg: TransportMessage, issues: string): void {
    const clientId = senderOf(msg.payload);
    this.logger.warn({ topic: msg.topic, clientId, issues }, 'Malformed invocation request');
    const payload = msg.payload;
    const invocationId: unknown =
      payload !== null && typeof payload === 'object' ? Reflect.get(payload, 'invocationId') : undefined;
    if (!clientId || typeof invocationId !== 'string' || invocationId.length === 0) return;
    this.send(Topics.invokeStatus(channelId), {
      invocationId,
      channelId,
      clientId,
      status: 'rejected',
      errorCode: 'BAD_REQUEST',
      message: issues,
      timestamp: this.now(),
    } satisfies InvokeStatusMessage);
  }

  private send(topic: string, payload: unknown): void {
    const task = this.publish(topic, payload).catch((err: unknown) => {
      this.logger.error({ topic, err: errorMessage(err) }, 'Failed to publish broker notice');
    });
    this.publishes.add(task);
    void task.finally(() => this.publishes.delete(task));
  }

  private async publish(topic: string, payload: unknown): Promise<void> {
    await this.transport.publish(topic, payload);
  }

  private channelOf(msg: TransportMessage): string | undefined {
    const channelId = topicSubject(msg.topic);
    if (!channelId) {
      this.logger.warn({ topic: msg.topic }, 'Message on topic without a channel id');
    }
    return channelId;
  }

  private now(): string {
    return iso(this.clock.wallMs());
  }
}

function iso(ms: number): string {
  return new Date(ms).toISOString();
}

function codeOf(err: unknown): string {
  return err instanceof BrokerError ? err.code : 'INTERNAL_ERROR';
}
