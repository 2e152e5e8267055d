import { randomUUID } from 'node:crypto';
import { BrokerError, isBrokerErrorCode, type BrokerErrorCode } from '../broker/errors.js';
import { errorMessage, silentLogger, type Logger } from '../logging/logger.js';
import {
  describeIssues,
  invokeStatusSchema,
  presenceSchema,
  reserveGrantSchema,
  reserveReplySchema,
  type ClientStatusMessage,
  type InvokeStatusMessage,
  type ReserveGrantMessage,
  type ReserveReplyMessage,
} from '../protocol/messages.js';
import { PRESENCE_TOPIC, Topics, TopicPatterns } from '../transport/topics.js';
import type { LastWill, Transport, TransportMessage, Unsubscribe } from '../transport/types.js';
import { WaitTable } from './WaitTable.js';

export interface ChannelClientOptions {
  /** Fail every wait when no presence beat arrives for this long (default: 15000) */
  presenceTimeoutMs?: number;
  /** Wait for release/renew replies (default: 5000) */
  replyTimeoutMs?: number;
  logger?: Logger;
}

export interface AcquireOptions {
  leaseSeconds?: number;
  timeoutMs: number;
  /** When false a busy channel fails with CHANNEL_BUSY instead of waiting. */
  queue?: boolean;
}

export interface SubmitOptions {
  timeoutMs: number;
  onProgress?: (progress: unknown) => void;
  invocationId?: string;
}

export interface InvocationResult {
  invocationId: string;
  result: unknown;
}

export interface Grant {
  channelId: string;
  reservationId: string;
  leaseSeconds: number;
  deadline: string;
}

export interface ChannelSession {
  readonly channelId: string;
  readonly grant: Grant;
  submit(parameters: unknown, options: SubmitOptions): Promise<InvocationResult>;
  renew(): Promise<string>;
}

export type ReleaseResult = 'released' | 'withdrawn' | 'not-holder';

type Hold = {
  grant: Grant;
  renewTimer: NodeJS.Timeout;
};

/**
 * Last will a workflow registers on its transport, so the broker drops
 * its reservations when it vanishes.
 */
export function clientWill(clientId: string): LastWill {
  const payload: ClientStatusMessage = { clientId, state: 'offline' };
  return { topic: Topics.clientStatus(clientId), payload, retain: true };
}

/**
 * Workflow-side proxy for reserving channels and running techniques on
 * them. Every wait is bounded by a caller timeout.
 */
export class ChannelClient {
  readonly clientId: string;
  private readonly logger: Logger;
  private readonly presenceTimeoutMs: number;
  private readonly replyTimeoutMs: number;
  private readonly grantWaits = new WaitTable<Grant>();
  private readonly replyWaits = new WaitTable<ReserveReplyMessage>();
  private readonly invokeWaits = new WaitTable<InvokeStatusMessage>();
  private readonly progressHandlers = new Map<string, (progress: unknown) => void>();
  private readonly acquireRequests = new Map<string, string>();
  private readonly holds = new Map<string, Hold>();
  private readonly subscriptions: Unsubscribe[] = [];
  private presenceTimer: NodeJS.Timeout | null = null;
  private brokerOnline: boolean | null = null;
  private stopConnectionWatch: (() => void) | null = null;

  constructor(
    private readonly transport: Transport,
    options: ChannelClientOptions = {},
  ) {
    this.clientId = transport.clientId;
    this.logger = options.logger ?? silentLogger();
    this.presenceTimeoutMs = options.presenceTimeoutMs ?? 15_000;
    this.replyTimeoutMs = options.replyTimeoutMs ?? 5_000;
  }

  async start(): Promise<void> {
    await this.transport.connect();
    this.stopConnectionWatch = this.transport.onConnectionChange((connected) => {
      if (!connected) {
        this.brokerLost('Transport connection lost');
      }
    });

    this.subscriptions.push(
      await this.transport.subscribe(PRESENCE_TOPIC, (msg) => this.onPresence(msg)),
      await this.transport.subscribe(TopicPatterns.reserveGrant, (msg) => this.onGrant(msg)),
      await this.transport.subscribe(TopicPatterns.reserveReply, (msg) => this.onReply(msg)),
      await this.transport.subscribe(TopicPatterns.invokeStatus, (msg) => this.onInvokeStatus(msg)),
    );
    const online: ClientStatusMessage = { clientId: this.clientId, state: 'online' };
    await this.transport.publish(Topics.clientStatus(this.clientId), online, { retain: true });
    this.armPresenceWatchdog();
  }

  async stop(): Promise<void> {
    this.clearPresenceWatchdog();
    const channels = [...this.holds.keys()];
    await Promise.all(
      channels.map((channelId) =>
        this.release(channelId).catch((err: unknown) => {
          this.logger.warn({ channelId, err: errorMessage(err) }, 'Release during shutdown failed');
        }),
      ),
    );
    this.failAll(new BrokerError('TRANSPORT_UNAVAILABLE', 'Client stopped'));
    this.stopConnectionWatch?.();
    this.stopConnectionWatch = null;

    if (this.transport.isConnected()) {
      const offline: ClientStatusMessage = { clientId: this.clientId, state: 'offline' };
      await this.transport.publish(Topics.clientStatus(this.clientId), offline, { retain: true });
      await Promise.all(this.subscriptions.splice(0, this.subscriptions.length).map((unsubscribe) => unsubscribe()));
      await this.transport.disconnect();
    }
  }

  isBrokerOnline(): boolean {
    return this.brokerOnline === true;
  }

  holding(channelId: string): Grant | undefined {
    return this.holds.get(channelId)?.grant;
  }

  /**
   * Waits for exclusive use of a channel. On timeout the queued request is
   * withdrawn and TIMEOUT is thrown.
   */
  async acquire(channelId: string, options: AcquireOptions): Promise<Grant> {
    this.assertBrokerReachable();
    const held = this.holds.get(channelId);
    if (held) return held.grant;
    if (this.grantWaits.has(channelId)) {
      throw new BrokerError('BAD_REQUEST', `Already waiting for channel ${channelId}`);
    }

    const requestId = randomUUID();
    this.acquireRequests.set(channelId, requestId);
    const grant = this.grantWaits.open(channelId, {
      channelId,
      timeoutMs: options.timeoutMs,
      onTimeout: () => {
        this.acquireRequests.delete(channelId);
        this.sendRelease(channelId, randomUUID());
        return new BrokerError('TIMEOUT', `No grant for ${channelId} within ${options.timeoutMs}ms`);
      },
    });

    try {
      await this.transport.publish(Topics.reserveRequest(channelId), {
        requestId,
        clientId: this.clientId,
        ...(options.leaseSeconds !== undefined ? { leaseSeconds: options.leaseSeconds } : {}),
        ...(options.queue !== undefined ? { queue: options.queue } : {}),
      });
    } catch (err) {
      this.grantWaits.reject(channelId, asBrokerError(err, 'TRANSPORT_UNAVAILABLE'));
    }
    try {
      return await grant;
    } finally {
      this.acquireRequests.delete(channelId);
    }
  }

  /**
   * Gives the channel back (or withdraws a queued request). Safe to repeat.
   */
  async release(channelId: string): Promise<ReleaseResult> {
    this.dropHold(channelId);
    const requestId = randomUUID();
    const reply = this.openReplyWait(channelId, requestId);
    this.sendRelease(channelId, requestId);
    const message = await reply;
    if (message.outcome === 'released' || message.outcome === 'withdrawn' || message.outcome === 'not-holder') {
      return message.outcome;
    }
    throw replyError(message, 'BAD_REQUEST');
  }

  /**
   * Extends the lease; resolves with the new deadline.
   */
  async renew(channelId: string): Promise<string> {
    const requestId = randomUUID();
    const reply = this.openReplyWait(channelId, requestId);
    await this.transport.publish(Topics.reserveRenew(channelId), { requestId, clientId: this.clientId });
    const message = await reply;
    if (message.outcome === 'renewed' && message.deadline) {
      const hold = this.holds.get(channelId);
      if (hold) hold.grant = { ...hold.grant, deadline: message.deadline };
      return message.deadline;
    }
    if (message.outcome === 'not-holder') {
      this.dropHold(channelId);
      throw new BrokerError('NOT_HOLDER', message.message ?? `Not holding ${channelId}`);
    }
    throw replyError(message, 'BAD_REQUEST');
  }

  /**
   * Runs a technique on a held channel and waits for its terminal status.
   */
  async submit(channelId: string, parameters: unknown, options: SubmitOptions): Promise<InvocationResult> {
    this.assertBrokerReachable();
    const invocationId = options.invocationId ?? randomUUID();
    if (options.onProgress) {
      this.progressHandlers.set(invocationId, options.onProgress);
    }

    const terminal = this.invokeWaits.open(invocationId, {
      channelId,
      timeoutMs: options.timeoutMs,
      onTimeout: () => {
        void this.cancel(channelId, invocationId).catch((err: unknown) => {
          this.logger.warn({ channelId, invocationId, err: errorMessage(err) }, 'Cancel after timeout failed');
        });
        return new BrokerError('TIMEOUT', `Invocation ${invocationId} did not finish within ${options.timeoutMs}ms`);
      },
    });

    try {
      await this.transport.publish(Topics.invokeRequest(channelId), {
        invocationId,
        clientId: this.clientId,
        parameters,
      });
    } catch (err) {
      this.invokeWaits.reject(invocationId, asBrokerError(err, 'TRANSPORT_UNAVAILABLE'));
    }

    try {
      const status = await terminal;
      return settleInvocation(status);
    } finally {
      this.progressHandlers.delete(invocationId);
    }
  }

  async cancel(channelId: string, invocationId: string): Promise<void> {
    await this.transport.publish(Topics.invokeCancel(channelId), { invocationId, clientId: this.clientId });
  }

  /**
   * Scoped use of a channel: acquire, run `fn`, release on every exit path.
   */
  async withChannel<T>(
    channelId: string,
    options: { leaseSeconds?: number; acquireTimeoutMs: number },
    fn: (session: ChannelSession) => Promise<T>,
  ): Promise<T> {
    const grant = await this.acquire(channelId, {
      timeoutMs: options.acquireTimeoutMs,
      ...(options.leaseSeconds !== undefined ? { leaseSeconds: options.leaseSeconds } : {}),
    });
    const session: ChannelSession = {
      channelId,
      grant,
      submit: (parameters, submitOptions) => this.submit(channelId, parameters, submitOptions),
      renew: () => this.renew(channelId),
    };
    try {
      return await fn(session);
    } finally {
      try {
        await this.release(channelId);
      } catch (err) {
        this.logger.warn({ channelId, err: errorMessage(err) }, 'Release after scoped use failed');
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Inbound
  // ---------------------------------------------------------------------------

  private onPresence(msg: TransportMessage): void {
    const parsed = presenceSchema.safeParse(msg.payload);
    if (!parsed.success) {
      this.logger.warn({ issues: describeIssues(parsed.error) }, 'Malformed presence message');
      return;
    }
    if (parsed.data.state === 'online') {
      this.brokerOnline = true;
      this.armPresenceWatchdog();
    } else {
      this.brokerLost('Broker went offline');
    }
  }

  private onGrant(msg: TransportMessage): void {
    const parsed = reserveGrantSchema.safeParse(msg.payload);
    if (!parsed.success || parsed.data.clientId !== this.clientId) return;
    const message = parsed.data;
    const channelId = message.channelId;
    const grant: Grant = {
      channelId,
      reservationId: message.reservationId,
      leaseSeconds: message.leaseSeconds,
      deadline: message.deadline,
    };

    if (this.grantWaits.has(channelId)) {
      this.startHold(grant);
      this.grantWaits.resolve(channelId, grant);
      return;
    }
    if (this.holds.get(channelId)?.grant.reservationId === message.reservationId) {
      return;
    }
    // Nobody is waiting (the acquire timed out): hand the channel back.
    this.logger.info({ channelId, reservationId: message.reservationId }, 'Releasing unsolicited grant');
    this.sendRelease(channelId, randomUUID());
  }

  private onReply(msg: TransportMessage): void {
    const parsed = reserveReplySchema.safeParse(msg.payload);
    if (!parsed.success || parsed.data.clientId !== this.clientId) return;
    const reply = parsed.data;
    const channelId = reply.channelId;

    if (reply.requestId && this.replyWaits.resolve(reply.requestId, reply)) {
      return;
    }

    switch (reply.outcome) {
      case 'queued':
        this.logger.debug({ channelId, position: reply.position }, 'Waiting in queue');
        return;
      case 'denied':
      case 'error':
        if (reply.requestId && this.acquireRequests.get(channelId) === reply.requestId) {
          this.grantWaits.reject(channelId, replyError(reply, 'BAD_REQUEST'));
        } else if (reply.code === 'BROKER_SHUTDOWN') {
          this.failChannel(channelId, replyError(reply, 'BROKER_SHUTDOWN'));
        }
        return;
      case 'expired':
      case 'revoked':
        this.logger.warn({ channelId, outcome: reply.outcome, code: reply.code }, 'Reservation ended by broker');
        this.failChannel(channelId, replyError(reply, reply.outcome === 'expired' ? 'LEASE_EXPIRED' : 'REVOKED'));
        return;
      default:
        return;
    }
  }

  private onInvokeStatus(msg: TransportMessage): void {
    const parsed = invokeStatusSchema.safeParse(msg.payload);
    if (!parsed.success || parsed.data.clientId !== this.clientId) return;
    const status = parsed.data;

    if (status.status === 'running' && status.progress !== undefined) {
      const handler = this.progressHandlers.get(status.invocationId);
      if (handler) {
        try {
          handler(status.progress);
        } catch (err) {
          this.logger.warn({ invocationId: status.invocationId, err: errorMessage(err) }, 'Progress handler threw');
        }
      }
      return;
    }
    if (status.status === 'pending' || status.status === 'running') return;
    this.invokeWaits.resolve(status.invocationId, status);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private startHold(grant: Grant): void {
    this.dropHold(grant.channelId);
    const periodMs = Math.max(100, (grant.leaseSeconds * 1000) / 3);
    const renewTimer = setInterval(() => {
      void this.renew(grant.channelId).catch((err: unknown) => {
        this.logger.warn({ channelId: grant.channelId, err: errorMessage(err) }, 'Lease renewal failed');
      });
    }, periodMs);
    renewTimer.unref();
    this.holds.set(grant.channelId, { grant, renewTimer });
  }

  private dropHold(channelId: string): void {
    const hold = this.holds.get(channelId);
    if (!hold) return;
    clearInterval(hold.renewTimer);
    this.holds.delete(channelId);
  }

  private openReplyWait(channelId: string, requestId: string): Promise<ReserveReplyMessage> {
    return this.replyWaits.open(requestId, {
      channelId,
      timeoutMs: this.replyTimeoutMs,
      onTimeout: () => new BrokerError('TIMEOUT', `No reply from broker for ${channelId} within ${this.replyTimeoutMs}ms`),
    });
  }

  private sendRelease(channelId: string, requestId: string): void {
    void this.transport
      .publish(Topics.reserveRelease(channelId), { requestId, clientId: this.clientId })
      .catch((err: unknown) => {
        this.replyWaits.reject(requestId, asBrokerError(err, 'TRANSPORT_UNAVAILABLE'));
        this.logger.warn({ channelId, err: errorMessage(err) }, 'Release could not be sent');
      });
  }

  private failChannel(channelId: string, err: BrokerError): void {
    this.dropHold(channelId);
    this.grantWaits.rejectChannel(channelId, err);
    this.invokeWaits.rejectChannel(channelId, err);
  }

  private failAll(err: BrokerError): void {
    for (const channelId of [...this.holds.keys()]) this.dropHold(channelId);
    this.grantWaits.rejectAll(err);
    this.replyWaits.rejectAll(err);
    this.invokeWaits.rejectAll(err);
  }

  private brokerLost(reason: string): void {
    const wasOnline = this.brokerOnline !== false;
    this.brokerOnline = false;
    this.clearPresenceWatchdog();
    if (wasOnline) {
      this.logger.warn({ reason }, 'Broker unavailable');
    }
    this.failAll(new BrokerError('TRANSPORT_UNAVAILABLE', reason));
  }

  private assertBrokerReachable(): void {
    if (this.brokerOnline === false || !this.transport.isConnected()) {
      throw new BrokerError('TRANSPORT_UNAVAILABLE', 'Broker is not reachable');
    }
  }

  private armPresenceWatchdog(): void {
    this.clearPresenceWatchdog();
    this.presenceTimer = setTimeout(() => {
      this.presenceTimer = null;
      this.brokerLost(`No broker presence for ${this.presenceTimeoutMs}ms`);
    }, this.presenceTimeoutMs);
    this.presenceTimer.unref();
  }

  private clearPresenceWatchdog(): void {
    if (this.presenceTimer) {
      clearTimeout(this.presenceTimer);
      this.presenceTimer = null;
    }
  }
}

function settleInvocation(status: InvokeStatusMessage): InvocationResult {
  switch (status.status) {
    case 'succeeded':
      return { invocationId: status.invocationId, result: status.result ?? null };
    case 'failed':
      throw new BrokerError('INVOCATION_FAILED', status.message ?? 'Invocation failed', status.errorCode);
    case 'cancelled':
      if (isReservationEnd(status.errorCode)) {
        throw new BrokerError(status.errorCode, status.message ?? `Reservation on ${status.channelId} ended`);
      }
      throw new BrokerError('INVOCATION_CANCELLED', status.message ?? 'Invocation cancelled', status.errorCode);
    default: {
      const code: BrokerErrorCode = isBrokerErrorCode(status.errorCode) ? status.errorCode : 'BAD_REQUEST';
      throw new BrokerError(code, status.message ?? 'Invocation rejected');
    }
  }
}

const RESERVATION_END_CODES: ReadonlySet<BrokerErrorCode> = new Set<BrokerErrorCode>([
  'LEASE_EXPIRED',
  'REVOKED',
  'BROKER_SHUTDOWN',
]);

/** Cancellation because the reservation was taken away, not because the client asked. */
function isReservationEnd(code: string | undefined): code is BrokerErrorCode {
  return isBrokerErrorCode(code) && RESERVATION_END_CODES.has(code);
}

function replyError(reply: ReserveReplyMessage, fallback: BrokerErrorCode): BrokerError {
  const code = isBrokerErrorCode(reply.code) ? reply.code : fallback;
  return new BrokerError(code, reply.message ?? `Broker replied ${reply.outcome} on ${reply.channelId}`);
}

function asBrokerError(err: unknown, fallback: BrokerErrorCode): BrokerError {
  return err instanceof BrokerError ? err : new BrokerError(fallback, errorMessage(err));
}
