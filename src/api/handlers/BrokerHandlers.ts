/**
 * BrokerHandlers: HTTP handlers for the ops view of the broker.
 *
 * Channel and invocation views are read-only; the revoke action ends a
 * reservation through the ReservationManager like any other implicit
 * release.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { snapshotChannel } from '../../broker/ChannelRegistry.js';
import { BrokerError } from '../../broker/errors.js';
import type { InvocationStatus } from '../../broker/TechniqueDispatcher.js';
import type { AppContext } from '../../server.js';
import {
  INVOCATION_STATUSES,
  type ApiError,
  type ChannelListResponse,
  type ChannelResponse,
  type DeviceListResponse,
  type InvocationListResponse,
  type InvocationResponse,
  type ListInvocationsQuery,
  type RevokeRequest,
  type RevokeResponse,
  type SweeperResponse,
} from '../types.js';

function toApiError(err: unknown, reply: FastifyReply): ApiError {
  if (err instanceof BrokerError) {
    reply.status(err.statusCode);
    return { error: err.code, message: err.message };
  }
  reply.status(500);
  return {
    error: 'INTERNAL_ERROR',
    message: err instanceof Error ? err.message : String(err),
  };
}

function isInvocationStatus(value: string): value is InvocationStatus {
  return INVOCATION_STATUSES.some((status) => status === value);
}

export function createBrokerHandlers(ctx: AppContext) {
  return {
    /**
     * GET /channels
     */
    async listChannels(): Promise<ChannelListResponse> {
      const channels = ctx.registry.list().map(snapshotChannel);
      return { channels, total: channels.length };
    },

    /**
     * GET /channels/:id
     */
    async getChannel(
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ): Promise<ChannelResponse | ApiError> {
      const channel = ctx.registry.lookup(request.params.id);
      if (!channel) {
        reply.status(404);
        return { error: 'CHANNEL_NOT_FOUND', message: `Unknown channel: ${request.params.id}` };
      }
      return { channel: snapshotChannel(channel) };
    },

    /**
     * POST /channels/:id/revoke
     * Ends the current reservation; the next queued client is granted.
     */
    async revokeChannel(
      request: FastifyRequest<{ Params: { id: string }; Body: RevokeRequest | undefined }>,
      reply: FastifyReply,
    ): Promise<RevokeResponse | ApiError> {
      try {
        const body = request.body;
        if (body !== undefined && body !== null && body.reason !== undefined && typeof body.reason !== 'string') {
          throw new BrokerError('BAD_REQUEST', 'reason must be a string');
        }
        const reason = body?.reason ?? 'Revoked by operator';
        const revoked = await ctx.manager.revoke(request.params.id, reason);
        const channel = ctx.registry.lookup(request.params.id);
        if (!channel) {
          throw new BrokerError('CHANNEL_NOT_FOUND', `Unknown channel: ${request.params.id}`);
        }
        return {
          revoked: revoked !== null,
          ...(revoked ? { clientId: revoked.clientId, reservationId: revoked.reservationId } : {}),
          channel: snapshotChannel(channel),
        };
      } catch (err) {
        return toApiError(err, reply);
      }
    },

    /**
     * GET /invocations
     */
    async listInvocations(
      request: FastifyRequest<{ Querystring: ListInvocationsQuery }>,
      reply: FastifyReply,
    ): Promise<InvocationListResponse | ApiError> {
      const { channelId, status } = request.query;
      if (status !== undefined && !isInvocationStatus(status)) {
        reply.status(400);
        return { error: 'BAD_REQUEST', message: `Unknown status filter: ${status}` };
      }
      const invocations = ctx.dispatcher.list({
        ...(channelId ? { channelId } : {}),
        ...(status ? { status } : {}),
      });
      return { invocations, total: invocations.length };
    },

    /**
     * GET /invocations/:id
     */
    async getInvocation(
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ): Promise<InvocationResponse | ApiError> {
      const invocation = ctx.dispatcher.get(request.params.id);
      if (!invocation) {
        reply.status(404);
        return { error: 'INVOCATION_NOT_FOUND', message: `Unknown invocation: ${request.params.id}` };
      }
      return { invocation };
    },

    /**
     * GET /devices
     */
    async listDevices(): Promise<DeviceListResponse> {
      const devices = ctx.devices.list();
      return { devices, total: devices.length };
    },

    /**
     * GET /sweeper
     */
    async getSweeper(): Promise<SweeperResponse> {
      return { sweeper: ctx.sweeper.status() };
    },
  };
}

export type BrokerHandlers = ReturnType<typeof createBrokerHandlers>;
