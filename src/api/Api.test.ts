/**
 * E2E tests for the ops HTTP API.
 */

import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { resolveConfig } from '../config/loader.js';
import { ManualClock } from '../core/clock.js';
import { silentLogger } from '../logging/logger.js';
import { createServer, initializeApp, shutdownBroker, startBroker } from '../server.js';
import type { AppContext } from '../server.js';
import { InMemoryBus, InMemoryTransport } from '../transport/InMemoryTransport.js';
import { Topics } from '../transport/topics.js';

describe('API E2E Tests', () => {
  let app: FastifyInstance;
  let ctx: AppContext;
  let bus: InMemoryBus;

  beforeAll(async () => {
    bus = new InMemoryBus();
    const config = resolveConfig({
      broker: { transport: 'memory' },
      channels: ['chan-1', { id: 'chan-2', usbPort: 'USB1' }],
      instrument: { simulated: { pointsPerTechnique: 1, periodMs: 0 } },
      logLevel: 'silent',
    });
    ctx = initializeApp(config, { bus, clock: new ManualClock(), logger: silentLogger() });
    await startBroker(ctx);

    app = await createServer(ctx);
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    await shutdownBroker(ctx);
  });

  describe('Health Check', () => {
    it('should return health status', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/health',
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.payload);
      expect(body).toEqual({
        status: 'ok',
        timestamp: '2025-01-01T00:00:00.000Z',
        components: {
          transport: { kind: 'memory', connected: true },
          channels: { total: 2, free: 2, reserved: 0, running: 0 },
          invocations: { running: 0 },
          sweeper: { running: true, errorStreak: 0 },
        },
      });
    });
  });

  describe('Channel Routes', () => {
    it('should list configured channels', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/channels' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.payload);
      expect(body.total).toBe(2);
      expect(body.channels).toEqual([
        { id: 'chan-1', usbPort: 'USB0', instrumentChannel: 1, state: 'free', queue: [] },
        { id: 'chan-2', usbPort: 'USB1', instrumentChannel: 2, state: 'free', queue: [] },
      ]);
    });

    it('should return 404 for an unknown channel', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/channels/chan-9' });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.payload)).toEqual({
        error: 'CHANNEL_NOT_FOUND',
        message: 'Unknown channel: chan-9',
      });
    });

    it('should show the holder and queue of a reserved channel', async () => {
      await ctx.manager.requestReservation('chan-1', 'wf-a');
      await ctx.manager.requestReservation('chan-1', 'wf-b');

      const response = await app.inject({ method: 'GET', url: '/api/channels/chan-1' });

      expect(response.statusCode).toBe(200);
      const { channel } = JSON.parse(response.payload);
      expect(channel).toMatchObject({
        id: 'chan-1',
        state: 'reserved',
        holder: 'wf-a',
        grantedAt: '2025-01-01T00:00:00.000Z',
        expiresAt: '2025-01-01T00:02:00.000Z',
        renewals: 0,
        queue: [{ clientId: 'wf-b', position: 1, queuedAt: '2025-01-01T00:00:00.000Z' }],
      });
    });

    it('should revoke the holder and promote the next client', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/channels/chan-1/revoke',
        payload: { reason: 'maintenance' },
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.payload);
      expect(body.revoked).toBe(true);
      expect(body.clientId).toBe('wf-a');
      expect(body.channel.holder).toBe('wf-b');
      expect(body.channel.queue).toEqual([]);
    });

    it('should report nothing to revoke on a free channel', async () => {
      const response = await app.inject({ method: 'POST', url: '/api/channels/chan-2/revoke' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.payload);
      expect(body.revoked).toBe(false);
      expect(body.clientId).toBeUndefined();
    });

    it('should reject a non-string reason', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/channels/chan-1/revoke',
        payload: { reason: 5 },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.payload)).toEqual({ error: 'BAD_REQUEST', message: 'reason must be a string' });
    });

    it('should return 404 when revoking an unknown channel', async () => {
      const response = await app.inject({ method: 'POST', url: '/api/channels/chan-9/revoke', payload: {} });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.payload).error).toBe('CHANNEL_NOT_FOUND');
    });
  });

  describe('Invocation Routes', () => {
    it('should list and fetch invocations', async () => {
      ctx.dispatcher.submit('chan-1', 'wf-b', 'inv-api-1', { name: 'OCV' });
      await ctx.dispatcher.whenSettled('inv-api-1');

      const list = await app.inject({ method: 'GET', url: '/api/invocations?status=succeeded&channelId=chan-1' });
      expect(list.statusCode).toBe(200);
      const body = JSON.parse(list.payload);
      expect(body.total).toBe(1);
      expect(body.invocations[0]).toMatchObject({
        invocationId: 'inv-api-1',
        channelId: 'chan-1',
        clientId: 'wf-b',
        status: 'succeeded',
        result: { techniques: 1, points: 1 },
        progressCount: 1,
      });

      const single = await app.inject({ method: 'GET', url: '/api/invocations/inv-api-1' });
      expect(single.statusCode).toBe(200);
      expect(JSON.parse(single.payload).invocation.status).toBe('succeeded');
    });

    it('should reject an unknown status filter', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/invocations?status=done' });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.payload)).toEqual({ error: 'BAD_REQUEST', message: 'Unknown status filter: done' });
    });

    it('should return 404 for an unknown invocation', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/invocations/inv-missing' });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.payload).error).toBe('INVOCATION_NOT_FOUND');
    });
  });

  describe('Device and Sweeper Routes', () => {
    it('should list device states', async () => {
      const device = new InMemoryTransport(bus, { clientId: 'pump' });
      await device.connect();
      await device.publish(Topics.deviceState('pump'), { online: true, rate: 1, updatedAt: '2025-01-01T00:00:00.000Z' }, { retain: true });
      await bus.flush();

      const response = await app.inject({ method: 'GET', url: '/api/devices' });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.payload)).toEqual({
        devices: [{ name: 'pump', online: true, fields: { rate: 1 }, updatedAt: '2025-01-01T00:00:00.000Z' }],
        total: 1,
      });
      await device.disconnect();
    });

    it('should report sweeper status', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/sweeper' });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.payload).sweeper).toMatchObject({ running: true, intervalMs: 5000, errorStreak: 0 });
    });
  });
});
