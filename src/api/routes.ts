/**
 * Route configuration for the ops API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers over the broker components.
 */

import type { FastifyInstance } from 'fastify';
import type { BrokerHandlers } from './handlers/BrokerHandlers.js';
import type { HealthResponse } from './types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  brokerHandlers: BrokerHandlers;
  health: () => HealthResponse;
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(fastify: FastifyInstance, options: RouteOptions): void {
  const { brokerHandlers, health } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => health());

  // ============================================================================
  // Channel Routes
  // ============================================================================

  fastify.get('/channels', brokerHandlers.listChannels);
  fastify.get('/channels/:id', brokerHandlers.getChannel);
  fastify.post('/channels/:id/revoke', brokerHandlers.revokeChannel);

  // ============================================================================
  // Invocation Routes
  // ============================================================================

  fastify.get('/invocations', brokerHandlers.listInvocations);
  fastify.get('/invocations/:id', brokerHandlers.getInvocation);

  // ============================================================================
  // Devices and Workers
  // ============================================================================

  fastify.get('/devices', brokerHandlers.listDevices);
  fastify.get('/sweeper', brokerHandlers.getSweeper);
}
