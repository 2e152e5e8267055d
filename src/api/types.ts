/**
 * Types for the ops HTTP API.
 *
 * Read-only views over broker state plus the operator revoke action.
 */

import type { ChannelSnapshot } from '../broker/ChannelRegistry.js';
import type { LeaseSweeperStatus } from '../broker/LeaseSweeper.js';
import type { Invocation, InvocationStatus } from '../broker/TechniqueDispatcher.js';
import type { DeviceState } from '../devices/DeviceStateStore.js';

// ============================================================================
// Error Response
// ============================================================================

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error code, e.g. CHANNEL_NOT_FOUND */
  error: string;
  /** Human-readable message */
  message: string;
  details?: unknown;
}

// ============================================================================
// Channels
// ============================================================================

export interface ChannelListResponse {
  channels: ChannelSnapshot[];
  total: number;
}

export interface ChannelResponse {
  channel: ChannelSnapshot;
}

export interface RevokeRequest {
  reason?: string;
}

export interface RevokeResponse {
  revoked: boolean;
  clientId?: string;
  reservationId?: string;
  channel: ChannelSnapshot;
}

// ============================================================================
// Invocations
// ============================================================================

export interface ListInvocationsQuery {
  channelId?: string;
  status?: string;
}

export interface InvocationListResponse {
  invocations: Invocation[];
  total: number;
}

export interface InvocationResponse {
  invocation: Invocation;
}

export const INVOCATION_STATUSES: readonly InvocationStatus[] = ['pending', 'running', 'succeeded', 'failed', 'cancelled'];

// ============================================================================
// Devices and workers
// ============================================================================

export interface DeviceListResponse {
  devices: DeviceState[];
  total: number;
}

export interface SweeperResponse {
  sweeper: LeaseSweeperStatus;
}

// ============================================================================
// Health Check
// ============================================================================

/**
 * Health check response.
 */
export interface HealthResponse {
  /** 'degraded' while the transport is disconnected */
  status: 'ok' | 'degraded';
  timestamp: string;
  components: {
    transport: { kind: string; connected: boolean };
    channels: { total: number; free: number; reserved: number; running: number };
    invocations: { running: number };
    sweeper: { running: boolean; errorStreak: number };
  };
}
