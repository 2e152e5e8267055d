/**
 * Wire payloads exchanged over the transport. Every inbound message is
 * parsed with these schemas before it reaches broker or client state.
 */

import { z } from 'zod';

const id = z.string().min(1).max(200);

// ---------------------------------------------------------------------------
// Presence
// ---------------------------------------------------------------------------

export const presenceSchema = z.object({
  processId: z.number().int(),
  hostname: z.string(),
  state: z.enum(['online', 'offline']),
  timestamp: z.string(),
  channels: z.array(z.string()).optional(),
});
export type PresenceMessage = z.infer<typeof presenceSchema>;

export const clientStatusSchema = z.object({
  clientId: id,
  state: z.enum(['online', 'offline']),
});
export type ClientStatusMessage = z.infer<typeof clientStatusSchema>;

// ---------------------------------------------------------------------------
// Reservations
// ---------------------------------------------------------------------------

export const reserveRequestSchema = z.object({
  requestId: id,
  clientId: id,
  leaseSeconds: z.number().positive().optional(),
  queue: z.boolean().optional(),
});
export type ReserveRequestMessage = z.infer<typeof reserveRequestSchema>;

export const reserveRenewSchema = z.object({
  requestId: id,
  clientId: id,
});
export type ReserveRenewMessage = z.infer<typeof reserveRenewSchema>;

export const reserveReleaseSchema = z.object({
  requestId: id.optional(),
  clientId: id,
});
export type ReserveReleaseMessage = z.infer<typeof reserveReleaseSchema>;

export const reserveGrantSchema = z.object({
  channelId: id,
  clientId: id,
  reservationId: id,
  requestId: id.optional(),
  grantedAt: z.string(),
  deadline: z.string(),
  leaseSeconds: z.number(),
});
export type ReserveGrantMessage = z.infer<typeof reserveGrantSchema>;

export const REPLY_OUTCOMES = [
  'queued',
  'renewed',
  'released',
  'withdrawn',
  'not-holder',
  'expired',
  'revoked',
  'denied',
  'error',
] as const;
export type ReplyOutcome = (typeof REPLY_OUTCOMES)[number];

export const reserveReplySchema = z.object({
  channelId: id,
  clientId: id,
  requestId: id.optional(),
  outcome: z.enum(REPLY_OUTCOMES),
  position: z.number().int().positive().optional(),
  deadline: z.string().optional(),
  code: z.string().optional(),
  message: z.string().optional(),
});
export type ReserveReplyMessage = z.infer<typeof reserveReplySchema>;

// ---------------------------------------------------------------------------
// Invocations
// ---------------------------------------------------------------------------

export const invokeRequestSchema = z.object({
  invocationId: id,
  clientId: id,
  parameters: z.unknown(),
});
export type InvokeRequestMessage = z.infer<typeof invokeRequestSchema>;

export const invokeCancelSchema = z.object({
  invocationId: id,
  clientId: id,
});
export type InvokeCancelMessage = z.infer<typeof invokeCancelSchema>;

export const INVOKE_STATUSES = ['pending', 'running', 'succeeded', 'failed', 'cancelled', 'rejected'] as const;
export type InvokeStatusValue = (typeof INVOKE_STATUSES)[number];

export const invokeStatusSchema = z.object({
  invocationId: id,
  channelId: id,
  clientId: id,
  status: z.enum(INVOKE_STATUSES),
  progress: z.unknown().optional(),
  result: z.unknown().optional(),
  errorCode: z.string().optional(),
  message: z.string().optional(),
  timestamp: z.string(),
});
export type InvokeStatusMessage = z.infer<typeof invokeStatusSchema>;

// ---------------------------------------------------------------------------
// Auxiliary devices
// ---------------------------------------------------------------------------

export const deviceStateSchema = z
  .object({
    online: z.boolean(),
    updatedAt: z.string().optional(),
  })
  .passthrough();
export type DeviceStateMessage = z.infer<typeof deviceStateSchema>;

export const deviceCommandSchema = z.object({
  requestId: id,
  command: z.string().min(1),
  args: z.record(z.unknown()).optional(),
});
export type DeviceCommandMessage = z.infer<typeof deviceCommandSchema>;

export const deviceReplySchema = z.object({
  requestId: id,
  ok: z.boolean(),
  result: z.unknown().optional(),
  error: z.string().optional(),
});
export type DeviceReplyMessage = z.infer<typeof deviceReplySchema>;

/**
 * Best-effort extraction of the sender from a payload that failed schema
 * validation, so the rejection can be addressed.
 */
export function senderOf(payload: unknown): string | undefined {
  if (payload === null || typeof payload !== 'object') return undefined;
  const clientId: unknown = Reflect.get(payload, 'clientId');
  return typeof clientId === 'string' && clientId.length > 0 ? clientId : undefined;
}

export function requestIdOf(payload: unknown): string | undefined {
  if (payload === null || typeof payload !== 'object') return undefined;
  const requestId: unknown = Reflect.get(payload, 'requestId');
  return typeof requestId === 'string' && requestId.length > 0 ? requestId : undefined;
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
