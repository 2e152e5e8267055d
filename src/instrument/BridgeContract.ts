/**
 * Line protocol spoken by the instrument bridge process.
 *
 * The job is written to stdin as one JSON line:
 *   { "invocationId", "usb_port", "channel", "techniques": [...] }
 * and the bridge answers on stdout with newline-delimited JSON:
 *   { "type": "data", "channel", "payload" }   zero or more
 *   { "type": "done", "channel", "result"? }   success
 *   { "type": "error", "error", "code"? }      failure
 */

import { z } from 'zod';
import type { InstrumentJob } from './InstrumentDriver.js';
import { techniquesOf } from './InstrumentDriver.js';

const dataLineSchema = z.object({
  type: z.literal('data'),
  channel: z.number().int().optional(),
  payload: z.unknown(),
});

const doneLineSchema = z.object({
  type: z.literal('done'),
  channel: z.number().int().optional(),
  result: z.unknown().optional(),
});

const errorLineSchema = z.object({
  type: z.literal('error'),
  error: z.string(),
  code: z.string().min(1).optional(),
  traceback: z.string().optional(),
});

const bridgeLineSchema = z.discriminatedUnion('type', [dataLineSchema, doneLineSchema, errorLineSchema]);

export type BridgeLine = z.infer<typeof bridgeLineSchema>;

export type ParsedBridgeLine =
  | { ok: true; line: BridgeLine }
  | { ok: false; error: string };

export function parseBridgeLine(text: string): ParsedBridgeLine {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return { ok: false, error: 'not JSON' };
  }
  const parsed = bridgeLineSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((issue) => issue.message).join('; ') };
  }
  return { ok: true, line: parsed.data };
}

export function encodeBridgeJob(job: InstrumentJob): string {
  return `${JSON.stringify({
    invocationId: job.invocationId,
    usb_port: job.usbPort,
    channel: job.instrumentChannel,
    techniques: techniquesOf(job.parameters),
  })}\n`;
}
