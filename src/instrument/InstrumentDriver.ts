/**
 * Instrument driver contract. A job is one technique invocation (possibly a
 * list of techniques run back-to-back) on one instrument channel.
 */

export interface InstrumentJob {
  invocationId: string;
  channelId: string;
  /** 1-based channel number on the instrument */
  instrumentChannel: number;
  usbPort: string;
  /** Opaque technique parameters as submitted by the client */
  parameters: unknown;
}

export interface RunContext {
  /** Aborted on explicit cancel or when the reservation ends mid-run. */
  signal: AbortSignal;
  /** Streams one chunk of measurement data back to the submitter. */
  onData: (chunk: unknown) => void;
}

export interface InstrumentDriver {
  readonly kind: string;
  run(job: InstrumentJob, context: RunContext): Promise<unknown>;
}

/**
 * Opaque failure from the instrument. `ABORTED` is reserved for runs ended
 * through the abort signal.
 */
export class InstrumentError extends Error {
  constructor(
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'InstrumentError';
  }
}

export const ABORTED = 'ABORTED';

export function abortedError(job: InstrumentJob): InstrumentError {
  return new InstrumentError(ABORTED, `Run ${job.invocationId} on ${job.channelId} was aborted`);
}

/**
 * Techniques in a job: `parameters.techniques` when it is a list, otherwise
 * the parameters as a single technique.
 */
export function techniquesOf(parameters: unknown): unknown[] {
  if (parameters !== null && typeof parameters === 'object' && !Array.isArray(parameters)) {
    const techniques: unknown = Reflect.get(parameters, 'techniques');
    if (Array.isArray(techniques)) {
      return techniques;
    }
  }
  return [parameters];
}
