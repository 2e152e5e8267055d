import { silentLogger, type Logger } from '../logging/logger.js';
import {
  abortedError,
  InstrumentError,
  techniquesOf,
  type InstrumentDriver,
  type InstrumentJob,
  type RunContext,
} from './InstrumentDriver.js';

export interface SimulatedInstrumentOptions {
  pointsPerTechnique: number;
  periodMs: number;
  logger?: Logger;
}

/**
 * Stand-in potentiostat. Emits `pointsPerTechnique` data points per
 * technique, `periodMs` apart.
 *
 * A technique object carrying `simulateFailure: "<CODE>"` fails the job with
 * that code once its points have been emitted.
 */
export class SimulatedInstrument implements InstrumentDriver {
  readonly kind = 'simulated';
  private readonly logger: Logger;

  constructor(private readonly options: SimulatedInstrumentOptions) {
    this.logger = options.logger ?? silentLogger();
  }

  async run(job: InstrumentJob, context: RunContext): Promise<unknown> {
    const techniques = techniquesOf(job.parameters);
    let points = 0;

    for (let t = 0; t < techniques.length; t++) {
      const technique = techniques[t];
      for (let i = 0; i < this.options.pointsPerTechnique; i++) {
        await this.wait(this.options.periodMs, context.signal, job);
        points += 1;
        context.onData({ technique: t, point: i, channel: job.instrumentChannel, value: Math.sin(points / 4) });
      }
      const failure = simulatedFailure(technique);
      if (failure) {
        throw new InstrumentError(failure, `Simulated failure in technique ${t}`);
      }
    }

    this.logger.debug({ invocationId: job.invocationId, points }, 'Simulated run finished');
    return { techniques: techniques.length, points };
  }

  private wait(ms: number, signal: AbortSignal, job: InstrumentJob): Promise<void> {
    if (signal.aborted) {
      return Promise.reject(abortedError(job));
    }
    return new Promise((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        reject(abortedError(job));
      };
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}

function simulatedFailure(technique: unknown): string | undefined {
  if (technique === null || typeof technique !== 'object') return undefined;
  const code: unknown = Reflect.get(technique, 'simulateFailure');
  return typeof code === 'string' && code.length > 0 ? code : undefined;
}
