import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import { errorMessage, silentLogger, type Logger } from '../logging/logger.js';
import { encodeBridgeJob, parseBridgeLine } from './BridgeContract.js';
import { classifyBridgeFailure } from './FailureClassifier.js';
import {
  abortedError,
  InstrumentError,
  type InstrumentDriver,
  type InstrumentJob,
  type RunContext,
} from './InstrumentDriver.js';

export type SidecarInstrumentOptions = {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
  timeoutMs?: number;
  /** Wait after SIGTERM before the bridge is killed outright (default: 5000) */
  killGraceMs?: number;
  logger?: Logger;
};

const STDERR_LIMIT = 8_192;

/**
 * Runs each job in a fresh bridge process that owns the vendor SDK. The
 * job goes to stdin; data, done and error lines come back on stdout.
 *
 * A run settles only once its bridge has exited, aborted or not, so the
 * next job never shares the instrument port with a dying bridge.
 */
export class SidecarInstrument implements InstrumentDriver {
  readonly kind = 'sidecar';
  private readonly logger: Logger;

  constructor(private readonly options: SidecarInstrumentOptions) {
    this.logger = options.logger ?? silentLogger();
  }

  run(job: InstrumentJob, context: RunContext): Promise<unknown> {
    if (context.signal.aborted) {
      return Promise.reject(abortedError(job));
    }

    return new Promise((resolve, reject) => {
      const child = spawn(this.options.command, this.options.args ?? [], {
        env: { ...process.env, ...(this.options.env ?? {}) },
        cwd: this.options.cwd,
      });

      let stderr = '';
      let settled = false;
      let timedOut = false;
      let aborted = false;
      let killTimer: NodeJS.Timeout | null = null;
      let outcome: { ok: true; result: unknown } | { ok: false; error: InstrumentError } | null = null;

      const finish = (fn: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        if (killTimer) clearTimeout(killTimer);
        context.signal.removeEventListener('abort', onAbort);
        fn();
      };

      const terminate = () => {
        if (killTimer) return;
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          this.logger.warn({ invocationId: job.invocationId, pid: child.pid }, 'Bridge ignored SIGTERM, killing');
          child.kill('SIGKILL');
        }, this.options.killGraceMs ?? 5_000);
      };

      const onAbort = () => {
        this.logger.info({ invocationId: job.invocationId, pid: child.pid }, 'Aborting bridge process');
        aborted = true;
        terminate();
      };
      context.signal.addEventListener('abort', onAbort, { once: true });

      const timeout = setTimeout(() => {
        timedOut = true;
        terminate();
      }, this.options.timeoutMs ?? 2 * 60 * 60 * 1000);

      const lines = createInterface({ input: child.stdout });
      lines.on('line', (text) => {
        if (text.trim().length === 0) return;
        const parsed = parseBridgeLine(text);
        if (!parsed.ok) {
          this.logger.warn({ invocationId: job.invocationId, error: parsed.error }, 'Ignoring bridge output line');
          return;
        }
        const line = parsed.line;
        if (line.type === 'data') {
          if (!settled && !aborted) context.onData(line.payload);
        } else if (line.type === 'done') {
          outcome = { ok: true, result: line.result ?? null };
        } else {
          outcome = { ok: false, error: new InstrumentError(line.code ?? 'INSTRUMENT_ERROR', line.error) };
        }
      });

      child.stderr.on('data', (chunk: Buffer) => {
        if (stderr.length < STDERR_LIMIT) {
          stderr += chunk.toString();
        }
      });

      child.on('error', (err) => {
        finish(() => reject(new InstrumentError('BRIDGE_SPAWN_FAILED', `Cannot start bridge: ${err.message}`)));
      });

      child.on('close', (exitCode, signal) => {
        finish(() => {
          const reported = outcome;
          if (!timedOut && reported?.ok === true) {
            resolve(reported.result);
            return;
          }
          if (!timedOut && reported?.ok === false) {
            reject(reported.error);
            return;
          }
          if (aborted && !timedOut) {
            reject(abortedError(job));
            return;
          }
          const classified = classifyBridgeFailure({ exitCode, signal, timedOut, stderr });
          this.logger.warn(
            {
              invocationId: job.invocationId,
              exitCode,
              signal,
              failureClass: classified.failureClass,
              retryRecommended: classified.retryRecommended,
            },
            'Bridge exited without a result',
          );
          reject(new InstrumentError(classified.failureCode, stderr.trim() || classified.reason));
        });
      });

      child.stdin.on('error', (err) => {
        this.logger.warn({ invocationId: job.invocationId, err: errorMessage(err) }, 'Bridge stdin closed early');
      });
      child.stdin.end(encodeBridgeJob(job));
    });
  }
}
