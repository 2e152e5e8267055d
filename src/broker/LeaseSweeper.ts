import { errorMessage, silentLogger, type Logger } from '../logging/logger.js';
import type { ReservationManager, SweepSummary } from './ReservationManager.js';

export interface LeaseSweeperStatus {
  running: boolean;
  intervalMs: number;
  lastRunAt?: string;
  lastRunSummary?: { scanned: number; expired: number } | { error: string; errorStreak: number };
  errorStreak: number;
  lastError?: string;
  inFlight: boolean;
  totalExpired: number;
}

/**
 * Periodic lease expiry. One sweep at a time; a tick that finds the
 * previous sweep still running is skipped.
 */
export class LeaseSweeper {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<SweepSummary> | null = null;
  private lastRunAt: string | undefined;
  private lastRunSummary: LeaseSweeperStatus['lastRunSummary'];
  private errorStreak = 0;
  private lastError: string | undefined;
  private totalExpired = 0;
  private readonly logger: Logger;

  constructor(
    private readonly manager: ReservationManager,
    private intervalMs: number,
    logger?: Logger,
  ) {
    this.logger = logger ?? silentLogger();
  }

  async sweepOnce(): Promise<SweepSummary | null> {
    if (this.inFlight) {
      return null;
    }
    const task = this.manager.sweepOnce();
    this.inFlight = task;
    try {
      const summary = await task;
      this.lastRunAt = summary.timestamp;
      this.lastRunSummary = { scanned: summary.scanned, expired: summary.expired.length };
      this.totalExpired += summary.expired.length;
      this.errorStreak = 0;
      this.lastError = undefined;
      return summary;
    } finally {
      this.inFlight = null;
    }
  }

  start(intervalMs: number = this.intervalMs): LeaseSweeperStatus {
    if (this.timer) {
      return this.status();
    }
    this.intervalMs = intervalMs;
    this.timer = setInterval(() => {
      void this.sweepOnce().catch((err: unknown) => {
        this.errorStreak += 1;
        this.lastError = errorMessage(err);
        this.lastRunSummary = { error: this.lastError, errorStreak: this.errorStreak };
        this.logger.error({ err: this.lastError, errorStreak: this.errorStreak }, 'Lease sweep failed');
      });
    }, this.intervalMs);
    this.timer.unref();
    this.logger.info({ intervalMs: this.intervalMs }, 'Lease sweeper started');
    return this.status();
  }

  stop(): LeaseSweeperStatus {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info('Lease sweeper stopped');
    }
    return this.status();
  }

  status(): LeaseSweeperStatus {
    return {
      running: this.timer !== null,
      intervalMs: this.intervalMs,
      ...(this.lastRunAt ? { lastRunAt: this.lastRunAt } : {}),
      ...(this.lastRunSummary ? { lastRunSummary: this.lastRunSummary } : {}),
      errorStreak: this.errorStreak,
      ...(this.lastError ? { lastError: this.lastError } : {}),
      inFlight: this.inFlight !== null,
      totalExpired: this.totalExpired,
    };
  }
}
