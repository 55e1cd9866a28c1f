/**
 * Periodic refresh: every `DATA_REFRESH_INTERVAL_MS` fetch the current
 * generation window and hand it to the configured sink.
 *
 * A failed cycle is logged, counted and reflected in the status; the next
 * cycle is still scheduled.
 */

import { DATA_REFRESH_INTERVAL_MS } from '../config.js';
import logger, { errorMessage, type Logger } from '../logger.js';
import { lastSuccessfulRefreshGauge, refreshCyclesTotal } from '../metrics.js';
import type { GenerationRecord } from './generationParser.js';
import type { GenerationSink } from './generationSink.js';

export type RefreshCycleStatus = 'never' | 'success' | 'failed';

export interface RefreshStatus {
  running: boolean;
  lastStatus: RefreshCycleStatus;
  lastStartedAt: string | null;
  lastSuccessAt: string | null;
  lastError: string | null;
  lastRows: number;
  cycles: number;
  consecutiveFailures: number;
}

type TimerHandle = ReturnType<typeof setTimeout>;

export interface RefreshSchedulerOptions {
  fetchCurrent: () => Promise<GenerationRecord[]>;
  sink: GenerationSink;
  intervalMs?: number;
  logger?: Logger;
  _deps?: {
    now?: () => Date;
    setTimer?: (fn: () => void, ms: number) => TimerHandle;
    clearTimer?: (handle: TimerHandle) => void;
  };
}

export class GenerationRefreshScheduler {
  private readonly fetchCurrent: () => Promise<GenerationRecord[]>;
  private readonly sink: GenerationSink;
  private readonly intervalMs: number;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly setTimer: (fn: () => void, ms: number) => TimerHandle;
  private readonly clearTimer: (handle: TimerHandle) => void;
  private timer: TimerHandle | null = null;
  private started = false;
  // Bumped on every start/stop; a tick only re-arms while its generation is current.
  private generation = 0;
  private inFlight: Promise<RefreshStatus> | null = null;
  private status: RefreshStatus = {
    running: false,
    lastStatus: 'never',
    lastStartedAt: null,
    lastSuccessAt: null,
    lastError: null,
    lastRows: 0,
    cycles: 0,
    consecutiveFailures: 0,
  };

  constructor(options: RefreshSchedulerOptions) {
    this.fetchCurrent = options.fetchCurrent;
    this.sink = options.sink;
    this.intervalMs = Math.max(1, Number(options.intervalMs) || DATA_REFRESH_INTERVAL_MS);
    this.log = options.logger ?? logger.child({ module: 'scheduler' });
    this.now = options._deps?.now ?? (() => new Date());
    this.setTimer = options._deps?.setTimer ?? ((fn, ms) => setTimeout(fn, ms));
    this.clearTimer = options._deps?.clearTimer ?? ((handle) => clearTimeout(handle));
  }

  getStatus(): RefreshStatus {
    return { ...this.status };
  }

  isStarted(): boolean {
    return this.started;
  }

  /** One fetch → sink cycle. Overlapping calls share the in-flight cycle. */
  runCycle(): Promise<RefreshStatus> {
    if (!this.inFlight) {
      this.inFlight = this.executeCycle().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /** Runs a cycle now, then one every interval after the previous finishes. */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.generation += 1;
    this.log.info({ intervalMs: this.intervalMs }, 'Refresh scheduler started');
    void this.tick(this.generation);
  }

  stop(): void {
    this.started = false;
    this.generation += 1;
    if (this.timer) {
      this.clearTimer(this.timer);
      this.timer = null;
    }
    this.log.info('Refresh scheduler stopped');
  }

  private async tick(generation: number): Promise<void> {
    this.timer = null;
    await this.runCycle();
    if (!this.started || generation !== this.generation) return;
    this.timer = this.setTimer(() => {
      void this.tick(generation);
    }, this.intervalMs);
  }

  private async executeCycle(): Promise<RefreshStatus> {
    const startedAt = this.now();
    this.status = { ...this.status, running: true, lastStartedAt: startedAt.toISOString() };
    try {
      const records = await this.fetchCurrent();
      const result = await this.sink.write(records);
      const finishedAt = this.now();
      this.status = {
        ...this.status,
        running: false,
        lastStatus: 'success',
        lastSuccessAt: finishedAt.toISOString(),
        lastError: null,
        lastRows: result.rows,
        cycles: this.status.cycles + 1,
        consecutiveFailures: 0,
      };
      refreshCyclesTotal.inc({ status: 'success' });
      lastSuccessfulRefreshGauge.set(Math.floor(finishedAt.getTime() / 1000));
      this.log.info({ rows: result.rows, sink: result.sink, location: result.location }, 'Refresh cycle completed');
    } catch (err: unknown) {
      this.status = {
        ...this.status,
        running: false,
        lastStatus: 'failed',
        lastError: errorMessage(err),
        lastRows: 0,
        cycles: this.status.cycles + 1,
        consecutiveFailures: this.status.consecutiveFailures + 1,
      };
      refreshCyclesTotal.inc({ status: 'failed' });
      this.log.error(
        { err, consecutiveFailures: this.status.consecutiveFailures },
        `Refresh cycle failed: ${errorMessage(err)}`,
      );
    }
    return this.getStatus();
  }
}
