/**
 * Collector
 * Layer: collector
 *
 * Provided ports:
 *   - collector.start
 *   - collector.stop
 *   - collector.read (availableData, getData, getAllData)
 *
 * Polls one device on a fixed interval in a background task and buffers
 * each raw status record in a FIFO for consumers to drain.
 */

import type {
  CollectorEntry,
  CollectorStats,
  FailurePolicy,
  Fetcher,
  LifecycleState,
} from './types';
import { FETCH_TIMEOUT_MS, MAX_TIMER_DELAY_MS } from './types';
import { CollectorStateError, CycleFailure } from './errors';
import {
  isBelowRecommendedInterval,
  readConfigFromEnv,
  validateConfig,
  validatePositiveInteger,
} from './config';
import { createDeviceFetcher } from './device';
import { defaultLogger, emitEvent, logSafely } from './log';
import type { CollectorEvent, EventHook, Logger } from './log';
import { errorMessage } from './utils';
import { EntryQueue } from './collector/queue';
import { runCollectorLoop } from './collector/loop';
import type { CycleOutcome } from './collector/perform-cycle';

export interface CollectorOptions {
  /** Device access; defaults to the HTTP device client */
  fetcher?: Fetcher;
  /** Timeout for the default device client (ignored with a custom fetcher) */
  fetchTimeoutMs?: number;
  logger?: Logger;
  /** Observer for every collector event */
  onEvent?: EventHook;
  /** 'skip' leaves a gap for a failed cycle, 'enqueue' queues a CycleFailure */
  failurePolicy?: FailurePolicy;
  /** Stop by itself after this many cycles */
  maxCycles?: number;
}

export class Collector {
  readonly host: string;
  readonly intervalSeconds: number;

  private readonly fetcher: Fetcher;
  private readonly logger: Logger;
  private readonly onEvent: EventHook | undefined;
  private readonly failurePolicy: FailurePolicy;
  private readonly maxCycles: number | null;

  private readonly queue = new EntryQueue<CollectorEntry>();
  private readonly stopController = new AbortController();
  private lifecycle: LifecycleState = 'idle';
  private loopTask: Promise<void> | null = null;
  private counters: CollectorStats = {
    cycles: 0,
    successes: 0,
    failures: 0,
    lastError: null,
    startedAt: null,
    stoppedAt: null,
  };

  /**
   * @throws ConfigError if the host is empty or the interval is out of range
   */
  constructor(host: string, intervalSeconds: number, options: CollectorOptions = {}) {
    const config = validateConfig(host, intervalSeconds);
    this.host = config.host;
    this.intervalSeconds = config.intervalSeconds;

    this.logger = options.logger ?? defaultLogger;
    const fetchTimeoutMs =
      options.fetchTimeoutMs === undefined
        ? FETCH_TIMEOUT_MS
        : validatePositiveInteger('fetchTimeoutMs', options.fetchTimeoutMs, MAX_TIMER_DELAY_MS);
    if (options.fetcher && options.fetchTimeoutMs !== undefined) {
      logSafely(
        this.logger,
        'debug',
        `fetchTimeoutMs ${fetchTimeoutMs} has no effect with a custom fetcher for ${this.host}`,
      );
    }
    this.fetcher = options.fetcher ?? createDeviceFetcher(fetchTimeoutMs);
    this.onEvent = options.onEvent;
    this.failurePolicy = options.failurePolicy ?? 'skip';
    this.maxCycles =
      options.maxCycles === undefined
        ? null
        : validatePositiveInteger('maxCycles', options.maxCycles);

    if (isBelowRecommendedInterval(this.intervalSeconds)) {
      this.emit({
        type: 'interval_warning',
        host: this.host,
        intervalSeconds: this.intervalSeconds,
      });
    }
  }

  get state(): LifecycleState {
    return this.lifecycle;
  }

  // ---------------------------------------------------------------------------
  // Port: collector.start / collector.stop
  // ---------------------------------------------------------------------------

  /**
   * Launches the polling loop. The first cycle runs immediately.
   *
   * @throws CollectorStateError if already started, or stopped (no restart)
   */
  start(): void {
    if (this.lifecycle === 'running' || this.lifecycle === 'stopping') {
      throw new CollectorStateError(
        'ALREADY_STARTED',
        `Collector for ${this.host} is already running`,
      );
    }
    if (this.lifecycle === 'stopped') {
      throw new CollectorStateError(
        'STOPPED',
        `Collector for ${this.host} was stopped and cannot be restarted; create a new one`,
      );
    }

    this.lifecycle = 'running';
    const timestamp = new Date().toISOString();
    this.counters.startedAt = timestamp;
    this.emit({
      type: 'loop_started',
      host: this.host,
      intervalSeconds: this.intervalSeconds,
      timestamp,
    });

    this.loopTask = runCollectorLoop({
      host: this.host,
      intervalMs: this.intervalSeconds * 1000,
      fetcher: this.fetcher,
      signal: this.stopController.signal,
      maxCycles: this.maxCycles,
      onCycle: (outcome, cycle) => this.handleCycle(outcome, cycle),
      onLoopError: (message) => logSafely(this.logger, 'error', message),
    }).then(
      (cycles) => this.finish(cycles),
      (error: unknown) => {
        logSafely(
          this.logger,
          'error',
          `Collector loop for ${this.host} ended unexpectedly: ${errorMessage(error)}`,
        );
        this.finish(this.counters.cycles);
      },
    );
  }

  /**
   * Requests the loop to stop. Idempotent.
   * A fetch already in flight completes and its result is still queued.
   */
  stop(): void {
    if (this.lifecycle === 'idle') {
      this.lifecycle = 'stopped';
      this.stopController.abort();
      return;
    }
    if (this.lifecycle !== 'running') return;

    logSafely(this.logger, 'debug', `Stop requested for collector ${this.host}`);
    this.lifecycle = 'stopping';
    this.stopController.abort();
  }

  /**
   * Resolves once the loop task has exited.
   */
  join(): Promise<void> {
    return this.loopTask ?? Promise.resolve();
  }

  // ---------------------------------------------------------------------------
  // Port: collector.read
  // ---------------------------------------------------------------------------

  /** Number of queued entries */
  availableData(): number {
    return this.queue.size;
  }

  /**
   * Dequeues the next entry.
   *
   * With `block` false, returns null at once when nothing is queued.
   * Otherwise waits for the next entry; `signal` cancels the wait.
   */
  getData(block: false): CollectorEntry | null;
  getData(block?: true, signal?: AbortSignal): Promise<CollectorEntry>;
  getData(block: boolean, signal?: AbortSignal): CollectorEntry | null | Promise<CollectorEntry>;
  getData(
    block: boolean = true,
    signal?: AbortSignal,
  ): CollectorEntry | null | Promise<CollectorEntry> {
    if (!block) {
      return this.queue.poll() ?? null;
    }
    return this.queue.take(signal);
  }

  /**
   * Drains every queued entry, oldest first.
   */
  getAllData(): CollectorEntry[] {
    return this.queue.drain();
  }

  stats(): CollectorStats {
    return { ...this.counters };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private handleCycle(outcome: CycleOutcome, cycle: number): void {
    this.counters.cycles = cycle;

    if (outcome.success) {
      this.counters.successes++;
      this.queue.push(outcome.status);
      this.emit({ type: 'cycle_completed', host: this.host, cycle, timestamp: outcome.timestamp });
      return;
    }

    this.counters.failures++;
    this.counters.lastError = outcome.error.message;
    this.emit({
      type: 'cycle_failed',
      host: this.host,
      cycle,
      code: outcome.error.code,
      error: outcome.error.message,
      timestamp: outcome.timestamp,
    });

    if (this.failurePolicy === 'enqueue') {
      this.queue.push(new CycleFailure(outcome.error, cycle, outcome.timestamp));
    }
  }

  private finish(cycles: number): void {
    this.lifecycle = 'stopped';
    this.stopController.abort();
    const timestamp = new Date().toISOString();
    this.counters.stoppedAt = timestamp;
    this.emit({ type: 'loop_stopped', host: this.host, cycles, timestamp });
  }

  private emit(event: CollectorEvent): void {
    emitEvent(this.logger, this.onEvent, event);
  }
}

// -----------------------------------------------------------------------------
// Environment factory
// -----------------------------------------------------------------------------

/**
 * Builds a collector from ENERGY_COLLECTOR_* variables.
 * Options passed here take precedence over the environment.
 *
 * @throws ConfigError if a variable is missing or malformed
 */
export function createCollectorFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options: CollectorOptions = {},
): Collector {
  const result = readConfigFromEnv(env);
  if (!result.success) {
    throw result.error;
  }

  const { host, intervalSeconds, fetchTimeoutMs, failurePolicy, maxCycles } = result.config;
  return new Collector(host, intervalSeconds, {
    ...(options.fetcher === undefined ? { fetchTimeoutMs } : {}),
    failurePolicy,
    ...(maxCycles === null ? {} : { maxCycles }),
    ...options,
  });
}
