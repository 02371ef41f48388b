/**
 * Boundary types for energy-status-collector
 *
 * These types define the contracts between modules.
 */

import type { CycleFailure } from './errors';

// -----------------------------------------------------------------------------
// RawStatus
// One telemetry record as returned by the device, passed through verbatim
// -----------------------------------------------------------------------------

export type RawStatus = Readonly<Record<string, unknown>>;

// -----------------------------------------------------------------------------
// CollectorEntry
// What a consumer dequeues: a status record, or a failure marker when the
// collector runs with failurePolicy 'enqueue'
// -----------------------------------------------------------------------------

export type CollectorEntry = RawStatus | CycleFailure;

// -----------------------------------------------------------------------------
// Fetcher
// -----------------------------------------------------------------------------

export interface FetchSuccess {
  success: true;
  /** Records produced by one device request; the collector expects exactly one */
  records: RawStatus[];
  timestamp: string;
}

export interface FetchFailure {
  success: false;
  error: string;
  timestamp: string;
  /** HTTP status, when the device answered */
  status?: number;
}

export type FetchOutcome = FetchSuccess | FetchFailure;

export type Fetcher = (host: string) => Promise<FetchOutcome>;

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export type FailurePolicy = 'skip' | 'enqueue';

export interface CollectorConfig {
  /** Address of the device (IP or hostname, optionally with port) */
  host: string;
  /** Polling interval in seconds */
  intervalSeconds: number;
}

export type LifecycleState = 'idle' | 'running' | 'stopping' | 'stopped';

export interface CollectorStats {
  /** Cycles attempted so far */
  cycles: number;
  successes: number;
  failures: number;
  /** Message of the most recent cycle failure (null if none) */
  lastError: string | null;
  /** ISO timestamp of start() (null before start) */
  startedAt: string | null;
  /** ISO timestamp of loop exit (null while running) */
  stoppedAt: string | null;
}

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

/** Hard lower bound for the polling interval */
export const MIN_INTERVAL_SECONDS = 10;

/** Below this the device's own cloud connection may suffer */
export const RECOMMENDED_INTERVAL_SECONDS = 60;

export const DEFAULT_INTERVAL_SECONDS = 60;

/** Largest delay a Node timer accepts; longer ones fire after 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Hard upper bound for the polling interval, so the sleep fits one timer */
export const MAX_INTERVAL_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);

/** Timeout for a single device request (milliseconds) */
export const FETCH_TIMEOUT_MS = 10000;

export const DEVICE_ENDPOINT_PATH = '/lala.cgi';
