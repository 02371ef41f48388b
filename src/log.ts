/**
 * Collector Log
 * Layer: infra
 *
 * Provided ports:
 *   - log.emit
 *
 * Structured collector events, written through @actions/core by default
 * and handed to an optional observer hook.
 */

import * as core from '@actions/core';
import { RECOMMENDED_INTERVAL_SECONDS } from './types';
import { errorMessage } from './utils';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

export const defaultLogger: Logger = {
  debug: (message) => core.debug(message),
  info: (message) => core.info(message),
  warning: (message) => core.warning(message),
  error: (message) => core.error(message),
};

// -----------------------------------------------------------------------------
// Events
// -----------------------------------------------------------------------------

export interface IntervalWarningEvent {
  type: 'interval_warning';
  host: string;
  intervalSeconds: number;
}

export interface LoopStartedEvent {
  type: 'loop_started';
  host: string;
  intervalSeconds: number;
  timestamp: string;
}

export interface LoopStoppedEvent {
  type: 'loop_stopped';
  host: string;
  cycles: number;
  timestamp: string;
}

export interface CycleCompletedEvent {
  type: 'cycle_completed';
  host: string;
  cycle: number;
  timestamp: string;
}

export interface CycleFailedEvent {
  type: 'cycle_failed';
  host: string;
  cycle: number;
  code: string;
  error: string;
  timestamp: string;
}

export type CollectorEvent =
  | IntervalWarningEvent
  | LoopStartedEvent
  | LoopStoppedEvent
  | CycleCompletedEvent
  | CycleFailedEvent;

export type EventHook = (event: CollectorEvent) => void;

export type LogLevel = keyof Logger;

/**
 * Maps an event to its log level and line.
 * Pure function.
 */
export function formatEvent(event: CollectorEvent): { level: LogLevel; message: string } {
  switch (event.type) {
    case 'interval_warning':
      return {
        level: 'warning',
        message:
          `Polling interval of ${event.intervalSeconds}s for ${event.host} is below the ` +
          `recommended ${RECOMMENDED_INTERVAL_SECONDS}s; frequent requests may disturb ` +
          `the device's cloud connection`,
      };
    case 'loop_started':
      return {
        level: 'info',
        message: `Collector started for ${event.host} (interval ${event.intervalSeconds}s)`,
      };
    case 'loop_stopped':
      return {
        level: 'info',
        message: `Collector stopped for ${event.host} after ${event.cycles} cycles`,
      };
    case 'cycle_completed':
      return { level: 'debug', message: `Cycle ${event.cycle} for ${event.host} collected` };
    case 'cycle_failed':
      return {
        level: 'warning',
        message: `Cycle ${event.cycle} for ${event.host} failed (${event.code}): ${event.error}`,
      };
  }
}

// -----------------------------------------------------------------------------
// Port: log.emit
// -----------------------------------------------------------------------------

/**
 * Writes through a caller-supplied logger. If that logger throws, the line
 * and the failure go to @actions/core instead.
 */
export function logSafely(logger: Logger, level: LogLevel, message: string): void {
  try {
    logger[level](message);
  } catch (err) {
    core.error(`Logger failed (${errorMessage(err)}) on ${level}: ${message}`);
  }
}

/**
 * Logs an event and passes it to the hook.
 * A throwing hook is reported and otherwise ignored.
 */
export function emitEvent(logger: Logger, hook: EventHook | undefined, event: CollectorEvent): void {
  const { level, message } = formatEvent(event);
  logSafely(logger, level, message);

  if (!hook) return;
  try {
    hook(event);
  } catch (err) {
    logSafely(logger, 'warning', `Event hook failed on ${event.type}: ${errorMessage(err)}`);
  }
}
