/**
 * Collector Main Loop
 *
 * The polling loop behind Collector.start().
 * Kept apart from the Collector class for testability via dependency injection.
 */

import type { Fetcher } from '../types';
import { errorMessage, sleep as sleepImpl } from '../utils';
import { performCycle as performCycleImpl } from './perform-cycle';
import type { CycleOutcome } from './perform-cycle';

/**
 * Dependency injection interface for runCollectorLoop.
 * Production defaults are used when not provided by tests.
 */
export interface LoopDeps {
  sleep: typeof sleepImpl;
  performCycle: typeof performCycleImpl;
}

const defaultDeps: LoopDeps = {
  sleep: sleepImpl,
  performCycle: performCycleImpl,
};

export interface LoopContext {
  host: string;
  intervalMs: number;
  fetcher: Fetcher;
  /** Cooperative stop request */
  signal: AbortSignal;
  /** Stop after this many cycles (null: run until stopped) */
  maxCycles: number | null;
  /** Receives every cycle result, in completion order */
  onCycle: (outcome: CycleOutcome, cycle: number) => void;
  /** Receives anything the loop body throws */
  onLoopError: (message: string) => void;
}

// -----------------------------------------------------------------------------
// Collector main loop
// -----------------------------------------------------------------------------

/**
 * Polls until the signal aborts or maxCycles is reached.
 *
 * Each iteration:
 *   1. Check the stop signal
 *   2. Await exactly one cycle and hand it to onCycle
 *   3. Sleep for the interval; an abort ends the sleep early
 *
 * A stop request never interrupts a fetch already in flight; that cycle's
 * result is still delivered. Resolves with the number of cycles run.
 */
export async function runCollectorLoop(
  ctx: LoopContext,
  deps: LoopDeps = defaultDeps,
): Promise<number> {
  let cycles = 0;

  while (!ctx.signal.aborted) {
    try {
      cycles++;
      const outcome = await deps.performCycle(ctx.fetcher, ctx.host);
      ctx.onCycle(outcome, cycles);
    } catch (error: unknown) {
      ctx.onLoopError(`Collector loop error: ${errorMessage(error)}`);
    }

    if (ctx.maxCycles !== null && cycles >= ctx.maxCycles) {
      break;
    }

    await deps.sleep(ctx.intervalMs, ctx.signal);
  }

  return cycles;
}
