/**
 * Shared test helpers for collector test modules.
 */

import { vi } from 'vitest';
import type { Fetcher, FetchOutcome, RawStatus } from '../../src/types';
import type { Logger } from '../../src/log';

export const TIMESTAMP = '2026-01-25T12:00:00.000Z';

export function makeSuccess(...records: RawStatus[]): FetchOutcome {
  return { success: true, records, timestamp: TIMESTAMP };
}

export function makeFailure(error = 'Network error: connect ECONNREFUSED'): FetchOutcome {
  return { success: false, error, timestamp: TIMESTAMP };
}

/**
 * Fetcher that answers with the given outcomes in order, then keeps
 * repeating the last one.
 */
export function makeSequenceFetcher(...outcomes: FetchOutcome[]) {
  let call = 0;
  return vi.fn<Fetcher>((): Promise<FetchOutcome> => {
    const outcome = outcomes[Math.min(call, outcomes.length - 1)] ?? makeFailure('no outcome');
    call++;
    return Promise.resolve(outcome);
  });
}

/**
 * Fetcher returning { v: n } on its n-th call.
 */
export function makeCountingFetcher() {
  let call = 0;
  return vi.fn<Fetcher>((): Promise<FetchOutcome> => {
    call++;
    return Promise.resolve(makeSuccess({ v: call }));
  });
}

export function makeLogger() {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warning: vi.fn<Logger['warning']>(),
    error: vi.fn<Logger['error']>(),
  } satisfies Logger;
}
