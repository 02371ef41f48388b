/**
 * Single Cycle
 *
 * Performs one fetch against the device and checks the fetcher contract:
 * every cycle produces exactly one status record or one error.
 */

import type { Fetcher, FetchOutcome, RawStatus } from '../types';
import { AdapterContractError, FetchError } from '../errors';
import type { CycleError } from '../errors';
import { errorMessage } from '../utils';

export interface CycleSuccess {
  success: true;
  status: RawStatus;
  timestamp: string;
}

export interface CycleFailed {
  success: false;
  error: CycleError;
  timestamp: string;
}

export type CycleOutcome = CycleSuccess | CycleFailed;

/**
 * Awaits the fetcher once. Never rejects.
 */
export async function performCycle(fetcher: Fetcher, host: string): Promise<CycleOutcome> {
  let outcome: FetchOutcome;
  try {
    outcome = await fetcher(host);
  } catch (err) {
    return {
      success: false,
      error: new FetchError(`Fetcher threw: ${errorMessage(err)}`),
      timestamp: new Date().toISOString(),
    };
  }

  if (!outcome.success) {
    return {
      success: false,
      error: new FetchError(outcome.error, outcome.status ?? null),
      timestamp: outcome.timestamp,
    };
  }

  const [status] = outcome.records;
  if (outcome.records.length !== 1 || status === undefined) {
    return {
      success: false,
      error: new AdapterContractError(outcome.records.length),
      timestamp: outcome.timestamp,
    };
  }

  return { success: true, status, timestamp: outcome.timestamp };
}
