/**
 * Error taxonomy
 * Layer: core
 *
 * Construction and lifecycle errors are thrown to the caller.
 * Cycle errors (FetchError, AdapterContractError) never leave the loop;
 * they are logged and, under failurePolicy 'enqueue', wrapped in a CycleFailure.
 */

export type ConfigErrorCode =
  | 'INTERVAL_TOO_SHORT'
  | 'INVALID_INTERVAL'
  | 'INVALID_HOST'
  | 'INVALID_OPTION';

export type CollectorStateErrorCode = 'ALREADY_STARTED' | 'STOPPED';

export class CollectorError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends CollectorError {
  declare readonly code: ConfigErrorCode;

  constructor(code: ConfigErrorCode, message: string) {
    super(code, message);
  }
}

export class CollectorStateError extends CollectorError {
  declare readonly code: CollectorStateErrorCode;

  constructor(code: CollectorStateErrorCode, message: string) {
    super(code, message);
  }
}

export class FetchError extends CollectorError {
  /** HTTP status, when the device answered */
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super('FETCH_FAILED', message);
    this.status = status;
  }
}

export class AdapterContractError extends CollectorError {
  /** Number of records the fetcher actually produced */
  readonly received: number;

  constructor(received: number) {
    super(
      'ADAPTER_CONTRACT',
      `Expected exactly one status record from the fetcher, but got: ${received}`,
    );
    this.received = received;
  }
}

export type CycleError = FetchError | AdapterContractError;

/**
 * Queue marker for a failed cycle.
 */
export class CycleFailure {
  readonly error: CycleError;
  readonly cycle: number;
  readonly timestamp: string;

  constructor(error: CycleError, cycle: number, timestamp: string) {
    this.error = error;
    this.cycle = cycle;
    this.timestamp = timestamp;
  }
}

export function isCycleFailure(entry: unknown): entry is CycleFailure {
  return entry instanceof CycleFailure;
}
