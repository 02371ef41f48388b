export { Collector, createCollectorFromEnv } from './collector';
export type { CollectorOptions } from './collector';
export {
  AdapterContractError,
  CollectorError,
  CollectorStateError,
  ConfigError,
  CycleFailure,
  FetchError,
  isCycleFailure,
} from './errors';
export type { CollectorStateErrorCode, ConfigErrorCode, CycleError } from './errors';
export { createDeviceFetcher, fetchDeviceStatus } from './device';
export { readConfigFromEnv } from './config';
export type { EnvConfig, EnvConfigOutcome } from './config';
export { defaultLogger } from './log';
export type { CollectorEvent, EventHook, Logger } from './log';
export type {
  CollectorConfig,
  CollectorEntry,
  CollectorStats,
  FailurePolicy,
  FetchOutcome,
  Fetcher,
  LifecycleState,
  RawStatus,
} from './types';
export {
  DEFAULT_INTERVAL_SECONDS,
  FETCH_TIMEOUT_MS,
  MAX_INTERVAL_SECONDS,
  MIN_INTERVAL_SECONDS,
  RECOMMENDED_INTERVAL_SECONDS,
} from './types';
