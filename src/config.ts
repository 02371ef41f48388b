/**
 * Configuration
 * Layer: core
 *
 * Provided ports:
 *   - config.validate
 *   - config.fromEnv
 *
 * Validates collector settings and reads them from the environment.
 */

import type { CollectorConfig, FailurePolicy } from './types';
import {
  DEFAULT_INTERVAL_SECONDS,
  FETCH_TIMEOUT_MS,
  MAX_INTERVAL_SECONDS,
  MIN_INTERVAL_SECONDS,
  RECOMMENDED_INTERVAL_SECONDS,
} from './types';
import { ConfigError } from './errors';
import { parseBooleanFlag, parseInteger } from './utils';

// -----------------------------------------------------------------------------
// Port: config.validate
// -----------------------------------------------------------------------------

/**
 * Validates host and interval.
 *
 * @throws ConfigError INVALID_HOST, INVALID_INTERVAL or INTERVAL_TOO_SHORT
 */
export function validateConfig(host: string, intervalSeconds: number): CollectorConfig {
  const trimmedHost = host.trim();
  if (trimmedHost === '') {
    throw new ConfigError('INVALID_HOST', 'Device host must not be empty');
  }

  if (!Number.isFinite(intervalSeconds)) {
    throw new ConfigError(
      'INVALID_INTERVAL',
      `Polling interval must be a finite number of seconds, got: ${intervalSeconds}`,
    );
  }

  if (intervalSeconds < MIN_INTERVAL_SECONDS) {
    throw new ConfigError(
      'INTERVAL_TOO_SHORT',
      `No interval below ${MIN_INTERVAL_SECONDS} seconds allowed, got: ${intervalSeconds}`,
    );
  }

  if (intervalSeconds > MAX_INTERVAL_SECONDS) {
    throw new ConfigError(
      'INVALID_INTERVAL',
      `No interval above ${MAX_INTERVAL_SECONDS} seconds allowed, got: ${intervalSeconds}`,
    );
  }

  return { host: trimmedHost, intervalSeconds };
}

/**
 * True for intervals that are allowed but below the recommended minimum.
 */
export function isBelowRecommendedInterval(intervalSeconds: number): boolean {
  return intervalSeconds < RECOMMENDED_INTERVAL_SECONDS;
}

/**
 * Validates an optional positive integer option (maxCycles, fetchTimeoutMs).
 *
 * @throws ConfigError INVALID_OPTION
 */
export function validatePositiveInteger(
  name: string,
  value: number,
  max: number = Number.MAX_SAFE_INTEGER,
): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError('INVALID_OPTION', `${name} must be a positive integer, got: ${value}`);
  }
  if (value > max) {
    throw new ConfigError('INVALID_OPTION', `${name} must be at most ${max}, got: ${value}`);
  }
  return value;
}

// -----------------------------------------------------------------------------
// Port: config.fromEnv
// -----------------------------------------------------------------------------

export const ENV_HOST = 'ENERGY_COLLECTOR_HOST';
export const ENV_INTERVAL = 'ENERGY_COLLECTOR_INTERVAL';
export const ENV_FETCH_TIMEOUT_MS = 'ENERGY_COLLECTOR_FETCH_TIMEOUT_MS';
export const ENV_ENQUEUE_FAILURES = 'ENERGY_COLLECTOR_ENQUEUE_FAILURES';
export const ENV_MAX_CYCLES = 'ENERGY_COLLECTOR_MAX_CYCLES';

export interface EnvConfig extends CollectorConfig {
  fetchTimeoutMs: number;
  failurePolicy: FailurePolicy;
  maxCycles: number | null;
}

export interface EnvConfigResult {
  success: true;
  config: EnvConfig;
}

export interface EnvConfigError {
  success: false;
  error: ConfigError;
}

export type EnvConfigOutcome = EnvConfigResult | EnvConfigError;

/**
 * Reads collector settings from environment variables.
 * Only parses; range checks on the interval happen in validateConfig.
 */
export function readConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EnvConfigOutcome {
  const host = env[ENV_HOST]?.trim();
  if (!host) {
    return {
      success: false,
      error: new ConfigError('INVALID_HOST', `${ENV_HOST} not set`),
    };
  }

  const intervalRaw = env[ENV_INTERVAL];
  const intervalSeconds = intervalRaw ? parseInteger(intervalRaw) : DEFAULT_INTERVAL_SECONDS;
  if (intervalSeconds === null) {
    return {
      success: false,
      error: new ConfigError(
        'INVALID_INTERVAL',
        `${ENV_INTERVAL} must be a whole number of seconds, got: ${intervalRaw}`,
      ),
    };
  }

  const timeoutRaw = env[ENV_FETCH_TIMEOUT_MS];
  const fetchTimeoutMs = timeoutRaw ? parseInteger(timeoutRaw) : FETCH_TIMEOUT_MS;
  if (fetchTimeoutMs === null || fetchTimeoutMs < 1) {
    return {
      success: false,
      error: new ConfigError(
        'INVALID_OPTION',
        `${ENV_FETCH_TIMEOUT_MS} must be a positive integer, got: ${timeoutRaw}`,
      ),
    };
  }

  const maxCyclesRaw = env[ENV_MAX_CYCLES];
  const maxCycles = maxCyclesRaw ? parseInteger(maxCyclesRaw) : null;
  if (maxCyclesRaw && (maxCycles === null || maxCycles < 1)) {
    return {
      success: false,
      error: new ConfigError(
        'INVALID_OPTION',
        `${ENV_MAX_CYCLES} must be a positive integer, got: ${maxCyclesRaw}`,
      ),
    };
  }

  return {
    success: true,
    config: {
      host,
      intervalSeconds,
      fetchTimeoutMs,
      failurePolicy: parseBooleanFlag(env[ENV_ENQUEUE_FAILURES]) ? 'enqueue' : 'skip',
      maxCycles,
    },
  };
}
