/**
 * Device Client
 * Layer: infra
 *
 * Provided ports:
 *   - device.fetchStatus
 *
 * Reads the raw status of an energy-storage device over its local HTTP API.
 * The response body is returned as-is; encoded values are not decoded here.
 */

import type { Fetcher, FetchOutcome, RawStatus } from './types';
import { DEVICE_ENDPOINT_PATH, FETCH_TIMEOUT_MS } from './types';
import { errorMessage, isARealObject } from './utils';
import requestForm from './device-request.json';

// -----------------------------------------------------------------------------
// Port: device.fetchStatus
// -----------------------------------------------------------------------------

/**
 * Fetches the current status of the device at `host`.
 *
 * @param host - IP address or hostname, optionally with scheme and port
 * @param timeoutMs - Abort the request after this many milliseconds
 */
export async function fetchDeviceStatus(
  host: string,
  timeoutMs: number = FETCH_TIMEOUT_MS,
): Promise<FetchOutcome> {
  const timestamp = new Date().toISOString();

  // Set up abort controller with timeout to prevent indefinite hangs
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(buildDeviceUrl(host), {
      signal: controller.signal,
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify(requestForm),
    });

    if (!response.ok) {
      clearTimeout(timeoutId);
      const statusText = response.statusText || 'Unknown error';
      return {
        success: false,
        error: `HTTP ${response.status}: ${statusText}`,
        timestamp,
        status: response.status,
      };
    }

    const text = await response.text();
    clearTimeout(timeoutId);

    const parsed = parseDeviceResponse(text);
    if (!parsed) {
      return {
        success: false,
        error: 'Failed to parse device response',
        timestamp,
        status: response.status,
      };
    }

    return { success: true, records: [parsed], timestamp };
  } catch (err) {
    clearTimeout(timeoutId);

    // Handle abort error specifically (timeout)
    if (err instanceof Error && err.name === 'AbortError') {
      return {
        success: false,
        error: `Request timeout: device did not respond within ${timeoutMs}ms`,
        timestamp,
      };
    }

    return {
      success: false,
      error: `Network error: ${errorMessage(err)}`,
      timestamp,
    };
  }
}

/**
 * Binds a timeout to fetchDeviceStatus, giving the collector's Fetcher shape.
 */
export function createDeviceFetcher(timeoutMs: number = FETCH_TIMEOUT_MS): Fetcher {
  return (host) => fetchDeviceStatus(host, timeoutMs);
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

/**
 * Builds the endpoint URL. A bare host gets the http scheme.
 */
export function buildDeviceUrl(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  const base = /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
  return `${base}${DEVICE_ENDPOINT_PATH}`;
}

/**
 * Parses a response body into a status record.
 * Returns null unless the body is a JSON object.
 */
export function parseDeviceResponse(text: string): RawStatus | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  return isARealObject(raw) ? raw : null;
}
