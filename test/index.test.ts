import { describe, it, expect } from 'vitest';
import * as pkg from '../src/index';

describe('package entry', (): void => {
  it('exposes the collector surface', (): void => {
    expect(typeof pkg.Collector).toBe('function');
    expect(typeof pkg.createCollectorFromEnv).toBe('function');
    expect(typeof pkg.fetchDeviceStatus).toBe('function');
    expect(typeof pkg.createDeviceFetcher).toBe('function');
    expect(typeof pkg.readConfigFromEnv).toBe('function');
    expect(typeof pkg.isCycleFailure).toBe('function');
    expect(pkg.MIN_INTERVAL_SECONDS).toBe(10);
    expect(pkg.RECOMMENDED_INTERVAL_SECONDS).toBe(60);
  });

  it('exposes the error taxonomy', (): void => {
    const error = new pkg.ConfigError('INTERVAL_TOO_SHORT', 'too short');
    expect(error).toBeInstanceOf(pkg.CollectorError);
    expect(new pkg.FetchError('x')).toBeInstanceOf(pkg.CollectorError);
    expect(new pkg.AdapterContractError(0)).toBeInstanceOf(pkg.CollectorError);
    expect(new pkg.CollectorStateError('STOPPED', 'x')).toBeInstanceOf(pkg.CollectorError);
  });
});
