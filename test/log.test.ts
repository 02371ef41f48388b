/**
 * Collector Log Tests
 *
 * @actions/core is auto-mocked so the default logger can be observed.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { defaultLogger, emitEvent, formatEvent, logSafely } from '../src/log';
import type { CollectorEvent } from '../src/log';
import { makeLogger, TIMESTAMP } from './collector/helpers';

vi.mock('@actions/core');

import * as core from '@actions/core';

describe('formatEvent', (): void => {
  it('formats the interval warning', (): void => {
    expect(
      formatEvent({ type: 'interval_warning', host: '192.168.1.20', intervalSeconds: 30 }),
    ).toEqual({
      level: 'warning',
      message:
        "Polling interval of 30s for 192.168.1.20 is below the recommended 60s; " +
        "frequent requests may disturb the device's cloud connection",
    });
  });

  it('formats loop start and stop at info level', (): void => {
    expect(
      formatEvent({
        type: 'loop_started',
        host: 'device.local',
        intervalSeconds: 60,
        timestamp: TIMESTAMP,
      }),
    ).toEqual({ level: 'info', message: 'Collector started for device.local (interval 60s)' });

    expect(
      formatEvent({ type: 'loop_stopped', host: 'device.local', cycles: 4, timestamp: TIMESTAMP }),
    ).toEqual({ level: 'info', message: 'Collector stopped for device.local after 4 cycles' });
  });

  it('formats cycle results', (): void => {
    expect(
      formatEvent({ type: 'cycle_completed', host: 'h', cycle: 2, timestamp: TIMESTAMP }),
    ).toEqual({ level: 'debug', message: 'Cycle 2 for h collected' });

    expect(
      formatEvent({
        type: 'cycle_failed',
        host: 'h',
        cycle: 3,
        code: 'FETCH_FAILED',
        error: 'HTTP 500: Internal Server Error',
        timestamp: TIMESTAMP,
      }),
    ).toEqual({
      level: 'warning',
      message: 'Cycle 3 for h failed (FETCH_FAILED): HTTP 500: Internal Server Error',
    });
  });
});

describe('emitEvent', (): void => {
  const event: CollectorEvent = {
    type: 'loop_stopped',
    host: 'h',
    cycles: 1,
    timestamp: TIMESTAMP,
  };

  it('logs the event and passes it to the hook', (): void => {
    const logger = makeLogger();
    const hook = vi.fn();

    emitEvent(logger, hook, event);

    expect(logger.info).toHaveBeenCalledWith('Collector stopped for h after 1 cycles');
    expect(hook).toHaveBeenCalledWith(event);
  });

  it('reports a throwing hook as a warning', (): void => {
    const logger = makeLogger();

    emitEvent(
      logger,
      () => {
        throw new Error('observer down');
      },
      event,
    );

    expect(logger.warning).toHaveBeenCalledWith('Event hook failed on loop_stopped: observer down');
  });

  it('works without a hook', (): void => {
    const logger = makeLogger();
    emitEvent(logger, undefined, event);
    expect(logger.info).toHaveBeenCalledTimes(1);
  });
});

describe('defaultLogger', (): void => {
  beforeEach((): void => {
    vi.clearAllMocks();
  });

  it('delegates each level to @actions/core', (): void => {
    defaultLogger.debug('d');
    defaultLogger.info('i');
    defaultLogger.warning('w');
    defaultLogger.error('e');

    expect(core.debug).toHaveBeenCalledWith('d');
    expect(core.info).toHaveBeenCalledWith('i');
    expect(core.warning).toHaveBeenCalledWith('w');
    expect(core.error).toHaveBeenCalledWith('e');
  });
});

describe('logSafely', (): void => {
  beforeEach((): void => {
    vi.clearAllMocks();
  });

  it('writes through the given logger', (): void => {
    const logger = makeLogger();

    logSafely(logger, 'warning', 'w');

    expect(logger.warning).toHaveBeenCalledWith('w');
    expect(core.error).not.toHaveBeenCalled();
  });

  it('falls back to @actions/core when the logger throws', (): void => {
    const logger = makeLogger();
    logger.error.mockImplementation(() => {
      throw new Error('disk full');
    });

    logSafely(logger, 'error', 'Collector loop error: boom');

    expect(core.error).toHaveBeenCalledWith(
      'Logger failed (disk full) on error: Collector loop error: boom',
    );
  });
});
