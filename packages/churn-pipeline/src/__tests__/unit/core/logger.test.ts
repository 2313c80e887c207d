/**
 * Logger tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { Logger, getLogLevel, isLogLevel, setLogLevel } from '../../../core/utils/logger.js';

describe('Logger', () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('writes JSON lines with service and metadata', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const log = new Logger({ service: 'churnline:test', pretty: false, level: 'debug' });

    log.info('Run finished', { records: 3 });

    expect(info).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(info.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({
      level: 'info',
      service: 'churnline:test',
      message: 'Run finished',
      records: 3,
    });
  });

  it('follows the process-wide level when none is fixed', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const log = new Logger({ service: 'churnline:test', pretty: true });

    setLogLevel('info');
    log.debug('hidden');
    expect(debug).not.toHaveBeenCalled();

    setLogLevel('debug');
    log.debug('shown');
    expect(debug).toHaveBeenCalledTimes(1);
  });

  it('recognizes log level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
