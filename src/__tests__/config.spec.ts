import { describe, it, expect, afterEach, vi } from 'vitest';
import { DEFAULT_DB_PATH, loadConfig } from '../config';
import { StoreError, getExitCode } from '../errors';
import { createLogger } from '../logger';
import { catchError } from './helpers';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({ dbPath: DEFAULT_DB_PATH, logLevel: 'warn', busyTimeoutMs: 5000 });
  });

  it('reads the environment', () => {
    expect(
      loadConfig({ CALCSTORE_DB: ':memory:', CALCSTORE_LOG_LEVEL: 'debug', CALCSTORE_BUSY_TIMEOUT_MS: '250' }),
    ).toEqual({ dbPath: ':memory:', logLevel: 'debug', busyTimeoutMs: 250 });
  });

  it('lets overrides win over the environment', () => {
    const config = loadConfig({ CALCSTORE_DB: 'env.db', CALCSTORE_LOG_LEVEL: 'info' }, { dbPath: 'flag.db', busyTimeoutMs: 0 });
    expect(config).toEqual({ dbPath: 'flag.db', logLevel: 'info', busyTimeoutMs: 0 });
  });

  it('rejects an unknown log level', () => {
    const error = catchError(() => loadConfig({ CALCSTORE_LOG_LEVEL: 'loud' }));
    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({ code: 'INVALID_CONFIG' });
    expect(error).toHaveProperty('message', expect.stringContaining('CALCSTORE_LOG_LEVEL'));
    expect(getExitCode(error)).toBe(2);
  });

  it('rejects a negative busy timeout', () => {
    expect(catchError(() => loadConfig({ CALCSTORE_BUSY_TIMEOUT_MS: '-1' }))).toMatchObject({ code: 'INVALID_CONFIG' });
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below the threshold', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createLogger('error');
    logger.warn('quiet');
    logger.error('loud');

    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('loud');
  });

  it('follows level changes', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    const logger = createLogger('silent');
    logger.debug('hidden');
    logger.level = 'debug';
    logger.debug('shown');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('shown');
  });
});

describe('getExitCode', () => {
  it('maps error kinds to exit codes', () => {
    expect(getExitCode(new Error('boom'))).toBe(1);
    expect(getExitCode(new StoreError('NOT_FOUND', 'missing'))).toBe(1);
  });
});
