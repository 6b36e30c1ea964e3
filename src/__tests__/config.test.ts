import { describe, it, expect, afterEach, vi } from 'vitest';
import { DEFAULT_ANALYSIS_CONFIG, createAnalysisConfig } from '../config';
import { getLogLevel, logger, setLogLevel } from '../logger';
import { ConfigError } from '../errors';

describe('createAnalysisConfig', () => {
  it('should fall back to the defaults', () => {
    const config = createAnalysisConfig();
    expect(config).toEqual(DEFAULT_ANALYSIS_CONFIG);
    expect(config.numWorkers).toBeGreaterThanOrEqual(1);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should apply overrides', () => {
    const config = createAnalysisConfig({ numWorkers: 3, lineStrategy: 'splitting-line' });
    expect(config.numWorkers).toBe(3);
    expect(config.lineStrategy).toBe('splitting-line');
    expect(config.logLevel).toBe('info');
  });

  it.each([0, 2.5])('should reject %s workers', numWorkers => {
    expect(() => createAnalysisConfig({ numWorkers })).toThrow(ConfigError);
  });

  it('should reject a tiny spatial index node size', () => {
    expect(() => createAnalysisConfig({ spatialIndexMaxEntries: 2 })).toThrow(
      'spatialIndexMaxEntries must be an integer greater equal 4'
    );
  });
});

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('should drop messages below the level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setLogLevel('info');

    logger.debug('hidden');
    logger.info('shown');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('shown');
  });

  it('should prefix debug messages', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setLogLevel('debug');

    logger.debug('details');

    expect(getLogLevel()).toBe('debug');
    expect(log).toHaveBeenCalledWith('[debug] details');
  });

  it('should stay quiet when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('silent');

    logger.error('failure', new Error('boom'));

    expect(error).not.toHaveBeenCalled();
  });
});
