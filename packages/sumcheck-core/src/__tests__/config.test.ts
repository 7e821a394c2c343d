import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildConfig, isLogLevel, DEFAULT_CONFIG } from '../config.js';

describe('buildConfig', () => {
  const saved = { ...process.env };

  beforeEach(() => {
    delete process.env['SUMCHECK_LOG_LEVEL'];
    delete process.env['SUMCHECK_PROGRESS'];
  });

  afterEach(() => {
    process.env = { ...saved };
  });

  it('should use defaults when nothing is set', () => {
    expect(buildConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('should read the log level from the environment', () => {
    process.env['SUMCHECK_LOG_LEVEL'] = 'DEBUG';
    expect(buildConfig().logLevel).toBe('debug');
  });

  it('should ignore an unknown log level', () => {
    process.env['SUMCHECK_LOG_LEVEL'] = 'loud';
    expect(buildConfig().logLevel).toBe('warn');
  });

  it('should turn progress off from the environment', () => {
    process.env['SUMCHECK_PROGRESS'] = 'false';
    expect(buildConfig().showProgress).toBe(false);

    process.env['SUMCHECK_PROGRESS'] = '0';
    expect(buildConfig().showProgress).toBe(false);

    process.env['SUMCHECK_PROGRESS'] = 'yes';
    expect(buildConfig().showProgress).toBe(true);
  });

  it('should prefer overrides to the environment', () => {
    process.env['SUMCHECK_LOG_LEVEL'] = 'debug';
    process.env['SUMCHECK_PROGRESS'] = 'false';

    expect(buildConfig({ logLevel: 'error', showProgress: true })).toEqual({
      logLevel: 'error',
      showProgress: true,
    });
  });
});

describe('isLogLevel', () => {
  it('should recognise pino levels and silent', () => {
    expect(isLogLevel('info')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
