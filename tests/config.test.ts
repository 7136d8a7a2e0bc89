import { resolveConfig } from '../src/config';
import { API_BASE_URL, API_TIMEOUT, MAX_RETRIES } from '../src/constants';
import { ConfigurationError } from '../src/errors';
import { Platform } from '../src/platform';

const KEYS = ['STRATA_ACCESS_KEY', 'STRATA_OWNER', 'STRATA_URL', 'STRATA_TIMEOUT', 'STRATA_MAX_RETRIES'];

describe('resolveConfig', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it('applies defaults around explicit parameters', () => {
    expect(resolveConfig({ accessKey: 'test-key', owner: 'alice' })).toEqual({
      accessKey: 'test-key',
      owner: 'alice',
      url: API_BASE_URL,
      timeout: API_TIMEOUT,
      maxRetries: MAX_RETRIES,
      retryDelay: 1000,
    });
  });

  it('reads the environment', () => {
    process.env.STRATA_ACCESS_KEY = 'env-key';
    process.env.STRATA_OWNER = 'bob';
    process.env.STRATA_URL = 'http://localhost:8080/api';
    process.env.STRATA_TIMEOUT = '500';
    process.env.STRATA_MAX_RETRIES = '0';

    expect(resolveConfig()).toMatchObject({
      accessKey: 'env-key',
      owner: 'bob',
      url: 'http://localhost:8080/api/',
      timeout: 500,
      maxRetries: 0,
    });
    expect(resolveConfig({ owner: 'carol' }).owner).toBe('carol');
  });

  it('requires an access key and an owner', () => {
    expect(() => resolveConfig({ owner: 'alice' })).toThrow(ConfigurationError);
    expect(() => resolveConfig({ accessKey: 'test-key' })).toThrow(/STRATA_OWNER/);
  });

  it('rejects malformed values', () => {
    const base = { accessKey: 'test-key', owner: 'alice' };

    expect(() => resolveConfig({ ...base, url: 'not a url' })).toThrow('Invalid platform URL "not a url"');
    expect(() => resolveConfig({ ...base, url: 'ftp://files.test/' })).toThrow(ConfigurationError);

    process.env.STRATA_MAX_RETRIES = 'many';
    expect(() => resolveConfig(base)).toThrow('STRATA_MAX_RETRIES must be a non-negative integer, got "many"');
  });
});

describe('Platform', () => {
  it('binds the dataset manager to the configured owner', () => {
    const platform = new Platform({ accessKey: 'test-key', owner: 'alice', url: 'https://api.test' });

    expect(platform.datasets.owner).toBe('alice');
    expect(platform.config.url).toBe('https://api.test/');
  });
});
