import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      requestsFile: 'requests.json',
      cachePages: true,
      cacheDir: 'cached_pages',
      timeoutMs: 30000,
      maxAttempts: 3,
      backoffFactor: 2,
      minDelayMs: 1000,
      maxDelayMs: 5000,
      proxyUrls: [],
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      REQUESTS_FILE: 'queue/urls.json',
      CACHE_PAGES: 'false',
      REQUEST_TIMEOUT_MS: '5000',
      MAX_ATTEMPTS: '5',
      BACKOFF_FACTOR: '0.5',
      PROXY_URLS: 'http://proxy-a:8080, http://proxy-b:8080,',
    });

    expect(config.requestsFile).toBe('queue/urls.json');
    expect(config.cachePages).toBe(false);
    expect(config.timeoutMs).toBe(5000);
    expect(config.maxAttempts).toBe(5);
    expect(config.backoffFactor).toBe(0.5);
    expect(config.proxyUrls).toEqual(['http://proxy-a:8080', 'http://proxy-b:8080']);
  });

  it('orders the delay bounds', () => {
    const config = loadConfig({ MIN_DELAY_MS: '4000', MAX_DELAY_MS: '2000' });
    expect([config.minDelayMs, config.maxDelayMs]).toEqual([2000, 4000]);
  });

  it('rejects values that are not numbers', () => {
    expect(() => loadConfig({ MAX_ATTEMPTS: 'three' })).toThrow(/MAX_ATTEMPTS/);
  });

  it('rejects an unknown cache flag', () => {
    expect(() => loadConfig({ CACHE_PAGES: 'yes' })).toThrow(/CACHE_PAGES/);
  });
});
