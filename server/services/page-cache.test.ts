import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PageCache } from './page-cache';

describe('PageCache', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'page-cache-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes the page under a name derived from the url', async () => {
    const cache = new PageCache(path.join(dir, 'cached_pages'));
    const saved = await cache.save('https://www.funda.nl/detail/koop/leiden/1/', '<html></html>');

    expect(saved).toBe(path.join(dir, 'cached_pages', 'www.funda.nl_detail_koop_leiden_1.html'));
    expect(await fs.readFile(path.join(dir, 'cached_pages', 'www.funda.nl_detail_koop_leiden_1.html'), 'utf8'))
      .toBe('<html></html>');
  });

  it('logs and returns null when the page cannot be written', async () => {
    const blocker = path.join(dir, 'not-a-directory');
    await fs.writeFile(blocker, 'x');

    const cache = new PageCache(blocker);
    await expect(cache.save('https://www.funda.nl/detail/1/', '<html></html>')).resolves.toBeNull();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});
