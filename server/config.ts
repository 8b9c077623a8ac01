import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

const configSchema = z.object({
  REQUESTS_FILE: z.string().min(1).default('requests.json'),
  CACHE_PAGES: booleanFlag.default('true'),
  CACHE_DIR: z.string().min(1).default('cached_pages'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  BACKOFF_FACTOR: z.coerce.number().nonnegative().default(2),
  MIN_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(5000),
  PROXY_URLS: z.string().default(''),
});

export interface ScraperConfig {
  requestsFile: string;
  cachePages: boolean;
  cacheDir: string;
  timeoutMs: number;
  maxAttempts: number;
  backoffFactor: number;
  minDelayMs: number;
  maxDelayMs: number;
  proxyUrls: string[];
}

/**
 * Reads scraper settings from the environment (.env is loaded on import).
 * Throws a ZodError naming the offending variable when a value is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  const parsed = configSchema.parse(env);

  return {
    requestsFile: parsed.REQUESTS_FILE,
    cachePages: parsed.CACHE_PAGES,
    cacheDir: parsed.CACHE_DIR,
    timeoutMs: parsed.REQUEST_TIMEOUT_MS,
    maxAttempts: parsed.MAX_ATTEMPTS,
    backoffFactor: parsed.BACKOFF_FACTOR,
    minDelayMs: Math.min(parsed.MIN_DELAY_MS, parsed.MAX_DELAY_MS),
    maxDelayMs: Math.max(parsed.MIN_DELAY_MS, parsed.MAX_DELAY_MS),
    proxyUrls: parsed.PROXY_URLS.split(',').map(s => s.trim()).filter(Boolean),
  };
}
