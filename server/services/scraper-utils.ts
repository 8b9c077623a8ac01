/**
 * Shared Scraper Utilities
 * URL checks, site detection and timing helpers used by every scraper
 */

import type { Website } from '@shared/schema';
import { UnknownWebsiteError } from '../errors';

// ============================================
// DELAY & JITTER UTILITIES
// ============================================

export function sleep(ms: number): Promise<void> {
  return new Promise(r => setTimeout(r, ms));
}

export function withJitter(base = 800, jitter = 700): number {
  return base + Math.floor(Math.random() * jitter);
}

/**
 * Random delay in [minMs, maxMs], used as a politeness throttle between listings
 */
export function randomDelay(minMs: number, maxMs: number): number {
  return withJitter(minMs, Math.max(maxMs - minMs, 0) + 1);
}

// ============================================
// BROWSER HEADERS
// ============================================

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': BROWSER_USER_AGENT,
  'Accept-Encoding': 'gzip, deflate, br',
  'Connection': 'keep-alive',
  'Cache-Control': 'max-age=0',
};

// ============================================
// URL HELPERS
// ============================================

/**
 * True when the string parses as an absolute URL with both scheme and host
 */
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol.length > 1 && parsed.host.length > 0;
  } catch {
    return false;
  }
}

const WEBSITE_MARKERS: Array<[string, Website]> = [
  ['funda', 'funda'],
  ['huislijn', 'huislijn'],
];

export function getWebsite(url: string): Website {
  const host = isValidUrl(url) ? new URL(url).hostname.toLowerCase() : '';
  const match = WEBSITE_MARKERS.find(([marker]) => host.includes(marker));
  if (!match) {
    throw new UnknownWebsiteError(url);
  }
  return match[1];
}

/**
 * Filename for a cached page: host plus the URL path with slashes as underscores
 * e.g. https://www.funda.nl/detail/koop/leiden/ → www.funda.nl_detail_koop_leiden.html
 */
export function getSafeFilename(url: string): string {
  const parsed = new URL(url);
  const path = parsed.pathname
    .replace(/^\/+|\/+$/g, '')
    .replace(/\//g, '_')
    .replace(/[^\w.\-]/g, '-');
  return `${parsed.host.replace(/:/g, '_')}_${path}.html`;
}
