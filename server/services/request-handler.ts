import http from 'http';
import https from 'https';
import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { TransportError, getErrorMessage } from '../errors';
import { log } from '../log';
import type { ProxyManager } from './proxy-manager';
import { DEFAULT_HEADERS, sleep } from './scraper-utils';

/**
 * HTTP transport for listing pages.
 *
 * One instance is one session: keep-alive agents and browser-like headers are
 * shared by every request it makes, and close() releases the sockets.
 * Transient failures are retried with exponential backoff (factor * 2^(n-1) s).
 */

export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'DELETE';

export const RETRY_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504, 520]);
export const RETRYABLE_METHODS = new Set<HttpMethod>(['HEAD', 'GET', 'OPTIONS']);

export interface RequestHandlerOptions {
  timeoutMs?: number;
  maxAttempts?: number;
  backoffFactor?: number;
  headers?: Record<string, string>;
  proxyManager?: ProxyManager;
  adapter?: AxiosRequestConfig['adapter'];
  onLog?: (msg: string) => void;
}

type AttemptOutcome =
  | { response: AxiosResponse<string>; error?: undefined }
  | { response?: undefined; error: string };

export class RequestHandler {
  private client: AxiosInstance;
  private httpAgent = new http.Agent({ keepAlive: true });
  private httpsAgent = new https.Agent({ keepAlive: true });
  private maxAttempts: number;
  private backoffFactor: number;
  private proxyManager?: ProxyManager;
  private onLog: (msg: string) => void;

  constructor(options: RequestHandlerOptions = {}) {
    this.maxAttempts = Math.max(options.maxAttempts ?? 3, 1);
    this.backoffFactor = options.backoffFactor ?? 2;
    this.proxyManager = options.proxyManager;
    this.onLog = options.onLog ?? (msg => log(msg, 'FETCH'));

    this.client = axios.create({
      timeout: options.timeoutMs ?? 30000,
      maxRedirects: 5,
      headers: { ...DEFAULT_HEADERS, ...options.headers },
      responseType: 'text',
      // Status handling happens in request(), not in axios
      validateStatus: () => true,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      adapter: options.adapter,
    });
  }

  async get(url: string): Promise<string> {
    const response = await this.request('GET', url);
    return response.data;
  }

  async request(method: HttpMethod, url: string): Promise<AxiosResponse<string>> {
    const retryable = RETRYABLE_METHODS.has(method);

    for (let attempt = 1; ; attempt++) {
      const outcome = await this.attempt(method, url);
      if (outcome.response && outcome.response.status >= 200 && outcome.response.status < 300) {
        return outcome.response;
      }

      const status = outcome.response ? outcome.response.status : null;
      const reason = status !== null ? `HTTP ${status}` : outcome.error ?? 'unknown error';
      const transient = status === null || RETRY_STATUS_CODES.has(status);

      if (!retryable || !transient || attempt >= this.maxAttempts) {
        throw new TransportError(
          `${method} ${url} failed after ${attempt} attempt(s): ${reason}`,
          url,
          status,
        );
      }

      const waitMs = this.backoffFactor * 1000 * 2 ** (attempt - 1);
      this.onLog(`❌ ${reason} for ${url} (attempt ${attempt}/${this.maxAttempts}), retrying in ${waitMs}ms`);
      await sleep(waitMs);
    }
  }

  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private async attempt(method: HttpMethod, url: string): Promise<AttemptOutcome> {
    const proxyAgent = this.proxyManager?.getProxyAgent();
    try {
      const response = await this.client.request<string>({
        method,
        url,
        ...(proxyAgent ? { httpsAgent: proxyAgent, httpAgent: proxyAgent, proxy: false } : {}),
      });
      return { response };
    } catch (error) {
      return { error: getErrorMessage(error) };
    }
  }
}
