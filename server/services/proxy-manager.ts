import { HttpsProxyAgent } from 'https-proxy-agent';
import { log } from '../log';

/**
 * Proxy Manager - round-robin over the proxies listed in PROXY_URLS.
 * With no proxies configured every request goes out directly.
 */
export class ProxyManager {
  private agents: HttpsProxyAgent<string>[];
  private hosts: string[];
  private requestCounts: number[];
  private currentIndex = 0;

  constructor(proxyUrls: string[] = []) {
    // Persistent agents with keepAlive, one per proxy
    this.agents = proxyUrls.map(url => new HttpsProxyAgent(url, {
      keepAlive: true,
      keepAliveMsecs: 30000,
      timeout: 60000
    }));
    this.hosts = proxyUrls.map(url => new URL(url).host);
    this.requestCounts = proxyUrls.map(() => 0);

    if (this.agents.length > 0) {
      log(`Created ${this.agents.length} persistent proxy agents`, 'PROXY');
    }
  }

  /**
   * Next agent in the rotation, or undefined for a direct connection
   */
  getProxyAgent(): HttpsProxyAgent<string> | undefined {
    if (this.agents.length === 0) return undefined;

    const index = this.currentIndex;
    this.requestCounts[index]++;
    this.currentIndex = (this.currentIndex + 1) % this.agents.length;
    return this.agents[index];
  }

  getStats() {
    return {
      totalRequests: this.requestCounts.reduce((a, b) => a + b, 0),
      perProxy: this.hosts.map((host, i) => ({
        host,
        requests: this.requestCounts[i]
      }))
    };
  }

  isEnabled(): boolean {
    return this.agents.length > 0;
  }

  destroy(): void {
    for (const agent of this.agents) {
      agent.destroy();
    }
  }
}
