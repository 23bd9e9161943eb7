import { SocksProxyAgent } from 'socks-proxy-agent';
import type { AxiosRequestConfig } from 'axios';

export interface ProbeConfigOptions {
  timeout?: number | undefined;
  maxContentBytes?: number | undefined;
  userAgent?: string | undefined;
  proxyUrl?: string | undefined;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export class ProbeConfig {
  private readonly timeout: number;
  private readonly maxContentBytes: number;
  private readonly userAgent: string;
  private readonly proxyUrl: string | null;

  constructor(options: ProbeConfigOptions = {}) {
    this.timeout = options.timeout ?? 10000;
    this.maxContentBytes = options.maxContentBytes ?? 2 * 1024 * 1024;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.proxyUrl = options.proxyUrl ?? null;
  }

  get requestTimeout(): number {
    return this.timeout;
  }

  get contentLimit(): number {
    return this.maxContentBytes;
  }

  createProxyAgent(): SocksProxyAgent | null {
    return this.proxyUrl ? new SocksProxyAgent(this.proxyUrl) : null;
  }

  /** The signal bounds the whole exchange; `timeout` alone only fires on an idle socket. */
  getRequestConfig(signal?: AbortSignal): AxiosRequestConfig {
    const agent = this.createProxyAgent();

    return {
      ...(agent ? { httpAgent: agent, httpsAgent: agent } : {}),
      // Environment proxies are ignored; routing goes through proxyUrl only
      proxy: false,
      timeout: this.timeout,
      ...(signal ? { signal } : {}),
      // Redirects are walked by the prober so every hop is visible
      maxRedirects: 0,
      // Bodies are read by the prober up to the byte cap and then cut off
      responseType: 'stream',
      validateStatus: () => true,
      headers: {
        'User-Agent': this.userAgent,
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5',
        'Accept-Encoding': 'gzip, deflate',
      },
    };
  }
}
