import axios, { type AxiosInstance } from 'axios';
import { Readable } from 'stream';
import type { Logger } from 'winston';
import { ProbeConfig } from './config.js';
import { classifyNetworkError } from './errors.js';
import { TextExtractor } from '../extraction/text-extractor.js';
import { extractHost, isSameRegistrableDomain, normalizeDomain } from '../utils/domain.js';
import type {
  FetchResult,
  FetchSuccessResult,
  ProbeFailure,
  ProbeResult,
  Prober,
  ProberOptions,
  Transport,
} from '../types/probe.js';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

interface BodyRead {
  data: string;
  truncated: boolean;
}

interface RedirectWalk {
  result: FetchResult;
  chain: string[];
}

export class HttpProber implements Prober {
  private readonly probeConfig: ProbeConfig;
  private readonly httpClient: AxiosInstance;
  private readonly maxRedirects: number;
  private readonly extractor: TextExtractor;
  private readonly logger: Logger | null;

  constructor(options: ProberOptions = {}) {
    this.probeConfig = new ProbeConfig(options);
    this.httpClient = options.httpClient ?? axios.create();
    this.maxRedirects = options.maxRedirects ?? 5;
    this.extractor = new TextExtractor();
    this.logger = options.logger ?? null;
  }

  async probe(domain: string): Promise<ProbeResult> {
    const target = normalizeDomain(domain);
    const httpsUrl = `https://${target}/`;

    const secure = await this.walk(httpsUrl);
    if (secure.result.success) {
      return this.buildReachedResult(httpsUrl, 'https', secure.result, secure.chain);
    }

    // Plain HTTP is only worth trying when the secure transport itself broke
    if (secure.result.failure.kind !== 'tls') {
      return this.buildFailedResult(httpsUrl, secure.result.failure, secure.chain);
    }

    this.logger?.debug('TLS failure, retrying over plain HTTP', { domain: target, error: secure.result.failure.message });

    const httpUrl = `http://${target}/`;
    const plain = await this.walk(httpUrl);
    if (plain.result.success) {
      return this.buildReachedResult(httpUrl, 'http', plain.result, plain.chain);
    }

    return this.buildFailedResult(httpUrl, plain.result.failure, plain.chain);
  }

  private async walk(startUrl: string): Promise<RedirectWalk> {
    const chain: string[] = [];
    const visited = new Set<string>([startUrl]);
    let url = startUrl;

    for (let hop = 0; ; hop++) {
      const result = await this.fetch(url);
      if (!result.success) {
        return { result, chain };
      }

      const location = result.headers['location'];
      if (!REDIRECT_STATUSES.has(result.status) || !location) {
        return { result, chain };
      }

      const next = this.resolveLocation(location, url);
      if (!next) {
        return { result, chain };
      }

      if (visited.has(next)) {
        return { result: this.failure(next, { kind: 'redirect_loop', message: `Redirect loop at ${next}` }), chain };
      }

      if (hop >= this.maxRedirects) {
        return {
          result: this.failure(next, { kind: 'too_many_redirects', message: `More than ${this.maxRedirects} redirects` }),
          chain,
        };
      }

      visited.add(next);
      chain.push(next);
      url = next;
    }
  }

  /**
   * Read a body stream up to maxBytes, then stop. A body still arriving when the
   * signal fires is cut off where it stands.
   */
  private async readStreamWithLimit(stream: Readable, maxBytes: number, signal: AbortSignal): Promise<BodyRead> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let totalBytes = 0;
      let truncated = false;

      const finish = (): void => {
        signal.removeEventListener('abort', onAbort);
        resolve({ data: Buffer.concat(chunks).toString('utf8'), truncated });
      };

      const onAbort = (): void => {
        truncated = true;
        stream.destroy();
      };

      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }

      stream.on('data', (chunk: Buffer | string) => {
        const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
        const remaining = maxBytes - totalBytes;
        if (remaining <= 0) {
          truncated = true;
          stream.destroy();
          return;
        }

        if (bytes.length > remaining) {
          chunks.push(bytes.subarray(0, remaining));
          totalBytes = maxBytes;
          truncated = true;
          stream.destroy();
        } else {
          chunks.push(bytes);
          totalBytes += bytes.length;
        }
      });

      stream.on('end', finish);
      // Destroyed streams emit close without end
      stream.on('close', finish);

      stream.on('error', (error) => {
        if (truncated) {
          finish();
          return;
        }
        signal.removeEventListener('abort', onAbort);
        reject(error);
      });
    });
  }

  private async readBody(data: unknown, signal: AbortSignal): Promise<BodyRead> {
    const maxBytes = this.probeConfig.contentLimit;

    if (data instanceof Readable) {
      return this.readStreamWithLimit(data, maxBytes, signal);
    }

    if (typeof data === 'string') {
      const bytes = Buffer.from(data);
      return bytes.length > maxBytes
        ? { data: bytes.subarray(0, maxBytes).toString('utf8'), truncated: true }
        : { data, truncated: false };
    }

    return { data: '', truncated: false };
  }

  async fetch(url: string): Promise<FetchResult> {
    try {
      this.logger?.debug(`GET ${url}`);
      const signal = AbortSignal.timeout(this.probeConfig.requestTimeout);
      const response = await this.httpClient.request<unknown>({
        ...this.probeConfig.getRequestConfig(signal),
        url,
        method: 'GET',
      });

      const body = await this.readBody(response.data, signal);
      if (body.truncated) {
        this.logger?.debug(`Body of ${url} cut off at ${body.data.length} characters`);
      }

      const headers: Record<string, string> = {};
      const entries: Array<[string, unknown]> = Object.entries(response.headers);
      for (const [name, value] of entries) {
        if (typeof value === 'string') {
          headers[name.toLowerCase()] = value;
        } else if (Array.isArray(value)) {
          headers[name.toLowerCase()] = value.join(', ');
        } else if (typeof value === 'number') {
          headers[name.toLowerCase()] = String(value);
        }
      }

      const result: FetchSuccessResult = {
        success: true,
        status: response.status,
        data: body.data,
        headers,
        url,
      };

      return result;
    } catch (error) {
      const failure = classifyNetworkError(error);
      this.logger?.debug(`Request to ${url} failed (${failure.kind}): ${failure.message}`);
      return this.failure(url, failure);
    }
  }

  private failure(url: string, failure: ProbeFailure): FetchResult {
    return { success: false, failure, url };
  }

  private resolveLocation(location: string, baseUrl: string): string | null {
    try {
      const resolved = new URL(location, baseUrl);
      if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
      resolved.hash = '';
      return resolved.href;
    } catch {
      return null;
    }
  }

  private buildReachedResult(
    requestedUrl: string,
    transport: Transport,
    result: FetchSuccessResult,
    chain: string[]
  ): ProbeResult {
    const requestedHost = extractHost(requestedUrl) ?? '';
    const finalHost = extractHost(result.url);
    const crossDomainRedirect =
      chain.length > 0 && finalHost !== null && !isSameRegistrableDomain(finalHost, requestedHost);

    const page = this.extractor.extract(result.data, result.headers['content-type'] ?? null);

    return {
      reached: true,
      requestedUrl,
      finalUrl: result.url,
      statusCode: result.status,
      pageTitle: page.title,
      bodyText: page.text,
      crossDomainRedirect,
      redirectChain: chain,
      transport,
      failure: null,
    };
  }

  private buildFailedResult(requestedUrl: string, failure: ProbeFailure, chain: string[]): ProbeResult {
    return {
      reached: false,
      requestedUrl,
      finalUrl: null,
      statusCode: null,
      pageTitle: null,
      bodyText: '',
      crossDomainRedirect: false,
      redirectChain: chain,
      transport: null,
      failure,
    };
  }
}
