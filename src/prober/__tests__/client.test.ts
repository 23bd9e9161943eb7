import { describe, it, expect } from 'vitest';
import axios, { AxiosError, CanceledError, type AxiosInstance, type AxiosResponse } from 'axios';
import { Readable } from 'stream';
import { HttpProber } from '../client.js';
import { classifyNetworkError } from '../errors.js';

type Route =
  | { status: number; headers?: Record<string, string>; body?: string | Readable }
  | { error: Error };

interface ScriptedClient {
  client: AxiosInstance;
  requests: string[];
}

/** Axios instance answering from a URL → response table, without touching the network. */
function scriptedClient(routes: Record<string, Route>): ScriptedClient {
  const requests: string[] = [];

  const client = axios.create({
    adapter: async (config) => {
      const url = config.url ?? '';
      requests.push(url);

      const route = routes[url];
      if (!route) {
        throw new AxiosError(`getaddrinfo ENOTFOUND ${url}`, 'ENOTFOUND', config);
      }
      if ('error' in route) {
        throw route.error;
      }

      return {
        data: route.body ?? '',
        status: route.status,
        statusText: String(route.status),
        headers: route.headers ?? {},
        config,
      };
    },
  });

  return { client, requests };
}

const html = (title: string, body: string): Route => ({
  status: 200,
  headers: { 'content-type': 'text/html; charset=utf-8' },
  body: `<html><head><title>${title}</title></head><body><p>${body}</p></body></html>`,
});

const redirect = (status: number, location: string): Route => ({ status, headers: { location } });

function tlsError(): Error {
  return new AxiosError('write EPROTO ssl3_get_record:wrong version number', 'EPROTO');
}

describe('HttpProber', () => {
  it('reaches a site over HTTPS and extracts its page', async () => {
    const { client, requests } = scriptedClient({ 'https://ok.test/': html('OK Site', 'Hello there') });
    const prober = new HttpProber({ httpClient: client });

    const result = await prober.probe('OK.test');

    expect(requests).toEqual(['https://ok.test/']);
    expect(result).toEqual({
      reached: true,
      requestedUrl: 'https://ok.test/',
      finalUrl: 'https://ok.test/',
      statusCode: 200,
      pageTitle: 'OK Site',
      bodyText: 'Hello there',
      crossDomainRedirect: false,
      redirectChain: [],
      transport: 'https',
      failure: null,
    });
  });

  it('counts an HTTP error status as reached', async () => {
    const { client } = scriptedClient({ 'https://missing-page.test/': { status: 404, body: 'Not Found' } });
    const result = await new HttpProber({ httpClient: client }).probe('missing-page.test');

    expect(result.reached).toBe(true);
    expect(result.statusCode).toBe(404);
  });

  it('falls back to plain HTTP after a TLS failure', async () => {
    const { client, requests } = scriptedClient({
      'https://legacy.test/': { error: tlsError() },
      'http://legacy.test/': html('Legacy', 'Still here'),
    });

    const result = await new HttpProber({ httpClient: client }).probe('legacy.test');

    expect(requests).toEqual(['https://legacy.test/', 'http://legacy.test/']);
    expect(result.reached).toBe(true);
    expect(result.transport).toBe('http');
    expect(result.requestedUrl).toBe('http://legacy.test/');
  });

  it('does not fall back after a DNS failure', async () => {
    const { client, requests } = scriptedClient({});

    const result = await new HttpProber({ httpClient: client }).probe('nx.test');

    expect(requests).toEqual(['https://nx.test/']);
    expect(result.reached).toBe(false);
    expect(result.failure?.kind).toBe('dns');
    expect(result.transport).toBeNull();
  });

  it('reports an unreachable site when both transports fail', async () => {
    const { client } = scriptedClient({
      'https://dead.test/': { error: tlsError() },
      'http://dead.test/': { error: new AxiosError('connect ECONNREFUSED 127.0.0.1:80', 'ECONNREFUSED') },
    });

    const result = await new HttpProber({ httpClient: client }).probe('dead.test');

    expect(result.reached).toBe(false);
    expect(result.requestedUrl).toBe('http://dead.test/');
    expect(result.failure?.kind).toBe('connection');
  });

  it('follows a redirect to www without calling it cross-domain', async () => {
    const { client } = scriptedClient({
      'https://brand.test/': redirect(301, 'https://www.brand.test/'),
      'https://www.brand.test/': html('Brand', 'Welcome'),
    });

    const result = await new HttpProber({ httpClient: client }).probe('brand.test');

    expect(result.reached).toBe(true);
    expect(result.finalUrl).toBe('https://www.brand.test/');
    expect(result.redirectChain).toEqual(['https://www.brand.test/']);
    expect(result.crossDomainRedirect).toBe(false);
  });

  it('flags a redirect to another registrable domain', async () => {
    const { client } = scriptedClient({
      'https://old.test/': redirect(302, 'https://new.example/landing'),
      'https://new.example/landing': html('New', 'We moved'),
    });

    const result = await new HttpProber({ httpClient: client }).probe('old.test');

    expect(result.crossDomainRedirect).toBe(true);
    expect(result.finalUrl).toBe('https://new.example/landing');
  });

  it('resolves relative Location headers against the current URL', async () => {
    const { client } = scriptedClient({
      'https://rel.test/': redirect(301, '/home#top'),
      'https://rel.test/home': html('Home', 'Hi'),
    });

    const result = await new HttpProber({ httpClient: client }).probe('rel.test');

    expect(result.redirectChain).toEqual(['https://rel.test/home']);
    expect(result.crossDomainRedirect).toBe(false);
  });

  it('stops on a redirect loop', async () => {
    const { client, requests } = scriptedClient({
      'https://loop.test/': redirect(302, 'https://loop.test/a'),
      'https://loop.test/a': redirect(302, 'https://loop.test/'),
    });

    const result = await new HttpProber({ httpClient: client }).probe('loop.test');

    expect(requests).toEqual(['https://loop.test/', 'https://loop.test/a']);
    expect(result.reached).toBe(false);
    expect(result.failure?.kind).toBe('redirect_loop');
    expect(result.redirectChain).toEqual(['https://loop.test/a']);
  });

  it('stops after the redirect budget is spent', async () => {
    const { client } = scriptedClient({
      'https://hop.test/': redirect(301, 'https://hop.test/1'),
      'https://hop.test/1': redirect(301, 'https://hop.test/2'),
      'https://hop.test/2': redirect(301, 'https://hop.test/3'),
    });

    const result = await new HttpProber({ httpClient: client, maxRedirects: 2 }).probe('hop.test');

    expect(result.reached).toBe(false);
    expect(result.failure).toEqual({ kind: 'too_many_redirects', message: 'More than 2 redirects' });
    expect(result.redirectChain).toEqual(['https://hop.test/1', 'https://hop.test/2']);
  });

  it('treats a redirect status without Location as the final response', async () => {
    const { client } = scriptedClient({ 'https://odd.test/': { status: 302, body: 'moved somewhere' } });

    const result = await new HttpProber({ httpClient: client }).probe('odd.test');

    expect(result.reached).toBe(true);
    expect(result.statusCode).toBe(302);
  });

  it('cuts an oversized body at the byte cap and still counts the site as reached', async () => {
    // 46 bytes of markup before the paragraph text
    const page = `<html><head><title>Big</title></head><body><p>${'x'.repeat(500)}</p></body></html>`;
    const { client } = scriptedClient({
      'https://big.test/': {
        status: 200,
        headers: { 'content-type': 'text/html' },
        body: Readable.from([Buffer.from(page)]),
      },
    });

    const result = await new HttpProber({ httpClient: client, maxContentBytes: 100 }).probe('big.test');

    expect(result.reached).toBe(true);
    expect(result.failure).toBeNull();
    expect(result.statusCode).toBe(200);
    expect(result.pageTitle).toBe('Big');
    expect(result.bodyText).toBe('x'.repeat(54));
  });

  it('keeps what arrived when a body is still trickling in at the deadline', async () => {
    const trickle = new Readable({ read() {} });
    trickle.push('still loading ');

    const { client } = scriptedClient({
      'https://slow-body.test/': { status: 200, headers: { 'content-type': 'text/plain' }, body: trickle },
    });

    const startedAt = Date.now();
    const result = await new HttpProber({ httpClient: client, timeout: 50 }).probe('slow-body.test');

    expect(Date.now() - startedAt).toBeLessThan(2000);
    expect(result.reached).toBe(true);
    expect(result.bodyText).toBe('still loading');
  });

  it('gives up with a timeout when no response arrives before the deadline', async () => {
    const client = axios.create({
      adapter: (config) =>
        new Promise<AxiosResponse>((_resolve, reject) => {
          config.signal?.addEventListener?.('abort', () => reject(new CanceledError(undefined, config)));
        }),
    });

    const result = await new HttpProber({ httpClient: client, timeout: 50 }).probe('stalled.test');

    expect(result.reached).toBe(false);
    expect(result.failure?.kind).toBe('timeout');
  });
});

describe('classifyNetworkError', () => {
  it('maps error codes to failure kinds', () => {
    expect(classifyNetworkError(new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED')).kind).toBe('timeout');
    expect(classifyNetworkError(new AxiosError('getaddrinfo ENOTFOUND x.test', 'ENOTFOUND')).kind).toBe('dns');
    expect(classifyNetworkError(new AxiosError('certificate has expired', 'CERT_HAS_EXPIRED')).kind).toBe('tls');
    expect(classifyNetworkError(new AxiosError('socket hang up', 'ECONNRESET')).kind).toBe('connection');
    expect(classifyNetworkError(new CanceledError()).kind).toBe('timeout');
  });

  it('falls back to the error message when there is no code', () => {
    expect(classifyNetworkError(new Error('SSL routines:tls_process_server_certificate')).kind).toBe('tls');
    expect(classifyNetworkError(new Error('something odd')).kind).toBe('other');
    const deadline = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    expect(classifyNetworkError(deadline).kind).toBe('timeout');
    expect(classifyNetworkError('not an error')).toEqual({ kind: 'other', message: 'Unknown error' });
  });
});
