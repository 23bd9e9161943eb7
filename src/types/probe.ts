import type { AxiosInstance } from 'axios';
import type { Logger } from 'winston';

export type Transport = 'https' | 'http';

export type ProbeFailureKind =
  | 'tls'
  | 'dns'
  | 'connection'
  | 'timeout'
  | 'redirect_loop'
  | 'too_many_redirects'
  | 'other';

export interface ProbeFailure {
  kind: ProbeFailureKind;
  message: string;
}

export interface ProbeResult {
  reached: boolean;
  requestedUrl: string;
  finalUrl: string | null;
  statusCode: number | null;
  pageTitle: string | null;
  bodyText: string;
  crossDomainRedirect: boolean;
  /** URLs visited after the first request, in order */
  redirectChain: string[];
  transport: Transport | null;
  failure: ProbeFailure | null;
}

export type FetchResult = FetchSuccessResult | FetchErrorResult;

export interface FetchSuccessResult {
  success: true;
  status: number;
  data: string;
  headers: Record<string, string>;
  url: string;
}

export interface FetchErrorResult {
  success: false;
  failure: ProbeFailure;
  url: string;
}

export interface ProberOptions {
  timeout?: number;
  maxRedirects?: number;
  maxContentBytes?: number;
  userAgent?: string;
  proxyUrl?: string | undefined;
  httpClient?: AxiosInstance;
  logger?: Logger;
}

export interface Prober {
  probe(domain: string): Promise<ProbeResult>;
}

export interface PageText {
  title: string | null;
  text: string;
}
