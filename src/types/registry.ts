import type { AxiosInstance } from 'axios';
import type { Logger } from 'winston';

export interface RegistryRecord {
  found: boolean;
  registrar: string | null;
  /** ISO date (YYYY-MM-DD) */
  createdOn: string | null;
  /** ISO date (YYYY-MM-DD) */
  expiresOn: string | null;
  nameServers: string[];
  registrantContact: string | null;
  statuses: string[];
  /** Set when the lookup failed, as opposed to finding no registration */
  error: string | null;
}

export interface RegistryClientOptions {
  timeout?: number;
  retryAttempts?: number;
  retryDelay?: number;
  bootstrapUrl?: string;
  /** TLD → RDAP base URLs; replaces the IANA bootstrap file when given */
  rdapServers?: Record<string, string[]>;
  httpClient?: AxiosInstance;
  logger?: Logger;
}

export interface RegistryLookup {
  lookup(domain: string): Promise<RegistryRecord>;
}
