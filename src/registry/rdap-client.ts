import axios, { type AxiosInstance } from 'axios';
import type { Logger } from 'winston';
import { RdapBootstrapSchema, RdapDomainSchema, VcardArraySchema, type RdapDomain, type RdapEntity } from '../schemas/rdap.js';
import { delay } from '../utils/delay.js';
import { domainTld, normalizeDomain } from '../utils/domain.js';
import type { RegistryClientOptions, RegistryLookup, RegistryRecord } from '../types/registry.js';

export const IANA_RDAP_BOOTSTRAP_URL = 'https://data.iana.org/rdap/dns.json';

const MAX_RETRY_AFTER_MS = 30000;

type RdapServiceIndex = Map<string, string[]>;

type RdapQueryOutcome =
  | { kind: 'found'; record: RegistryRecord }
  | { kind: 'not_found' }
  | { kind: 'failed'; error: string; retryAfterMs: number | null };

export class RdapClient implements RegistryLookup {
  private readonly httpClient: AxiosInstance;
  private readonly timeout: number;
  private readonly retryAttempts: number;
  private readonly retryDelay: number;
  private readonly bootstrapUrl: string;
  private readonly logger: Logger | null;
  private serviceIndexPromise: Promise<RdapServiceIndex> | null;

  constructor(options: RegistryClientOptions = {}) {
    this.httpClient = options.httpClient ?? axios.create();
    this.timeout = options.timeout ?? 10000;
    this.retryAttempts = Math.max(options.retryAttempts ?? 2, 1);
    this.retryDelay = options.retryDelay ?? 2000;
    this.bootstrapUrl = options.bootstrapUrl ?? IANA_RDAP_BOOTSTRAP_URL;
    this.logger = options.logger ?? null;
    this.serviceIndexPromise = options.rdapServers ? Promise.resolve(indexServers(options.rdapServers)) : null;
  }

  async lookup(domain: string): Promise<RegistryRecord> {
    const target = normalizeDomain(domain);
    const tld = domainTld(target);

    let servers: string[];
    try {
      const index = await this.loadServiceIndex();
      servers = index.get(tld) ?? [];
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      return emptyRecord(`RDAP bootstrap unavailable: ${errorMessage}`);
    }

    if (servers.length === 0) {
      return emptyRecord(`No RDAP service for .${tld}`);
    }

    let lastError = 'RDAP lookup failed';

    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      const outcome = await this.query(servers, target);

      if (outcome.kind === 'found') return outcome.record;
      if (outcome.kind === 'not_found') return emptyRecord(null);

      lastError = outcome.error;
      if (attempt < this.retryAttempts) {
        const waitMs = outcome.retryAfterMs ?? this.retryDelay * attempt;
        this.logger?.debug(`RDAP lookup failed (attempt ${attempt}/${this.retryAttempts}), retrying in ${waitMs}ms`, {
          domain: target,
          error: outcome.error,
        });
        await delay(waitMs);
      }
    }

    return emptyRecord(lastError);
  }

  private async query(servers: string[], domain: string): Promise<RdapQueryOutcome> {
    let lastFailure: RdapQueryOutcome = { kind: 'failed', error: 'RDAP lookup failed', retryAfterMs: null };

    for (const server of servers) {
      const url = buildDomainQueryUrl(server, domain);

      try {
        const response = await this.httpClient.get<unknown>(url, {
          timeout: this.timeout,
          signal: AbortSignal.timeout(this.timeout),
          responseType: 'json',
          validateStatus: () => true,
          headers: { Accept: 'application/rdap+json, application/json' },
        });

        if (response.status === 404) {
          return { kind: 'not_found' };
        }

        if (response.status === 429) {
          const retryAfter = response.headers['retry-after'];
          return {
            kind: 'failed',
            error: 'RDAP rate limited (429)',
            retryAfterMs: parseRetryAfter(typeof retryAfter === 'string' ? retryAfter : null),
          };
        }

        if (response.status === 200) {
          const parsed = RdapDomainSchema.safeParse(response.data);
          if (parsed.success && parsed.data.objectClassName === 'domain') {
            return { kind: 'found', record: toRegistryRecord(parsed.data) };
          }
          lastFailure = { kind: 'failed', error: 'Unexpected RDAP payload', retryAfterMs: null };
          continue;
        }

        lastFailure = { kind: 'failed', error: `RDAP HTTP ${response.status}`, retryAfterMs: null };
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        lastFailure = { kind: 'failed', error: errorMessage, retryAfterMs: null };
      }
    }

    return lastFailure;
  }

  private loadServiceIndex(): Promise<RdapServiceIndex> {
    if (!this.serviceIndexPromise) {
      this.serviceIndexPromise = this.httpClient
        .get<unknown>(this.bootstrapUrl, {
          timeout: this.timeout,
          signal: AbortSignal.timeout(this.timeout),
          responseType: 'json',
        })
        .then((response) => {
          const bootstrap = RdapBootstrapSchema.parse(response.data);
          const index: RdapServiceIndex = new Map();
          for (const [tlds, urls] of bootstrap.services) {
            for (const tld of tlds) {
              index.set(tld.toLowerCase(), urls);
            }
          }
          return index;
        })
        .catch((error: unknown) => {
          this.serviceIndexPromise = null;
          throw error;
        });
    }

    return this.serviceIndexPromise;
  }
}

function indexServers(servers: Record<string, string[]>): RdapServiceIndex {
  return new Map(Object.entries(servers).map(([tld, urls]) => [tld.toLowerCase(), urls]));
}

function buildDomainQueryUrl(serviceUrl: string, domain: string): string {
  const normalized = serviceUrl.endsWith('/') ? serviceUrl : `${serviceUrl}/`;
  return `${normalized}domain/${encodeURIComponent(domain)}`;
}

function emptyRecord(error: string | null): RegistryRecord {
  return {
    found: false,
    registrar: null,
    createdOn: null,
    expiresOn: null,
    nameServers: [],
    registrantContact: null,
    statuses: [],
    error,
  };
}

function toRegistryRecord(data: RdapDomain): RegistryRecord {
  const entities = flattenEntities(data.entities);
  const registrar = entities.find((entity) => entity.roles?.includes('registrar'));
  const registrant = entities.find((entity) => entity.roles?.includes('registrant'));

  return {
    found: true,
    registrar: registrar ? vcardField(registrar, 'fn') : null,
    createdOn: eventDate(data, 'registration'),
    expiresOn: eventDate(data, 'expiration'),
    nameServers: data.nameservers
      .map((ns) => ns.ldhName?.toLowerCase().replace(/\.$/, ''))
      .filter((name): name is string => Boolean(name)),
    registrantContact: registrant ? (vcardField(registrant, 'fn') ?? vcardField(registrant, 'org')) : null,
    statuses: data.status,
    error: null,
  };
}

function flattenEntities(entities: RdapEntity[]): RdapEntity[] {
  return entities.flatMap((entity) => [entity, ...flattenEntities(entity.entities ?? [])]);
}

function vcardField(entity: RdapEntity, field: string): string | null {
  const vcard = VcardArraySchema.safeParse(entity.vcardArray);
  if (!vcard.success) return null;

  for (const property of vcard.data[1]) {
    const value = property[3];
    if (property[0] === field && typeof value === 'string' && value.trim()) {
      return value.trim();
    }
  }
  return null;
}

function eventDate(data: RdapDomain, action: string): string | null {
  const event = data.events.find((e) => e.eventAction === action);
  if (!event) return null;

  const timestamp = Date.parse(event.eventDate);
  return Number.isNaN(timestamp) ? null : new Date(timestamp).toISOString().substring(0, 10);
}

function parseRetryAfter(value: string | null): number | null {
  if (!value) return null;

  const seconds = Number(value);
  if (!Number.isNaN(seconds)) {
    return Math.min(Math.max(seconds, 0) * 1000, MAX_RETRY_AFTER_MS);
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    return Math.min(Math.max(date - Date.now(), 0), MAX_RETRY_AFTER_MS);
  }

  return null;
}
