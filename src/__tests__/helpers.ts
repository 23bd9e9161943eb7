import type { ProbeFailureKind, ProbeResult, Prober } from '../types/probe.js';
import type { RegistryLookup, RegistryRecord } from '../types/registry.js';

export function reachedProbe(domain: string, overrides: Partial<ProbeResult> = {}): ProbeResult {
  return {
    reached: true,
    requestedUrl: `https://${domain}/`,
    finalUrl: `https://${domain}/`,
    statusCode: 200,
    pageTitle: null,
    bodyText: '',
    crossDomainRedirect: false,
    redirectChain: [],
    transport: 'https',
    failure: null,
    ...overrides,
  };
}

export function unreachedProbe(domain: string, kind: ProbeFailureKind = 'dns'): ProbeResult {
  return {
    reached: false,
    requestedUrl: `https://${domain}/`,
    finalUrl: null,
    statusCode: null,
    pageTitle: null,
    bodyText: '',
    crossDomainRedirect: false,
    redirectChain: [],
    transport: null,
    failure: { kind, message: `${kind} failure` },
  };
}

export function registryRecord(overrides: Partial<RegistryRecord> = {}): RegistryRecord {
  return {
    found: true,
    registrar: 'Example Registrar',
    createdOn: '2001-03-04',
    expiresOn: '2030-03-04',
    nameServers: ['ns1.example.net'],
    registrantContact: null,
    statuses: ['client transfer prohibited'],
    error: null,
    ...overrides,
  };
}

/** In-memory prober; domains without a scripted result are unreachable. */
export class FakeProber implements Prober {
  readonly calls: string[] = [];
  private readonly results: Record<string, ProbeResult>;

  constructor(results: Record<string, ProbeResult>) {
    this.results = results;
  }

  async probe(domain: string): Promise<ProbeResult> {
    this.calls.push(domain);
    return this.results[domain] ?? unreachedProbe(domain);
  }
}

/** In-memory registry; domains without a scripted record are unregistered. */
export class FakeRegistry implements RegistryLookup {
  readonly calls: string[] = [];
  private readonly records: Record<string, RegistryRecord>;

  constructor(records: Record<string, RegistryRecord> = {}) {
    this.records = records;
  }

  async lookup(domain: string): Promise<RegistryRecord> {
    this.calls.push(domain);
    return this.records[domain] ?? registryRecord({ found: false, registrar: null, createdOn: null, expiresOn: null, nameServers: [], statuses: [] });
  }
}
