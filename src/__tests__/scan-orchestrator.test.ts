import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { runScan, ScanOrchestrator } from '../scan-orchestrator.js';
import { catalogFromRecord } from '../catalog/catalog.js';
import { ReportSchema } from '../schemas/report.js';
import { FakeProber, FakeRegistry, reachedProbe, registryRecord } from './helpers.js';
import type { ProbeResult, Prober } from '../types/probe.js';
import type { RegistryRecord } from '../types/registry.js';
import type { ScanOptions, ScanProgress } from '../types/scan.js';

const CLOCK = (): Date => new Date('2026-05-01T12:00:00Z');

const catalog = catalogFromRecord({
  '2005': ['example-thin.test', 'parked-test.test', 'gone-test.test', 'sale-test.test'],
  '2010': ['sale-test.test', 'idle-test.test', 'moved-test.test'],
});

function probes(): Record<string, ProbeResult> {
  return {
    'example-thin.test': reachedProbe('example-thin.test', { bodyText: 'Under Construction' }),
    'parked-test.test': reachedProbe('parked-test.test', { bodyText: 'This domain is parked' }),
    'sale-test.test': reachedProbe('sale-test.test', { bodyText: 'Buy this domain via Sedo' }),
    'moved-test.test': reachedProbe('moved-test.test', {
      finalUrl: 'https://elsewhere.example/',
      redirectChain: ['https://elsewhere.example/'],
      crossDomainRedirect: true,
    }),
  };
}

function registrations(): Record<string, RegistryRecord> {
  return { 'idle-test.test': registryRecord({ registrar: 'Idle Registrar' }) };
}

function scanOptions(overrides: Partial<ScanOptions> = {}): ScanOptions {
  return {
    workerCount: 3,
    domainDelay: 0,
    clock: CLOCK,
    logLevel: 'silent',
    prober: new FakeProber(probes()),
    registry: new FakeRegistry(registrations()),
    ...overrides,
  };
}

describe('runScan', () => {
  it('assigns every domain one of the six statuses', async () => {
    const report = await runScan(catalog, scanOptions());

    const statuses = Object.fromEntries(report.results.map((item) => [item.domain, item.status]));
    expect(statuses).toEqual({
      'example-thin.test': 'active',
      'parked-test.test': 'parked',
      'gone-test.test': 'available',
      'sale-test.test': 'for_sale',
      'idle-test.test': 'parked',
      'moved-test.test': 'redirect',
    });
    expect(report.summary).toEqual({ active: 1, parked: 2, for_sale: 1, redirect: 1, expired: 0, available: 1 });
    expect(report.totalDomains).toBe(6);
    expect(report.workerCount).toBe(3);
  });

  it('queries the registry only for unreachable domains', async () => {
    const prober = new FakeProber(probes());
    const registry = new FakeRegistry(registrations());

    await runScan(catalog, scanOptions({ prober, registry }));

    expect([...prober.calls].sort()).toEqual([
      'example-thin.test',
      'gone-test.test',
      'idle-test.test',
      'moved-test.test',
      'parked-test.test',
      'sale-test.test',
    ]);
    expect([...registry.calls].sort()).toEqual(['gone-test.test', 'idle-test.test']);
  });

  it('scores an unregistered, unreachable domain from catalog data alone', async () => {
    const report = await runScan(catalog, scanOptions());
    const gone = report.results.find((item) => item.domain === 'gone-test.test');

    expect(gone).toMatchObject({
      status: 'available',
      confidence: 'high',
      years: [2005],
      score: 8,
      httpInfo: null,
      whoisInfo: null,
      checkedAt: '2026-05-01T12:00:00.000Z',
    });
    expect(gone?.scoreBreakdown).toEqual({
      base: 5,
      age: 2,
      length: 0,
      tld: 0,
      popularity: 0,
      keywords: 0,
      brandability: 0,
      status: 0.5,
    });
  });

  it('carries the deciding reason and sale platform into the report', async () => {
    const report = await runScan(catalog, scanOptions());
    const sale = report.results.find((item) => item.domain === 'sale-test.test');

    expect(sale).toMatchObject({
      status: 'for_sale',
      confidence: 'high',
      reason: 'Page offers the domain for sale ("buy this domain")',
      salePlatform: 'sedo',
    });
  });

  it('keeps registry details for registered domains without a website', async () => {
    const report = await runScan(catalog, scanOptions());
    const idle = report.results.find((item) => item.domain === 'idle-test.test');

    expect(idle?.whoisInfo?.registrar).toBe('Idle Registrar');
    expect(idle?.httpInfo).toBeNull();
  });

  it('produces the same records with one worker or ten', async () => {
    const single = await runScan(catalog, scanOptions({ workerCount: 1 }));
    const many = await runScan(catalog, scanOptions({ workerCount: 10 }));

    const byDomain = (a: { domain: string }, b: { domain: string }): number => a.domain.localeCompare(b.domain);
    expect([...many.results].sort(byDomain)).toEqual([...single.results].sort(byDomain));
    expect(many.summary).toEqual(single.summary);
  });

  it('reports progress for every domain', async () => {
    const progress: ScanProgress[] = [];
    await runScan(catalog, scanOptions({ onProgress: (update) => progress.push(update) }));

    expect(progress.map((update) => update.completed)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(progress.every((update) => update.total === 6)).toBe(true);
  });

  it('finishes the scan when the progress listener throws', async () => {
    const report = await runScan(
      catalog,
      scanOptions({
        onProgress: () => {
          throw new Error('listener broke');
        },
      })
    );

    expect(report.totalDomains).toBe(6);
  });

  it('applies the year filter and quick mode', async () => {
    const byYear = await runScan(catalog, scanOptions({ yearFilter: 2010 }));
    expect(byYear.results.map((item) => item.domain).sort()).toEqual(['idle-test.test', 'moved-test.test', 'sale-test.test']);

    const quick = await runScan(catalog, scanOptions({ quickMode: true, quickLimit: 1 }));
    expect(quick.results.map((item) => item.domain).sort()).toEqual(['example-thin.test', 'sale-test.test']);
  });

  it('degrades a domain whose check throws to a low-confidence available record', async () => {
    class ExplodingProber implements Prober {
      async probe(domain: string): Promise<ProbeResult> {
        if (domain === 'sale-test.test') {
          throw new Error('probe exploded');
        }
        return reachedProbe(domain, { bodyText: 'Under Construction' });
      }
    }

    const report = await runScan(catalog, scanOptions({ prober: new ExplodingProber() }));
    const sale = report.results.find((item) => item.domain === 'sale-test.test');

    expect(report.totalDomains).toBe(6);
    expect(sale).toMatchObject({
      status: 'available',
      confidence: 'low',
      reason: 'Check failed: probe exploded',
      salePlatform: null,
    });
  });

  it('spreads the catalog over the worker pool', async () => {
    const orchestrator = new ScanOrchestrator(catalog, scanOptions({ workerCount: 2 }));
    await orchestrator.run();

    const stats = orchestrator.getStats();
    expect(stats.workerCount).toBe(2);
    expect(stats.workers.map((worker) => worker.workerId)).toEqual(['scan-worker-1', 'scan-worker-2']);
    expect(stats.workers.reduce((sum, worker) => sum + worker.processed, 0)).toBe(6);
  });

  describe('setup validation', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'scan-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('rejects a worker count below one before probing', async () => {
      const prober = new FakeProber(probes());
      await expect(runScan(catalog, scanOptions({ workerCount: 0, prober }))).rejects.toMatchObject({
        code: 'INVALID_WORKER_COUNT',
      });
      expect(prober.calls).toEqual([]);
    });

    it('rejects a year missing from the catalog before probing', async () => {
      const prober = new FakeProber(probes());
      await expect(runScan(catalog, scanOptions({ yearFilter: 1999, prober }))).rejects.toMatchObject({ code: 'UNKNOWN_YEAR' });
      expect(prober.calls).toEqual([]);
    });

    it('rejects an unwritable output path before probing', async () => {
      const prober = new FakeProber(probes());
      const outputPath = path.join(dir, 'missing', 'results.json');

      await expect(runScan(catalog, scanOptions({ outputPath, prober }))).rejects.toMatchObject({ code: 'OUTPUT_UNWRITABLE' });
      expect(prober.calls).toEqual([]);
    });

    it('writes the report to the output path', async () => {
      const outputPath = path.join(dir, 'results.json');

      const report = await runScan(catalog, scanOptions({ outputPath }));

      const written = ReportSchema.parse(JSON.parse(await fs.readFile(outputPath, 'utf8')));
      expect(written).toEqual(report);
    });
  });
});
