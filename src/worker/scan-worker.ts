import type { Logger } from 'winston';
import { resolveRegistryStatus } from '../classifier/registry-status.js';
import { recommend } from '../scoring/recommendation.js';
import { createScanWorkerLogger } from '../utils/logger.js';
import { delay } from '../utils/delay.js';
import type { PageClassifier } from '../classifier/page-classifier.js';
import type { Scorer } from '../scoring/scorer.js';
import type { WorkQueue } from '../queue/work-queue.js';
import type { CatalogEntry } from '../types/catalog.js';
import type { Prober, ProbeResult } from '../types/probe.js';
import type { RegistryLookup, RegistryRecord } from '../types/registry.js';
import type { Classification, DomainRecord, DomainStatus } from '../types/record.js';
import type { RecordSink, ScanWorkerOptions } from '../types/scan.js';

export interface ScanWorkerDeps {
  queue: WorkQueue;
  prober: Prober;
  registry: RegistryLookup;
  classifier: PageClassifier;
  scorer: Scorer;
  sink: RecordSink;
}

export class ScanWorker {
  private readonly workerId: string;
  private readonly deps: ScanWorkerDeps;
  private readonly domainDelay: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private processed: number;

  constructor(workerId: string, deps: ScanWorkerDeps, options: ScanWorkerOptions = {}) {
    this.workerId = workerId;
    this.deps = deps;
    this.domainDelay = options.domainDelay ?? 500;
    this.clock = options.clock ?? (() => new Date());
    this.processed = 0;

    this.logger = createScanWorkerLogger(workerId, options.logLevel, options.logDir);
  }

  /** Drains the shared queue; resolves once it is empty. */
  async run(): Promise<void> {
    this.logger.debug('Worker started');

    let entry = this.deps.queue.next();
    while (entry) {
      const record = await this.processEntry(entry);
      this.deps.sink(record);
      this.processed++;

      entry = this.deps.queue.next();
      if (entry && this.domainDelay > 0) {
        await delay(this.domainDelay);
      }
    }

    this.logger.debug(`Worker finished after ${this.processed} domains`);
  }

  async processEntry(entry: CatalogEntry): Promise<DomainRecord> {
    const { domain } = entry;

    try {
      this.logger.debug('Probing', { domain });
      const probe = await this.deps.prober.probe(domain);
      const pageClassification = this.deps.classifier.classify(entry, probe);

      if (pageClassification.status !== 'unknown') {
        this.logger.debug(`Classified as ${pageClassification.status}: ${pageClassification.reason}`, { domain });
        return this.assemble(entry, pageClassification.status, pageClassification, probe, null);
      }

      this.logger.debug('Unreachable, asking the registry', { domain });
      const registry = await this.deps.registry.lookup(domain);
      const registryClassification = resolveRegistryStatus(registry, this.clock());
      const status = registryClassification.status === 'unknown' ? 'available' : registryClassification.status;

      return this.assemble(entry, status, registryClassification, probe, registry);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error('Domain check failed', { domain, error: errorMessage });

      return this.assemble(
        entry,
        'available',
        { status: 'available', confidence: 'low', reason: `Check failed: ${errorMessage}`, salePlatform: null },
        null,
        null
      );
    }
  }

  private assemble(
    entry: CatalogEntry,
    status: DomainStatus,
    classification: Classification,
    probe: ProbeResult | null,
    registry: RegistryRecord | null
  ): DomainRecord {
    const now = this.clock();
    const input = { domain: entry.domain, years: entry.years, status };
    const result = this.deps.scorer.score(input, now);

    return {
      domain: entry.domain,
      years: entry.years,
      status,
      confidence: classification.confidence,
      reason: classification.reason,
      salePlatform: classification.salePlatform,
      probe,
      registry,
      score: result.score,
      scoreBreakdown: result.breakdown,
      recommendation: recommend(input, result, this.deps.scorer, now),
      checkedAt: now.toISOString(),
    };
  }

  getStats(): { workerId: string; processed: number } {
    return { workerId: this.workerId, processed: this.processed };
  }
}
