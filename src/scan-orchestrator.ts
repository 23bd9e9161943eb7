import type { Logger } from 'winston';
import { ScanWorker } from './worker/scan-worker.js';
import { WorkQueue } from './queue/work-queue.js';
import { ResultCollector } from './queue/result-collector.js';
import { HttpProber } from './prober/client.js';
import { RdapClient } from './registry/rdap-client.js';
import { PageClassifier } from './classifier/page-classifier.js';
import { Scorer } from './scoring/scorer.js';
import { buildCatalogEntries } from './catalog/catalog.js';
import { buildReport } from './report/report-builder.js';
import { assertWritable, writeReport } from './report/report-writer.js';
import { ScanSetupError } from './errors.js';
import { createLogger } from './utils/logger.js';
import type { Catalog } from './types/catalog.js';
import type { Report } from './types/report.js';
import type { ScanOptions } from './types/scan.js';

export class ScanOrchestrator {
  private readonly catalog: Catalog;
  private readonly options: ScanOptions;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private workers: ScanWorker[];

  constructor(catalog: Catalog, options: ScanOptions) {
    this.catalog = catalog;
    this.options = options;
    this.clock = options.clock ?? (() => new Date());
    this.workers = [];
    this.logger = createLogger({
      name: 'ORCHESTRATOR',
      level: options.logLevel,
      logFile: options.logDir ? `${options.logDir}/orchestrator.log` : undefined,
    });
  }

  /** Everything that can make the scan pointless is checked here, before any domain is touched. */
  async validate(): Promise<void> {
    const { workerCount, yearFilter, outputPath } = this.options;

    if (!Number.isInteger(workerCount) || workerCount < 1) {
      throw new ScanSetupError('INVALID_WORKER_COUNT', `Worker count must be an integer ≥ 1, got ${workerCount}`);
    }

    if (yearFilter !== undefined && !this.catalog.has(yearFilter)) {
      throw new ScanSetupError('UNKNOWN_YEAR', `Year ${yearFilter} is not in the catalog`);
    }

    if (outputPath) {
      await assertWritable(outputPath);
    }
  }

  async run(): Promise<Report> {
    await this.validate();

    const { workerCount, outputPath } = this.options;
    const entries = buildCatalogEntries(this.catalog, {
      year: this.options.yearFilter,
      quick: this.options.quickMode,
      quickLimit: this.options.quickLimit,
    });

    this.logger.info(`Scanning ${entries.length} domains with ${workerCount} workers`);

    const queue = new WorkQueue(entries);
    const collector = new ResultCollector({
      total: entries.length,
      logger: this.logger,
      onProgress: this.options.onProgress,
    });

    const prober = this.options.prober ?? new HttpProber();
    const registry = this.options.registry ?? new RdapClient();
    const classifier = new PageClassifier();
    const scorer = new Scorer();

    this.workers = [];
    for (let i = 1; i <= workerCount; i++) {
      this.workers.push(
        new ScanWorker(
          `scan-worker-${i}`,
          { queue, prober, registry, classifier, scorer, sink: (record) => collector.add(record) },
          {
            domainDelay: this.options.domainDelay,
            clock: this.clock,
            logLevel: this.options.logLevel,
            logDir: this.options.logDir,
          }
        )
      );
    }

    await Promise.all(this.workers.map((worker) => worker.run()));

    const report = buildReport(collector.drain(), { generatedAt: this.clock(), workerCount });

    if (outputPath) {
      await writeReport(outputPath, report);
      this.logger.info(`Report written to ${outputPath}`);
    }

    this.logger.info(`Scan complete: ${report.totalDomains} domains`, { summary: report.summary });
    return report;
  }

  getStats(): { workerCount: number; workers: Array<{ workerId: string; processed: number }> } {
    return {
      workerCount: this.options.workerCount,
      workers: this.workers.map((worker) => worker.getStats()),
    };
  }
}

export function runScan(catalog: Catalog, options: ScanOptions): Promise<Report> {
  return new ScanOrchestrator(catalog, options).run();
}
