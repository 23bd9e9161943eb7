import type { Logger } from 'winston';
import type { DomainRecord } from '../types/record.js';
import type { ScanProgress } from '../types/scan.js';

interface ResultCollectorOptions {
  total: number;
  logger: Logger;
  onProgress?: ((progress: ScanProgress) => void) | undefined;
}

/** Single point where worker results land; owns the progress count. */
export class ResultCollector {
  private readonly records: DomainRecord[] = [];
  private readonly total: number;
  private readonly logger: Logger;
  private readonly onProgress: ((progress: ScanProgress) => void) | null;
  private completedCount = 0;

  constructor(options: ResultCollectorOptions) {
    this.total = options.total;
    this.logger = options.logger;
    this.onProgress = options.onProgress ?? null;
  }

  add(record: DomainRecord): void {
    this.records.push(record);
    this.completedCount++;

    const progress: ScanProgress = {
      completed: this.completedCount,
      total: this.total,
      domain: record.domain,
    };

    this.logger.info(`Progress ${progress.completed}/${progress.total}: ${record.domain} → ${record.status} (score ${record.score})`);
    if (!this.onProgress) return;

    try {
      this.onProgress(progress);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error('Progress callback failed', { domain: record.domain, error: errorMessage });
    }
  }

  get completed(): number {
    return this.completedCount;
  }

  drain(): DomainRecord[] {
    return this.records.splice(0);
  }
}
