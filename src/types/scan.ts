import type { Prober } from './probe.js';
import type { RegistryLookup } from './registry.js';
import type { DomainRecord } from './record.js';

export interface ScanProgress {
  completed: number;
  total: number;
  domain: string;
}

export interface ScanOptions {
  workerCount: number;
  yearFilter?: number | undefined;
  quickMode?: boolean | undefined;
  quickLimit?: number | undefined;
  outputPath?: string | undefined;
  /** Pause between two domains handled by the same worker */
  domainDelay?: number | undefined;
  prober?: Prober;
  registry?: RegistryLookup;
  clock?: () => Date;
  onProgress?: (progress: ScanProgress) => void;
  logLevel?: string | undefined;
  logDir?: string | undefined;
}

export interface ScanWorkerOptions {
  domainDelay?: number | undefined;
  clock?: () => Date;
  logLevel?: string | undefined;
  logDir?: string | undefined;
}

export type RecordSink = (record: DomainRecord) => void;
