// Catalog types
export type { Catalog, CatalogEntry, CatalogFilterOptions } from './catalog.js';

// Probe types
export type {
  Transport,
  ProbeFailureKind,
  ProbeFailure,
  ProbeResult,
  FetchResult,
  FetchSuccessResult,
  FetchErrorResult,
  ProberOptions,
  Prober,
  PageText,
} from './probe.js';

// Registry types
export type { RegistryRecord, RegistryClientOptions, RegistryLookup } from './registry.js';

// Record and scoring types
export type {
  DomainStatus,
  Confidence,
  Classification,
  ScoreDimension,
  ScoreBreakdown,
  ScoreResult,
  ScoreInput,
  Recommendation,
  DomainRecord,
} from './record.js';

// Report types
export type { StatusSummary, HttpInfo, WhoisInfo, ReportRecord, Report } from './report.js';

// Scan types
export type { ScanProgress, ScanOptions, ScanWorkerOptions, RecordSink } from './scan.js';
