export { runScan, ScanOrchestrator } from './scan-orchestrator.js';
export { ScanSetupError, type ScanSetupErrorCode } from './errors.js';
export { loadConfig, loadServeConfig } from './config.js';
export { loadCatalog, catalogFromRecord, buildCatalogEntries, catalogYears, DEFAULT_CATALOG_PATH } from './catalog/index.js';
export { HttpProber } from './prober/index.js';
export { RdapClient, IANA_RDAP_BOOTSTRAP_URL } from './registry/index.js';
export { PageClassifier, classify, resolveRegistryStatus, DEFAULT_CLASSIFIER_RULES, type ClassifierRules } from './classifier/index.js';
export { Scorer, score, recommend, estimateValue, createDefaultWeights, loadLexicon, type ScoreWeights } from './scoring/index.js';
export { buildReport, writeReport } from './report/index.js';
export { ReportServer, type ReportServerOptions } from './api/server.js';
export type * from './types/index.js';
export * from './schemas/index.js';
