// Config schemas
export {
  LogLevelSchema,
  ScanConfigSchema,
  ServeConfigSchema,
  type ScanConfigInput,
  type ScanConfig,
  type ServeConfig,
} from './config.js';

// Catalog schemas
export {
  MIN_CATALOG_YEAR,
  MAX_CATALOG_YEAR,
  MAX_DOMAINS_PER_YEAR,
  CatalogYearSchema,
  CatalogFileSchema,
  type CatalogFile,
} from './catalog.js';

// RDAP schemas
export {
  RdapBootstrapSchema,
  VcardArraySchema,
  RdapEntitySchema,
  RdapEventSchema,
  RdapDomainSchema,
  type RdapEntity,
  type RdapBootstrap,
  type RdapDomain,
} from './rdap.js';

// Scoring schemas
export { LexiconSchema, type Lexicon } from './scoring.js';

// Report schemas
export {
  DomainStatusSchema,
  ConfidenceSchema,
  ScoreBreakdownSchema,
  HttpInfoSchema,
  WhoisInfoSchema,
  ReportRecordSchema,
  ReportSchema,
  type ReportFile,
} from './report.js';

// API schemas
export {
  DomainListQuerySchema,
  DomainParamsSchema,
  type DomainListQuery,
  type DomainParams,
} from './api.js';
