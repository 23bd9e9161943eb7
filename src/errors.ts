export type ScanSetupErrorCode =
  | 'CATALOG_UNREADABLE'
  | 'CATALOG_INVALID'
  | 'OUTPUT_UNWRITABLE'
  | 'INVALID_WORKER_COUNT'
  | 'UNKNOWN_YEAR'
  | 'REPORT_UNREADABLE';

/** Raised for setup problems that stop a scan (or the report API) before any domain is touched. */
export class ScanSetupError extends Error {
  readonly code: ScanSetupErrorCode;

  constructor(code: ScanSetupErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScanSetupError';
    this.code = code;
  }
}
