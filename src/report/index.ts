export { buildReport, toReportRecord, summarize, emptySummary, sortRecords } from './report-builder.js';
export { writeReport, assertWritable } from './report-writer.js';
