import type { DomainRecord } from '../types/record.js';
import type { Report, ReportRecord, StatusSummary } from '../types/report.js';

export function emptySummary(): StatusSummary {
  return { active: 0, parked: 0, for_sale: 0, redirect: 0, expired: 0, available: 0 };
}

export function summarize(records: Array<Pick<DomainRecord, 'status'>>): StatusSummary {
  const summary = emptySummary();
  for (const record of records) {
    summary[record.status] += 1;
  }
  return summary;
}

export function toReportRecord(record: DomainRecord): ReportRecord {
  const { probe, registry } = record;

  return {
    domain: record.domain,
    years: record.years,
    status: record.status,
    confidence: record.confidence,
    reason: record.reason,
    salePlatform: record.salePlatform,
    score: record.score,
    scoreBreakdown: record.scoreBreakdown,
    recommendation: record.recommendation,
    httpInfo: probe?.reached
      ? {
          finalUrl: probe.finalUrl,
          statusCode: probe.statusCode,
          redirected: probe.redirectChain.length > 0,
          pageTitle: probe.pageTitle,
        }
      : null,
    whoisInfo: registry?.found
      ? {
          registrar: registry.registrar,
          createdOn: registry.createdOn,
          expiresOn: registry.expiresOn,
          nameServers: registry.nameServers,
          registrant: registry.registrantContact,
        }
      : null,
    checkedAt: record.checkedAt,
  };
}

/** Highest score first, then by domain name. */
export function sortRecords<T extends Pick<DomainRecord, 'score' | 'domain'>>(records: T[]): T[] {
  return [...records].sort((a, b) => b.score - a.score || a.domain.localeCompare(b.domain));
}

export function buildReport(records: DomainRecord[], meta: { generatedAt: Date; workerCount: number }): Report {
  const sorted = sortRecords(records);

  return {
    generatedAt: meta.generatedAt.toISOString(),
    totalDomains: sorted.length,
    workerCount: meta.workerCount,
    summary: summarize(sorted),
    results: sorted.map(toReportRecord),
  };
}
