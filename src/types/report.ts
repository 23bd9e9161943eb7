import type { DomainStatus, Confidence, ScoreBreakdown, Recommendation } from './record.js';

export type StatusSummary = Record<DomainStatus, number>;

export interface HttpInfo {
  finalUrl: string | null;
  statusCode: number | null;
  redirected: boolean;
  pageTitle: string | null;
}

export interface WhoisInfo {
  registrar: string | null;
  createdOn: string | null;
  expiresOn: string | null;
  nameServers: string[];
  registrant: string | null;
}

export interface ReportRecord {
  domain: string;
  years: number[];
  status: DomainStatus;
  confidence: Confidence;
  reason: string;
  salePlatform: string | null;
  score: number;
  scoreBreakdown: ScoreBreakdown;
  recommendation: Recommendation;
  httpInfo: HttpInfo | null;
  whoisInfo: WhoisInfo | null;
  checkedAt: string;
}

export interface Report {
  generatedAt: string;
  totalDomains: number;
  workerCount: number;
  summary: StatusSummary;
  results: ReportRecord[];
}
