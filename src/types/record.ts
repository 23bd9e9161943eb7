import type { ProbeResult } from './probe.js';
import type { RegistryRecord } from './registry.js';

export type DomainStatus = 'active' | 'parked' | 'for_sale' | 'redirect' | 'expired' | 'available';

export type Confidence = 'high' | 'medium' | 'low';

export interface Classification {
  status: DomainStatus | 'unknown';
  confidence: Confidence;
  reason: string;
  salePlatform: string | null;
}

export type ScoreDimension =
  | 'base'
  | 'age'
  | 'length'
  | 'tld'
  | 'popularity'
  | 'keywords'
  | 'brandability'
  | 'status';

export type ScoreBreakdown = Record<ScoreDimension, number>;

export interface ScoreResult {
  score: number;
  breakdown: ScoreBreakdown;
}

export interface ScoreInput {
  domain: string;
  years: number[];
  status: DomainStatus;
}

export interface Recommendation {
  reasons: string[];
  estimatedValue: string;
}

export interface DomainRecord {
  domain: string;
  years: number[];
  status: DomainStatus;
  confidence: Confidence;
  /** The rule or registry fact that decided the status */
  reason: string;
  salePlatform: string | null;
  probe: ProbeResult | null;
  registry: RegistryRecord | null;
  score: number;
  scoreBreakdown: ScoreBreakdown;
  recommendation: Recommendation;
  checkedAt: string;
}
