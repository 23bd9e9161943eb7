import { domainLabel, domainTld } from '../utils/domain.js';
import { createDefaultWeights, type ScoreStep, type ScoreWeights } from './weights.js';
import type { ScoreBreakdown, ScoreInput, ScoreResult } from '../types/record.js';

const VOWELS = new Set(['a', 'e', 'i', 'o', 'u']);

export class Scorer {
  private readonly weights: ScoreWeights;

  constructor(weights: ScoreWeights = createDefaultWeights()) {
    this.weights = weights;
  }

  score(input: ScoreInput, now: Date = new Date()): ScoreResult {
    const label = domainLabel(input.domain);

    const breakdown: ScoreBreakdown = {
      base: this.weights.base,
      age: this.ageContribution(input.years, now),
      length: this.lengthContribution(label),
      tld: this.weights.tld[domainTld(input.domain)] ?? 0,
      popularity: stepFromTop(this.weights.popularity, new Set(input.years).size),
      keywords: this.matchedKeywords(label).length > 0 ? this.weights.keywordBonus : 0,
      brandability: this.brandabilityContribution(label),
      status: this.weights.status[input.status] ?? 0,
    };

    const total = Object.values(breakdown).reduce((sum, value) => sum + value, 0);
    const score = Math.min(this.weights.max, Math.max(this.weights.min, Math.round(total)));

    return { score, breakdown };
  }

  matchedKeywords(label: string): string[] {
    return this.weights.keywords.filter((keyword) => label.includes(keyword));
  }

  /** Years between the earliest catalog appearance and `now`. */
  ageInYears(years: number[], now: Date): number {
    if (years.length === 0) return 0;
    return Math.max(now.getUTCFullYear() - Math.min(...years), 0);
  }

  private ageContribution(years: number[], now: Date): number {
    return stepFromTop(this.weights.age, this.ageInYears(years, now));
  }

  private lengthContribution(label: string): number {
    for (const step of this.weights.length) {
      if (label.length <= step.threshold) return step.points;
    }
    return label.length >= this.weights.longNameLength ? this.weights.longNamePenalty : 0;
  }

  private brandabilityContribution(label: string): number {
    const characters = label.split('');
    const vowelRatio = characters.filter((c) => VOWELS.has(c)).length / Math.max(label.length, 1);
    const hyphens = characters.filter((c) => c === '-').length;
    const digits = characters.filter((c) => c >= '0' && c <= '9').length;
    const { min, max } = this.weights.vowelRatio;

    if (hyphens === 0 && digits === 0 && vowelRatio >= min && vowelRatio <= max) {
      return this.weights.brandableBonus;
    }
    if (hyphens >= this.weights.maxHyphens || digits >= this.weights.maxDigits) {
      return this.weights.unbrandablePenalty;
    }
    return 0;
  }
}

function stepFromTop(steps: ScoreStep[], value: number): number {
  for (const step of steps) {
    if (value >= step.threshold) return step.points;
  }
  return 0;
}

export function score(input: ScoreInput, weights?: ScoreWeights, now?: Date): ScoreResult {
  return new Scorer(weights).score(input, now);
}
