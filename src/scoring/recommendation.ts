import { domainLabel, domainTld } from '../utils/domain.js';
import type { Scorer } from './scorer.js';
import type { Recommendation, ScoreInput, ScoreResult } from '../types/record.js';

const VALUE_RANGES: Record<number, string> = {
  1: '$0-$100',
  2: '$100-$500',
  3: '$500-$1,000',
  4: '$1,000-$2,500',
  5: '$2,500-$5,000',
  6: '$5,000-$10,000',
  7: '$10,000-$25,000',
  8: '$25,000-$50,000',
  9: '$50,000-$100,000',
  10: '$100,000+',
};

export function estimateValue(score: number, status: ScoreInput['status']): string {
  if (status === 'available') return '$10-$15 (registration cost)';
  return VALUE_RANGES[score] ?? '$1,000-$5,000';
}

export function recommend(input: ScoreInput, result: ScoreResult, scorer: Scorer, now: Date): Recommendation {
  const { breakdown } = result;
  const label = domainLabel(input.domain);
  const reasons: string[] = [];

  const age = scorer.ageInYears(input.years, now);
  if (breakdown.age > 0) {
    reasons.push(`Popular since ${Math.min(...input.years)} (${age} years)`);
  }

  if (breakdown.length > 0) {
    reasons.push(`Short name (${label.length} chars)`);
  } else if (breakdown.length < 0) {
    reasons.push('Long name reduces memorability');
  }

  if (breakdown.tld > 0) {
    reasons.push(`.${domainTld(input.domain)} TLD premium`);
  }

  if (breakdown.popularity > 0) {
    reasons.push(`Appeared in ${new Set(input.years).size} years of top lists`);
  }

  if (breakdown.keywords > 0) {
    reasons.push(`High-value keywords: ${scorer.matchedKeywords(label).slice(0, 3).join(', ')}`);
  }

  if (breakdown.brandability > 0) {
    reasons.push('Good brandability (pronounceable, clean)');
  } else if (breakdown.brandability < 0) {
    reasons.push('Low brandability (hyphens/digits)');
  }

  switch (input.status) {
    case 'available':
      reasons.push('Potentially available for registration');
      break;
    case 'for_sale':
      reasons.push('Listed for sale, acquisition possible');
      break;
    case 'expired':
      reasons.push('Registration lapsed, watch for drop');
      break;
    case 'active':
      reasons.push('Currently active, acquisition unlikely');
      break;
    default:
      break;
  }

  if (reasons.length === 0) {
    reasons.push('Standard domain');
  }

  return {
    reasons,
    estimatedValue: estimateValue(result.score, input.status),
  };
}
