import fs from 'fs';
import { LexiconSchema, type Lexicon } from '../schemas/scoring.js';
import type { DomainStatus } from '../types/record.js';

/** A step table: the first row whose threshold is met contributes its points. */
export interface ScoreStep {
  threshold: number;
  points: number;
}

export interface ScoreWeights {
  base: number;
  /** Years since first appearance, highest threshold first */
  age: ScoreStep[];
  /** Label length, shortest threshold first (`threshold` is a maximum) */
  length: ScoreStep[];
  /** Label length at or above which the long-name penalty applies */
  longNameLength: number;
  longNamePenalty: number;
  tld: Record<string, number>;
  /** Distinct popularity years, highest threshold first */
  popularity: ScoreStep[];
  keywordBonus: number;
  keywords: string[];
  vowelRatio: { min: number; max: number };
  brandableBonus: number;
  /** Applied when hyphens reach `maxHyphens` or digits reach `maxDigits` */
  unbrandablePenalty: number;
  maxHyphens: number;
  maxDigits: number;
  status: Partial<Record<DomainStatus, number>>;
  min: number;
  max: number;
}

const LEXICON_URL = new URL('../../data/lexicon.json', import.meta.url);

export function loadLexicon(path: string | URL = LEXICON_URL): Lexicon {
  return LexiconSchema.parse(JSON.parse(fs.readFileSync(path, 'utf8')));
}

export function lexiconTerms(lexicon: Lexicon): string[] {
  return [...new Set(Object.values(lexicon).flat().map((term) => term.toLowerCase()))];
}

export function createDefaultWeights(keywords: string[] = lexiconTerms(loadLexicon())): ScoreWeights {
  return {
    base: 5,
    age: [
      { threshold: 20, points: 2 },
      { threshold: 10, points: 1.5 },
      { threshold: 5, points: 0.5 },
    ],
    length: [
      { threshold: 3, points: 2 },
      { threshold: 5, points: 1.5 },
      { threshold: 8, points: 0.5 },
    ],
    longNameLength: 15,
    longNamePenalty: -1,
    tld: { com: 1, io: 0.5, ai: 0.5, co: 0.5 },
    popularity: [
      { threshold: 5, points: 1.5 },
      { threshold: 3, points: 1 },
      { threshold: 2, points: 0.5 },
    ],
    keywordBonus: 1,
    keywords,
    vowelRatio: { min: 0.2, max: 0.6 },
    brandableBonus: 0.5,
    unbrandablePenalty: -0.5,
    maxHyphens: 2,
    maxDigits: 3,
    status: { available: 0.5, active: -0.5 },
    min: 1,
    max: 10,
  };
}
