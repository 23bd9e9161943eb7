export { Scorer, score } from './scorer.js';
export { recommend, estimateValue } from './recommendation.js';
export {
  createDefaultWeights,
  loadLexicon,
  lexiconTerms,
  type ScoreWeights,
  type ScoreStep,
} from './weights.js';
