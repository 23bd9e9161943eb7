export { PageClassifier, classify } from './page-classifier.js';
export { resolveRegistryStatus } from './registry-status.js';
export { DEFAULT_CLASSIFIER_RULES, type ClassifierRules } from './rules.js';
