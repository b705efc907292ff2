export type { Intent, IntentClassifier, IntentDecision, IntentReason } from './types.js';
export { INTENTS, isIntent } from './types.js';
export {
  KeywordIntentClassifier,
  ModelIntentClassifier,
  createIntentClassifier,
  buildKeywordMatcher,
  parseIntentLabel,
  CLASSIFY_TEMPLATE,
} from './intent-classifier.js';
