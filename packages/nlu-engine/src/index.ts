export { clampConfidence, NO_OPINION, NoopIntentClassifier, type ClassifierVerdict, type IntentClassifier } from './classifier';
export { DOMAIN_IDS, isDomainId, mapIntentToDomain, type DomainId } from './domains';
export { normalizeQuery, normalizeText, type NormalizedQuery } from './normalizer';
export {
  createNluContext,
  QuestionProcessor,
  RESOLVED_DOMAIN_CONFIDENCE,
  type NluContext,
  type NluContextInput,
  type ProcessedQuestion,
} from './processor';
export { IntentResolver, RULE_MATCH_CONFIDENCE, type IntentStrategy, type ResolvedIntent } from './resolver';
export { buildRetrievalQuery, DOMAIN_HINTS, SEGMENT_SEPARATOR, SLOT_SEPARATOR } from './retrieval';
export { compileIntentRules, compilePattern, distinctLabels, type IntentRule } from './rules';
export {
  extractPlacePhrases,
  extractSlots,
  PLACE_SLOT,
  prepareGazetteer,
  slotValues,
  stripPlacePunctuation,
  type PreparedGazetteer,
  type PreparedSlot,
  type SlotMap,
} from './slots';
