export {
  AnswerSynthesizer,
  baseConfidence,
  DEFAULT_SHORTLIST_SIZE,
  DETAIL_BONUS,
  MIN_CONFIDENCE,
  SHORTLIST_BONUS,
} from './answers/AnswerSynthesizer';
export { inferDomain } from './answers/domainInference';
export { combinedText, findRecordMatch, rankRecords, scoreRecord, wantedTags } from './answers/matching';
export { formatPrice, PLACEHOLDER, truncate } from './answers/templates/helpers';
export type {
  AnswerDebug,
  AnswerReason,
  AnswerResult,
  AnswerSource,
  AnswerState,
  AnswerSynthesizerOptions,
  DomainSource,
  RecordScore,
} from './answers/types';
export { AnswerEvaluator, questionKeywords } from './evaluation/AnswerEvaluator';
export {
  evaluatorOptionsSchema,
  scoringWeightsSchema,
  type AnswerEvaluation,
  type AnswerEvaluatorOptions,
  type EvaluationInput,
  type ScoringWeights,
} from './evaluation/types';
