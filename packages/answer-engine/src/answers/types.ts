import type { DomainId } from '@campus-assist/nlu-engine';

export type AnswerState = 'detail' | 'shortlist' | 'unsupported' | 'undetermined' | 'no_data';

export type AnswerReason =
  | 'record_match'
  | 'shortlist'
  | 'domain_not_supported_yet'
  | 'domain_none_after_fallback'
  | 'no_records';

export type DomainSource = 'processor' | 'keyword' | 'record_name' | 'none';

export interface AnswerSource {
  title: string;
  url: string;
  snippet: string;
}

export interface RecordScore {
  name: string;
  score: number;
}

export interface AnswerDebug {
  state: AnswerState;
  reason: AnswerReason;
  domain: DomainId | null;
  domainSource: DomainSource;
  collection?: string;
  recordCount: number;
  baseConfidence: number;
  matchedRecord?: string;
  matchedBy?: 'name' | 'token';
  wantedTags?: string[];
  scores?: RecordScore[];
}

export interface AnswerResult {
  answer: string;
  sources: AnswerSource[];
  confidence: number;
  debug: AnswerDebug;
}

export interface AnswerSynthesizerOptions {
  /** Which knowledge collection backs each domain. Unlisted domains are unsupported. */
  collections?: Partial<Record<DomainId, string>>;
  shortlistSize?: number;
}
