import type { HallRecord } from '@campus-assist/knowledge-catalog';
import { clampConfidence, DOMAIN_IDS, type DomainId, type ProcessedQuestion } from '@campus-assist/nlu-engine';
import { inferDomain } from './domainInference';
import { combinedText, findRecordMatch, rankRecords, wantedTags } from './matching';
import { hallDetailTemplate } from './templates/hallDetailTemplate';
import { NO_DATA_MESSAGE, UNDETERMINED_MESSAGE, unsupportedMessage } from './templates/messages';
import { shortlistTemplate } from './templates/shortlistTemplate';
import type { AnswerDebug, AnswerResult, AnswerSynthesizerOptions, DomainSource } from './types';

export const MIN_CONFIDENCE = 0.1;
export const DETAIL_BONUS = 0.25;
export const SHORTLIST_BONUS = 0.15;
export const DEFAULT_SHORTLIST_SIZE = 3;

const DEFAULT_COLLECTIONS: Partial<Record<DomainId, string>> = {
  accommodation: 'halls',
};

export function baseConfidence(processed: ProcessedQuestion): number {
  return clampConfidence(0.6 * clampConfidence(processed.confidence.intent) + 0.4 * clampConfidence(processed.confidence.domain));
}

/**
 * Turns a processed question and a snapshot of records into an answer. Pure:
 * no I/O, no mutation of its inputs, and no throwing on incomplete records.
 *
 * States are checked in this order: no_data, undetermined, unsupported,
 * detail, shortlist.
 */
export class AnswerSynthesizer {
  private readonly collections: Partial<Record<DomainId, string>>;
  private readonly shortlistSize: number;

  constructor(options: AnswerSynthesizerOptions = {}) {
    this.collections = { ...(options.collections ?? DEFAULT_COLLECTIONS) };
    this.shortlistSize = Math.max(1, options.shortlistSize ?? DEFAULT_SHORTLIST_SIZE);
  }

  get supportedDomains(): DomainId[] {
    return DOMAIN_IDS.filter((domain) => this.collections[domain] !== undefined);
  }

  synthesize(processed: ProcessedQuestion, records: readonly HallRecord[]): AnswerResult {
    const base = baseConfidence(processed);
    const floor = Math.max(MIN_CONFIDENCE, base);

    let domain = processed.domain;
    let domainSource: DomainSource = domain ? 'processor' : 'none';
    const debugBase = (): Pick<AnswerDebug, 'domain' | 'domainSource' | 'recordCount' | 'baseConfidence'> => ({
      domain,
      domainSource,
      recordCount: records.length,
      baseConfidence: base,
    });

    if (records.length === 0) {
      return {
        answer: NO_DATA_MESSAGE,
        sources: [],
        confidence: clampConfidence(floor),
        debug: { ...debugBase(), state: 'no_data', reason: 'no_records' },
      };
    }

    if (!domain) {
      const inferred = inferDomain(processed.cleanText, records);
      domain = inferred.domain;
      domainSource = inferred.source;
    }

    if (!domain) {
      return {
        answer: UNDETERMINED_MESSAGE,
        sources: [],
        confidence: clampConfidence(floor),
        debug: { ...debugBase(), state: 'undetermined', reason: 'domain_none_after_fallback' },
      };
    }

    const collection = this.collections[domain];
    if (!collection) {
      return {
        answer: unsupportedMessage(domain, this.supportedDomains),
        sources: [],
        confidence: clampConfidence(floor),
        debug: { ...debugBase(), state: 'unsupported', reason: 'domain_not_supported_yet' },
      };
    }

    const combined = combinedText(processed);
    const match = findRecordMatch(combined, records);
    if (match) {
      const rendered = hallDetailTemplate(match.record);
      return {
        answer: rendered.answer,
        sources: [rendered.source],
        confidence: clampConfidence(base + DETAIL_BONUS),
        debug: {
          ...debugBase(),
          state: 'detail',
          reason: 'record_match',
          collection,
          matchedRecord: match.record.name,
          matchedBy: match.matchedBy,
        },
      };
    }

    const wanted = wantedTags(combined);
    const { ranked, scores } = rankRecords(records, wanted, this.shortlistSize);
    const rendered = shortlistTemplate(ranked, wanted);
    return {
      answer: rendered.answer,
      sources: rendered.sources,
      confidence: clampConfidence(base + SHORTLIST_BONUS),
      debug: {
        ...debugBase(),
        state: 'shortlist',
        reason: 'shortlist',
        collection,
        wantedTags: wanted,
        scores,
      },
    };
  }
}
