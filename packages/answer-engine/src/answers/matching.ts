import type { HallRecord } from '@campus-assist/knowledge-catalog';
import { slotValues, type ProcessedQuestion } from '@campus-assist/nlu-engine';
import { containsPhrase, tokenize } from './domainInference';
import type { RecordScore } from './types';

export const MIN_MATCH_TOKEN_LENGTH = 4;

const TAG_KEYWORDS: ReadonlyArray<{ tag: string; keywords: readonly string[] }> = [
  { tag: 'budget', keywords: ['budget', 'cheap', 'cheapest', 'affordable', 'low cost', 'inexpensive'] },
  {
    tag: 'close_to_campus',
    keywords: ['close to campus', 'near campus', 'on campus', 'nearby', 'walking distance', 'closest'],
  },
  { tag: 'social', keywords: ['social', 'lively', 'party', 'parties', 'community', 'friends'] },
  { tag: 'undergraduate', keywords: ['undergraduate', 'undergrad', 'first year', 'fresher', 'year 1'] },
  { tag: 'postgraduate', keywords: ['postgraduate', 'postgrad', 'masters', 'phd'] },
  { tag: 'quiet', keywords: ['quiet', 'peaceful', 'calm'] },
];

/** Question text, every slot value and the retrieval query, lowercased. */
export function combinedText(processed: ProcessedQuestion): string {
  return [processed.cleanText, ...slotValues(processed.slots), processed.retrievalQuery]
    .join(' ')
    .toLowerCase()
    .trim();
}

export interface RecordMatch {
  record: HallRecord;
  matchedBy: 'name' | 'token';
}

/**
 * First record in store order whose name appears in the text (or contains
 * it), or that shares a token of at least four characters with it.
 */
export function findRecordMatch(combined: string, records: readonly HallRecord[]): RecordMatch | undefined {
  const textTokens = new Set(tokenize(combined).filter((token) => token.length >= MIN_MATCH_TOKEN_LENGTH));

  for (const record of records) {
    const name = record.name.toLowerCase().trim();
    if (!name) {
      continue;
    }
    if (combined.includes(name) || (combined !== '' && name.includes(combined))) {
      return { record, matchedBy: 'name' };
    }
    if (tokenize(name).some((token) => textTokens.has(token))) {
      return { record, matchedBy: 'token' };
    }
  }

  return undefined;
}

export function wantedTags(combined: string): string[] {
  return TAG_KEYWORDS.filter(({ keywords }) => keywords.some((keyword) => containsPhrase(combined, keyword))).map(
    ({ tag }) => tag,
  );
}

export function recordTagSet(record: HallRecord): Set<string> {
  return new Set([...record.tags, ...record.lifestyleTags].map((tag) => tag.toLowerCase().trim()));
}

export function scoreRecord(record: HallRecord, wanted: readonly string[]): number {
  const tags = recordTagSet(record);
  return wanted.filter((tag) => tags.has(tag)).length;
}

/**
 * Descending by score. Array.prototype.sort is stable, so equal scores keep
 * store order.
 */
export function rankRecords(
  records: readonly HallRecord[],
  wanted: readonly string[],
  limit: number,
): { ranked: HallRecord[]; scores: RecordScore[] } {
  const scored = records.map((record) => ({ record, score: scoreRecord(record, wanted) }));
  scored.sort((a, b) => b.score - a.score);
  const top = scored.slice(0, limit);
  return {
    ranked: top.map((entry) => entry.record),
    scores: top.map((entry) => ({ name: entry.record.name, score: entry.score })),
  };
}
