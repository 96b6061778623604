import type { HallRecord } from '@campus-assist/knowledge-catalog';
import type { DomainId } from '@campus-assist/nlu-engine';
import type { DomainSource } from './types';

const DOMAIN_KEYWORDS: ReadonlyArray<{ domain: DomainId; keywords: readonly string[] }> = [
  {
    domain: 'accommodation',
    keywords: [
      'accommodation',
      'hall',
      'halls',
      'room',
      'rooms',
      'rent',
      'ensuite',
      'en-suite',
      'stay',
      'live in',
      'living',
      'housing',
      'flat',
    ],
  },
];

export function containsPhrase(text: string, phrase: string): boolean {
  if (phrase.includes(' ') || phrase.includes('-')) {
    return text.includes(phrase);
  }
  return tokenize(text).includes(phrase);
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);
}

/**
 * Used when the processor produced no domain: keyword scan first, then any
 * known record name mentioned in the text.
 */
export function inferDomain(
  cleanText: string,
  records: readonly HallRecord[],
): { domain: DomainId | null; source: DomainSource } {
  for (const { domain, keywords } of DOMAIN_KEYWORDS) {
    if (keywords.some((keyword) => containsPhrase(cleanText, keyword))) {
      return { domain, source: 'keyword' };
    }
  }

  const text = cleanText.toLowerCase();
  if (records.some((record) => text.includes(record.name.toLowerCase()))) {
    return { domain: 'accommodation', source: 'record_name' };
  }

  return { domain: null, source: 'none' };
}
