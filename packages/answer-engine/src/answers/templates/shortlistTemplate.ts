import type { HallRecord } from '@campus-assist/knowledge-catalog';
import type { AnswerSource } from '../types';
import { joinOrPlaceholder, orPlaceholder, truncate } from './helpers';

export const SHORTLIST_DESCRIPTION_LENGTH = 140;

export function shortlistTemplate(
  halls: readonly HallRecord[],
  wanted: readonly string[],
): { answer: string; sources: AnswerSource[] } {
  const intro =
    wanted.length > 0
      ? `Here are some halls that match what you asked for (${wanted.join(', ')}):`
      : 'Here are some halls you might like to look at:';

  const blocks = halls.map((hall) => {
    const description = truncate(hall.shortDescription ?? '', SHORTLIST_DESCRIPTION_LENGTH);
    return [
      `- ${hall.name}`,
      `  ${orPlaceholder(description)}`,
      `  Tags: ${joinOrPlaceholder(hall.tags)}`,
      `  Lifestyle: ${joinOrPlaceholder(hall.lifestyleTags)}`,
      `  Link: ${orPlaceholder(hall.officialUrl)}`,
    ].join('\n');
  });

  return {
    answer: [intro, ...blocks].join('\n'),
    sources: halls.map((hall) => ({
      title: hall.name,
      url: hall.officialUrl ?? '',
      snippet: truncate(hall.shortDescription ?? '', SHORTLIST_DESCRIPTION_LENGTH),
    })),
  };
}
