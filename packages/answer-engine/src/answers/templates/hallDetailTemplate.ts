import type { HallRecord } from '@campus-assist/knowledge-catalog';
import type { AnswerSource } from '../types';
import { formatRoomType, joinOrPlaceholder, orPlaceholder, PLACEHOLDER, takeCodePoints } from './helpers';

export const DETAIL_SNIPPET_LENGTH = 240;

export function hallDetailTemplate(hall: HallRecord): { answer: string; source: AnswerSource } {
  const roomLines = hall.roomTypes.length > 0 ? hall.roomTypes.map(formatRoomType) : [PLACEHOLDER];

  const answer = [
    hall.name,
    orPlaceholder(hall.shortDescription),
    '',
    `Address: ${orPlaceholder(hall.address)}`,
    `Catering: ${orPlaceholder(hall.cateringType)}`,
    `Tags: ${joinOrPlaceholder(hall.tags)}`,
    `Lifestyle: ${joinOrPlaceholder(hall.lifestyleTags)}`,
    `Facilities: ${joinOrPlaceholder(hall.facilities)}`,
    `Room features: ${joinOrPlaceholder(hall.roomFeaturesCommon)}`,
    `Services: ${joinOrPlaceholder(hall.services)}`,
    '',
    'Room types:',
    ...roomLines,
    '',
    `Official page: ${orPlaceholder(hall.officialUrl)}`,
    `Email: ${orPlaceholder(hall.contactEmail)}`,
    `Phone: ${orPlaceholder(hall.contactPhone)}`,
  ].join('\n');

  return {
    answer,
    source: {
      title: hall.name,
      url: hall.officialUrl ?? '',
      snippet: takeCodePoints(hall.shortDescription ?? '', DETAIL_SNIPPET_LENGTH),
    },
  };
}
