import type { DomainId } from './domains';
import { slotValues, type SlotMap } from './slots';

export const SLOT_SEPARATOR = ' | ';
export const SEGMENT_SEPARATOR = ' ; ';

export const DOMAIN_HINTS: Readonly<Partial<Record<DomainId, string>>> = {
  location: 'location on campus',
  course_info: 'course information and entry requirements',
  event_info: 'date and time',
};

export function buildRetrievalQuery(cleanText: string, domain: DomainId | null, slots: SlotMap): string {
  const segments = [cleanText];

  const values = slotValues(slots);
  if (values.length > 0) {
    segments.push(values.join(SLOT_SEPARATOR));
  }

  const hint = domain ? DOMAIN_HINTS[domain] : undefined;
  if (hint) {
    segments.push(hint);
  }

  return segments.join(SEGMENT_SEPARATOR);
}
