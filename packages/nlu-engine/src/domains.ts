export type DomainId =
  | 'location'
  | 'event_info'
  | 'course_info'
  | 'fees_funding'
  | 'accommodation'
  | 'it_support'
  | 'library';

const INTENT_DOMAINS: ReadonlyMap<string, DomainId> = new Map<string, DomainId>([
  ['ask_location', 'location'],
  ['ask_directions', 'location'],
  ['ask_time', 'event_info'],
  ['ask_entry_requirements', 'course_info'],
  ['ask_course_info', 'course_info'],
  ['ask_fees', 'fees_funding'],
  ['ask_funding', 'fees_funding'],
  ['ask_accommodation', 'accommodation'],
  ['ask_it_help', 'it_support'],
  ['ask_library', 'library'],
]);

export const DOMAIN_IDS: readonly DomainId[] = [
  'location',
  'event_info',
  'course_info',
  'fees_funding',
  'accommodation',
  'it_support',
  'library',
];

export function mapIntentToDomain(intent: string | null): DomainId | null {
  if (intent === null) {
    return null;
  }
  return INTENT_DOMAINS.get(intent) ?? null;
}

export function isDomainId(value: unknown): value is DomainId {
  return typeof value === 'string' && DOMAIN_IDS.some((domain) => domain === value);
}
