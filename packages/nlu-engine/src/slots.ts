import type { GazetteerCatalog } from '@campus-assist/knowledge-catalog';
import { normalizeText } from './normalizer';

export type SlotMap = Record<string, string[]>;

export const PLACE_SLOT = 'place';

interface PreparedEntry {
  readonly canonical: string;
  /** Normalized aliases followed by the normalized canonical value. */
  readonly phrases: readonly string[];
}

export interface PreparedSlot {
  readonly slot: string;
  readonly entries: readonly PreparedEntry[];
}

export type PreparedGazetteer = readonly PreparedSlot[];

const PLACE_PATTERNS: readonly RegExp[] = [/how\s+do\s+i\s+get\s+to\s+(.*)/, /where\s+is\s+(.*)/];

/**
 * Pre-normalizes gazetteer phrases so matching against clean text is a plain
 * substring test. Empty phrases are dropped since they would match anything.
 */
export function prepareGazetteer(catalog: GazetteerCatalog): PreparedGazetteer {
  return Object.freeze(
    catalog.slots.map((slot) =>
      Object.freeze({
        slot: slot.slot,
        entries: Object.freeze(
          slot.entries.map((entry) =>
            Object.freeze({
              canonical: entry.canonical,
              phrases: Object.freeze(
                [...new Set([...entry.aliases, entry.canonical].map(normalizeText))].filter(Boolean),
              ),
            }),
          ),
        ),
      }),
    ),
  );
}

export function stripPlacePunctuation(phrase: string): string {
  return phrase.replace(/^[\s?.!]+|[\s?.!]+$/g, '');
}

export function extractPlacePhrases(cleanText: string): string[] {
  const phrases: string[] = [];
  for (const pattern of PLACE_PATTERNS) {
    const match = pattern.exec(cleanText);
    const phrase = stripPlacePunctuation(match?.[1] ?? '');
    if (phrase) {
      phrases.push(phrase);
    }
  }
  return phrases;
}

/**
 * Every slot type fires independently. Gazetteer slots record canonical values
 * once each, in gazetteer order; `place` collects raw captured phrases after
 * any gazetteer values already stored under that key.
 */
export function extractSlots(cleanText: string, gazetteer: PreparedGazetteer): SlotMap {
  const found: SlotMap = {};

  for (const { slot, entries } of gazetteer) {
    for (const entry of entries) {
      if (!entry.phrases.some((phrase) => cleanText.includes(phrase))) {
        continue;
      }
      const values = found[slot] ?? [];
      if (!values.includes(entry.canonical)) {
        values.push(entry.canonical);
      }
      found[slot] = values;
    }
  }

  const places = extractPlacePhrases(cleanText);
  if (places.length > 0) {
    found[PLACE_SLOT] = [...(found[PLACE_SLOT] ?? []), ...places];
  }

  return found;
}

export function slotValues(slots: SlotMap): string[] {
  return Object.values(slots).flat();
}
