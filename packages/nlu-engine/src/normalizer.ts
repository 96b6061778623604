export interface NormalizedQuery {
  rawText: string;
  cleanText: string;
}

const MAX_PASSES = 3;

/**
 * NFKC, trim and lowercase. Lowercasing can produce characters that NFKC
 * rewrites again (and the reverse), so the steps repeat until the text is
 * stable, which keeps `normalizeText(normalizeText(x)) === normalizeText(x)`.
 */
export function normalizeText(raw: string): string {
  let current = raw;
  for (let pass = 0; pass < MAX_PASSES; pass += 1) {
    const next = current.normalize('NFKC').trim().toLowerCase();
    if (next === current) {
      return next;
    }
    current = next;
  }
  return current;
}

export function normalizeQuery(raw: string): NormalizedQuery {
  return { rawText: raw, cleanText: normalizeText(raw) };
}
