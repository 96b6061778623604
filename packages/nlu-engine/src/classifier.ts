export interface ClassifierVerdict {
  intent: string | null;
  confidence: number;
}

/**
 * Fallback intent classification, consulted only when no rule matches.
 * Implementations must answer with one of `allowedLabels` or `null`.
 */
export interface IntentClassifier {
  readonly id: string;
  classify(text: string, allowedLabels: readonly string[]): Promise<ClassifierVerdict>;
}

export const NO_OPINION: Readonly<ClassifierVerdict> = Object.freeze({ intent: null, confidence: 0 });

export class NoopIntentClassifier implements IntentClassifier {
  readonly id = 'none';

  async classify(_text: string, _allowedLabels: readonly string[]): Promise<ClassifierVerdict> {
    return { ...NO_OPINION };
  }
}

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}
