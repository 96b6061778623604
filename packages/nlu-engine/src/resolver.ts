import { clampConfidence, type ClassifierVerdict, type IntentClassifier } from './classifier';
import { distinctLabels, type IntentRule } from './rules';

export const RULE_MATCH_CONFIDENCE = 0.9;

export type IntentStrategy = 'rule' | 'classifier' | 'none';

export interface ResolvedIntent {
  intent: string | null;
  confidence: number;
  strategy: IntentStrategy;
  reason: string;
}

function unresolved(reason: string): ResolvedIntent {
  return { intent: null, confidence: 0, strategy: 'none', reason };
}

export class IntentResolver {
  private readonly allowedLabels: readonly string[];

  constructor(
    private readonly rules: readonly IntentRule[],
    private readonly classifier: IntentClassifier,
  ) {
    this.allowedLabels = Object.freeze(distinctLabels(rules));
  }

  get labels(): readonly string[] {
    return this.allowedLabels;
  }

  /**
   * First matching rule wins. The classifier only runs when no rule matched,
   * and its failures resolve to a null intent instead of rejecting.
   */
  async resolve(cleanText: string): Promise<ResolvedIntent> {
    for (const rule of this.rules) {
      if (rule.pattern.test(cleanText)) {
        return {
          intent: rule.label,
          confidence: RULE_MATCH_CONFIDENCE,
          strategy: 'rule',
          reason: `matched rule /${rule.pattern.source}/`,
        };
      }
    }

    if (cleanText === '') {
      return unresolved('empty_input');
    }
    if (this.allowedLabels.length === 0) {
      return unresolved('no_rules_loaded');
    }

    let verdict: ClassifierVerdict;
    try {
      verdict = await this.classifier.classify(cleanText, this.allowedLabels);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return unresolved(`classifier_error: ${message}`);
    }

    if (verdict.intent === null) {
      return unresolved(`no_rule_matched; classifier ${this.classifier.id} had no opinion`);
    }
    if (!this.allowedLabels.includes(verdict.intent)) {
      return unresolved(`classifier ${this.classifier.id} returned unknown label '${verdict.intent}'`);
    }

    return {
      intent: verdict.intent,
      confidence: clampConfidence(verdict.confidence),
      strategy: 'classifier',
      reason: `classifier ${this.classifier.id}`,
    };
  }
}
