import type { CatalogWarning, GazetteerCatalog, IntentCatalog } from '@campus-assist/knowledge-catalog';
import { NoopIntentClassifier, type IntentClassifier } from './classifier';
import { mapIntentToDomain, type DomainId } from './domains';
import { normalizeQuery } from './normalizer';
import { IntentResolver, type IntentStrategy } from './resolver';
import { buildRetrievalQuery } from './retrieval';
import { compileIntentRules, type IntentRule } from './rules';
import { extractSlots, prepareGazetteer, type PreparedGazetteer, type SlotMap } from './slots';

export const RESOLVED_DOMAIN_CONFIDENCE = 0.8;

export interface ProcessedQuestion {
  rawText: string;
  cleanText: string;
  intent: string | null;
  domain: DomainId | null;
  slots: SlotMap;
  retrievalQuery: string;
  confidence: {
    intent: number;
    domain: number;
  };
  intentResolution: {
    strategy: IntentStrategy;
    reason: string;
  };
}

/**
 * Everything the question pipeline reads, built once at start-up and shared
 * read-only between requests.
 */
export interface NluContext {
  readonly rules: readonly IntentRule[];
  readonly gazetteer: PreparedGazetteer;
  readonly classifier: IntentClassifier;
}

export interface NluContextInput {
  intents: IntentCatalog;
  gazetteer: GazetteerCatalog;
  classifier?: IntentClassifier;
  intentsSource?: string;
}

export function createNluContext(input: NluContextInput): { context: NluContext; warnings: CatalogWarning[] } {
  const { rules, warnings } = compileIntentRules(input.intents, input.intentsSource);
  const context: NluContext = Object.freeze({
    rules: Object.freeze(rules.map((rule) => Object.freeze(rule))),
    gazetteer: prepareGazetteer(input.gazetteer),
    classifier: input.classifier ?? new NoopIntentClassifier(),
  });
  return { context, warnings };
}

export class QuestionProcessor {
  private readonly resolver: IntentResolver;

  constructor(private readonly context: NluContext) {
    this.resolver = new IntentResolver(context.rules, context.classifier);
  }

  get intentLabels(): readonly string[] {
    return this.resolver.labels;
  }

  async process(text: string): Promise<ProcessedQuestion> {
    const { rawText, cleanText } = normalizeQuery(text);
    const resolved = await this.resolver.resolve(cleanText);
    const domain = mapIntentToDomain(resolved.intent);
    const slots = extractSlots(cleanText, this.context.gazetteer);

    return {
      rawText,
      cleanText,
      intent: resolved.intent,
      domain,
      slots,
      retrievalQuery: buildRetrievalQuery(cleanText, domain, slots),
      confidence: {
        intent: resolved.confidence,
        domain: domain ? RESOLVED_DOMAIN_CONFIDENCE : 0,
      },
      intentResolution: {
        strategy: resolved.strategy,
        reason: resolved.reason,
      },
    };
  }
}
