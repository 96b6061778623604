import { NO_OPINION, type ClassifierVerdict, type IntentClassifier } from '@campus-assist/nlu-engine';
import { z } from 'zod';
import type { Logger } from '../logging';
import { errorMessage } from '../llm';
import type { ChatModelAdapter } from './llm';

export const CLASSIFIER_SYSTEM_PROMPT =
  "You are an intent classifier. Return ONLY valid JSON with keys 'intent' and 'confidence'. " +
  "'intent' must be one of the provided labels or null. 'confidence' must be a number between 0 and 1.";

const FALLBACK_MENTION_CONFIDENCE = 0.5;

const verdictSchema = z.object({
  intent: z.union([z.string(), z.null()]).optional(),
  confidence: z.preprocess(
    (value) => (typeof value === 'string' ? Number(value) : value),
    z.number().finite().catch(0),
  ),
});

export function buildClassifierPrompt(text: string, labels: readonly string[]): string {
  return `Text: ${text}\nAllowed intents: ${labels.join(', ')}`;
}

function extractJsonObject(content: string): unknown {
  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return undefined;
  }
  try {
    return JSON.parse(content.slice(start, end + 1));
  } catch {
    return undefined;
  }
}

/**
 * Reads a model reply. A JSON verdict naming an allowed label (or null) is
 * taken as is; anything else falls back to the first allowed label the reply
 * mentions.
 */
export function parseClassifierReply(content: string, labels: readonly string[]): ClassifierVerdict {
  const verdict = verdictSchema.safeParse(extractJsonObject(content));
  if (verdict.success) {
    const { intent, confidence } = verdict.data;
    if (typeof intent === 'string' && labels.includes(intent)) {
      return { intent, confidence };
    }
    if (intent === null || intent === 'null') {
      return { intent: null, confidence };
    }
  }

  const lowered = content.toLowerCase();
  const mentioned = labels.find((label) => lowered.includes(label.toLowerCase()));
  return mentioned ? { intent: mentioned, confidence: FALLBACK_MENTION_CONFIDENCE } : { ...NO_OPINION };
}

export class LlmIntentClassifier implements IntentClassifier {
  readonly id: string;

  constructor(
    private readonly chat: ChatModelAdapter,
    private readonly logger: Logger,
  ) {
    this.id = `llm:${chat.provider}`;
  }

  async classify(text: string, allowedLabels: readonly string[]): Promise<ClassifierVerdict> {
    const labels = [...new Set(allowedLabels.filter(Boolean))].sort();
    if (labels.length === 0) {
      return { ...NO_OPINION };
    }

    let content: string;
    try {
      content = await this.chat.generate({
        prompt: buildClassifierPrompt(text, labels),
        systemPrompt: CLASSIFIER_SYSTEM_PROMPT,
      });
    } catch (error) {
      this.logger.warn('classifier.llm.failed', { error: errorMessage(error) });
      return { ...NO_OPINION };
    }

    const verdict = parseClassifierReply(content, labels);
    this.logger.debug('classifier.llm.verdict', { intent: verdict.intent, confidence: verdict.confidence });
    return verdict;
  }
}
