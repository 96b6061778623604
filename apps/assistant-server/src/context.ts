import { AnswerEvaluator, AnswerSynthesizer } from '@campus-assist/answer-engine';
import { campusConfigFile, loadGazetteer, loadIntentCatalog, type CatalogWarning } from '@campus-assist/knowledge-catalog';
import { createNluContext, NoopIntentClassifier, QuestionProcessor, type IntentClassifier } from '@campus-assist/nlu-engine';
import { LlmIntentClassifier } from './adapters/intentClassifier';
import { YamlKnowledgeStore, type KnowledgeStoreReader } from './adapters/knowledgeStore';
import { createDefaultLlmRouter, fallbackFor, RoutedChatModelAdapter, type ChatModelAdapter } from './adapters/llm';
import type { AssistantConfig } from './config';
import type { Logger } from './logging';
import type { AssistantServices } from './tools/types';

/** Built once at start-up and shared read-only by every request. */
export interface AssistantContext extends Readonly<AssistantServices> {
  readonly config: AssistantConfig;
  readonly classifier: IntentClassifier;
}

export interface AssistantContextOverrides {
  store?: KnowledgeStoreReader;
  classifier?: IntentClassifier;
  chatModel?: ChatModelAdapter;
}

export function createIntentClassifier(config: AssistantConfig, logger: Logger, chatModel?: ChatModelAdapter): IntentClassifier {
  const { provider, timeoutMs, openaiModel, claudeModel } = config.classifier;
  if (provider === 'none') {
    return new NoopIntentClassifier();
  }

  const chat =
    chatModel ??
    new RoutedChatModelAdapter(createDefaultLlmRouter(logger.child({ component: 'llm.router' }), { openaiModel, claudeModel }), {
      primary: provider,
      fallback: fallbackFor(provider),
      timeoutMs,
      maxOutputTokens: 50,
    });
  return new LlmIntentClassifier(chat, logger.child({ component: 'classifier' }));
}

function logWarnings(logger: Logger, warnings: CatalogWarning[]): void {
  for (const warning of warnings) {
    logger.warn('catalog.entry.skipped', { ...warning });
  }
}

/**
 * Loads the intent rules and gazetteer, picks the classifier and store, and
 * freezes the result. Catalog errors propagate: the server cannot start
 * without them.
 */
export function createAssistantContext(
  config: AssistantConfig,
  logger: Logger,
  overrides: AssistantContextOverrides = {},
): AssistantContext {
  const intents = loadIntentCatalog({ rootDir: config.rootDir });
  const gazetteer = loadGazetteer({ rootDir: config.rootDir });
  logWarnings(logger, [...intents.warnings, ...gazetteer.warnings]);

  const classifier = overrides.classifier ?? createIntentClassifier(config, logger, overrides.chatModel);
  const nlu = createNluContext({
    intents: intents.catalog,
    gazetteer: gazetteer.catalog,
    classifier,
    intentsSource: campusConfigFile(config.rootDir, 'intents.yaml'),
  });
  logWarnings(logger, nlu.warnings);

  const processor = new QuestionProcessor(nlu.context);
  const store = overrides.store ?? new YamlKnowledgeStore({ rootDir: config.rootDir, logger: logger.child({ component: 'store' }) });

  logger.info('assistant.context.ready', {
    rootDir: config.rootDir,
    ruleCount: nlu.context.rules.length,
    intentLabels: processor.intentLabels.length,
    gazetteerSlots: nlu.context.gazetteer.length,
    classifier: classifier.id,
    store: store.id,
  });

  return Object.freeze({
    config,
    classifier,
    processor,
    store,
    synthesizer: new AnswerSynthesizer(),
    evaluator: new AnswerEvaluator({ qualityThreshold: config.qualityThreshold }),
  });
}
