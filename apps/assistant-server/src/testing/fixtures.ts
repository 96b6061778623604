import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { HallRecord } from '@campus-assist/knowledge-catalog';
import type { IntentClassifier } from '@campus-assist/nlu-engine';
import { InMemoryKnowledgeStore, type KnowledgeStoreReader } from '../adapters/knowledgeStore';
import type { AssistantConfig } from '../config';
import { createAssistantContext, type AssistantContext } from '../context';
import { createSilentLogger, type Logger } from '../logging';
import { AssistantRuntime } from '../runtime';

export const FIXTURE_INTENTS_YAML = `version: 1
intents:
  - intent: ask_directions
    patterns:
      - '\\bhow do i get to\\b'
  - intent: ask_accommodation
    patterns:
      - '\\baccommodation\\b|\\bhalls?\\b'
  - intent: ask_library
    patterns:
      - regex: '\\blibrary\\b'
        flags: [IGNORECASE]
`;

export const FIXTURE_GAZETTEER_YAML = `version: 1
slots:
  - slot: hall
    items:
      - canonical: Butler Court
        aliases: [butler]
      - canonical: Harding House
        aliases: [harding]
  - slot: building
    items:
      - canonical: student union
        aliases: [the union]
`;

function hall(overrides: Partial<HallRecord> & { name: string }): HallRecord {
  return {
    tags: [],
    lifestyleTags: [],
    facilities: [],
    roomFeaturesCommon: [],
    services: [],
    roomTypes: [],
    ...overrides,
  };
}

export const FIXTURE_HALLS: readonly HallRecord[] = Object.freeze([
  hall({
    name: 'Butler Court',
    shortDescription: 'Courtyard hall a short walk from the main teaching buildings.',
    cateringType: 'self-catered',
    tags: ['close_to_campus', 'undergraduate'],
    lifestyleTags: ['social'],
    roomTypes: [{ name: 'Standard ensuite', ensuite: true, tenancyWeeks: '43', prices: [{ year: '2025/26', perWeek: 180, total: 7740 }] }],
    officialUrl: 'https://example.ac.uk/halls/butler-court',
  }),
  hall({
    name: 'Harding House',
    shortDescription: 'Quiet catered hall with shared bathrooms.',
    cateringType: 'catered',
    tags: ['budget'],
    lifestyleTags: ['quiet'],
    officialUrl: 'https://example.ac.uk/halls/harding-house',
  }),
  hall({
    name: 'Elmwood Residence',
    shortDescription: 'Large flats next to the sports centre.',
    tags: ['budget', 'close_to_campus'],
    officialUrl: 'https://example.ac.uk/halls/elmwood',
  }),
]);

export function writeCampusWorkspace(files: Record<string, string>): string {
  const rootDir = mkdtempSync(path.join(tmpdir(), 'campus-assist-server-'));
  const configDir = path.join(rootDir, '.campus-assist');
  mkdirSync(configDir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(path.join(configDir, name), content, 'utf8');
  }
  return rootDir;
}

export function testConfig(rootDir: string): AssistantConfig {
  return {
    port: 0,
    rootDir,
    logLevel: 'error',
    classifier: { provider: 'none', timeoutMs: 1000 },
    qualityThreshold: 70,
  };
}

export interface TestRuntimeOptions {
  store?: KnowledgeStoreReader;
  classifier?: IntentClassifier;
  logger?: Logger;
}

export interface TestRuntime {
  runtime: AssistantRuntime;
  context: AssistantContext;
  cleanup(): void;
}

export function createTestRuntime(options: TestRuntimeOptions = {}): TestRuntime {
  const rootDir = writeCampusWorkspace({
    'intents.yaml': FIXTURE_INTENTS_YAML,
    'gazetteer.yaml': FIXTURE_GAZETTEER_YAML,
  });
  const logger = options.logger ?? createSilentLogger();
  const context = createAssistantContext(testConfig(rootDir), logger, {
    store: options.store ?? new InMemoryKnowledgeStore(FIXTURE_HALLS),
    classifier: options.classifier,
  });

  return {
    runtime: new AssistantRuntime(context, logger),
    context,
    cleanup: () => rmSync(rootDir, { recursive: true, force: true }),
  };
}
