import assert from 'node:assert/strict';
import test from 'node:test';
import type { ClassifierVerdict, IntentClassifier } from './classifier';
import { NoopIntentClassifier } from './classifier';
import { mapIntentToDomain } from './domains';
import { IntentResolver, RULE_MATCH_CONFIDENCE } from './resolver';
import { compileIntentRules } from './rules';

const { rules } = compileIntentRules({
  version: 1,
  intents: [
    { intent: 'ask_location', patterns: [{ regex: "\\bwhere(?:'s| is)\\b", flags: ['IGNORECASE'] }] },
    { intent: 'ask_directions', patterns: [{ regex: '\\bhow do i get to\\b', flags: [] }] },
    { intent: 'ask_accommodation', patterns: [{ regex: '\\bhalls?\\b', flags: [] }] },
    { intent: 'ask_library', patterns: [{ regex: '\\blibrary\\b', flags: [] }] },
  ],
});

class ScriptedClassifier implements IntentClassifier {
  readonly id = 'scripted';
  readonly calls: Array<{ text: string; allowedLabels: readonly string[] }> = [];

  constructor(private readonly reply: () => Promise<ClassifierVerdict>) {}

  classify(text: string, allowedLabels: readonly string[]): Promise<ClassifierVerdict> {
    this.calls.push({ text, allowedLabels });
    return this.reply();
  }
}

test('first matching rule wins in configured order', async () => {
  const resolver = new IntentResolver(rules, new NoopIntentClassifier());

  const resolved = await resolver.resolve('where is the library?');
  assert.equal(resolved.intent, 'ask_location');
  assert.equal(resolved.confidence, RULE_MATCH_CONFIDENCE);
  assert.equal(resolved.strategy, 'rule');
});

test('classifier is not consulted when a rule matches', async () => {
  const classifier = new ScriptedClassifier(async () => ({ intent: 'ask_library', confidence: 0.3 }));
  const resolver = new IntentResolver(rules, classifier);

  const resolved = await resolver.resolve('which halls have a gym');
  assert.equal(resolved.intent, 'ask_accommodation');
  assert.equal(resolved.confidence, 0.9);
  assert.equal(classifier.calls.length, 0);
});

test('classifier fallback receives distinct labels in rule order and is adopted', async () => {
  const classifier = new ScriptedClassifier(async () => ({ intent: 'ask_library', confidence: 0.72 }));
  const resolver = new IntentResolver(rules, classifier);

  const resolved = await resolver.resolve('can i borrow books');
  assert.deepEqual(resolved, {
    intent: 'ask_library',
    confidence: 0.72,
    strategy: 'classifier',
    reason: 'classifier scripted',
  });
  assert.deepEqual(classifier.calls, [
    {
      text: 'can i borrow books',
      allowedLabels: ['ask_location', 'ask_directions', 'ask_accommodation', 'ask_library'],
    },
  ]);
});

test('classifier confidence is clamped into [0, 1]', async () => {
  const high = new IntentResolver(rules, new ScriptedClassifier(async () => ({ intent: 'ask_library', confidence: 4 })));
  const nan = new IntentResolver(rules, new ScriptedClassifier(async () => ({ intent: 'ask_library', confidence: Number.NaN })));

  assert.equal((await high.resolve('books please')).confidence, 1);
  assert.equal((await nan.resolve('books please')).confidence, 0);
});

test('labels outside the rule set are rejected', async () => {
  const resolver = new IntentResolver(rules, new ScriptedClassifier(async () => ({ intent: 'ask_parking', confidence: 0.8 })));

  const resolved = await resolver.resolve('parking permits');
  assert.equal(resolved.intent, null);
  assert.equal(resolved.confidence, 0);
  assert.equal(resolved.strategy, 'none');
});

test('classifier failures degrade to a null intent', async () => {
  const resolver = new IntentResolver(
    rules,
    new ScriptedClassifier(async () => {
      throw new Error('socket hang up');
    }),
  );

  const resolved = await resolver.resolve('parking permits');
  assert.equal(resolved.intent, null);
  assert.equal(resolved.confidence, 0);
  assert.equal(resolved.reason, 'classifier_error: socket hang up');
});

test('empty input resolves to nothing without calling the classifier', async () => {
  const classifier = new ScriptedClassifier(async () => ({ intent: 'ask_library', confidence: 1 }));
  const resolver = new IntentResolver(rules, classifier);

  assert.deepEqual(await resolver.resolve(''), { intent: null, confidence: 0, strategy: 'none', reason: 'empty_input' });
  assert.equal(classifier.calls.length, 0);
});

test('invalid patterns are skipped with a warning', () => {
  const compiled = compileIntentRules({
    version: 1,
    intents: [{ intent: 'ask_time', patterns: [{ regex: '(unclosed', flags: [] }, { regex: 'opening hours', flags: ['DOTALL'] }] }],
  });

  assert.equal(compiled.rules.length, 1);
  assert.equal(compiled.rules[0]?.pattern.flags, 's');
  assert.equal(compiled.warnings[0]?.entry, 'intents[0].patterns[0]');
});

test('intent to domain mapping is fixed', () => {
  assert.equal(mapIntentToDomain('ask_location'), 'location');
  assert.equal(mapIntentToDomain('ask_directions'), 'location');
  assert.equal(mapIntentToDomain('ask_time'), 'event_info');
  assert.equal(mapIntentToDomain('ask_entry_requirements'), 'course_info');
  assert.equal(mapIntentToDomain('ask_course_info'), 'course_info');
  assert.equal(mapIntentToDomain('ask_fees'), 'fees_funding');
  assert.equal(mapIntentToDomain('ask_funding'), 'fees_funding');
  assert.equal(mapIntentToDomain('ask_accommodation'), 'accommodation');
  assert.equal(mapIntentToDomain('ask_it_help'), 'it_support');
  assert.equal(mapIntentToDomain('ask_library'), 'library');
  assert.equal(mapIntentToDomain('ask_parking'), null);
  assert.equal(mapIntentToDomain(null), null);
});
