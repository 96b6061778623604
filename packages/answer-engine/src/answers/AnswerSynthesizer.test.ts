import assert from 'node:assert/strict';
import test from 'node:test';
import type { HallRecord } from '@campus-assist/knowledge-catalog';
import type { ProcessedQuestion } from '@campus-assist/nlu-engine';
import { AnswerSynthesizer, baseConfidence } from './AnswerSynthesizer';

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

const halls: readonly HallRecord[] = Object.freeze([
  hall({
    name: 'Butler Court',
    shortDescription: 'Lively courtyard hall a short walk from the main teaching buildings.',
    cateringType: 'self-catered',
    tags: ['close_to_campus', 'undergraduate'],
    lifestyleTags: ['social'],
    facilities: ['laundry', 'common room'],
    roomTypes: [
      {
        name: 'Standard ensuite',
        ensuite: true,
        tenancyWeeks: '43',
        prices: [
          { year: '2024/25', perWeek: 170, total: 7310 },
          { year: '2025/26', perWeek: 180, total: 7740 },
        ],
      },
    ],
    officialUrl: 'https://example.ac.uk/halls/butler-court',
    contactEmail: 'butler@example.ac.uk',
  }),
  hall({
    name: 'Harding House',
    shortDescription: 'Quiet catered hall with shared bathrooms.',
    tags: ['budget', 'undergraduate'],
    lifestyleTags: ['quiet'],
    officialUrl: 'https://example.ac.uk/halls/harding-house',
  }),
  hall({
    name: 'Mill Lane Studios',
    shortDescription: 'Self-contained studios for postgraduate students.',
    tags: ['postgraduate'],
    lifestyleTags: ['quiet'],
    officialUrl: 'https://example.ac.uk/halls/mill-lane',
  }),
  hall({
    name: 'Elmwood Residence',
    shortDescription: 'Large flats next to the sports centre.',
    tags: ['budget', 'close_to_campus'],
    lifestyleTags: ['social'],
    officialUrl: 'https://example.ac.uk/halls/elmwood',
  }),
]);

function processed(overrides: Partial<ProcessedQuestion> & { cleanText: string }): ProcessedQuestion {
  return {
    rawText: overrides.cleanText,
    intent: null,
    domain: null,
    slots: {},
    retrievalQuery: overrides.cleanText,
    confidence: { intent: 0, domain: 0 },
    intentResolution: { strategy: 'none', reason: 'test' },
    ...overrides,
  };
}

const accommodationRule = {
  intent: 'ask_accommodation',
  domain: 'accommodation',
  confidence: { intent: 0.9, domain: 0.8 },
} as const;

function assertClose(actual: number, expected: number): void {
  assert.ok(Math.abs(actual - expected) < 1e-9, `expected ${actual} to be close to ${expected}`);
}

test('named hall produces a detail answer with one source', () => {
  const synthesizer = new AnswerSynthesizer();
  const result = synthesizer.synthesize(
    processed({ ...accommodationRule, cleanText: 'tell me about butler court accommodation and prices' }),
    halls,
  );

  assert.equal(result.debug.state, 'detail');
  assert.equal(result.debug.reason, 'record_match');
  assert.equal(result.debug.matchedRecord, 'Butler Court');
  assert.equal(result.debug.matchedBy, 'name');
  assert.equal(result.confidence, 1);
  assert.deepEqual(result.sources, [
    {
      title: 'Butler Court',
      url: 'https://example.ac.uk/halls/butler-court',
      snippet: 'Lively courtyard hall a short walk from the main teaching buildings.',
    },
  ]);

  const lines = result.answer.split('\n');
  assert.equal(lines[0], 'Butler Court');
  assert.ok(lines.includes('Address: —'));
  assert.ok(lines.includes('Catering: self-catered'));
  assert.ok(lines.includes('Tags: close_to_campus, undergraduate'));
  assert.ok(lines.includes('Facilities: laundry, common room'));
  assert.ok(lines.includes('Services: —'));
  assert.ok(
    lines.includes('- Standard ensuite | ensuite: yes | tenancy: 43 weeks | current price: 2025/26: £180.00 per week, £7740.00 total'),
  );
  assert.ok(lines.includes('Phone: —'));
});

test('record names found in the text resolve the domain when the processor could not', () => {
  const synthesizer = new AnswerSynthesizer();
  const result = synthesizer.synthesize(processed({ cleanText: 'is butler court good for social students?' }), halls);

  assert.equal(result.debug.domain, 'accommodation');
  assert.equal(result.debug.domainSource, 'record_name');
  assert.equal(result.debug.state, 'detail');
  assert.equal(result.confidence, 0.25);
});

test('a shared long token is enough to match a record', () => {
  const synthesizer = new AnswerSynthesizer();
  const result = synthesizer.synthesize(
    processed({ ...accommodationRule, cleanText: 'does harding have parking' }),
    halls,
  );

  assert.equal(result.debug.matchedRecord, 'Harding House');
  assert.equal(result.debug.matchedBy, 'token');
});

test('budget questions without a name get a tag-ranked shortlist', () => {
  const synthesizer = new AnswerSynthesizer();
  const result = synthesizer.synthesize(
    processed({ ...accommodationRule, cleanText: 'what halls are budget friendly?' }),
    halls,
  );

  assert.equal(result.debug.state, 'shortlist');
  assert.deepEqual(result.debug.wantedTags, ['budget']);
  assert.deepEqual(result.debug.scores, [
    { name: 'Harding House', score: 1 },
    { name: 'Elmwood Residence', score: 1 },
    { name: 'Butler Court', score: 0 },
  ]);
  assert.deepEqual(
    result.sources.map((source) => source.title),
    ['Harding House', 'Elmwood Residence', 'Butler Court'],
  );
  assert.equal(result.confidence, 1);
  assert.equal(
    result.answer.split('\n')[0],
    'Here are some halls that match what you asked for (budget):',
  );
});

test('keyword inference routes vague accommodation questions to a shortlist', () => {
  const synthesizer = new AnswerSynthesizer();
  const result = synthesizer.synthesize(processed({ cleanText: 'where should an undergraduate stay?' }), halls);

  assert.equal(result.debug.domainSource, 'keyword');
  assert.equal(result.debug.state, 'shortlist');
  assert.deepEqual(result.debug.wantedTags, ['undergraduate']);
  assert.deepEqual(
    result.sources.map((source) => source.title),
    ['Butler Court', 'Harding House', 'Mill Lane Studios'],
  );
  assert.equal(result.confidence, 0.15);
});

test('empty input ends undetermined with the minimum confidence', () => {
  const synthesizer = new AnswerSynthesizer();
  const result = synthesizer.synthesize(processed({ cleanText: '' }), halls);

  assert.equal(result.debug.state, 'undetermined');
  assert.equal(result.debug.reason, 'domain_none_after_fallback');
  assert.deepEqual(result.sources, []);
  assert.equal(result.confidence, 0.1);
});

test('domains without a collection are unsupported', () => {
  const synthesizer = new AnswerSynthesizer();
  const result = synthesizer.synthesize(
    processed({
      cleanText: 'where is the library',
      intent: 'ask_location',
      domain: 'location',
      confidence: { intent: 0.9, domain: 0.8 },
    }),
    halls,
  );

  assert.equal(result.debug.state, 'unsupported');
  assert.equal(result.debug.reason, 'domain_not_supported_yet');
  assert.equal(
    result.answer,
    'That looks like a question about campus locations. I can only answer questions about accommodation halls at the moment.',
  );
  assertClose(result.confidence, 0.86);
});

test('an empty store always answers with no_data', () => {
  const synthesizer = new AnswerSynthesizer();
  const cases = [
    processed({ ...accommodationRule, cleanText: 'tell me about butler court' }),
    processed({ cleanText: 'where is the library', intent: 'ask_location', domain: 'location', confidence: { intent: 0.9, domain: 0.8 } }),
    processed({ cleanText: '' }),
  ];

  for (const question of cases) {
    const result = synthesizer.synthesize(question, []);
    assert.equal(result.debug.state, 'no_data');
    assert.equal(result.debug.reason, 'no_records');
    assert.deepEqual(result.sources, []);
    assert.ok(result.confidence >= 0.1 && result.confidence <= 1);
  }
});

test('a price entry without amounts prints only the year', () => {
  const synthesizer = new AnswerSynthesizer();
  const sparse = hall({
    name: 'Sparse Lodge',
    roomTypes: [{ name: 'Budget twin', prices: [{ year: '2025/26' }] }, { prices: [] }],
  });

  const result = synthesizer.synthesize(processed({ ...accommodationRule, cleanText: 'sparse lodge rooms' }), [sparse]);

  const lines = result.answer.split('\n');
  assert.ok(lines.includes('- Budget twin | ensuite: — | tenancy: — | current price: 2025/26'));
  assert.ok(lines.includes('- — | ensuite: — | tenancy: — | current price: —'));
  assert.equal(lines[1], '—');
  assert.deepEqual(result.sources, [{ title: 'Sparse Lodge', url: '', snippet: '' }]);
});

test('snippets and shortlist descriptions are truncated', () => {
  const synthesizer = new AnswerSynthesizer();
  const long = hall({ name: 'Long Hall', shortDescription: 'a'.repeat(300), tags: ['quiet'] });

  const detail = synthesizer.synthesize(processed({ ...accommodationRule, cleanText: 'long hall' }), [long]);
  assert.equal(detail.sources[0]?.snippet.length, 240);

  const shortlist = synthesizer.synthesize(processed({ ...accommodationRule, cleanText: 'any quiet rooms' }), [long]);
  assert.equal(shortlist.debug.state, 'shortlist');
  assert.equal(shortlist.sources[0]?.snippet, `${'a'.repeat(139)}…`);
});

test('truncation never splits an emoji at the cut', () => {
  const synthesizer = new AnswerSynthesizer();
  const detailHall = hall({ name: 'Long Hall', shortDescription: `${'a'.repeat(239)}🏠${'b'.repeat(20)}`, tags: ['quiet'] });
  const detail = synthesizer.synthesize(processed({ ...accommodationRule, cleanText: 'long hall' }), [detailHall]);
  assert.equal(detail.sources[0]?.snippet, `${'a'.repeat(239)}🏠`);

  const listHall = hall({ name: 'Long Hall', shortDescription: `${'a'.repeat(138)}🏠${'b'.repeat(20)}`, tags: ['quiet'] });
  const shortlist = synthesizer.synthesize(processed({ ...accommodationRule, cleanText: 'any quiet rooms' }), [listHall]);
  assert.equal(shortlist.sources[0]?.snippet, `${'a'.repeat(138)}🏠…`);
});

test('shortlist size is configurable', () => {
  const synthesizer = new AnswerSynthesizer({ shortlistSize: 2 });
  const result = synthesizer.synthesize(processed({ ...accommodationRule, cleanText: 'any quiet rooms' }), halls);

  assert.deepEqual(
    result.sources.map((source) => source.title),
    ['Harding House', 'Mill Lane Studios'],
  );
});

test('base confidence blends intent and domain confidence', () => {
  assertClose(baseConfidence(processed({ cleanText: 'x', confidence: { intent: 0.5, domain: 0.8 } })), 0.62);
  assert.equal(baseConfidence(processed({ cleanText: 'x', confidence: { intent: 7, domain: -1 } })), 0.6);
});
