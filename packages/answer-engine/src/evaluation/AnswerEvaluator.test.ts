import assert from 'node:assert/strict';
import test from 'node:test';
import type { ProcessedQuestion } from '@campus-assist/nlu-engine';
import { AnswerSynthesizer } from '../answers/AnswerSynthesizer';
import type { AnswerResult } from '../answers/types';
import { AnswerEvaluator, normalizeWeights, questionKeywords } from './AnswerEvaluator';

const butlerQuestion: ProcessedQuestion = {
  rawText: 'Tell me about Butler Court prices',
  cleanText: 'tell me about butler court prices',
  intent: 'ask_accommodation',
  domain: 'accommodation',
  slots: { hall: ['Butler Court'] },
  retrievalQuery: 'tell me about butler court prices ; Butler Court',
  confidence: { intent: 0.9, domain: 0.8 },
  intentResolution: { strategy: 'rule', reason: 'test' },
};

const butlerAnswer: AnswerResult = {
  answer: 'Butler Court is a self-catered hall.\nRooms cost £180.00 per week.',
  sources: [{ title: 'Butler Court', url: 'https://example.ac.uk/halls/butler-court', snippet: '' }],
  confidence: 1,
  debug: {
    state: 'detail',
    reason: 'record_match',
    domain: 'accommodation',
    domainSource: 'processor',
    recordCount: 1,
    baseConfidence: 0.86,
  },
};

test('question keywords combine slot values and longer non-stop-word tokens', () => {
  assert.deepEqual(questionKeywords({ processed: butlerQuestion, answer: butlerAnswer }), [
    'butler court',
    'butler',
    'court',
    'prices',
  ]);
});

test('a grounded detail answer passes with high scores', () => {
  const evaluation = new AnswerEvaluator().evaluate({ processed: butlerQuestion, answer: butlerAnswer });

  assert.equal(evaluation.relevanceScore, 85);
  assert.equal(evaluation.completenessScore, 100);
  assert.equal(evaluation.clarityScore, 100);
  assert.equal(evaluation.accuracyScore, 95);
  assert.equal(evaluation.overallScore, 93.75);
  assert.equal(evaluation.passed, true);
  assert.equal(evaluation.qualityThreshold, 70);
  assert.deepEqual(evaluation.suggestions, ['The answer meets quality standards']);
  assert.equal(
    evaluation.feedback,
    'The answer stays on the topic of the question. It is complete and backed by sources. It is clear and well structured. It is likely to be accurate.',
  );
});

test('an undetermined answer fails and collects suggestions', () => {
  const processed: ProcessedQuestion = {
    ...butlerQuestion,
    rawText: '',
    cleanText: '',
    intent: null,
    domain: null,
    slots: {},
    retrievalQuery: '',
    confidence: { intent: 0, domain: 0 },
  };
  const answer = new AnswerSynthesizer().synthesize(processed, [
    { name: 'Harding House', tags: [], lifestyleTags: [], facilities: [], roomFeaturesCommon: [], services: [], roomTypes: [] },
  ]);

  const evaluation = new AnswerEvaluator().evaluate({ processed, answer });

  assert.equal(answer.debug.state, 'undetermined');
  assert.equal(evaluation.relevanceScore, 58);
  assert.equal(evaluation.completenessScore, 40);
  assert.equal(evaluation.clarityScore, 90);
  assert.equal(evaluation.accuracyScore, 40);
  assert.equal(evaluation.overallScore, 56.3);
  assert.equal(evaluation.passed, false);
  assert.deepEqual(evaluation.suggestions, [
    'Mention more of the terms used in the question',
    'Add supporting detail and link to sources',
    'Confirm the details against the official pages',
  ]);
});

test('threshold and weights are configurable and validated', () => {
  const strict = new AnswerEvaluator({ qualityThreshold: 95 });
  assert.equal(strict.evaluate({ processed: butlerQuestion, answer: butlerAnswer }).passed, false);

  const clarityOnly = new AnswerEvaluator({ weights: { relevance: 0, completeness: 0, clarity: 1, accuracy: 0 } });
  assert.equal(clarityOnly.evaluate({ processed: butlerQuestion, answer: butlerAnswer }).overallScore, 100);

  assert.throws(() => new AnswerEvaluator({ qualityThreshold: 150 }));
  assert.throws(() => new AnswerEvaluator({ weights: { relevance: 0, completeness: 0, clarity: 0, accuracy: 0 } }));
});

test('weights are scaled to sum to one', () => {
  assert.deepEqual(normalizeWeights({ relevance: 2, completeness: 2, clarity: 2, accuracy: 2 }), {
    relevance: 0.25,
    completeness: 0.25,
    clarity: 0.25,
    accuracy: 0.25,
  });

  const heavy = new AnswerEvaluator({ weights: { relevance: 0, completeness: 0, clarity: 5, accuracy: 0 } });
  assert.equal(heavy.evaluate({ processed: butlerQuestion, answer: butlerAnswer }).overallScore, 100);

  const doubled = new AnswerEvaluator({ weights: { relevance: 2, completeness: 2, clarity: 2, accuracy: 2 } });
  const even = new AnswerEvaluator({ weights: { relevance: 0.25, completeness: 0.25, clarity: 0.25, accuracy: 0.25 } });
  assert.equal(
    doubled.evaluate({ processed: butlerQuestion, answer: butlerAnswer }).overallScore,
    even.evaluate({ processed: butlerQuestion, answer: butlerAnswer }).overallScore,
  );
});

test('an empty answer scores zero clarity', () => {
  const evaluation = new AnswerEvaluator().evaluate({
    processed: butlerQuestion,
    answer: { ...butlerAnswer, answer: '   ', sources: [] },
  });

  assert.equal(evaluation.clarityScore, 0);
  assert.equal(evaluation.completenessScore, 20);
});
