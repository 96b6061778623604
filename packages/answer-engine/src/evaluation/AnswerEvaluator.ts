import { slotValues } from '@campus-assist/nlu-engine';
import { tokenize } from '../answers/domainInference';
import {
  evaluatorOptionsSchema,
  type AnswerEvaluation,
  type AnswerEvaluatorOptions,
  type EvaluationInput,
  type ScoringWeights,
} from './types';

const STOP_WORDS = new Set([
  'about',
  'after',
  'also',
  'been',
  'does',
  'from',
  'have',
  'into',
  'like',
  'more',
  'much',
  'please',
  'should',
  'some',
  'tell',
  'than',
  'that',
  'their',
  'them',
  'then',
  'there',
  'they',
  'this',
  'what',
  'when',
  'where',
  'which',
  'will',
  'with',
  'would',
  'your',
]);

const PASSING_DIMENSION = 70;

function clampScore(value: number): number {
  return Math.min(100, Math.max(0, value));
}

function roundTwo(value: number): number {
  return Math.round(value * 100) / 100;
}

export function questionKeywords(input: EvaluationInput): string[] {
  const fromSlots = slotValues(input.processed.slots).map((value) => value.toLowerCase().trim());
  const fromText = tokenize(input.processed.cleanText).filter((token) => token.length >= 4 && !STOP_WORDS.has(token));
  return [...new Set([...fromSlots, ...fromText])].filter(Boolean);
}

export function normalizeWeights(weights: ScoringWeights): ScoringWeights {
  const total = weights.relevance + weights.completeness + weights.clarity + weights.accuracy;
  return {
    relevance: weights.relevance / total,
    completeness: weights.completeness / total,
    clarity: weights.clarity / total,
    accuracy: weights.accuracy / total,
  };
}

/**
 * Heuristic quality score for a synthesized answer. Each dimension is 0-100;
 * the overall score is their weighted sum. Weights are scaled to sum to 1,
 * so the overall score stays within 0-100.
 */
export class AnswerEvaluator {
  private readonly weights: ScoringWeights;
  private readonly qualityThreshold: number;

  constructor(options: AnswerEvaluatorOptions = {}) {
    const parsed = evaluatorOptionsSchema.parse(options);
    this.weights = normalizeWeights(parsed.weights);
    this.qualityThreshold = parsed.qualityThreshold;
  }

  evaluate(input: EvaluationInput): AnswerEvaluation {
    const relevanceScore = this.relevance(input);
    const completenessScore = this.completeness(input);
    const clarityScore = this.clarity(input);
    const accuracyScore = this.accuracy(input);

    const overallScore = roundTwo(
      relevanceScore * this.weights.relevance +
        completenessScore * this.weights.completeness +
        clarityScore * this.weights.clarity +
        accuracyScore * this.weights.accuracy,
    );

    return {
      overallScore,
      relevanceScore,
      completenessScore,
      clarityScore,
      accuracyScore,
      feedback: feedbackFor({ relevanceScore, completenessScore, clarityScore, accuracyScore }),
      suggestions: suggestionsFor({ relevanceScore, completenessScore, clarityScore, accuracyScore }),
      passed: overallScore >= this.qualityThreshold,
      qualityThreshold: this.qualityThreshold,
    };
  }

  private relevance({ processed, answer }: EvaluationInput): number {
    const keywords = questionKeywords({ processed, answer });
    const text = answer.answer.toLowerCase();
    const keywordScore =
      keywords.length > 0 ? (keywords.filter((keyword) => text.includes(keyword)).length / keywords.length) * 100 : 50;
    const domainScore = processed.domain !== null && answer.debug.domain === processed.domain ? 100 : 70;
    return roundTwo(clampScore(keywordScore * 0.6 + domainScore * 0.4));
  }

  private completeness({ answer }: EvaluationInput): number {
    let score = 0;
    if (answer.answer.trim().length > 20) {
      score += 40;
    }
    if (answer.sources.length > 0) {
      score += 20;
      if (answer.sources.every((source) => source.url.trim() !== '')) {
        score += 20;
      }
    }
    if (answer.confidence >= 0.5) {
      score += 20;
    }
    return clampScore(score);
  }

  private clarity({ answer }: EvaluationInput): number {
    const text = answer.answer.trim();
    if (!text) {
      return 0;
    }

    let score = 50;
    const wordCount = text.split(/\s+/).length;
    if (wordCount >= 10 && wordCount <= 200) {
      score += 25;
    } else if (wordCount > 5) {
      score += 15;
    }
    if (/[.!?:]/.test(text)) {
      score += 15;
    }
    if (text.includes('\n')) {
      score += 10;
    }
    return clampScore(score);
  }

  private accuracy({ answer }: EvaluationInput): number {
    let score = answer.confidence >= 0.75 ? 85 : answer.confidence >= 0.5 ? 70 : 50;
    if (answer.debug.state === 'detail') {
      score += 10;
    } else if (answer.debug.state === 'undetermined') {
      score -= 10;
    }
    return clampScore(score);
  }
}

interface DimensionScores {
  relevanceScore: number;
  completenessScore: number;
  clarityScore: number;
  accuracyScore: number;
}

function band(score: number, high: string, medium: string, low: string): string {
  if (score >= 80) {
    return high;
  }
  return score >= 60 ? medium : low;
}

function feedbackFor(scores: DimensionScores): string {
  return [
    band(
      scores.relevanceScore,
      'The answer stays on the topic of the question.',
      'The answer is mostly on topic but could be more focused.',
      'The answer does not address the question well.',
    ),
    band(
      scores.completenessScore,
      'It is complete and backed by sources.',
      'It covers the main points but leaves some detail out.',
      'It is missing information or sources.',
    ),
    band(
      scores.clarityScore,
      'It is clear and well structured.',
      'It is readable but could be clearer.',
      'It is hard to follow.',
    ),
    band(
      scores.accuracyScore,
      'It is likely to be accurate.',
      'It is probably accurate but worth double-checking.',
      'Its accuracy is uncertain.',
    ),
  ].join(' ');
}

function suggestionsFor(scores: DimensionScores): string[] {
  const suggestions: string[] = [];
  if (scores.relevanceScore < PASSING_DIMENSION) {
    suggestions.push('Mention more of the terms used in the question');
  }
  if (scores.completenessScore < PASSING_DIMENSION) {
    suggestions.push('Add supporting detail and link to sources');
  }
  if (scores.clarityScore < PASSING_DIMENSION) {
    suggestions.push('Break the answer into clearer sections');
  }
  if (scores.accuracyScore < PASSING_DIMENSION) {
    suggestions.push('Confirm the details against the official pages');
  }
  if (suggestions.length === 0) {
    suggestions.push('The answer meets quality standards');
  }
  return suggestions;
}
