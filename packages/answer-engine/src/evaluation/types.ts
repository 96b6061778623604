import type { ProcessedQuestion } from '@campus-assist/nlu-engine';
import { z } from 'zod';
import type { AnswerResult } from '../answers/types';

export const scoringWeightsSchema = z
  .object({
    relevance: z.number().min(0),
    completeness: z.number().min(0),
    clarity: z.number().min(0),
    accuracy: z.number().min(0),
  })
  .refine((weights) => weights.relevance + weights.completeness + weights.clarity + weights.accuracy > 0, {
    message: 'at least one weight must be positive',
  });

export type ScoringWeights = z.infer<typeof scoringWeightsSchema>;

export const evaluatorOptionsSchema = z.object({
  weights: scoringWeightsSchema.default({ relevance: 0.35, completeness: 0.25, clarity: 0.2, accuracy: 0.2 }),
  qualityThreshold: z.number().min(0).max(100).default(70),
});

export type AnswerEvaluatorOptions = z.input<typeof evaluatorOptionsSchema>;

export interface EvaluationInput {
  processed: ProcessedQuestion;
  answer: AnswerResult;
}

export interface AnswerEvaluation {
  overallScore: number;
  relevanceScore: number;
  completenessScore: number;
  clarityScore: number;
  accuracyScore: number;
  feedback: string;
  suggestions: string[];
  passed: boolean;
  qualityThreshold: number;
}
