import type { AnswerEvaluation, AnswerResult } from '@campus-assist/answer-engine';
import type { ProcessedQuestion } from '@campus-assist/nlu-engine';

export type ToolName = 'process_question' | 'fetch_records' | 'synthesize_answer' | 'evaluate_answer';

export interface ToolTrace {
  id: string;
  tool: ToolName;
  status: 'success' | 'error';
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  input: unknown;
  output?: unknown;
  error?: {
    message: string;
    code?: string;
  };
}

export interface AskResponse {
  requestId: string;
  processed: ProcessedQuestion;
  answer: AnswerResult;
  evaluation: AnswerEvaluation;
  storeAvailable: boolean;
  traces: ToolTrace[];
}

export interface HallSummary {
  name: string;
  cateringType?: string;
  tags: string[];
  officialUrl?: string;
}
