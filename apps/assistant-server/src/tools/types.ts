import type { AnswerEvaluation, AnswerEvaluator, AnswerResult, AnswerSynthesizer, EvaluationInput } from '@campus-assist/answer-engine';
import type { HallRecord, KnowledgeCollection } from '@campus-assist/knowledge-catalog';
import type { ProcessedQuestion, QuestionProcessor } from '@campus-assist/nlu-engine';
import type { KnowledgeStoreReader } from '../adapters/knowledgeStore';
import type { Logger } from '../logging';
import type { ToolName, ToolTrace } from '../types';

export interface AssistantServices {
  processor: QuestionProcessor;
  store: KnowledgeStoreReader;
  synthesizer: AnswerSynthesizer;
  evaluator: AnswerEvaluator;
}

export interface ToolExecutionContext {
  requestId: string;
  logger: Logger;
  services: AssistantServices;
}

export interface ToolInputMap {
  process_question: {
    question: string;
  };
  fetch_records: {
    collection: KnowledgeCollection;
  };
  synthesize_answer: {
    processed: ProcessedQuestion;
    records: HallRecord[];
  };
  evaluate_answer: EvaluationInput;
}

export interface ToolOutputMap {
  process_question: ProcessedQuestion;
  fetch_records: HallRecord[];
  synthesize_answer: AnswerResult;
  evaluate_answer: AnswerEvaluation;
}

export interface ToolDefinition<TName extends ToolName = ToolName> {
  name: TName;
  description: string;
  execute: (
    input: ToolInputMap[TName],
    context: ToolExecutionContext,
  ) => Promise<ToolOutputMap[TName]> | ToolOutputMap[TName];
  /** Shapes what the trace records; defaults to the value itself. */
  traceInput?: (input: ToolInputMap[TName]) => unknown;
  traceOutput?: (output: ToolOutputMap[TName]) => unknown;
}

export type ToolDefinitions = { [TName in ToolName]: ToolDefinition<TName> };

export interface ToolExecutionResult<TName extends ToolName = ToolName> {
  output: ToolOutputMap[TName];
  trace: ToolTrace;
}
