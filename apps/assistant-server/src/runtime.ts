import { randomUUID } from 'node:crypto';
import type { AnswerResult } from '@campus-assist/answer-engine';
import type { HallRecord } from '@campus-assist/knowledge-catalog';
import type { ProcessedQuestion } from '@campus-assist/nlu-engine';
import type { AssistantContext } from './context';
import type { Logger } from './logging';
import { ToolExecutionError, ToolExecutor } from './tools/executor';
import { ToolRegistry } from './tools/registry';
import type { AskResponse, HallSummary, ToolTrace } from './types';

interface LoadedRecords {
  records: HallRecord[];
  storeAvailable: boolean;
  trace: ToolTrace;
}

export class AssistantRuntime {
  private readonly toolExecutor: ToolExecutor;

  constructor(
    private readonly context: AssistantContext,
    private readonly logger: Logger,
  ) {
    this.toolExecutor = new ToolExecutor(new ToolRegistry(), logger.child({ component: 'tools' }), context);
  }

  get intentLabels(): readonly string[] {
    return this.context.processor.intentLabels;
  }

  async process(question: string): Promise<ProcessedQuestion> {
    return this.context.processor.process(question);
  }

  async answer(processed: ProcessedQuestion): Promise<AnswerResult> {
    const requestId = randomUUID();
    const { records } = await this.loadRecords(requestId, this.logger.child({ requestId }));
    return this.context.synthesizer.synthesize(processed, records);
  }

  async ask(question: string): Promise<AskResponse> {
    const requestId = randomUUID();
    const reqLogger = this.logger.child({ requestId });
    reqLogger.info('assistant.ask.start', { question });

    const processed = await this.toolExecutor.run(requestId, 'process_question', { question });
    const loaded = await this.loadRecords(requestId, reqLogger);
    const answer = await this.toolExecutor.run(requestId, 'synthesize_answer', {
      processed: processed.output,
      records: loaded.records,
    });
    const evaluation = await this.toolExecutor.run(requestId, 'evaluate_answer', {
      processed: processed.output,
      answer: answer.output,
    });

    const response: AskResponse = {
      requestId,
      processed: processed.output,
      answer: answer.output,
      evaluation: evaluation.output,
      storeAvailable: loaded.storeAvailable,
      traces: [processed.trace, loaded.trace, answer.trace, evaluation.trace],
    };

    reqLogger.info('assistant.ask.success', {
      intent: response.processed.intent,
      domain: response.processed.domain,
      state: response.answer.debug.state,
      confidence: response.answer.confidence,
      overallScore: response.evaluation.overallScore,
      passed: response.evaluation.passed,
    });

    return response;
  }

  async listHalls(): Promise<HallSummary[]> {
    const records = await this.context.store.fetchAllRecords('halls');
    return records.map((record) => ({
      name: record.name,
      cateringType: record.cateringType,
      tags: record.tags,
      officialUrl: record.officialUrl,
    }));
  }

  // A failing store reads as an empty collection so the answer degrades to no_data.
  private async loadRecords(requestId: string, logger: Logger): Promise<LoadedRecords> {
    try {
      const { output, trace } = await this.toolExecutor.run(requestId, 'fetch_records', { collection: 'halls' });
      return { records: output, storeAvailable: true, trace };
    } catch (error) {
      if (!(error instanceof ToolExecutionError)) {
        throw error;
      }
      logger.warn('assistant.store.unavailable', { store: this.context.store.id, error: error.cause });
      return { records: [], storeAvailable: false, trace: error.trace };
    }
  }
}
