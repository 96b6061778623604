import type { ToolDefinitions } from './types';

export function createToolImplementations(): ToolDefinitions {
  return {
    process_question: {
      name: 'process_question',
      description: 'Normalize a question, resolve intent and domain, extract slots and build the retrieval query.',
      execute: ({ question }, { services }) => services.processor.process(question),
      traceOutput: (processed) => ({
        intent: processed.intent,
        domain: processed.domain,
        slots: processed.slots,
        strategy: processed.intentResolution.strategy,
      }),
    },
    fetch_records: {
      name: 'fetch_records',
      description: 'Read every record of a knowledge collection.',
      execute: async ({ collection }, { services, logger }) => {
        const records = await services.store.fetchAllRecords(collection);
        logger.debug('tool.fetch_records.loaded', { store: services.store.id, collection, count: records.length });
        return records;
      },
      traceOutput: (records) => ({ count: records.length, names: records.map((record) => record.name) }),
    },
    synthesize_answer: {
      name: 'synthesize_answer',
      description: 'Build a detail, shortlist or fallback answer from the processed question and the records.',
      execute: ({ processed, records }, { services }) => services.synthesizer.synthesize(processed, records),
      traceInput: ({ processed, records }) => ({ cleanText: processed.cleanText, recordCount: records.length }),
      traceOutput: (answer) => answer.debug,
    },
    evaluate_answer: {
      name: 'evaluate_answer',
      description: 'Score the answer for relevance, completeness, clarity and accuracy.',
      execute: (input, { services }) => services.evaluator.evaluate(input),
      traceInput: ({ answer }) => ({ state: answer.debug.state, confidence: answer.confidence }),
      traceOutput: (evaluation) => ({ overallScore: evaluation.overallScore, passed: evaluation.passed }),
    },
  };
}
