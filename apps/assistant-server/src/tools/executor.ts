import { errorMessage } from '../llm';
import type { Logger } from '../logging';
import type { ToolName, ToolTrace } from '../types';
import { ToolRegistry } from './registry';
import type { AssistantServices, ToolExecutionContext, ToolExecutionResult, ToolInputMap } from './types';

export class ToolExecutionError extends Error {
  constructor(
    public readonly trace: ToolTrace,
    cause: unknown,
  ) {
    super(`Tool ${trace.tool} failed: ${errorMessage(cause)}`);
    this.name = 'ToolExecutionError';
    this.cause = cause;
  }

  declare cause: unknown;
}

export class ToolExecutor {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly baseLogger: Logger,
    private readonly services: AssistantServices,
  ) {}

  async run<TName extends ToolName>(
    requestId: string,
    toolName: TName,
    input: ToolInputMap[TName],
  ): Promise<ToolExecutionResult<TName>> {
    const tool = this.registry.get(toolName);
    const logger = this.baseLogger.child({ requestId, tool: toolName });
    const startedAt = new Date();
    const started = Date.now();
    const tracedInput = tool.traceInput ? tool.traceInput(input) : input;

    logger.debug('tool.run.start', { input: tracedInput });

    const context: ToolExecutionContext = {
      requestId,
      logger,
      services: this.services,
    };

    try {
      const output = await tool.execute(input, context);
      const finishedAt = new Date();
      const durationMs = Date.now() - started;
      logger.debug('tool.run.success', { durationMs });
      return {
        output,
        trace: {
          id: `${requestId}:${toolName}:${started}`,
          tool: toolName,
          status: 'success',
          startedAt: startedAt.toISOString(),
          finishedAt: finishedAt.toISOString(),
          durationMs,
          input: tracedInput,
          output: tool.traceOutput ? tool.traceOutput(output) : output,
        },
      };
    } catch (error) {
      const finishedAt = new Date();
      const durationMs = Date.now() - started;
      logger.error('tool.run.error', { durationMs, error });
      throw new ToolExecutionError(
        {
          id: `${requestId}:${toolName}:${started}`,
          tool: toolName,
          status: 'error',
          startedAt: startedAt.toISOString(),
          finishedAt: finishedAt.toISOString(),
          durationMs,
          input: tracedInput,
          error: {
            message: errorMessage(error),
            code: error instanceof Error ? error.name : undefined,
          },
        },
        error,
      );
    }
  }
}
