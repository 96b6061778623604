import type { Logger } from '../logging';
import type { AssistantRuntime } from '../runtime';
import { isRecord, McpInvalidParamsError, type McpToolCallParams, type McpToolCallResult, type McpToolDefinition } from './types';

const MCP_TOOL_NAMES = ['campus.process_question', 'campus.ask_question', 'campus.list_halls'] as const;
type McpToolName = (typeof MCP_TOOL_NAMES)[number];

const MAX_QUESTION_LENGTH = 2000;

export class CampusMcpToolHost {
  constructor(
    private readonly runtime: AssistantRuntime,
    private readonly logger: Logger,
  ) {}

  listTools(): McpToolDefinition[] {
    return [
      {
        name: 'campus.process_question',
        description:
          'Normalize a campus question and return its intent, domain, extracted slots and retrieval query without answering it.',
        inputSchema: objectSchema(
          {
            question: { type: 'string', description: 'Free-text question, e.g. "how much is Butler Court?"' },
          },
          ['question'],
        ),
      },
      {
        name: 'campus.ask_question',
        description:
          'Answer a campus question from the hall records and score the answer. Returns the processed question, the answer with sources, the evaluation and step traces.',
        inputSchema: objectSchema(
          {
            question: { type: 'string', description: 'Free-text question about accommodation halls' },
          },
          ['question'],
        ),
      },
      {
        name: 'campus.list_halls',
        description: 'List the accommodation halls currently in the knowledge store.',
        inputSchema: objectSchema({}, []),
      },
    ];
  }

  async callTool(params: McpToolCallParams): Promise<McpToolCallResult> {
    const toolName = assertMcpToolName(params.name);
    const rawArgs = params.arguments === undefined ? {} : asRecord(params.arguments, 'tools/call.arguments');
    this.logger.debug('mcp.tool.call', { tool: toolName });

    switch (toolName) {
      case 'campus.process_question': {
        const question = readQuestion(rawArgs);
        const processed = await this.runtime.process(question);
        return jsonToolResult(
          processed,
          processed.intent
            ? `Resolved intent ${processed.intent} (${processed.intentResolution.strategy}).`
            : 'No intent could be resolved for this question.',
        );
      }

      case 'campus.ask_question': {
        const question = readQuestion(rawArgs);
        const response = await this.runtime.ask(question);
        return {
          content: [
            { type: 'text', text: response.answer.answer },
            { type: 'json', json: response },
          ],
          structuredContent: response,
        };
      }

      case 'campus.list_halls': {
        const halls = await this.runtime.listHalls();
        return jsonToolResult({ halls }, `Found ${halls.length} hall${halls.length === 1 ? '' : 's'}.`);
      }
    }
  }
}

function objectSchema(properties: Record<string, unknown>, required: string[]): McpToolDefinition['inputSchema'] {
  return {
    type: 'object',
    properties,
    required,
    additionalProperties: false,
  };
}

function isMcpToolName(name: string): name is McpToolName {
  return MCP_TOOL_NAMES.some((candidate) => candidate === name);
}

function assertMcpToolName(name: string): McpToolName {
  if (!isMcpToolName(name)) {
    throw new McpInvalidParamsError(`Unknown MCP tool: ${name}`);
  }
  return name;
}

export function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new McpInvalidParamsError(`Invalid ${label}: expected object`);
  }
  return value;
}

export function readString(source: Record<string, unknown>, field: string): string {
  const value = source[field];
  if (typeof value !== 'string') {
    throw new McpInvalidParamsError(`Invalid tools/call argument '${field}': expected string`);
  }
  return value.trim();
}

function readQuestion(source: Record<string, unknown>): string {
  const question = readString(source, 'question');
  if (question.length > MAX_QUESTION_LENGTH) {
    throw new McpInvalidParamsError(`Invalid tools/call argument 'question': longer than ${MAX_QUESTION_LENGTH} characters`);
  }
  return question;
}

function jsonToolResult(result: unknown, message: string): McpToolCallResult {
  return {
    content: [
      { type: 'text', text: message },
      { type: 'json', json: result },
    ],
    structuredContent: result,
  };
}
