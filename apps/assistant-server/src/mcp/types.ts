export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id?: string | number | null;
  method: string;
  params?: unknown;
}

export interface JsonRpcSuccess {
  jsonrpc: '2.0';
  id: string | number | null;
  result: unknown;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcFailure {
  jsonrpc: '2.0';
  id: string | number | null;
  error: JsonRpcError;
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

/** The part of a transport the server writes replies through. */
export interface McpResponder {
  attach(): void;
  writeResult(id: string | number | null, result: unknown): void;
  writeError(id: string | number | null, code: number, message: string, data?: unknown): void;
}

export interface McpToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
    additionalProperties?: boolean;
  };
}

export interface McpToolCallParams {
  name: string;
  arguments?: unknown;
}

export interface McpToolCallResult {
  content: Array<
    | {
        type: 'text';
        text: string;
      }
    | {
        type: 'json';
        json: unknown;
      }
  >;
  structuredContent?: unknown;
  isError?: boolean;
}

export class McpInvalidParamsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'McpInvalidParamsError';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
