import { errorMessage } from '../llm';
import { isRecord, type JsonRpcFailure, type JsonRpcRequest, type JsonRpcResponse, type JsonRpcSuccess, type McpResponder } from './types';

interface ProtocolHandlers {
  onRequest: (message: JsonRpcRequest) => Promise<void> | void;
  onProtocolError?: (error: Error) => void;
  input?: NodeJS.ReadableStream;
  output?: {
    write: (chunk: Uint8Array | string) => unknown;
  };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isRequestId(value: unknown): value is string | number | null | undefined {
  return value === undefined || value === null || typeof value === 'string' || typeof value === 'number';
}

/** JSON-RPC 2.0 over stdio with `Content-Length` framing. */
export class StdioJsonRpcProtocol implements McpResponder {
  private buffer = Buffer.alloc(0);

  constructor(private readonly handlers: ProtocolHandlers) {}

  attach(): void {
    const input = this.handlers.input ?? process.stdin;
    input.on('data', (chunk: Buffer | string) => {
      try {
        this.ingestChunk(chunk);
      } catch (error) {
        this.handlers.onProtocolError?.(toError(error));
      }
    });
  }

  ingestChunk(chunk: Buffer | string | Uint8Array): void {
    const next = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    this.buffer = Buffer.concat([this.buffer, next]);
    this.consumeBuffer();
  }

  async dispatchMessage(raw: unknown): Promise<void> {
    if (!isRecord(raw)) {
      throw new Error('Invalid JSON-RPC payload: expected object');
    }
    if (raw.jsonrpc !== '2.0') {
      throw new Error('Invalid JSON-RPC payload: jsonrpc must be 2.0');
    }
    if (typeof raw.method !== 'string' || raw.method.trim() === '') {
      throw new Error('Invalid JSON-RPC payload: method is required');
    }
    if (!isRequestId(raw.id)) {
      throw new Error('Invalid JSON-RPC payload: id must be a string, number or null');
    }

    await this.handlers.onRequest({ jsonrpc: '2.0', id: raw.id, method: raw.method, params: raw.params });
  }

  writeResult(id: string | number | null, result: unknown): void {
    const payload: JsonRpcSuccess = {
      jsonrpc: '2.0',
      id,
      result,
    };
    this.writeMessage(payload);
  }

  writeError(id: string | number | null, code: number, message: string, data?: unknown): void {
    const payload: JsonRpcFailure = {
      jsonrpc: '2.0',
      id,
      error: { code, message, data },
    };
    this.writeMessage(payload);
  }

  private writeMessage(payload: JsonRpcResponse): void {
    const body = Buffer.from(JSON.stringify(payload), 'utf8');
    const header = Buffer.from(`Content-Length: ${body.length}\r\n\r\n`, 'utf8');
    const output = this.handlers.output ?? process.stdout;
    output.write(Buffer.concat([header, body]));
  }

  private consumeBuffer(): void {
    while (true) {
      const headerEnd = this.buffer.indexOf('\r\n\r\n');
      if (headerEnd === -1) {
        return;
      }

      const headerText = this.buffer.subarray(0, headerEnd).toString('utf8');
      const junk = leadingJunk(headerText);
      if (junk > 0) {
        this.buffer = this.buffer.subarray(junk);
        this.handlers.onProtocolError?.(new Error(`Discarded ${junk} bytes before a frame header`));
        continue;
      }

      const messageStart = headerEnd + 4;
      let contentLength: number;
      try {
        contentLength = parseContentLength(headerText);
      } catch (error) {
        // Drop the unusable header so the frames behind it can still be read.
        this.buffer = this.buffer.subarray(messageStart);
        this.handlers.onProtocolError?.(toError(error));
        continue;
      }
      const messageEnd = messageStart + contentLength;

      if (this.buffer.length < messageEnd) {
        return;
      }

      const body = this.buffer.subarray(messageStart, messageEnd).toString('utf8');
      this.buffer = this.buffer.subarray(messageEnd);

      let parsed: unknown;
      try {
        parsed = JSON.parse(body);
      } catch (error) {
        this.handlers.onProtocolError?.(new Error(`Invalid JSON body: ${errorMessage(error)}`));
        continue;
      }

      void this.dispatchMessage(parsed).catch((error: unknown) => {
        this.handlers.onProtocolError?.(toError(error));
      });
    }
  }
}

/**
 * Bytes in front of a `Content-Length` header that does not start its own
 * line, e.g. the body left behind by a frame whose header was rejected.
 */
export function leadingJunk(headerText: string): number {
  const start = headerText.search(/content-length\s*:/i);
  if (start <= 0 || headerText.slice(start - 2, start) === '\r\n') {
    return 0;
  }
  return Buffer.byteLength(headerText.slice(0, start), 'utf8');
}

export function parseContentLength(headerText: string): number {
  const lines = headerText.split('\r\n');
  for (const line of lines) {
    const [name, value] = line.split(':', 2);
    if (name?.toLowerCase() === 'content-length') {
      const parsed = Number(value?.trim());
      if (!Number.isInteger(parsed) || parsed < 0) {
        break;
      }
      return parsed;
    }
  }
  throw new Error('Missing or invalid Content-Length header');
}
