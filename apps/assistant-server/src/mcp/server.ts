import { errorMessage } from '../llm';
import type { Logger } from '../logging';
import { StdioJsonRpcProtocol } from './protocol';
import type { CampusMcpToolHost } from './toolHost';
import { isRecord, McpInvalidParamsError, type JsonRpcRequest, type McpResponder } from './types';

export const JSON_RPC_METHOD_NOT_FOUND = -32601;
export const JSON_RPC_INVALID_PARAMS = -32602;
export const JSON_RPC_INTERNAL_ERROR = -32603;

export const MCP_SERVER_NAME = 'campus-assist-mcp';

export interface CampusMcpServerOptions {
  protocol?: McpResponder;
}

export class CampusMcpServer {
  private readonly protocol: McpResponder;

  constructor(
    private readonly tools: CampusMcpToolHost,
    private readonly logger: Logger,
    options: CampusMcpServerOptions = {},
  ) {
    this.protocol =
      options.protocol ??
      new StdioJsonRpcProtocol({
        onRequest: (message) => this.dispatch(message),
        onProtocolError: (error) => this.logger.error('mcp.protocol.error', { error }),
      });
  }

  start(): void {
    this.logger.info('mcp.server.start', { transport: 'stdio' });
    this.protocol.attach();
    process.stdin.resume();
  }

  async dispatch(message: JsonRpcRequest): Promise<void> {
    const reqLogger = this.logger.child({ method: message.method, id: message.id ?? null });
    reqLogger.debug('mcp.request.received');

    if (message.id === undefined) {
      reqLogger.debug('mcp.notification.ignored');
      return;
    }

    try {
      switch (message.method) {
        case 'initialize':
          this.protocol.writeResult(message.id, {
            protocolVersion: '2024-11-05',
            capabilities: {
              tools: {
                listChanged: false,
              },
            },
            serverInfo: {
              name: MCP_SERVER_NAME,
              version: '0.1.0',
            },
          });
          return;

        case 'ping':
          this.protocol.writeResult(message.id, {});
          return;

        case 'tools/list':
          this.protocol.writeResult(message.id, {
            tools: this.tools.listTools(),
          });
          return;

        case 'tools/call': {
          if (!isRecord(message.params)) {
            throw new McpInvalidParamsError('tools/call.params must be an object');
          }
          const name = message.params.name;
          if (typeof name !== 'string' || name.trim() === '') {
            throw new McpInvalidParamsError('tools/call.params.name must be a non-empty string');
          }
          const result = await this.tools.callTool({
            name,
            arguments: message.params.arguments,
          });
          this.protocol.writeResult(message.id, result);
          return;
        }

        default:
          this.protocol.writeError(message.id, JSON_RPC_METHOD_NOT_FOUND, `Method not found: ${message.method}`);
          return;
      }
    } catch (error) {
      reqLogger.error('mcp.request.error', { error });
      if (error instanceof McpInvalidParamsError) {
        this.protocol.writeError(message.id, JSON_RPC_INVALID_PARAMS, error.message);
        return;
      }
      this.protocol.writeError(message.id, JSON_RPC_INTERNAL_ERROR, errorMessage(error));
    }
  }
}
