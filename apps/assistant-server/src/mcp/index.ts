import { loadAssistantConfig } from '../config';
import { createAssistantContext } from '../context';
import { AssistantRuntime } from '../runtime';
import { createMcpLogger } from './logger';
import { CampusMcpServer, MCP_SERVER_NAME } from './server';
import { CampusMcpToolHost } from './toolHost';

const bootLogger = createMcpLogger({ service: MCP_SERVER_NAME });

try {
  const config = loadAssistantConfig();
  const logger = createMcpLogger({ service: MCP_SERVER_NAME }, { level: config.logLevel });
  const context = createAssistantContext(config, logger);
  const runtime = new AssistantRuntime(context, logger);
  const server = new CampusMcpServer(new CampusMcpToolHost(runtime, logger.child({ component: 'mcp.tools' })), logger);

  server.start();
} catch (error) {
  bootLogger.error('mcp.server.start_failed', { error });
  process.exitCode = 1;
}
