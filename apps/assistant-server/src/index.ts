import { loadAssistantConfig } from './config';
import { createAssistantContext } from './context';
import { createLogger } from './logging';
import { CampusMcpToolHost } from './mcp/toolHost';
import { AssistantRuntime } from './runtime';
import { createAssistantHttpServer, SERVICE_NAME } from './server';

const bootLogger = createLogger({ service: SERVICE_NAME });

try {
  const config = loadAssistantConfig();
  const logger = createLogger({ service: SERVICE_NAME }, { level: config.logLevel });
  const runtime = new AssistantRuntime(createAssistantContext(config, logger), logger);
  const toolHost = new CampusMcpToolHost(runtime, logger.child({ component: 'http.tools' }));
  const server = createAssistantHttpServer(runtime, toolHost, logger);

  server.listen(config.port, () => {
    logger.info('server.started', { port: config.port, baseUrl: `http://localhost:${config.port}`, rootDir: config.rootDir });
  });
} catch (error) {
  bootLogger.error('server.start_failed', { error });
  process.exitCode = 1;
}
