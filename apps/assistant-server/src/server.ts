import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { isDomainId } from '@campus-assist/nlu-engine';
import { z } from 'zod';
import { errorMessage } from './llm';
import type { Logger } from './logging';
import type { CampusMcpToolHost } from './mcp/toolHost';
import { McpInvalidParamsError } from './mcp/types';
import type { AssistantRuntime } from './runtime';

export const SERVICE_NAME = 'campus-assist-server';
const MAX_BODY_BYTES = 1_000_000;

export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

const questionBodySchema = z.object({
  question: z.string().trim().max(2000),
});

export const processedQuestionSchema = z.object({
  rawText: z.string().default(''),
  cleanText: z.string(),
  intent: z.string().nullable().default(null),
  domain: z
    .string()
    .nullable()
    .default(null)
    .transform((value) => (isDomainId(value) ? value : null)),
  slots: z.record(z.array(z.string())).default({}),
  retrievalQuery: z.string().default(''),
  confidence: z
    .object({
      intent: z.number().default(0),
      domain: z.number().default(0),
    })
    .default({}),
  intentResolution: z
    .object({
      strategy: z.enum(['rule', 'classifier', 'none']).default('none'),
      reason: z.string().default('supplied'),
    })
    .default({}),
});

const answerBodySchema = z.object({
  processed: processedQuestionSchema,
});

const toolCallBodySchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  arguments: z.record(z.unknown()).optional(),
});

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { 'content-type': 'application/json; charset=utf-8' });
  res.end(JSON.stringify(body, null, 2));
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new RequestValidationError('Request body is too large');
    }
    chunks.push(buffer);
  }

  const raw = Buffer.concat(chunks).toString('utf8').trim();
  if (!raw) {
    throw new RequestValidationError('Request body is empty');
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new RequestValidationError(`Request body is not valid JSON: ${errorMessage(error)}`);
  }
}

async function readBody<T extends z.ZodTypeAny>(req: IncomingMessage, schema: T): Promise<z.output<T>> {
  const payload = await readJsonBody(req);
  const result = schema.safeParse(payload);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new RequestValidationError(`Invalid payload: ${details}`);
  }
  return result.data;
}

type RouteHandler = (req: IncomingMessage, logger: Logger) => Promise<unknown>;

interface Route {
  method: 'GET' | 'POST';
  handle: RouteHandler;
}

export function createAssistantHttpServer(runtime: AssistantRuntime, toolHost: CampusMcpToolHost, logger: Logger): Server {
  const routes: Record<string, Route> = {
    '/health': {
      method: 'GET',
      handle: async () => ({ ok: true, service: SERVICE_NAME, intents: runtime.intentLabels.length }),
    },
    '/process': {
      method: 'POST',
      handle: async (req, requestLogger) => {
        const { question } = await readBody(req, questionBodySchema);
        requestLogger.info('http.process.received', { question });
        return runtime.process(question);
      },
    },
    '/answer': {
      method: 'POST',
      handle: async (req) => {
        const { processed } = await readBody(req, answerBodySchema);
        return runtime.answer(processed);
      },
    },
    '/ask': {
      method: 'POST',
      handle: async (req, requestLogger) => {
        const { question } = await readBody(req, questionBodySchema);
        requestLogger.info('http.ask.received', { question });
        return runtime.ask(question);
      },
    },
    '/halls': {
      method: 'GET',
      handle: async () => ({ halls: await runtime.listHalls() }),
    },
    '/tools/list': {
      method: 'GET',
      handle: async () => ({ tools: toolHost.listTools() }),
    },
    '/tools/call': {
      method: 'POST',
      handle: async (req, requestLogger) => {
        const body = await readBody(req, toolCallBodySchema);
        requestLogger.info('http.tools.call.received', { name: body.name });
        return toolHost.callTool({ name: body.name, arguments: body.arguments });
      },
    },
  };

  return createServer((req, res) => {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    const requestLogger = logger.child({ method: req.method, path: pathname });
    const route = Object.hasOwn(routes, pathname) ? routes[pathname] : undefined;

    if (!route) {
      sendJson(res, 404, { error: 'Not found' });
      return;
    }
    if (req.method !== route.method) {
      sendJson(res, 405, { error: 'Method not allowed', allowed: [route.method] });
      return;
    }

    void route.handle(req, requestLogger).then(
      (body) => sendJson(res, 200, body),
      (error: unknown) => {
        const clientError = error instanceof RequestValidationError || error instanceof McpInvalidParamsError;
        requestLogger.error('http.request.error', { error });
        sendJson(res, clientError ? 400 : 500, { error: errorMessage(error) });
      },
    );
  });
}
