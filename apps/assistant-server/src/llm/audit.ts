import type { Logger } from '../logging';
import type { LlmAuditEvent, LlmAuditSink } from './types';

const SENSITIVE_KEY = /key|secret|token/i;

export function sanitizeMetadata(metadata: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!metadata) {
    return undefined;
  }

  const next: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    // keyId names the variable a key came from, not the key.
    if (SENSITIVE_KEY.test(key) && key !== 'keyId') {
      next[key] = '[REDACTED]';
      continue;
    }
    next[key] = value;
  }
  return next;
}

export class LoggerLlmAuditSink implements LlmAuditSink {
  constructor(private readonly logger: Logger) {}

  emit(event: LlmAuditEvent): void {
    const data = {
      requestId: event.requestId,
      provider: event.provider,
      model: event.model,
      ...(event.metadata ? { metadata: sanitizeMetadata(event.metadata) } : {}),
    };

    if (event.event === 'llm.route.provider.failure' || event.event === 'llm.route.exhausted') {
      this.logger.warn(event.event, data);
      return;
    }
    this.logger.info(event.event, data);
  }
}

export class InMemoryLlmAuditSink implements LlmAuditSink {
  readonly events: LlmAuditEvent[] = [];

  emit(event: LlmAuditEvent): void {
    this.events.push(event);
  }
}
