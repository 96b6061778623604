import type { Logger } from '../logging';
import { LoggerLlmAuditSink } from './audit';
import { errorMessage, LlmProviderError, LlmRoutingExhaustedError, type LlmRouteAttempt } from './errors';
import type {
  KeyResolutionService,
  LlmAuditEvent,
  LlmAuditSink,
  LlmGenerateResponse,
  LlmProvider,
  LlmProviderId,
  LlmRouteRequest,
} from './types';

export interface LlmRouterOptions {
  providers: LlmProvider[];
  keyResolution: KeyResolutionService;
  logger: Logger;
  auditSink?: LlmAuditSink;
}

function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Tries the primary provider, then each fallback in order. A provider is
 * skipped when it is not registered or has no key; a failure only moves on
 * to the next provider when it is retryable.
 */
export class LlmRouter {
  private readonly providerMap = new Map<LlmProviderId, LlmProvider>();
  private readonly auditSink: LlmAuditSink;

  constructor(private readonly options: LlmRouterOptions) {
    for (const provider of options.providers) {
      this.providerMap.set(provider.id, provider);
    }
    this.auditSink = options.auditSink ?? new LoggerLlmAuditSink(options.logger.child({ subsystem: 'llm' }));
  }

  async generate(routeRequest: LlmRouteRequest): Promise<LlmGenerateResponse> {
    const { routing, requestId } = routeRequest;
    const order = [routing.primary, ...routing.fallbackOrder.filter((id) => id !== routing.primary)];
    const attempts: LlmRouteAttempt[] = [];
    const emit = (event: Omit<LlmAuditEvent, 'ts' | 'requestId'>) => {
      this.auditSink.emit({ ts: nowIso(), requestId, ...event });
    };

    emit({ event: 'llm.route.start', metadata: { order } });

    for (let index = 0; index < order.length; index += 1) {
      const providerId = order[index];
      if (providerId === undefined) {
        continue;
      }
      const provider = this.providerMap.get(providerId);
      if (!provider) {
        emit({ event: 'llm.route.provider.skipped', provider: providerId, metadata: { reason: 'provider_not_enabled' } });
        attempts.push({ provider: providerId, code: 'provider_not_enabled', message: 'Provider not configured' });
        continue;
      }

      const resolvedKey = await this.options.keyResolution.resolveKey(providerId);

      if (!resolvedKey) {
        emit({ event: 'llm.route.provider.skipped', provider: providerId, metadata: { reason: 'key_not_found' } });
        attempts.push({ provider: providerId, code: 'key_not_found', message: 'No key resolved for provider' });
        continue;
      }

      emit({
        event: 'llm.route.provider.attempt',
        provider: providerId,
        model: provider.model,
        metadata: { keyId: resolvedKey.keyId, attemptIndex: index },
      });

      try {
        const response = await provider.generate(routeRequest.request, {
          resolvedKey,
          timeoutMs: routing.timeoutMs,
          logger: this.options.logger.child({ requestId, provider: providerId }),
          requestId,
        });

        emit({
          event: 'llm.route.provider.success',
          provider: providerId,
          model: provider.model,
          metadata: { keyId: resolvedKey.keyId },
        });

        return response;
      } catch (error) {
        const providerError =
          error instanceof LlmProviderError
            ? error
            : new LlmProviderError(errorMessage(error), {
                provider: providerId,
                code: 'unknown',
                retryable: false,
                cause: error,
              });

        attempts.push({
          provider: providerId,
          code: providerError.code,
          message: providerError.message,
          statusCode: providerError.options.statusCode,
        });

        emit({
          event: 'llm.route.provider.failure',
          provider: providerId,
          model: provider.model,
          metadata: {
            code: providerError.code,
            retryable: providerError.retryable,
            statusCode: providerError.options.statusCode,
          },
        });

        const nextProvider = order[index + 1];
        if (nextProvider !== undefined && providerError.retryable) {
          emit({
            event: 'llm.route.provider.fallback',
            provider: providerId,
            model: provider.model,
            metadata: { reason: providerError.code, nextProvider },
          });
          continue;
        }

        break;
      }
    }

    emit({ event: 'llm.route.exhausted', metadata: { attempts } });
    throw new LlmRoutingExhaustedError('No LLM provider could fulfill the request.', attempts);
  }
}
