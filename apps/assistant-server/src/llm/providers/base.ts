import { errorMessage, LlmProviderError, classifyHttpStatus } from '../errors';
import type { LlmGenerateRequest, LlmGenerateResponse, LlmProvider, LlmProviderGenerateContext, LlmProviderId } from '../types';

export interface HttpResponseLike {
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type HttpFetcher = (input: {
  url: string;
  method: 'POST';
  headers: Record<string, string>;
  body: string;
  timeoutMs?: number;
}) => Promise<HttpResponseLike>;

export const fetchHttp: HttpFetcher = async (input) => {
  return fetch(input.url, {
    method: input.method,
    headers: input.headers,
    body: input.body,
    signal: input.timeoutMs === undefined ? undefined : AbortSignal.timeout(input.timeoutMs),
  });
};

export interface ProviderBaseOptions {
  id: LlmProviderId;
  model: string;
  endpoint: string;
  fetcher?: HttpFetcher;
}

function isTimeoutError(error: unknown): boolean {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return true;
  }
  return /timeout|aborted|abort/i.test(errorMessage(error));
}

export abstract class BaseHttpLlmProvider implements LlmProvider {
  readonly id: LlmProviderId;
  readonly model: string;
  private readonly endpoint: string;
  private readonly fetcher: HttpFetcher;

  protected constructor(options: ProviderBaseOptions) {
    this.id = options.id;
    this.model = options.model;
    this.endpoint = options.endpoint;
    this.fetcher = options.fetcher ?? fetchHttp;
  }

  async generate(request: LlmGenerateRequest, context: LlmProviderGenerateContext): Promise<LlmGenerateResponse> {
    if (!context.resolvedKey.key) {
      throw new LlmProviderError('API key is missing for provider request.', {
        provider: this.id,
        code: 'key_not_found',
        retryable: false,
      });
    }

    const payload = this.buildRequestBody(request);
    context.logger.debug('llm.provider.request', { endpoint: this.endpoint, model: this.model });

    try {
      const response = await this.fetcher({
        url: this.endpoint,
        method: 'POST',
        headers: this.buildHeaders(context.resolvedKey.key),
        body: JSON.stringify(payload),
        timeoutMs: context.timeoutMs,
      });

      if (response.status < 200 || response.status >= 300) {
        const text = await response.text();
        throw classifyHttpStatus(this.id, response.status, `${this.id} request failed with HTTP ${response.status}: ${text}`);
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch (error) {
        throw this.invalidResponse(`body is not JSON (${errorMessage(error)})`);
      }
      return this.parseResponse(data);
    } catch (error) {
      if (error instanceof LlmProviderError) {
        throw error;
      }

      const isTimeout = isTimeoutError(error);
      throw new LlmProviderError(`${this.id} network request failed: ${errorMessage(error)}`, {
        provider: this.id,
        code: isTimeout ? 'timeout' : 'network_error',
        retryable: true,
        cause: error,
      });
    }
  }

  protected invalidResponse(details: string): LlmProviderError {
    return new LlmProviderError(`${this.id} returned an unexpected response body: ${details}`, {
      provider: this.id,
      code: 'invalid_response',
      retryable: false,
    });
  }

  protected abstract buildRequestBody(request: LlmGenerateRequest): unknown;
  protected abstract buildHeaders(apiKey: string): Record<string, string>;
  protected abstract parseResponse(raw: unknown): LlmGenerateResponse;
}
