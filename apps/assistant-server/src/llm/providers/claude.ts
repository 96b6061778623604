import { z } from 'zod';
import { BaseHttpLlmProvider, type HttpFetcher } from './base';
import type { LlmGenerateRequest, LlmGenerateResponse } from '../types';

export interface ClaudeProviderOptions {
  model?: string;
  endpoint?: string;
  fetcher?: HttpFetcher;
  anthropicVersion?: string;
}

const messagesSchema = z.object({
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })).optional(),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

export class ClaudeLlmProvider extends BaseHttpLlmProvider {
  private readonly anthropicVersion: string;

  constructor(options: ClaudeProviderOptions = {}) {
    super({
      id: 'claude',
      model: options.model ?? 'claude-3-5-haiku-latest',
      endpoint: options.endpoint ?? 'https://api.anthropic.com/v1/messages',
      fetcher: options.fetcher,
    });
    this.anthropicVersion = options.anthropicVersion ?? '2023-06-01';
  }

  protected buildRequestBody(request: LlmGenerateRequest): unknown {
    return {
      model: this.model,
      max_tokens: request.maxOutputTokens ?? 1024,
      temperature: request.temperature,
      system: request.systemPrompt,
      messages: [{ role: 'user', content: request.prompt }],
    };
  }

  protected buildHeaders(apiKey: string): Record<string, string> {
    return {
      'content-type': 'application/json',
      'x-api-key': apiKey,
      'anthropic-version': this.anthropicVersion,
    };
  }

  protected parseResponse(raw: unknown): LlmGenerateResponse {
    const parsed = messagesSchema.safeParse(raw);
    if (!parsed.success) {
      throw this.invalidResponse(parsed.error.message);
    }

    const payload = parsed.data;
    const text = (payload.content ?? [])
      .filter((item) => item.type === 'text' && typeof item.text === 'string')
      .map((item) => item.text ?? '')
      .join('\n');

    return {
      provider: 'claude',
      model: this.model,
      content: text,
      usage: {
        inputTokens: payload.usage?.input_tokens,
        outputTokens: payload.usage?.output_tokens,
      },
      raw,
    };
  }
}
