import { z } from 'zod';
import { BaseHttpLlmProvider, type HttpFetcher } from './base';
import type { LlmGenerateRequest, LlmGenerateResponse } from '../types';

export interface OpenAiProviderOptions {
  model?: string;
  endpoint?: string;
  fetcher?: HttpFetcher;
}

const usageSchema = z
  .object({
    input_tokens: z.number().optional(),
    output_tokens: z.number().optional(),
  })
  .optional();

// The Responses API only sets output_text in its SDKs; raw bodies carry the
// text inside output[].content[].
const responsesSchema = z.object({
  output_text: z.string().optional(),
  output: z
    .array(
      z.object({
        content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })).optional(),
      }),
    )
    .optional(),
  usage: usageSchema,
});

export class OpenAiLlmProvider extends BaseHttpLlmProvider {
  constructor(options: OpenAiProviderOptions = {}) {
    super({
      id: 'openai',
      model: options.model ?? 'gpt-4.1-mini',
      endpoint: options.endpoint ?? 'https://api.openai.com/v1/responses',
      fetcher: options.fetcher,
    });
  }

  protected buildRequestBody(request: LlmGenerateRequest): unknown {
    const input = request.systemPrompt
      ? [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.prompt },
        ]
      : request.prompt;

    return {
      model: this.model,
      input,
      temperature: request.temperature,
      max_output_tokens: request.maxOutputTokens,
      metadata: request.metadata,
    };
  }

  protected buildHeaders(apiKey: string): Record<string, string> {
    return {
      'content-type': 'application/json',
      authorization: `Bearer ${apiKey}`,
    };
  }

  protected parseResponse(raw: unknown): LlmGenerateResponse {
    const parsed = responsesSchema.safeParse(raw);
    if (!parsed.success) {
      throw this.invalidResponse(parsed.error.message);
    }

    const payload = parsed.data;
    const content =
      payload.output_text ??
      (payload.output ?? [])
        .flatMap((item) => item.content ?? [])
        .filter((part) => part.type === 'output_text')
        .map((part) => part.text ?? '')
        .join('');

    return {
      provider: 'openai',
      model: this.model,
      content,
      usage: {
        inputTokens: payload.usage?.input_tokens,
        outputTokens: payload.usage?.output_tokens,
      },
      raw,
    };
  }
}
