import type { Logger } from '../logging';
import {
  ClaudeLlmProvider,
  EnvironmentKeyResolutionService,
  LlmRouter,
  OpenAiLlmProvider,
  type HttpFetcher,
  type KeyResolutionService,
  type LlmProviderId,
} from '../llm';

export interface ChatPrompt {
  prompt: string;
  systemPrompt?: string;
  requestId?: string;
}

export interface ChatModelAdapter {
  provider: LlmProviderId | 'router';
  generate(input: ChatPrompt): Promise<string>;
}

export interface RoutedChatModelOptions {
  primary: LlmProviderId;
  fallback?: LlmProviderId[];
  timeoutMs: number;
  maxOutputTokens?: number;
}

export class RoutedChatModelAdapter implements ChatModelAdapter {
  provider: 'router' = 'router';

  constructor(
    private readonly router: LlmRouter,
    private readonly options: RoutedChatModelOptions,
  ) {}

  async generate(input: ChatPrompt): Promise<string> {
    const result = await this.router.generate({
      requestId: input.requestId,
      request: {
        prompt: input.prompt,
        systemPrompt: input.systemPrompt,
        temperature: 0,
        maxOutputTokens: this.options.maxOutputTokens,
      },
      routing: {
        primary: this.options.primary,
        fallbackOrder: this.options.fallback ?? [],
        timeoutMs: this.options.timeoutMs,
      },
    });

    return result.content;
  }
}

export interface DefaultLlmRouterOptions {
  keyResolution?: KeyResolutionService;
  openaiModel?: string;
  claudeModel?: string;
  fetcher?: HttpFetcher;
}

export function createDefaultLlmRouter(logger: Logger, options: DefaultLlmRouterOptions = {}): LlmRouter {
  const resolver = options.keyResolution ?? new EnvironmentKeyResolutionService();

  return new LlmRouter({
    logger,
    keyResolution: resolver,
    providers: [
      new OpenAiLlmProvider({ model: options.openaiModel, fetcher: options.fetcher }),
      new ClaudeLlmProvider({ model: options.claudeModel, fetcher: options.fetcher }),
    ],
  });
}

/** The other provider backs up the configured one. */
export function fallbackFor(primary: LlmProviderId): LlmProviderId[] {
  return primary === 'openai' ? ['claude'] : ['openai'];
}
