import type { KeyResolutionService, LlmProviderId, ResolvedApiKey } from './types';

export const PROVIDER_KEY_ENV: Record<LlmProviderId, string> = {
  openai: 'CAMPUS_ASSIST_OPENAI_API_KEY',
  claude: 'CAMPUS_ASSIST_ANTHROPIC_API_KEY',
};

/** Reads one deployment-wide key per provider; blank values count as absent. */
export class EnvironmentKeyResolutionService implements KeyResolutionService {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async resolveKey(provider: LlmProviderId): Promise<ResolvedApiKey | null> {
    const envKey = PROVIDER_KEY_ENV[provider];
    const key = this.env[envKey]?.trim();
    if (!key) {
      return null;
    }

    return { provider, key, keyId: envKey };
  }
}
