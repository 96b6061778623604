import path from 'node:path';
import { z, type ZodIssue } from 'zod';
import { LOG_LEVELS, type LogLevel } from './logging';

export const CLASSIFIER_PROVIDERS = ['none', 'openai', 'claude'] as const;
export type ClassifierProvider = (typeof CLASSIFIER_PROVIDERS)[number];

export interface AssistantConfig {
  port: number;
  rootDir: string;
  logLevel: LogLevel;
  classifier: {
    provider: ClassifierProvider;
    timeoutMs: number;
    openaiModel?: string;
    claudeModel?: string;
  };
  qualityThreshold: number;
}

export class AssistantConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: ZodIssue[],
  ) {
    super(message);
    this.name = 'AssistantConfigError';
  }
}

// Unset and blank variables both fall back to the default.
function blankToUndefined(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function optionalEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(blankToUndefined, schema);
}

const envSchema = z.object({
  PORT: optionalEnv(z.coerce.number().int().min(0).max(65535).default(8787)),
  CAMPUS_ASSIST_ROOT: optionalEnv(z.string().optional()),
  CAMPUS_ASSIST_LOG_LEVEL: optionalEnv(z.enum(LOG_LEVELS).default('info')),
  CAMPUS_ASSIST_CLASSIFIER: optionalEnv(z.enum(CLASSIFIER_PROVIDERS).default('none')),
  CAMPUS_ASSIST_CLASSIFIER_TIMEOUT_MS: optionalEnv(z.coerce.number().int().positive().default(20_000)),
  CAMPUS_ASSIST_OPENAI_MODEL: optionalEnv(z.string().optional()),
  CAMPUS_ASSIST_CLAUDE_MODEL: optionalEnv(z.string().optional()),
  CAMPUS_ASSIST_QUALITY_THRESHOLD: optionalEnv(z.coerce.number().min(0).max(100).default(70)),
});

export function loadAssistantConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AssistantConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new AssistantConfigError(`Invalid environment configuration: ${details}`, result.error.issues);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    rootDir: path.resolve(cwd, parsed.CAMPUS_ASSIST_ROOT ?? '.'),
    logLevel: parsed.CAMPUS_ASSIST_LOG_LEVEL,
    classifier: {
      provider: parsed.CAMPUS_ASSIST_CLASSIFIER,
      timeoutMs: parsed.CAMPUS_ASSIST_CLASSIFIER_TIMEOUT_MS,
      openaiModel: parsed.CAMPUS_ASSIST_OPENAI_MODEL,
      claudeModel: parsed.CAMPUS_ASSIST_CLAUDE_MODEL,
    },
    qualityThreshold: parsed.CAMPUS_ASSIST_QUALITY_THRESHOLD,
  };
}
