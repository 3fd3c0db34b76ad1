/**
 * Model configuration: defaults, credential resolution and validation.
 * Built once at startup and passed to the model; nothing in src/core/llm reads the environment.
 */
import { z } from 'zod';

export const DEFAULT_MODEL_NAME = 'zai-org/GLM-4.5';
export const DEFAULT_BASE_URL = 'https://foundation-models.api.cloud.ru/v1';

export const API_KEY_ENV_VARS = ['CLOUD_RU_API_KEY', 'API_KEY'] as const;

export const TRANSPORT_TIMEOUT_MS = 60_000;
export const TRANSPORT_MAX_RETRIES = 2;

export interface ModelOptions {
  modelName?: string;
  apiKey?: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  presencePenalty?: number;
}

export type Env = Readonly<Record<string, string | undefined>>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const modelConfigSchema = z.object({
  modelName: z.string().trim().min(1).default(DEFAULT_MODEL_NAME),
  apiKey: z.string().min(1),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  temperature: z.number().min(0).max(2).default(0.5),
  maxTokens: z.number().int().positive().default(5000),
  topP: z.number().min(0).max(1).default(0.95),
  presencePenalty: z.number().min(-2).max(2).default(0),
});

export type ModelConfig = Readonly<z.infer<typeof modelConfigSchema>>;

/**
 * Explicit argument first, then CLOUD_RU_API_KEY, then API_KEY. Blank values count as unset.
 */
export function resolveApiKey(explicit: string | undefined, env: Env): string | undefined {
  const candidates = [explicit, ...API_KEY_ENV_VARS.map((name) => env[name])];
  for (const candidate of candidates) {
    const value = candidate?.trim();
    if (value) return value;
  }
  return undefined;
}

export function resolveModelConfig(options: ModelOptions = {}, env: Env = process.env): ModelConfig {
  const apiKey = resolveApiKey(options.apiKey, env);
  if (!apiKey) {
    throw new ConfigError(
      `No API key configured. Pass apiKey or set ${API_KEY_ENV_VARS.join(' or ')} in the environment.`
    );
  }

  const parsed = modelConfigSchema.safeParse({ ...options, apiKey });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid model option "${issue.path.join('.')}": ${issue.message}`);
  }
  return Object.freeze(parsed.data);
}
