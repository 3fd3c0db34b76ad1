import { resolveModelConfig } from '../config.js';
import type { Env, ModelConfig, ModelOptions } from '../config.js';
import { createConsoleLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import { describeError } from '../../utils/text.js';
import { createOpenAIProvider } from './adapters/openai.js';
import { conformResponse, isCodeProtocol, synthesizeErrorContent } from './protocol.js';
import { buildCompletionRequest } from './request.js';
import type { ChatResult, CompletionProvider, GenerationOptions, Transcript } from './types.js';

export const PROVIDER_NAME = 'Cloud.ru';

export interface ModelInfo {
  provider: string;
  modelName: string;
  baseUrl: string;
  temperature: number;
  maxTokens: number;
  topP: number;
}

export interface FoundationModelDeps {
  provider: CompletionProvider;
  logger?: Logger;
}

function chatResult(content: string): ChatResult {
  const result: ChatResult = { role: 'assistant', content };
  return Object.freeze(result);
}

/**
 * Chat model for a code-executing agent, backed by an OpenAI-compatible completion provider.
 *
 * `generate` never rejects: transport failures and malformed replies come back as assistant
 * messages the agent can still parse. When the stop sequences mark a code-protocol call, replies
 * that lack a `Thought:` line and a `<code>` block are rewritten into that shape.
 */
export class FoundationModel {
  readonly config: ModelConfig;
  /** Secondary providers are not supported. */
  readonly fallbackEnabled = false as const;
  private provider: CompletionProvider;
  private logger: Logger;

  constructor(config: ModelConfig, deps: FoundationModelDeps) {
    this.config = config;
    this.provider = deps.provider;
    this.logger = deps.logger ?? createConsoleLogger();
  }

  async generate(transcript: Transcript, options: GenerationOptions = {}): Promise<ChatResult> {
    const codeProtocol = isCodeProtocol(options.stopSequences);
    try {
      const request = buildCompletionRequest(transcript, options, this.config);
      this.logger.debug(
        `[${this.config.modelName}] ${request.messages.length} message(s), code protocol: ${codeProtocol}`
      );
      const text = await this.provider.complete(request);
      return chatResult(conformResponse(text, codeProtocol));
    } catch (error: unknown) {
      this.logger.error(`Completion request to ${PROVIDER_NAME} failed: ${describeError(error)}`);
      return chatResult(synthesizeErrorContent(error, codeProtocol));
    }
  }

  /** Same as `generate`, returning only the text. */
  async complete(transcript: Transcript, options: GenerationOptions = {}): Promise<string> {
    const result = await this.generate(transcript, options);
    return result.content;
  }

  getModelInfo(): ModelInfo {
    return {
      provider: PROVIDER_NAME,
      modelName: this.config.modelName,
      baseUrl: this.config.baseUrl,
      temperature: this.config.temperature,
      maxTokens: this.config.maxTokens,
      topP: this.config.topP,
    };
  }
}

export interface CreateModelOptions extends ModelOptions {
  logger?: Logger;
  env?: Env;
}

/**
 * Resolve configuration (explicit options, then environment) and wire the OpenAI-compatible
 * transport. Throws ConfigError when no credential is available.
 */
export function createFoundationModel(options: CreateModelOptions = {}): FoundationModel {
  const { logger, env, ...modelOptions } = options;
  const config = resolveModelConfig(modelOptions, env);
  return new FoundationModel(config, { provider: createOpenAIProvider(config), logger });
}

/** Options the fallback variant used to accept. Ignored. */
export interface LegacyFallbackOptions {
  useOpenAIFallback?: boolean;
  openaiApiKey?: string;
}

/**
 * @deprecated Use createFoundationModel. Fallback options are discarded and no secondary
 * provider is ever contacted.
 */
export function createFoundationModelWithFallback(
  options: CreateModelOptions & LegacyFallbackOptions = {}
): FoundationModel {
  const { useOpenAIFallback: _useFallback, openaiApiKey: _openaiKey, ...rest } = options;
  return createFoundationModel(rest);
}
