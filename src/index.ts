export {
  API_KEY_ENV_VARS,
  ConfigError,
  DEFAULT_BASE_URL,
  DEFAULT_MODEL_NAME,
  resolveApiKey,
  resolveModelConfig,
} from './core/config.js';
export type { Env, ModelConfig, ModelOptions } from './core/config.js';
export { checkConnection } from './core/connection.js';
export type { ConnectionCheck } from './core/connection.js';
export { createOpenAIProvider } from './core/llm/adapters/openai.js';
export {
  FoundationModel,
  createFoundationModel,
  createFoundationModelWithFallback,
} from './core/llm/model.js';
export type { CreateModelOptions, FoundationModelDeps, LegacyFallbackOptions, ModelInfo } from './core/llm/model.js';
export { normalizeMessages } from './core/llm/normalizer.js';
export { conformResponse, isCodeProtocol, sanitizeStopSequences } from './core/llm/protocol.js';
export { buildCompletionRequest } from './core/llm/request.js';
export type {
  ChatResult,
  CompletionProvider,
  CompletionRequest,
  GenerationOptions,
  InboundMessage,
  MessageRecord,
  NormalizedMessage,
  Transcript,
} from './core/llm/types.js';
export { ToolExecutor, resolveToolKeys, toolsDef } from './core/tools.js';
export type { NeutralToolDef, ToolKeys, ToolName } from './core/tools.js';
export { createConsoleLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
