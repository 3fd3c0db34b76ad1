/**
 * Types shared by the normalizer, the request builder and the completion provider.
 */

/**
 * Attribute-style message as produced by the agent framework. Role may be a plain string or an
 * enum-like value rendering as `MessageRole.USER`; content may be a string, a list of content
 * parts, or missing.
 */
export interface MessageRecord {
  role?: unknown;
  content?: unknown;
}

/** Mapping-style message (`Map` keyed by field name). */
export type MessageMapping = ReadonlyMap<string, unknown>;

export type InboundMessage = MessageRecord | MessageMapping;

export type Transcript = readonly unknown[];

export type ProviderRole = 'system' | 'user' | 'assistant';

export type RoleKind = ProviderRole | 'tool_call' | 'tool_response' | 'unknown';

export interface NormalizedMessage {
  role: ProviderRole;
  content: string;
}

export interface GenerationOptions {
  /** Any iterable of any element type; only non-empty strings reach the provider. */
  stopSequences?: Iterable<unknown>;
  /** Accepted for interface compatibility, never forwarded. */
  responseFormat?: unknown;
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  presencePenalty?: number;
}

export interface CompletionRequest {
  model: string;
  messages: NormalizedMessage[];
  temperature: number;
  maxTokens: number;
  topP: number;
  presencePenalty: number;
  stop?: string[];
}

export interface ChatResult {
  readonly role: 'assistant';
  readonly content: string;
}

/**
 * Transport to the completion provider. Retries and timeouts are the implementation's concern;
 * any rejection is treated as a failed call by the adapter.
 */
export interface CompletionProvider {
  complete(request: CompletionRequest): Promise<string>;
}
