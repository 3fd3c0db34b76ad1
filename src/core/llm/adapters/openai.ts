import OpenAI from 'openai';
import { TRANSPORT_MAX_RETRIES, TRANSPORT_TIMEOUT_MS } from '../../config.js';
import type { ModelConfig } from '../../config.js';
import type { CompletionProvider, CompletionRequest, NormalizedMessage } from '../types.js';

type ChatCompletionParams = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;

interface CompletionLike {
  choices: ReadonlyArray<{ message?: { content?: string | null } | null }>;
}

function toMessageParam(message: NormalizedMessage): OpenAI.Chat.ChatCompletionMessageParam {
  return { role: message.role, content: message.content };
}

export function toChatCompletionParams(request: CompletionRequest): ChatCompletionParams {
  const params: ChatCompletionParams = {
    model: request.model,
    messages: request.messages.map(toMessageParam),
    temperature: request.temperature,
    max_tokens: request.maxTokens,
    top_p: request.topP,
    presence_penalty: request.presencePenalty,
  };
  if (request.stop) params.stop = request.stop;
  return params;
}

/**
 * Text of the top choice. A reply without choices or content is treated as malformed.
 */
export function extractCompletionText(completion: CompletionLike): string {
  const choice = completion.choices[0];
  if (!choice) throw new Error('Completion provider returned no choices');
  const content = choice.message?.content;
  if (typeof content !== 'string') throw new Error('Completion provider returned no message content');
  return content;
}

/**
 * OpenAI-compatible chat-completion transport. Timeout and retry count are fixed for every call.
 */
export function createOpenAIProvider(config: ModelConfig): CompletionProvider {
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    timeout: TRANSPORT_TIMEOUT_MS,
    maxRetries: TRANSPORT_MAX_RETRIES,
  });

  return {
    async complete(request: CompletionRequest): Promise<string> {
      const completion = await client.chat.completions.create(toChatCompletionParams(request));
      return extractCompletionText(completion);
    },
  };
}
