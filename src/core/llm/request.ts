import type { ModelConfig } from '../config.js';
import { normalizeMessages } from './normalizer.js';
import { appendFormatReminder, compactSystemPrompt, isCodeProtocol, sanitizeStopSequences } from './protocol.js';
import type { CompletionRequest, GenerationOptions, NormalizedMessage, Transcript } from './types.js';

/** Sent when nothing in the transcript survives normalization. */
export const EMPTY_TRANSCRIPT_FALLBACK: NormalizedMessage = { role: 'user', content: 'Hello' };

export function buildCompletionRequest(
  transcript: Transcript,
  options: GenerationOptions,
  config: ModelConfig
): CompletionRequest {
  let messages = normalizeMessages(transcript);
  if (messages.length === 0) messages = [{ ...EMPTY_TRANSCRIPT_FALLBACK }];

  messages = compactSystemPrompt(messages);
  if (isCodeProtocol(options.stopSequences)) {
    messages = appendFormatReminder(messages);
  }

  const request: CompletionRequest = {
    model: config.modelName,
    messages,
    temperature: options.temperature ?? config.temperature,
    maxTokens: options.maxTokens ?? config.maxTokens,
    topP: options.topP ?? config.topP,
    presencePenalty: options.presencePenalty ?? config.presencePenalty,
  };

  const stop = sanitizeStopSequences(options.stopSequences);
  if (stop) request.stop = stop;
  return request;
}
