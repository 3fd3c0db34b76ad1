import { describeError } from '../utils/text.js';
import type { ModelConfig } from './config.js';
import { buildCompletionRequest } from './llm/request.js';
import type { CompletionProvider } from './llm/types.js';

export const CONNECTION_PROBE = 'Reply with a single word: working?';

export type ConnectionCheck =
  | { ok: true; reply: string; modelName: string; baseUrl: string }
  | { ok: false; error: string };

/**
 * Round trip a one-line prompt straight through the provider. Unlike FoundationModel.generate,
 * transport errors are reported instead of being turned into a reply.
 */
export async function checkConnection(config: ModelConfig, provider: CompletionProvider): Promise<ConnectionCheck> {
  try {
    const request = buildCompletionRequest([{ role: 'user', content: CONNECTION_PROBE }], {}, config);
    const reply = await provider.complete(request);
    return { ok: true, reply: reply.trim(), modelName: config.modelName, baseUrl: config.baseUrl };
  } catch (error: unknown) {
    return { ok: false, error: describeError(error) };
  }
}
