/**
 * Response protocol expected by the code-executing agent: a `Thought:` line followed by a
 * `<code>` block. Helpers here are pure; the model wires them into the request/response cycle.
 */
import { describeError, renderText } from '../../utils/text.js';
import type { NormalizedMessage } from './types.js';

export const THOUGHT_MARKER = 'Thought:';
export const CODE_OPEN = '<code>';
export const CODE_CLOSE = '</code>';

/** System prompts longer than this are replaced by COMPACT_SYSTEM_PROMPT. */
export const MAX_SYSTEM_PROMPT_LENGTH = 10_000;

/** Upper bound on `stop` accepted by the provider. */
export const MAX_STOP_SEQUENCES = 4;

export const COMPACT_SYSTEM_PROMPT = [
  'You are an expert assistant who solves tasks step by step using code.',
  'Always respond in this format:',
  `${THOUGHT_MARKER} [your reasoning]`,
  CODE_OPEN,
  '[your python code]',
  CODE_CLOSE,
  'Use print() to output intermediate results.',
  'Use final_answer() to provide the final result.',
].join('\n');

export const FORMAT_REMINDER = `\n\nRemember to respond with:\n${THOUGHT_MARKER} [reasoning]\n${CODE_OPEN}\n[python code]\n${CODE_CLOSE}`;

/** Any collection of stop sequences as a list; a collection that can't be iterated counts as one element. */
function toStopList(stopSequences: Iterable<unknown> | undefined): unknown[] {
  if (stopSequences == null) return [];
  if (Array.isArray(stopSequences)) return stopSequences;
  if (typeof stopSequences === 'string') return [stopSequences];
  try {
    return Array.from(stopSequences);
  } catch {
    // broken iterator: render the collection itself
    return [stopSequences];
  }
}

/**
 * Code-protocol mode is signalled by the code delimiter among the requested stop sequences.
 * Heuristic: each element is rendered as text and searched, so element types don't matter.
 */
export function isCodeProtocol(stopSequences: Iterable<unknown> | undefined): boolean {
  return toStopList(stopSequences).some((stop) => renderText(stop).includes(CODE_OPEN));
}

export function sanitizeStopSequences(stopSequences: Iterable<unknown> | undefined): string[] | undefined {
  const valid = toStopList(stopSequences)
    .filter((stop): stop is string => typeof stop === 'string' && stop.length > 0)
    .slice(0, MAX_STOP_SEQUENCES);
  return valid.length > 0 ? valid : undefined;
}

export function compactSystemPrompt(messages: NormalizedMessage[]): NormalizedMessage[] {
  const [first, ...rest] = messages;
  if (!first || first.role !== 'system' || first.content.length <= MAX_SYSTEM_PROMPT_LENGTH) {
    return messages;
  }
  return [{ role: 'system', content: COMPACT_SYSTEM_PROMPT }, ...rest];
}

export function appendFormatReminder(messages: NormalizedMessage[]): NormalizedMessage[] {
  const last = messages[messages.length - 1];
  if (!last || last.role !== 'user') return messages;
  return [...messages.slice(0, -1), { role: 'user', content: last.content + FORMAT_REMINDER }];
}

/**
 * Keyword sniffing, not parsing: `print` or `def ` in any case, or a literal `import `.
 */
export function looksLikeCode(text: string): boolean {
  const lower = text.toLowerCase();
  return lower.includes('print') || lower.includes('def ') || text.includes('import ');
}

export function isConformant(text: string): boolean {
  return text.includes(THOUGHT_MARKER) || text.includes(CODE_OPEN);
}

/**
 * Quote text as a single-line Python string literal.
 */
export function toPythonStringLiteral(text: string): string {
  const escaped = text
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n');
  return `'${escaped}'`;
}

function codeBlock(thought: string, code: string): string {
  return `${THOUGHT_MARKER} ${thought}\n${CODE_OPEN}\n${code}\n${CODE_CLOSE}`;
}

/**
 * Rewrite a provider reply so the agent's parser accepts it. Outside code-protocol mode, or when
 * either marker is already present, the text is returned unchanged.
 */
export function conformResponse(text: string, codeProtocol: boolean): string {
  if (!codeProtocol || isConformant(text)) return text;
  if (looksLikeCode(text)) {
    return codeBlock('I will execute the requested code.', text);
  }
  return codeBlock('I will print the answer.', `print(${toPythonStringLiteral(text)})`);
}

export function synthesizeErrorContent(error: unknown, codeProtocol: boolean): string {
  const message = describeError(error);
  if (codeProtocol) {
    return codeBlock('An error occurred.', `print(${toPythonStringLiteral(`Error: ${message}`)})`);
  }
  return `Sorry, an error occurred: ${message}`;
}
