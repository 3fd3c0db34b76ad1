import { renderText } from '../../utils/text.js';
import type { InboundMessage, NormalizedMessage, RoleKind, Transcript } from './types.js';

interface MessageFields {
  role: unknown;
  content: unknown;
  hasRole: boolean;
  hasContent: boolean;
}

const ROLE_KINDS: Record<string, RoleKind> = {
  system: 'system',
  user: 'user',
  assistant: 'assistant',
  'tool-call': 'tool_call',
  tool_call: 'tool_call',
  'tool-response': 'tool_response',
  tool_response: 'tool_response',
};

function isInboundMessage(value: unknown): value is InboundMessage {
  return typeof value === 'object' && value !== null;
}

function isMapping(message: InboundMessage): message is ReadonlyMap<string, unknown> {
  return message instanceof Map;
}

/** Single discrimination point between mapping-style and attribute-style messages. */
function readMessageFields(message: InboundMessage): MessageFields {
  if (isMapping(message)) {
    return {
      role: message.get('role'),
      content: message.get('content'),
      hasRole: message.has('role'),
      hasContent: message.has('content'),
    };
  }
  return {
    role: message.role,
    content: message.content,
    hasRole: 'role' in message,
    hasContent: 'content' in message,
  };
}

/**
 * `MessageRole.TOOL_RESPONSE` -> `tool_response`. Anything up to the last dot is treated as a
 * namespace.
 */
export function resolveRole(role: unknown): string {
  const text = renderText(role).trim();
  const dot = text.lastIndexOf('.');
  return (dot === -1 ? text : text.slice(dot + 1)).toLowerCase();
}

export function classifyRole(role: string): RoleKind {
  return Object.prototype.hasOwnProperty.call(ROLE_KINDS, role) ? ROLE_KINDS[role] : 'unknown';
}

function readPartText(part: unknown): { found: boolean; text: unknown } {
  if (part instanceof Map) return { found: part.has('text'), text: part.get('text') };
  if (typeof part === 'object' && part !== null && 'text' in part) {
    return { found: true, text: part.text };
  }
  return { found: false, text: undefined };
}

export function resolveContent(message: InboundMessage): string {
  const fields = readMessageFields(message);
  if (!fields.hasContent) return renderText(message);

  const { content } = fields;
  if (Array.isArray(content) && content.length > 0) {
    const first = readPartText(content[0]);
    if (first.found) return renderText(first.text);
  }
  return renderText(content);
}

/**
 * Convert a transcript into the provider's three-role shape.
 *
 * Tool calls are dropped, tool responses become assistant turns, unrecognised roles are dropped.
 * Never throws; relative order of the surviving messages is kept.
 */
export function normalizeMessages(transcript: Transcript): NormalizedMessage[] {
  const out: NormalizedMessage[] = [];
  for (const message of transcript) {
    if (!isInboundMessage(message)) continue;

    let normalized: NormalizedMessage | undefined;
    try {
      normalized = normalizeMessage(message);
    } catch {
      // unreadable message (throwing accessor, proxy trap): dropped like an unknown role
      normalized = undefined;
    }
    if (normalized) out.push(normalized);
  }
  return out;
}

function normalizeMessage(message: InboundMessage): NormalizedMessage | undefined {
  const fields = readMessageFields(message);
  const kind = classifyRole(fields.hasRole && fields.role !== undefined ? resolveRole(fields.role) : 'user');

  switch (kind) {
    case 'tool_call':
    case 'unknown':
      return undefined;
    case 'tool_response':
      return { role: 'assistant', content: resolveContent(message) };
    default:
      return { role: kind, content: resolveContent(message) };
  }
}
