import { describe, expect, it } from 'vitest';

import { classifyRole, normalizeMessages, resolveContent, resolveRole } from './normalizer.js';

class RoleOnlyMessage {
  constructor(public role: unknown) {}
}

class AgentMessage {
  constructor(
    public role: unknown,
    public content?: unknown
  ) {}
}

const enumRole = (name: string) => ({ toString: () => `MessageRole.${name}` });

describe('resolveRole', () => {
  it('strips the namespace prefix and lower-cases', () => {
    expect(resolveRole('MessageRole.TOOL_RESPONSE')).toBe('tool_response');
    expect(resolveRole('Assistant')).toBe('assistant');
  });

  it('renders enum-like objects through toString', () => {
    expect(resolveRole(enumRole('SYSTEM'))).toBe('system');
  });
});

describe('classifyRole', () => {
  it('maps both spellings of the tool roles', () => {
    expect(classifyRole('tool-call')).toBe('tool_call');
    expect(classifyRole('tool_call')).toBe('tool_call');
    expect(classifyRole('tool-response')).toBe('tool_response');
    expect(classifyRole('tool_response')).toBe('tool_response');
  });

  it('treats anything else as unknown', () => {
    expect(classifyRole('developer')).toBe('unknown');
    expect(classifyRole('constructor')).toBe('unknown');
  });
});

describe('resolveContent', () => {
  it('uses the text of the first content part', () => {
    expect(
      resolveContent({
        role: 'user',
        content: [
          { type: 'text', text: 'first' },
          { type: 'text', text: 'second' },
        ],
      })
    ).toBe('first');
  });

  it('renders lists without a text part as JSON', () => {
    expect(resolveContent({ role: 'user', content: [{ type: 'image' }] })).toBe('[{"type":"image"}]');
    expect(resolveContent({ role: 'user', content: [] })).toBe('[]');
  });

  it('renders the whole message when content is absent', () => {
    expect(resolveContent(new RoleOnlyMessage('user'))).toBe('{"role":"user"}');
  });

  it('stringifies non-string content', () => {
    expect(resolveContent({ role: 'user', content: 42 })).toBe('42');
    expect(resolveContent({ role: 'user', content: null })).toBe('');
  });
});

describe('normalizeMessages', () => {
  it('returns an empty list for an empty transcript', () => {
    expect(normalizeMessages([])).toEqual([]);
  });

  it('drops tool-call messages entirely', () => {
    expect(normalizeMessages([{ role: 'tool-call', content: 'run search' }])).toEqual([]);
  });

  it('remaps tool responses to assistant turns', () => {
    expect(normalizeMessages([{ role: 'tool-response', content: '42' }])).toEqual([
      { role: 'assistant', content: '42' },
    ]);
  });

  it('keeps order and handles attribute, mapping and enum-role messages', () => {
    const transcript = [
      new AgentMessage(enumRole('SYSTEM'), [{ type: 'text', text: 'be brief' }]),
      new Map<string, unknown>([
        ['role', 'user'],
        ['content', 'what is 2 + 2?'],
      ]),
      { role: 'MessageRole.TOOL_CALL', content: 'calculator(2 + 2)' },
      { role: 'MessageRole.TOOL_RESPONSE', content: [{ text: '4' }] },
      { role: 'developer', content: 'ignored' },
      { role: 'ASSISTANT', content: 'The answer is 4' },
    ];

    expect(normalizeMessages(transcript)).toEqual([
      { role: 'system', content: 'be brief' },
      { role: 'user', content: 'what is 2 + 2?' },
      { role: 'assistant', content: '4' },
      { role: 'assistant', content: 'The answer is 4' },
    ]);
  });

  it('defaults a missing role to user', () => {
    expect(normalizeMessages([{ content: 'hi' }])).toEqual([{ role: 'user', content: 'hi' }]);
  });

  it('ignores entries that are not messages', () => {
    expect(normalizeMessages([null, 'user', 7, { role: 'user', content: 'ok' }])).toEqual([
      { role: 'user', content: 'ok' },
    ]);
  });

  it('drops messages whose fields cannot be read and keeps the rest in order', () => {
    const throwingRole = {
      get role(): string {
        throw new Error('role unavailable');
      },
    };
    const throwingContent = {
      role: 'assistant',
      get content(): string {
        throw new Error('content unavailable');
      },
    };
    const trapped = new Proxy(
      {},
      {
        has(): boolean {
          throw new Error('trap');
        },
      }
    );

    expect(
      normalizeMessages([
        { role: 'system', content: 'be brief' },
        throwingRole,
        { role: 'user', content: 'hi' },
        throwingContent,
        trapped,
        { role: 'assistant', content: 'hello' },
      ])
    ).toEqual([
      { role: 'system', content: 'be brief' },
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello' },
    ]);
  });

  it('only ever emits provider roles', () => {
    const roles = normalizeMessages([
      { role: 'tool', content: 'a' },
      { role: 'function', content: 'b' },
      { role: 'tool_response', content: 'c' },
      { role: 'system', content: 'd' },
      { role: 'user' },
    ]).map((m) => m.role);

    expect(roles).toEqual(['assistant', 'system', 'user']);
  });
});
