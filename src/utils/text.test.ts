import { describe, expect, it } from 'vitest';

import { describeError, renderText } from './text.js';

describe('renderText', () => {
  it('renders primitives', () => {
    expect(renderText('hi')).toBe('hi');
    expect(renderText(undefined)).toBe('');
    expect(renderText(4.5)).toBe('4.5');
    expect(renderText(false)).toBe('false');
  });

  it('uses a custom toString when one is defined', () => {
    expect(renderText({ toString: () => 'MessageRole.USER' })).toBe('MessageRole.USER');
    expect(renderText(new Error('boom'))).toBe('Error: boom');
  });

  it('renders maps, arrays and plain objects as JSON', () => {
    expect(renderText(new Map([['role', 'user']]))).toBe('{"role":"user"}');
    expect(renderText(['a', 1])).toBe('["a",1]');
    expect(renderText({ role: 'user' })).toBe('{"role":"user"}');
  });

  it('never throws on circular structures', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;
    expect(renderText(circular)).toBe('[object Object]');
  });
});

describe('describeError', () => {
  it('prefers the error message', () => {
    expect(describeError(new TypeError('bad input'))).toBe('bad input');
    expect(describeError({ code: 'ECONNRESET' })).toBe('{"code":"ECONNRESET"}');
  });
});
