import { describe, it, expect } from 'vitest';

import { EncodingCursor, popType } from './cursor.js';

function pop(text: string) {
  const cursor = new EncodingCursor(text);
  return { type: popType(cursor), rest: cursor.rest() };
}

describe('EncodingCursor', () => {
  it('reads a maximal digit run', () => {
    const c = new EncodingCursor('120i');
    expect(c.readDigits()).toBe(120);
    expect(c.peek()).toBe('i');
    expect(c.readDigits()).toBeUndefined();
  });

  it('rejects digit runs beyond exact integer range', () => {
    const c = new EncodingCursor('12345678901234567890123i');
    expect(c.readDigits()).toBeUndefined();
    expect(c.peek()).toBe('i');
    expect(c.failedAt).toBe(0);
  });

  it('matches brackets of its own kind only', () => {
    const c = new EncodingCursor('{A={B=[2{C=i}]}}q');
    const content = c.matchBracket('{', '}');
    expect(content?.rest()).toBe('A={B=[2{C=i}]}');
    expect(c.rest()).toBe('q');
  });

  it('leaves the cursor in place on unbalanced brackets', () => {
    const c = new EncodingCursor('{A=i');
    expect(c.matchBracket('{', '}')).toBeUndefined();
    expect(c.pos).toBe(0);
    expect(c.failedAt).toBe(4);
  });

  it('keeps sub-cursors inside their bounds', () => {
    const c = new EncodingCursor('[3i]"x"');
    const content = c.matchBracket('[', ']');
    expect(content?.indexOf('"')).toBe(-1);
    expect(content?.slice()).toBe('3i');
  });
});

describe('popType', () => {
  it('skips nested aggregates', () => {
    expect(pop('{A={B=i}}i')).toEqual({ type: '{A={B=i}}', rest: 'i' });
    expect(pop('(U="a"i"b"[4c])8')).toEqual({ type: '(U="a"i"b"[4c])', rest: '8' });
  });

  it('skips blocks with a signature', () => {
    expect(pop('@?<v@?@>x')).toEqual({ type: '@?<v@?@>', rest: 'x' });
    expect(pop('@?16')).toEqual({ type: '@?', rest: '16' });
  });

  it('skips qualifiers and pointers with their target', () => {
    expect(pop('rn^{S=i}8')).toEqual({ type: 'rn^{S=i}', rest: '8' });
    expect(pop('^?0')).toEqual({ type: '^?', rest: '0' });
  });

  it('skips quoted object names', () => {
    expect(pop('@"NSString"16')).toEqual({ type: '@"NSString"', rest: '16' });
  });

  it('skips bit-fields and vectors', () => {
    expect(pop('b12i')).toEqual({ type: 'b12', rest: 'i' });
    expect(pop('!4f8')).toEqual({ type: '!4f', rest: '8' });
  });

  it('runs to the end on unterminated input', () => {
    expect(pop('{abc')).toEqual({ type: '{abc', rest: '' });
    expect(pop('@"abc')).toEqual({ type: '@"abc', rest: '' });
  });

  it('skips long prefix runs without recursing', () => {
    const text = 'r'.repeat(20000) + '^'.repeat(20000) + 'i';
    expect(pop(text + '8')).toEqual({ type: text, rest: '8' });
  });

  it('consumes nothing at the end of input', () => {
    expect(pop('')).toEqual({ type: '', rest: '' });
  });
});
