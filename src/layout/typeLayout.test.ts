import { describe, it, expect } from 'vitest';

import { decode } from '../encoding/decode.js';
import { UnsupportedLayoutError } from '../errors.js';
import { methodValueSize, pointerSize, sizeAndAlignment, toKoffiType } from './typeLayout.js';

function layoutOf(text: string) {
  const node = decode(text);
  if (!node) throw new Error(`fixture does not decode: ${text}`);
  return sizeAndAlignment(node);
}

// Expectations assume a 64-bit host.
describe('sizeAndAlignment', () => {
  it('sizes primitives', () => {
    expect(layoutOf('c')).toEqual({ size: 1, alignment: 1 });
    expect(layoutOf('s')).toEqual({ size: 2, alignment: 2 });
    expect(layoutOf('i')).toEqual({ size: 4, alignment: 4 });
    expect(layoutOf('q')).toEqual({ size: 8, alignment: 8 });
    expect(layoutOf('d')).toEqual({ size: 8, alignment: 8 });
    expect(layoutOf('B')).toEqual({ size: 1, alignment: 1 });
  });

  it('sizes l and L as 32-bit', () => {
    expect(layoutOf('l')).toEqual({ size: 4, alignment: 4 });
    expect(layoutOf('L')).toEqual({ size: 4, alignment: 4 });
    expect(layoutOf('{S=li}')).toEqual({ size: 8, alignment: 4 });
    expect(methodValueSize({ typeEncoding: 'l', offset: 16 })).toBe(4);
  });

  it('sizes every pointer-like type as a pointer', () => {
    const word = { size: pointerSize(), alignment: pointerSize() };
    expect(pointerSize()).toBe(8);
    for (const text of ['@', '@"NSString"', '#', ':', '@?', '^?', '*', '^v', '^{Opaque}']) {
      expect(layoutOf(text)).toEqual(word);
    }
  });

  it('lays out structs with padding', () => {
    expect(layoutOf('{CGPoint=dd}')).toEqual({ size: 16, alignment: 8 });
    expect(layoutOf('{S=ci}')).toEqual({ size: 8, alignment: 4 });
    expect(layoutOf('{S=cd}')).toEqual({ size: 16, alignment: 8 });
    expect(layoutOf('{CGRect={CGPoint=dd}{CGSize=dd}}')).toEqual({ size: 32, alignment: 8 });
  });

  it('lays out unions and arrays', () => {
    expect(layoutOf('(U=ci)')).toEqual({ size: 4, alignment: 4 });
    expect(layoutOf('[3s]')).toEqual({ size: 6, alignment: 2 });
    expect(layoutOf('{S=[4c]i}')).toEqual({ size: 8, alignment: 4 });
  });

  it('ignores transparent qualifiers', () => {
    expect(layoutOf('rn^i')).toEqual({ size: 8, alignment: 8 });
    expect(layoutOf('Ai')).toEqual({ size: 4, alignment: 4 });
  });

  it('returns undefined for shapes without a fixed layout', () => {
    for (const text of ['v', 'b3', 'D', 't', '{Opaque}', '{Empty=}', '{S=b1b7}', '[i]', '?', 'jd']) {
      expect(layoutOf(text)).toBeUndefined();
    }
  });
});

describe('toKoffiType', () => {
  it('throws UnsupportedLayoutError naming the encoding', () => {
    const node = decode('{Opaque}');
    expect(node).toBeDefined();
    if (node) {
      expect(() => toKoffiType(node)).toThrow(UnsupportedLayoutError);
      expect(() => toKoffiType(node)).toThrow('No native layout for "{Opaque}": struct Opaque is opaque');
    }
  });
});

describe('methodValueSize', () => {
  it('decodes the slot and sizes it', () => {
    expect(methodValueSize({ typeEncoding: '{CGPoint=dd}', offset: 16 })).toBe(16);
    expect(methodValueSize({ typeEncoding: 'v' })).toBeUndefined();
    expect(methodValueSize({ typeEncoding: '{broken' })).toBeUndefined();
  });
});
