import { isModifierChar } from './modifier.js';

type DecodeState = { failedAt: number; depth: number };

/** Nested types deeper than this fail instead of exhausting the call stack. */
export const MAX_NESTING = 512;

/**
 * Forward-only view over a type encoding, bounded to `[pos, end)`.
 *
 * Bracketed content is handed to nested decoders as a bounded sub-cursor over
 * the same text, so deep aggregates never re-slice the input.
 */
export class EncodingCursor {
  constructor(
    readonly text: string,
    public pos = 0,
    readonly end = text.length,
    private readonly failure: DecodeState = { failedAt: -1, depth: 0 },
  ) {}

  get atEnd(): boolean {
    return this.pos >= this.end;
  }

  /** Furthest offset at which a decode step gave up, or -1. */
  get failedAt(): number {
    return this.failure.failedAt;
  }

  peek(offset = 0): string | undefined {
    const i = this.pos + offset;
    return i < this.end ? this.text.charAt(i) : undefined;
  }

  startsWith(prefix: string): boolean {
    return this.pos + prefix.length <= this.end && this.text.startsWith(prefix, this.pos);
  }

  advance(n = 1) {
    this.pos = Math.min(this.pos + n, this.end);
  }

  /** Index of `ch` at or after the cursor, or -1 when it does not occur before `end`. */
  indexOf(ch: string, from = this.pos): number {
    const i = this.text.indexOf(ch, from);
    return i === -1 || i >= this.end ? -1 : i;
  }

  slice(start = this.pos, end = this.end): string {
    return this.text.slice(start, end);
  }

  rest(): string {
    return this.slice();
  }

  /** A cursor over `[start, end)` that reports failures to the same place as this one. */
  sub(start: number, end: number): EncodingCursor {
    return new EncodingCursor(this.text, start, end, this.failure);
  }

  /** Records a failure at the current position; returns undefined for `return cursor.fail()`. */
  fail(at = this.pos): undefined {
    this.failure.failedAt = Math.max(this.failure.failedAt, at);
    return undefined;
  }

  /**
   * Enters one level of nesting, shared by every sub-cursor. False (and a
   * recorded failure) past `MAX_NESTING`; pair each true with `leave()`.
   */
  enter(): boolean {
    if (this.failure.depth >= MAX_NESTING) {
      this.fail();
      return false;
    }
    this.failure.depth++;
    return true;
  }

  leave() {
    this.failure.depth--;
  }

  /**
   * Consumes a maximal run of decimal digits. A run too large to be an exact
   * integer is still consumed but yields undefined and records a failure.
   */
  readDigits(): number | undefined {
    const start = this.pos;
    while (this.pos < this.end && isDigit(this.text.charAt(this.pos))) this.pos++;
    if (start === this.pos) return undefined;
    const value = Number(this.text.slice(start, this.pos));
    return Number.isSafeInteger(value) ? value : this.fail(start);
  }

  /**
   * Finds the closer matching the `open` character at `openPos`.
   * Only delimiters of this pair are counted; other brackets inside are left
   * to the nested decoders.
   */
  findClose(openPos: number, open: string, close: string): number {
    let depth = 0;
    for (let i = openPos; i < this.end; i++) {
      const ch = this.text.charAt(i);
      if (ch === open) depth++;
      else if (ch === close) {
        depth--;
        if (depth === 0) return i;
      }
    }
    return -1;
  }

  /**
   * Expects `open` at the cursor. Returns a sub-cursor over the bracket
   * content and moves past the matching closer; unbalanced input returns
   * undefined and leaves the cursor where it was.
   */
  matchBracket(open: string, close: string): EncodingCursor | undefined {
    if (this.peek() !== open) return this.fail();
    const closeAt = this.findClose(this.pos, open, close);
    if (closeAt === -1) return this.fail(this.end);
    const content = this.sub(this.pos + 1, closeAt);
    this.pos = closeAt + 1;
    return content;
  }

  /** Like `matchBracket` after the opener was consumed, but runs to the end when unbalanced. */
  skipBalanced(open: string, close: string) {
    const closeAt = this.findClose(this.pos - 1, open, close);
    this.pos = closeAt === -1 ? this.end : closeAt + 1;
  }
}

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

const closers: Record<string, string> = { '{': '}', '(': ')', '[': ']' };

/**
 * Moves past exactly one top-level type without building it. Lenient:
 * unterminated brackets and quotes run to the end of input.
 */
export function skipType(cursor: EncodingCursor) {
  // qualifier, pointer and vector (`!<digits>`) prefixes
  let ch = cursor.peek();
  while (ch !== undefined && (isModifierChar(ch) || ch === '^' || ch === '!')) {
    cursor.advance();
    if (ch === '!') cursor.readDigits();
    ch = cursor.peek();
  }
  if (ch === undefined) return;
  cursor.advance();

  switch (ch) {
    case '@':
      if (cursor.peek() === '?') {
        cursor.advance();
        if (cursor.peek() === '<') {
          cursor.advance();
          cursor.skipBalanced('<', '>');
        }
      } else if (cursor.peek() === '"') {
        cursor.advance();
        const close = cursor.indexOf('"');
        cursor.pos = close === -1 ? cursor.end : close + 1;
      }
      return;
    case 'b':
      cursor.readDigits();
      return;
    case '{':
    case '(':
    case '[':
      cursor.skipBalanced(ch, closers[ch]);
      return;
    default:
      return;
  }
}

/** Raw text of the next top-level type, advancing past it. */
export function popType(cursor: EncodingCursor): string {
  const start = cursor.pos;
  skipType(cursor);
  return cursor.slice(start, cursor.pos);
}
