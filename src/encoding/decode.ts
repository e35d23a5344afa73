import { traceDebug } from '../dx/trace.js';
import { MalformedEncodingError } from '../errors.js';
import { EncodingCursor } from './cursor.js';
import { modifierFromChar } from './modifier.js';
import {
  array,
  bitField,
  block,
  field,
  functionPointer,
  modified,
  object,
  pointer,
  primitive,
  struct,
  union,
  type Field,
  type PrimitiveKind,
  type TypeNode,
} from './typeNode.js';

export type DecodeResult = {
  type: TypeNode;
  /** Input left after the first complete type. */
  rest: string;
};

const simpleTypes = new Map<string, PrimitiveKind>([
  ['#', 'class'],
  [':', 'selector'],
  ['c', 'char'],
  ['C', 'uchar'],
  ['s', 'short'],
  ['S', 'ushort'],
  ['i', 'int'],
  ['I', 'uint'],
  ['l', 'long'],
  ['L', 'ulong'],
  ['q', 'longLong'],
  ['Q', 'ulongLong'],
  ['t', 'int128'],
  ['T', 'uint128'],
  ['f', 'float'],
  ['d', 'double'],
  ['D', 'longDouble'],
  ['B', 'bool'],
  ['v', 'void'],
  ['?', 'unknown'],
  ['*', 'charPtr'],
  ['%', 'atom'],
]);

/**
 * Decodes the first complete type in `text` and returns it with the
 * unconsumed remainder. Malformed input yields undefined, never a partial tree.
 */
export function decodeWithRemainder(text: string): DecodeResult | undefined {
  const cursor = new EncodingCursor(text);
  const type = decodeType(cursor);
  if (!type) {
    traceDebug('decode.failed', { input: text, offset: cursor.failedAt });
    return undefined;
  }
  return { type, rest: cursor.rest() };
}

/** Decodes the first type description in `text`, ignoring anything after it. */
export function decode(text: string): TypeNode | undefined {
  return decodeWithRemainder(text)?.type;
}

export function decodeOrThrow(text: string): TypeNode {
  const cursor = new EncodingCursor(text);
  const type = decodeType(cursor);
  if (!type) throw new MalformedEncodingError(text, Math.max(cursor.failedAt, 0));
  return type;
}

/** Decodes one type at the cursor, advancing past it. */
export function decodeType(c: EncodingCursor): TypeNode | undefined {
  if (!c.enter()) return undefined;
  try {
    return decodeNested(c);
  } finally {
    c.leave();
  }
}

function decodeNested(c: EncodingCursor): TypeNode | undefined {
  const first = c.peek();
  if (first === undefined) return c.fail();

  if (c.startsWith('@?')) return decodeBlock(c);
  if (c.startsWith('@"')) return decodeQuotedObject(c);
  if (c.startsWith('^?')) {
    c.advance(2);
    return functionPointer();
  }
  if (first === '@') {
    c.advance();
    return object();
  }

  const kind = simpleTypes.get(first);
  if (kind) {
    c.advance();
    return primitive(kind);
  }

  const modifier = modifierFromChar(first);
  if (modifier) {
    c.advance();
    const inner = decodeType(c);
    return inner && modified(modifier, inner);
  }

  switch (first) {
    case 'b':
      return decodeBitField(c);
    case '[':
      return decodeArray(c);
    case '^': {
      c.advance();
      const pointee = decodeType(c);
      return pointee && pointer(pointee);
    }
    case '(':
      return decodeAggregate(c, 'union');
    case '{':
      return decodeAggregate(c, 'struct');
    case '1':
      c.advance();
      return primitive('voidConst');
    case '2':
      c.advance();
      return primitive('voidIn');
    default:
      return c.fail();
  }
}

// `@?` or `@?<ret@?arg...>`; exactly one `@?` separates the return type from the arguments.
function decodeBlock(c: EncodingCursor): TypeNode | undefined {
  c.advance(2);
  if (c.peek() !== '<') return block();

  const content = c.matchBracket('<', '>');
  if (!content) return undefined;

  const returnType = decodeType(content);
  if (!returnType) return undefined;
  if (!content.startsWith('@?')) return content.fail();
  content.advance(2);

  const paramTypes: TypeNode[] = [];
  while (!content.atEnd) {
    const param = decodeType(content);
    if (!param) return undefined;
    paramTypes.push(param);
  }
  return block(returnType, paramTypes);
}

function readQuoted(c: EncodingCursor): string | undefined {
  c.advance();
  const close = c.indexOf('"');
  if (close === -1) return c.fail(c.end);
  const name = c.slice(c.pos, close);
  c.pos = close + 1;
  return name;
}

function decodeQuotedObject(c: EncodingCursor): TypeNode | undefined {
  c.advance();
  const name = readQuoted(c);
  return name === undefined ? undefined : object(name);
}

function decodeBitField(c: EncodingCursor): TypeNode | undefined {
  c.advance();
  const width = c.readDigits();
  return width === undefined ? c.fail() : bitField(width);
}

function decodeArray(c: EncodingCursor): TypeNode | undefined {
  const content = c.matchBracket('[', ']');
  if (!content) return undefined;
  const countAt = content.pos;
  const count = content.readDigits();
  if (count === undefined && content.pos !== countAt) return undefined;
  const elementType = decodeType(content);
  if (!elementType) return undefined;
  if (!content.atEnd) return content.fail();
  return array(elementType, count);
}

function normalizeName(raw: string): string | undefined {
  return raw === '' || raw === '?' ? undefined : raw;
}

function decodeAggregate(c: EncodingCursor, kind: 'struct' | 'union'): TypeNode | undefined {
  const content = kind === 'struct' ? c.matchBracket('{', '}') : c.matchBracket('(', ')');
  if (!content) return undefined;
  if (content.atEnd) return content.fail();

  const make = kind === 'struct' ? struct : union;
  const equals = content.indexOf('=');
  if (equals === -1) return make(normalizeName(content.rest()));

  const name = normalizeName(content.slice(content.pos, equals));
  content.pos = equals + 1;

  const fields: Field[] = [];
  while (!content.atEnd) {
    const member = decodeField(content);
    if (!member) return undefined;
    fields.push(member);
  }
  return make(name, fields);
}

function decodeField(c: EncodingCursor): Field | undefined {
  let name: string | undefined;
  if (c.peek() === '"') {
    name = readQuoted(c);
    if (name === undefined) return undefined;
  }

  if (c.peek() === 'b') {
    c.advance();
    const width = c.readDigits();
    if (width === undefined) return c.fail();
    return field(primitive('int'), name, width);
  }

  const type = decodeType(c);
  return type && field(type, name);
}
