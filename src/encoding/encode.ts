import { encodeModifier } from './modifier.js';
import type { AggregateType, Field, PrimitiveKind, TypeNode } from './typeNode.js';

const primitiveChars: Record<PrimitiveKind, string> = {
  class: '#',
  selector: ':',
  char: 'c',
  uchar: 'C',
  short: 's',
  ushort: 'S',
  int: 'i',
  uint: 'I',
  long: 'l',
  ulong: 'L',
  longLong: 'q',
  ulongLong: 'Q',
  int128: 't',
  uint128: 'T',
  float: 'f',
  double: 'd',
  longDouble: 'D',
  bool: 'B',
  void: 'v',
  voidConst: '1',
  voidIn: '2',
  unknown: '?',
  charPtr: '*',
  atom: '%',
};

export function encode(node: TypeNode): string {
  switch (node.kind) {
    case 'object':
      return node.name === undefined ? '@' : `@"${node.name}"`;
    case 'block':
      if (!node.returnType || !node.paramTypes) return '@?';
      return `@?<${encode(node.returnType)}@?${node.paramTypes.map(encode).join('')}>`;
    case 'functionPointer':
      return '^?';
    case 'array':
      return `[${node.count ?? ''}${encode(node.elementType)}]`;
    case 'pointer':
      return `^${encode(node.pointee)}`;
    case 'bitField':
      return `b${node.width}`;
    case 'struct':
    case 'union':
      return encodeAggregate(node);
    case 'modified':
      return `${encodeModifier(node.modifier)}${encode(node.inner)}`;
    case 'other':
      return node.raw;
    default:
      return primitiveChars[node.kind];
  }
}

// Anonymous aggregates are written as `?`: `{}` would not decode again.
function encodeAggregate(node: AggregateType): string {
  const [open, close] = node.kind === 'struct' ? ['{', '}'] : ['(', ')'];
  const name = node.name || '?';
  if (!node.fields) return `${open}${name}${close}`;
  return `${open}${name}=${node.fields.map(encodeField).join('')}${close}`;
}

export function encodeField(f: Field): string {
  const name = f.name === undefined ? '' : `"${f.name}"`;
  if (f.bitWidth !== undefined) return `${name}b${f.bitWidth}`;
  return `${name}${encode(f.type)}`;
}
