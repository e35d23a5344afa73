import {
  object,
  primitive,
  type PrimitiveKind,
  type TypeNode,
} from '../encoding/typeNode.js';

// Encoded the way clang does on LP64 Darwin, where `long` is written `q`.
const fixedWidth = new Map<string, PrimitiveKind>(Object.entries({
  int8_t: 'char',
  uint8_t: 'uchar',
  int16_t: 'short',
  uint16_t: 'ushort',
  int32_t: 'int',
  uint32_t: 'uint',
  int64_t: 'longLong',
  uint64_t: 'ulongLong',
  size_t: 'ulongLong',
  ssize_t: 'longLong',
  ptrdiff_t: 'longLong',
  intptr_t: 'longLong',
  uintptr_t: 'ulongLong',
  __int128_t: 'int128',
  __uint128_t: 'uint128',
} satisfies Record<string, PrimitiveKind>));

const objcNames = new Map<string, PrimitiveKind>(Object.entries({
  SEL: 'selector',
  Class: 'class',
  BOOL: 'bool',
  _Bool: 'bool',
  NSInteger: 'longLong',
  NSUInteger: 'ulongLong',
  CGFloat: 'double',
  NSTimeInterval: 'double',
  unichar: 'ushort',
} satisfies Record<string, PrimitiveKind>));

/** Encoding for a builtin or well-known typedef name, if it is one. */
export function builtinType(name: string): TypeNode | undefined {
  switch (name) {
    case 'void':
      return primitive('void');
    case 'char':
      return primitive('char');
    case 'int':
      return primitive('int');
    case 'float':
      return primitive('float');
    case 'double':
      return primitive('double');
    case 'bool':
      return primitive('bool');
    case 'id':
    case 'instancetype':
      return object();
  }
  const kind = fixedWidth.get(name) ?? objcNames.get(name);
  return kind ? primitive(kind) : undefined;
}

/**
 * `unsigned`, `long long`, `short int`, `long double`...: `specifiers` are
 * the sign/size keywords, `base` the optional trailing primitive.
 */
export function sizedType(specifiers: string[], base: string | undefined): TypeNode {
  const unsigned = specifiers.includes('unsigned');
  const longs = specifiers.filter((s) => s === 'long').length;
  const short = specifiers.includes('short');

  if (base === 'double') return primitive(longs > 0 ? 'longDouble' : 'double');
  if (base === 'char') return primitive(unsigned ? 'uchar' : 'char');
  if (short) return primitive(unsigned ? 'ushort' : 'short');
  if (longs > 0) return primitive(unsigned ? 'ulongLong' : 'longLong');
  return primitive(unsigned ? 'uint' : 'int');
}
