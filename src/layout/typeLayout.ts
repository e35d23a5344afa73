import koffi from 'koffi';

import { decode } from '../encoding/decode.js';
import { encode } from '../encoding/encode.js';
import type { AggregateType, TypeNode } from '../encoding/typeNode.js';
import { logDebug } from '../dx/logger.js';
import { UnsupportedLayoutError } from '../errors.js';
import type { MethodValue } from '../signature/methodSignature.js';

/** A koffi type: a primitive type name or a constructed descriptor. */
export type KoffiType = Parameters<typeof koffi.sizeof>[0];

export type TypeLayout = {
  size: number;
  alignment: number;
};

/**
 * Maps a decoded type to a koffi type descriptor for the host ABI.
 *
 * Objects, classes, selectors, blocks and `char *` are all plain pointers.
 * Shapes without a fixed C layout (bit-fields, `long double`, 128-bit
 * integers, opaque aggregates, unsized arrays, `_Complex`) throw
 * UnsupportedLayoutError.
 */
export function toKoffiType(node: TypeNode): KoffiType {
  const unsupported = (reason: string) => new UnsupportedLayoutError(encode(node), reason);

  switch (node.kind) {
    case 'class':
    case 'selector':
    case 'object':
    case 'block':
    case 'functionPointer':
      return koffi.pointer('void');
    case 'charPtr':
      return koffi.pointer('char');
    case 'char':
      return 'char';
    case 'uchar':
      return 'uchar';
    case 'short':
      return 'short';
    case 'ushort':
      return 'ushort';
    case 'int':
      return 'int';
    case 'uint':
      return 'uint';
    // `l`/`L` are 32-bit in encodings on every ABI; a 64-bit `long` is written `q`
    case 'long':
      return 'int32';
    case 'ulong':
      return 'uint32';
    case 'longLong':
      return 'longlong';
    case 'ulongLong':
      return 'ulonglong';
    case 'float':
      return 'float';
    case 'double':
      return 'double';
    case 'bool':
      return 'bool';
    case 'pointer':
      // pointee layout is irrelevant, and may itself be opaque
      return koffi.pointer('void');
    case 'array':
      if (node.count === undefined || node.count === 0) throw unsupported('array has no element count');
      return koffi.array(toKoffiType(node.elementType), node.count);
    case 'struct':
    case 'union':
      return aggregateType(node, unsupported);
    case 'modified':
      if (node.modifier === 'complex') throw unsupported('_Complex types are not supported');
      return toKoffiType(node.inner);
    case 'bitField':
      throw unsupported('bit-fields have no standalone layout');
    case 'longDouble':
    case 'int128':
    case 'uint128':
      throw unsupported(`${node.kind} is not available through koffi`);
    case 'void':
    case 'voidConst':
    case 'voidIn':
    case 'atom':
    case 'unknown':
    case 'other':
      throw unsupported(`${node.kind} has no size`);
  }
}

function aggregateType(
  node: AggregateType,
  unsupported: (reason: string) => UnsupportedLayoutError,
): KoffiType {
  if (!node.fields) throw unsupported(`${node.kind} ${node.name ?? '?'} is opaque`);
  if (node.fields.length === 0) throw unsupported(`${node.kind} ${node.name ?? '?'} has no members`);

  const members: Record<string, KoffiType> = {};
  node.fields.forEach((f, i) => {
    if (f.bitWidth !== undefined || f.type.kind === 'bitField') {
      throw unsupported('bit-field members are not supported');
    }
    // positional keys: decoded names may repeat or be missing
    members[`m${i}`] = toKoffiType(f.type);
  });
  return node.kind === 'struct' ? koffi.struct(members) : koffi.union(members);
}

/** Size and alignment on the host ABI, or undefined when the type has no fixed layout. */
export function sizeAndAlignment(node: TypeNode): TypeLayout | undefined {
  try {
    const type = toKoffiType(node);
    return { size: koffi.sizeof(type), alignment: koffi.alignof(type) };
  } catch (err) {
    if (err instanceof UnsupportedLayoutError) {
      logDebug(err.message);
      return undefined;
    }
    throw err;
  }
}

export function pointerSize(): number {
  return koffi.sizeof(koffi.pointer('void'));
}

/** Size of a method slot's type, decoding it on demand. */
export function methodValueSize(value: MethodValue): number | undefined {
  const type = decode(value.typeEncoding);
  return type && sizeAndAlignment(type)?.size;
}
