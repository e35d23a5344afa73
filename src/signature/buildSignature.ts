import { encode } from '../encoding/encode.js';
import type { TypeNode } from '../encoding/typeNode.js';
import { warn } from '../dx/warnings.js';
import { pointerSize, sizeAndAlignment } from '../layout/typeLayout.js';
import type { MethodSignature, MethodValue } from './methodSignature.js';

const INT_SIZE = 4;

const integralKinds = new Set<TypeNode['kind']>([
  'char',
  'uchar',
  'short',
  'ushort',
  'int',
  'uint',
  'long',
  'ulong',
  'longLong',
  'ulongLong',
  'bool',
]);

function unqualified(node: TypeNode): TypeNode {
  return node.kind === 'modified' ? unqualified(node.inner) : node;
}

/**
 * Bytes an argument occupies in the frame: integral types are promoted to
 * at least `int`, arrays decay to a pointer.
 */
function argumentSlotSize(node: TypeNode): number | undefined {
  const base = unqualified(node);
  if (base.kind === 'array') return pointerSize();
  const layout = sizeAndAlignment(node);
  if (!layout) return undefined;
  return integralKinds.has(base.kind) ? Math.max(layout.size, INT_SIZE) : layout.size;
}

/**
 * Encodes a method signature from its types, with offsets laid out the way
 * the compiler emits them (`v24@0:8@16`). When any argument has no known
 * size the offsets and stack size are left out (`v@:D`).
 *
 * For a method, `argumentTypes` starts with the receiver and selector.
 */
export function buildMethodSignature(
  returnType: TypeNode,
  argumentTypes: TypeNode[],
): MethodSignature {
  const returnValue: MethodValue = { typeEncoding: encode(returnType) };
  const sizes = argumentTypes.map(argumentSlotSize);

  if (sizes.some((s) => s === undefined)) {
    warn({
      code: 'LAYOUT_UNAVAILABLE',
      message: 'argument offsets omitted: an argument type has no known size',
    });
    return {
      returnValue,
      arguments: argumentTypes.map((t) => ({ typeEncoding: encode(t) })),
    };
  }

  let offset = 0;
  const args: MethodValue[] = argumentTypes.map((t, i) => {
    const value = { typeEncoding: encode(t), offset };
    offset += sizes[i] ?? 0;
    return value;
  });
  return { returnValue, arguments: args, stackSize: offset };
}
