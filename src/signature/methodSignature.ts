import { EncodingCursor, popType } from '../encoding/cursor.js';
import { decode } from '../encoding/decode.js';
import { primitive, type TypeNode } from '../encoding/typeNode.js';

/** One slot of a method signature, its type kept as raw encoding text. */
export type MethodValue = {
  typeEncoding: string;
  /** Offset of the value in the argument frame. */
  offset?: number;
};

export type MethodSignature = {
  returnValue: MethodValue;
  /** Includes the implicit `self` and `_cmd` slots. */
  arguments: MethodValue[];
  /** Total size of the argument frame. */
  stackSize?: number;
};

function methodValue(typeEncoding: string, offset: number | undefined): MethodValue {
  return offset === undefined ? { typeEncoding } : { typeEncoding, offset };
}

/**
 * Splits a method type encoding such as `v24@0:8@16` into its slots without
 * decoding the types. Trailing input that no longer yields a type or an
 * offset ends the scan.
 */
export function parseMethodSignature(encoding: string): MethodSignature {
  const cursor = new EncodingCursor(encoding);

  const returnType = popType(cursor);
  const stackSize = cursor.readDigits();

  const args: MethodValue[] = [];
  while (!cursor.atEnd) {
    const start = cursor.pos;
    const type = popType(cursor);
    const offset = cursor.readDigits();
    if (cursor.pos === start) break;
    args.push(methodValue(type, offset));
  }

  const signature: MethodSignature = {
    returnValue: { typeEncoding: returnType },
    arguments: args,
  };
  if (stackSize !== undefined) signature.stackSize = stackSize;
  return signature;
}

export function encodeMethodValue(value: MethodValue): string {
  return `${value.typeEncoding}${value.offset ?? ''}`;
}

export function encodeMethodSignature(signature: MethodSignature): string {
  return (
    encodeMethodValue(signature.returnValue) +
    `${signature.stackSize ?? ''}` +
    signature.arguments.map(encodeMethodValue).join('')
  );
}

/** Decodes the slot's type on demand; undecodable text reads as `unknown`. */
export function methodValueType(value: MethodValue): TypeNode {
  return decode(value.typeEncoding) ?? primitive('unknown');
}
