import type { Modifier } from './modifier.js';

export type PrimitiveKind =
  | 'class'
  | 'selector'
  | 'char'
  | 'uchar'
  | 'short'
  | 'ushort'
  | 'int'
  | 'uint'
  | 'long'
  | 'ulong'
  | 'longLong'
  | 'ulongLong'
  | 'int128'
  | 'uint128'
  | 'float'
  | 'double'
  | 'longDouble'
  | 'bool'
  | 'void'
  /** `void` qualified as a const method argument (`1`) */
  | 'voidConst'
  /** `void` qualified as an `in` method argument (`2`) */
  | 'voidIn'
  /** `char *`, encoded as `*` rather than `^c` */
  | 'charPtr'
  | 'atom'
  /** `?` */
  | 'unknown';

export type PrimitiveType = { kind: PrimitiveKind };

/** `id`, `NSString *` or `id <Protocol>` (name kept with its angle brackets). */
export type ObjectType = { kind: 'object'; name?: string };

/**
 * A block. `returnType` and `paramTypes` are either both set (signature
 * embedded in the encoding) or both absent (bare `@?`).
 */
export type BlockType = {
  kind: 'block';
  returnType?: TypeNode;
  paramTypes?: TypeNode[];
};

export type FunctionPointerType = { kind: 'functionPointer' };

export type ArrayType = { kind: 'array'; elementType: TypeNode; count?: number };

export type PointerType = { kind: 'pointer'; pointee: TypeNode };

/** Only meaningful as the type of an aggregate member. */
export type BitFieldType = { kind: 'bitField'; width: number };

/**
 * `fields` absent: forward reference, members unknown.
 * `fields: []`: members known, and there are none.
 */
export type AggregateType = {
  kind: 'struct' | 'union';
  name?: string;
  fields?: Field[];
};

export type ModifiedType = { kind: 'modified'; modifier: Modifier; inner: TypeNode };

export type OtherType = { kind: 'other'; raw: string };

export type TypeNode =
  | PrimitiveType
  | ObjectType
  | BlockType
  | FunctionPointerType
  | ArrayType
  | PointerType
  | BitFieldType
  | AggregateType
  | ModifiedType
  | OtherType;

export type Field = {
  type: TypeNode;
  name?: string;
  bitWidth?: number;
};

export function primitive(kind: PrimitiveKind): PrimitiveType {
  return { kind };
}

export function object(name?: string): ObjectType {
  return name === undefined ? { kind: 'object' } : { kind: 'object', name };
}

export function block(returnType?: TypeNode, paramTypes?: TypeNode[]): BlockType {
  if (returnType === undefined || paramTypes === undefined) return { kind: 'block' };
  return { kind: 'block', returnType, paramTypes };
}

export function functionPointer(): FunctionPointerType {
  return { kind: 'functionPointer' };
}

export function array(elementType: TypeNode, count?: number): ArrayType {
  return count === undefined ? { kind: 'array', elementType } : { kind: 'array', elementType, count };
}

export function pointer(pointee: TypeNode): PointerType {
  return { kind: 'pointer', pointee };
}

export function bitField(width: number): BitFieldType {
  return { kind: 'bitField', width };
}

function aggregate(kind: 'struct' | 'union', name?: string, fields?: Field[]): AggregateType {
  const node: AggregateType = { kind };
  if (name !== undefined) node.name = name;
  if (fields !== undefined) node.fields = fields;
  return node;
}

export function struct(name?: string, fields?: Field[]): AggregateType {
  return aggregate('struct', name, fields);
}

export function union(name?: string, fields?: Field[]): AggregateType {
  return aggregate('union', name, fields);
}

export function modified(modifier: Modifier, inner: TypeNode): ModifiedType {
  return { kind: 'modified', modifier, inner };
}

export function other(raw: string): OtherType {
  return { kind: 'other', raw };
}

export function field(type: TypeNode, name?: string, bitWidth?: number): Field {
  const f: Field = { type };
  if (name !== undefined) f.name = name;
  if (bitWidth !== undefined) f.bitWidth = bitWidth;
  return f;
}
