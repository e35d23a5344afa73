import { decodedModifier } from './modifier.js';
import type { Field, PrimitiveKind, TypeNode } from './typeNode.js';

export const DEFAULT_INDENT = '    ';

const primitiveNames: Record<PrimitiveKind, string> = {
  class: 'Class',
  selector: 'SEL',
  char: 'char',
  uchar: 'unsigned char',
  short: 'short',
  ushort: 'unsigned short',
  int: 'int',
  uint: 'unsigned int',
  long: 'long',
  ulong: 'unsigned long',
  longLong: 'long long',
  ulongLong: 'unsigned long long',
  int128: '__int128_t',
  uint128: '__uint128_t',
  float: 'float',
  double: 'double',
  longDouble: 'long double',
  bool: 'BOOL',
  void: 'void',
  voidConst: 'void',
  voidIn: 'void',
  charPtr: 'char *',
  atom: 'atom',
  unknown: 'unknown',
};

/**
 * Renders a C-like declaration for documentation output. Aggregate bodies
 * span several lines, one member per line, indented by `indent`.
 */
export function decoded(node: TypeNode, indent: string = DEFAULT_INDENT): string {
  switch (node.kind) {
    case 'object':
      if (node.name === undefined) return 'id';
      if (node.name.startsWith('<') && node.name.endsWith('>')) return `id ${node.name}`;
      return `${node.name} *`;
    case 'block':
      if (!node.returnType || !node.paramTypes) return 'id /* block */';
      return `${decoded(node.returnType, indent)} (^)(${node.paramTypes
        .map((p) => decoded(p, indent))
        .join(', ')})`;
    case 'functionPointer':
      return 'void * /* function pointer */';
    case 'array':
      return `${decoded(node.elementType, indent)}[${node.count ?? ''}]`;
    case 'pointer':
      return `${decoded(node.pointee, indent)} *`;
    case 'bitField':
      return `int x : ${node.width}`;
    case 'struct':
    case 'union': {
      if (!node.fields || node.fields.length === 0) return `${node.kind} ${node.name ?? '{}'}`;
      const name = node.name !== undefined ? ` ${node.name} ` : ' ';
      return `${node.kind}${name}{\n${decodedFields(node.fields, indent)}\n}`;
    }
    case 'modified':
      return `${decodedModifier(node.modifier)} ${decoded(node.inner, indent)}`;
    case 'other':
      return node.raw;
    default:
      return primitiveNames[node.kind];
  }
}

/** `type name;` or `type name : width;`, with `fallbackName` standing in for a missing name. */
export function decodedField(f: Field, fallbackName = 'x', indent: string = DEFAULT_INDENT): string {
  const name = f.name ?? fallbackName;
  if (f.bitWidth !== undefined) return `${decoded(f.type, indent)} ${name} : ${f.bitWidth};`;
  return `${decoded(f.type, indent)} ${name};`;
}

export function decodedFields(fields: Field[], indent: string = DEFAULT_INDENT): string {
  return fields
    .map((f, i) =>
      decodedField(f, `x${i}`, indent)
        .split('\n')
        .map((line) => indent + line)
        .join('\n'),
    )
    .join('\n');
}

function singleLine(text: string): string {
  return text.split('\n').join(' ');
}

/**
 * The type as written inside a method argument slot: aggregates by name,
 * `char` as `BOOL` (the runtime encodes `BOOL` as `c` on some ABIs).
 */
export function argumentDeclaration(node: TypeNode): string {
  if (node.kind === 'struct' || node.kind === 'union') {
    if (node.name !== undefined) return node.name;
  }
  if (node.kind === 'char') return 'BOOL';
  return singleLine(decoded(node, ''));
}
