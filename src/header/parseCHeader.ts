import { encode } from '../encoding/encode.js';
import {
  array,
  field,
  functionPointer,
  modified,
  pointer,
  primitive,
  struct,
  union,
  type AggregateType,
  type Field,
  type TypeNode,
} from '../encoding/typeNode.js';
import { logDebug } from '../dx/logger.js';
import { traceInfo } from '../dx/trace.js';
import { warn } from '../dx/warnings.js';
import { buildMethodSignature } from '../signature/buildSignature.js';
import {
  encodeMethodSignature,
  type MethodSignature,
} from '../signature/methodSignature.js';
import { builtinType, sizedType } from './cTypeNames.js';
import { createHeaderParser, type SyntaxNode } from './loadParser.js';

export type CDeclaration =
  | {
      kind: 'struct' | 'union';
      name: string;
      type: AggregateType;
      encoding: string;
      line: number;
    }
  | {
      kind: 'typedef';
      name: string;
      type: TypeNode;
      encoding: string;
      line: number;
    }
  | {
      kind: 'function';
      name: string;
      returnType: TypeNode;
      parameterTypes: TypeNode[];
      signature: MethodSignature;
      encoding: string;
      line: number;
    };

type Declarated = { name?: string; type: TypeNode };

const sizeKeywords = new Set(['signed', 'unsigned', 'long', 'short']);

function lineOf(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

function hasConst(node: SyntaxNode): boolean {
  return node.children.some((c) => c.type === 'type_qualifier' && c.text === 'const');
}

/** `const` sits outside the pointer: `const char *` is `r*`, `const int *` is `r^i`. */
function pointerTo(base: TypeNode): TypeNode {
  if (base.kind === 'modified' && base.modifier === 'const') {
    return modified('const', pointerTo(base.inner));
  }
  if (base.kind === 'char') return primitive('charPtr');
  return pointer(base);
}

/** Top-level `const` on a value is not part of its encoding. */
function stripValueConst(node: TypeNode): TypeNode {
  if (node.kind !== 'modified' || node.modifier !== 'const') return node;
  const inner = node.inner.kind;
  return inner === 'pointer' || inner === 'charPtr' ? node : node.inner;
}

/** Array parameters are passed as pointers. */
function decayParameter(node: TypeNode): TypeNode {
  return node.kind === 'array' ? pointer(node.elementType) : node;
}

class HeaderImporter {
  readonly declarations: CDeclaration[] = [];
  private readonly typedefs = new Map<string, TypeNode>();
  private readonly aggregates = new Map<string, AggregateType>();

  visit(node: SyntaxNode) {
    switch (node.type) {
      case 'translation_unit':
        for (const child of node.namedChildren) this.visit(child);
        return;
      case 'declaration':
        this.declaration(node);
        return;
      case 'type_definition':
        this.typeDefinition(node);
        return;
      case 'function_definition':
        this.functionDefinition(node);
        return;
      case 'struct_specifier':
      case 'union_specifier':
      case 'enum_specifier':
        this.typeFrom(node);
        return;
      case 'ERROR':
        logDebug(`skipping unparsable text at line ${lineOf(node)}`);
        return;
    }
    if (node.type.startsWith('preproc_')) {
      for (const child of node.namedChildren) this.visit(child);
    }
  }

  private baseType(node: SyntaxNode): TypeNode {
    const typeNode = node.childForFieldName('type');
    const base = typeNode ? this.typeFrom(typeNode) : primitive('int');
    return hasConst(node) ? modified('const', base) : base;
  }

  private typeFrom(node: SyntaxNode): TypeNode {
    switch (node.type) {
      case 'primitive_type':
      case 'type_identifier':
        return this.namedType(node);
      case 'sized_type_specifier': {
        const specifiers = node.children
          .filter((c) => sizeKeywords.has(c.type))
          .map((c) => c.type);
        return sizedType(specifiers, node.childForFieldName('type')?.text);
      }
      case 'struct_specifier':
        return this.aggregate(node, 'struct');
      case 'union_specifier':
        return this.aggregate(node, 'union');
      case 'enum_specifier': {
        const underlying = node.childForFieldName('underlying_type');
        return underlying ? this.typeFrom(underlying) : primitive('int');
      }
      default:
        warn({
          code: 'UNKNOWN_TYPE_NAME',
          message: `unsupported type specifier \`${node.text}\` at line ${lineOf(node)}`,
        });
        return primitive('unknown');
    }
  }

  private namedType(node: SyntaxNode): TypeNode {
    const name = node.text;
    const known = this.typedefs.get(name) ?? builtinType(name);
    if (known) return known;
    warn({
      code: 'UNKNOWN_TYPE_NAME',
      message: `unknown type \`${name}\` at line ${lineOf(node)}`,
      hint: 'Declare the typedef earlier in the same header.',
    });
    return primitive('unknown');
  }

  private aggregate(node: SyntaxNode, kind: 'struct' | 'union'): AggregateType {
    const name = node.childForFieldName('name')?.text;
    const body = node.childForFieldName('body');
    const key = `${kind} ${name ?? ''}`;

    if (!body) {
      const known = name ? this.aggregates.get(key) : undefined;
      return known ?? (kind === 'struct' ? struct(name) : union(name));
    }

    const fields = this.fields(body);
    const type = kind === 'struct' ? struct(name, fields) : union(name, fields);
    if (name) {
      this.aggregates.set(key, type);
      this.declarations.push({ kind, name, type, encoding: encode(type), line: lineOf(node) });
    }
    return type;
  }

  private fields(body: SyntaxNode): Field[] {
    const fields: Field[] = [];
    for (const member of body.namedChildren) {
      if (member.type !== 'field_declaration') continue;

      const base = this.baseType(member);
      const clause = member.namedChildren.find((c) => c.type === 'bitfield_clause');
      const widthText = clause?.namedChildren[0]?.text;
      const width = widthText !== undefined && /^\d+$/.test(widthText) ? Number(widthText) : undefined;

      const declarators = member.childrenForFieldName('declarator');
      if (declarators.length === 0) {
        fields.push(width === undefined ? field(stripValueConst(base)) : field(primitive('int'), undefined, width));
        continue;
      }
      for (const declarator of declarators) {
        const { name, type } = this.declarated(base, declarator);
        fields.push(
          width === undefined
            ? field(stripValueConst(type), name)
            : field(primitive('int'), name, width),
        );
      }
    }
    return fields;
  }

  /** Applies a declarator (outermost first) to the specifier type. */
  private declarated(base: TypeNode, node: SyntaxNode | null, inFunction = false): Declarated {
    if (!node) return { type: base };
    const inner = node.childForFieldName('declarator');

    switch (node.type) {
      case 'identifier':
      case 'field_identifier':
      case 'type_identifier':
        return { name: node.text, type: base };
      case 'pointer_declarator':
      case 'abstract_pointer_declarator':
        return inFunction
          ? this.declarated(base, inner)
          : this.declarated(pointerTo(base), inner);
      case 'array_declarator':
      case 'abstract_array_declarator': {
        const size = node.childForFieldName('size')?.text;
        const count = size !== undefined && /^\d+$/.test(size) ? Number(size) : undefined;
        return this.declarated(array(base, count), inner);
      }
      case 'function_declarator':
      case 'abstract_function_declarator':
        return this.declarated(functionPointer(), inner, true);
      case 'parenthesized_declarator':
      case 'abstract_parenthesized_declarator':
        return this.declarated(base, node.namedChildren[0] ?? null, inFunction);
      case 'init_declarator':
      case 'attributed_declarator':
        return this.declarated(base, inner ?? node.namedChildren[0] ?? null, inFunction);
      default:
        return { type: base };
    }
  }

  private typeDefinition(node: SyntaxNode) {
    const base = this.baseType(node);
    for (const declarator of node.childrenForFieldName('declarator')) {
      const { name, type } = this.declarated(base, declarator);
      if (!name) continue;
      const value = stripValueConst(type);
      this.typedefs.set(name, value);
      this.declarations.push({
        kind: 'typedef',
        name,
        type: value,
        encoding: encode(value),
        line: lineOf(node),
      });
    }
  }

  private declaration(node: SyntaxNode) {
    const base = this.baseType(node);
    for (const declarator of node.childrenForFieldName('declarator')) {
      this.recordFunction(node, base, declarator);
    }
  }

  private functionDefinition(node: SyntaxNode) {
    const declarator = node.childForFieldName('declarator');
    if (declarator) this.recordFunction(node, this.baseType(node), declarator);
  }

  /** Records `declarator` if it names a function; variables are ignored. */
  private recordFunction(owner: SyntaxNode, base: TypeNode, declarator: SyntaxNode) {
    let returnType = base;
    let current: SyntaxNode | null = declarator;
    while (current && current.type === 'pointer_declarator') {
      returnType = pointerTo(returnType);
      current = current.childForFieldName('declarator');
    }
    if (!current || current.type !== 'function_declarator') return;

    const nameNode = current.childForFieldName('declarator');
    if (!nameNode || nameNode.type !== 'identifier') return;
    const name = nameNode.text;

    const params = current.childForFieldName('parameters');
    const paramNodes = params?.children ?? [];
    if (paramNodes.some((c) => c.type === 'variadic_parameter' || c.type === '...')) {
      warn({
        code: 'SKIPPED_DECLARATION',
        message: `variadic function \`${name}\` at line ${lineOf(owner)} has no fixed signature`,
      });
      return;
    }

    const parameterTypes: TypeNode[] = [];
    for (const param of paramNodes) {
      if (param.type !== 'parameter_declaration') continue;
      const { type } = this.declarated(this.baseType(param), param.childForFieldName('declarator'));
      const value = decayParameter(stripValueConst(type));
      if (value.kind === 'void') continue;
      parameterTypes.push(value);
    }

    const resolvedReturn = stripValueConst(returnType);
    const signature = buildMethodSignature(resolvedReturn, parameterTypes);
    this.declarations.push({
      kind: 'function',
      name,
      returnType: resolvedReturn,
      parameterTypes,
      signature,
      encoding: encodeMethodSignature(signature),
      line: lineOf(owner),
    });
  }
}

/**
 * Imports the struct, union, typedef and function declarations of a C
 * header, in source order. Names must be declared before use; anything
 * unresolved becomes `unknown`.
 */
export function parseCHeader(source: string): CDeclaration[] {
  const tree = createHeaderParser().parse(source);
  const importer = new HeaderImporter();
  importer.visit(tree.rootNode);
  traceInfo('header.parsed', { declarations: importer.declarations.length });
  return importer.declarations;
}
