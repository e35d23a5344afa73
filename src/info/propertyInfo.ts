import { EncodingCursor } from '../encoding/cursor.js';
import { decodeType } from '../encoding/decode.js';
import { encode } from '../encoding/encode.js';
import { argumentDeclaration } from '../encoding/prettyPrint.js';
import { primitive, type TypeNode } from '../encoding/typeNode.js';

/** One entry of a runtime property attribute string such as `T@"NSString",C,N,V_title`. */
export type PropertyAttribute =
  | { kind: 'type'; type?: TypeNode }
  | { kind: 'readonly' }
  | { kind: 'nonatomic' }
  | { kind: 'dynamic' }
  | { kind: 'copy' }
  | { kind: 'retain' }
  | { kind: 'weak' }
  | { kind: 'getter'; name: string }
  | { kind: 'setter'; name: string }
  | { kind: 'ivar'; name: string }
  | { kind: 'other'; raw: string };

export type PropertyDescription = {
  name: string;
  attributes: PropertyAttribute[];
  isClassProperty: boolean;
};

function readValue(c: EncodingCursor): string {
  const comma = c.indexOf(',');
  const end = comma === -1 ? c.end : comma;
  const value = c.slice(c.pos, end);
  c.pos = end;
  return value;
}

function attributeFor(code: string, value: string): PropertyAttribute {
  switch (code) {
    case 'R':
      return { kind: 'readonly' };
    case 'N':
      return { kind: 'nonatomic' };
    case 'D':
      return { kind: 'dynamic' };
    case 'C':
      return { kind: 'copy' };
    case '&':
      return { kind: 'retain' };
    case 'W':
      return { kind: 'weak' };
    case 'G':
      return { kind: 'getter', name: value };
    case 'S':
      return { kind: 'setter', name: value };
    case 'V':
      return { kind: 'ivar', name: value };
    default:
      return { kind: 'other', raw: code + value };
  }
}

/**
 * Parses a property attribute string. The type after `T` is decoded with the
 * type decoder, so commas inside it never end the attribute; a type that does
 * not decode up to the next comma is kept as `{ kind: 'type' }` without a type.
 */
export function parsePropertyAttributes(text: string): PropertyAttribute[] {
  const c = new EncodingCursor(text);
  const attributes: PropertyAttribute[] = [];

  while (!c.atEnd) {
    // empty segment, as in `N,,R`
    if (c.peek() === ',') {
      c.advance();
      continue;
    }
    const code = c.peek() ?? '';
    c.advance();

    if (code === 'T') {
      const start = c.pos;
      const type = decodeType(c);
      if (type && (c.atEnd || c.peek() === ',')) {
        attributes.push({ kind: 'type', type });
      } else {
        c.pos = start;
        readValue(c);
        attributes.push({ kind: 'type' });
      }
    } else {
      attributes.push(attributeFor(code, readValue(c)));
    }

    if (c.peek() === ',') c.advance();
  }
  return attributes;
}

export function encodePropertyAttribute(attribute: PropertyAttribute): string {
  switch (attribute.kind) {
    case 'type':
      return `T${attribute.type ? encode(attribute.type) : ''}`;
    case 'readonly':
      return 'R';
    case 'nonatomic':
      return 'N';
    case 'dynamic':
      return 'D';
    case 'copy':
      return 'C';
    case 'retain':
      return '&';
    case 'weak':
      return 'W';
    case 'getter':
      return `G${attribute.name}`;
    case 'setter':
      return `S${attribute.name}`;
    case 'ivar':
      return `V${attribute.name}`;
    case 'other':
      return attribute.raw;
  }
}

export function encodePropertyAttributes(attributes: PropertyAttribute[]): string {
  return attributes.map(encodePropertyAttribute).join(',');
}

function has(property: PropertyDescription, kind: PropertyAttribute['kind']): boolean {
  return property.attributes.some((a) => a.kind === kind);
}

function nameOf(property: PropertyDescription, kind: 'getter' | 'setter' | 'ivar'): string | undefined {
  for (const a of property.attributes) {
    if ((a.kind === 'getter' || a.kind === 'setter' || a.kind === 'ivar') && a.kind === kind) {
      return a.name;
    }
  }
  return undefined;
}

export function propertyType(property: PropertyDescription): TypeNode {
  for (const a of property.attributes) {
    if (a.kind === 'type' && a.type) return a.type;
  }
  return primitive('unknown');
}

export type PropertyAccessors = {
  getter: string;
  /** Absent for read-only properties. */
  setter?: string;
};

export function propertyAccessors(property: PropertyDescription): PropertyAccessors {
  const getter = nameOf(property, 'getter') ?? property.name;
  if (has(property, 'readonly')) return { getter };
  const setter =
    nameOf(property, 'setter') ??
    `set${property.name.charAt(0).toUpperCase()}${property.name.slice(1)}:`;
  return { getter, setter };
}

/**
 * `@property(copy, nonatomic) NSString *title; // @synthesize title=_title`
 */
export function propertyHeader(property: PropertyDescription): string {
  const typeString = argumentDeclaration(propertyType(property));

  const modifiers: string[] = [];
  if (property.isClassProperty) modifiers.push('class');
  const getterName = nameOf(property, 'getter');
  if (getterName) modifiers.push(`getter=${getterName}`);
  const setterName = nameOf(property, 'setter');
  if (setterName) modifiers.push(`setter=${setterName}`);
  if (has(property, 'readonly')) modifiers.push('readonly');
  if (has(property, 'weak')) modifiers.push('weak');
  if (has(property, 'copy')) modifiers.push('copy');
  if (has(property, 'retain')) modifiers.push('retain');
  if (has(property, 'nonatomic')) modifiers.push('nonatomic');

  const comments: string[] = [];
  if (has(property, 'dynamic')) comments.push(`@dynamic ${property.name}`);
  const ivarName = nameOf(property, 'ivar');
  if (ivarName) {
    comments.push(
      ivarName === property.name
        ? `@synthesize ${ivarName}`
        : `@synthesize ${property.name}=${ivarName}`,
    );
  }

  let result = '@property';
  if (modifiers.length) result += `(${modifiers.join(', ')})`;
  result += ` ${typeString}`;
  result += typeString.endsWith('*') ? `${property.name};` : ` ${property.name};`;
  for (const comment of comments) result += ` // ${comment}`;
  return result;
}
