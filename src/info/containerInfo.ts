import { ivarHeader, type IvarDescription } from './ivarInfo.js';
import { methodHeader, type MethodDescription } from './methodInfo.js';
import { propertyHeader, type PropertyDescription } from './propertyInfo.js';

export type ClassDescription = {
  name: string;
  superclassName?: string;
  protocols?: string[];
  ivars?: IvarDescription[];
  properties?: PropertyDescription[];
  methods?: MethodDescription[];
};

export type ProtocolDescription = {
  name: string;
  protocols?: string[];
  properties?: PropertyDescription[];
  methods?: MethodDescription[];
  optionalProperties?: PropertyDescription[];
  optionalMethods?: MethodDescription[];
};

export type CategoryDescription = {
  /** Category name, the text inside the parentheses */
  name: string;
  className: string;
  protocols?: string[];
  properties?: PropertyDescription[];
  methods?: MethodDescription[];
};

const INDENT = '    ';

function adopted(protocols: string[] | undefined): string {
  return protocols && protocols.length > 0 ? ` <${protocols.join(', ')}>` : '';
}

/**
 * Class members come first, then instance members. Each non-empty group is
 * preceded by a blank line.
 */
function memberBlocks(
  properties: PropertyDescription[] = [],
  methods: MethodDescription[] = [],
): string[] {
  const groups = [
    properties.filter((p) => p.isClassProperty).map(propertyHeader),
    properties.filter((p) => !p.isClassProperty).map(propertyHeader),
    methods.filter((m) => m.isClassMethod).map(methodHeader),
    methods.filter((m) => !m.isClassMethod).map(methodHeader),
  ];
  return groups.flatMap((group) => (group.length > 0 ? ['', ...group] : []));
}

/**
 * ```
 * @interface Widget : NSObject <NSCopying> {
 *     int _count;
 * }
 *
 * - (void)reset;
 *
 * @end
 * ```
 */
export function classHeader(cls: ClassDescription): string {
  let decl = `@interface ${cls.name}`;
  if (cls.superclassName) decl += ` : ${cls.superclassName}`;
  decl += adopted(cls.protocols);

  const lines = [decl];
  const ivars = cls.ivars ?? [];
  if (ivars.length > 0) {
    lines[0] += ' {';
    for (const ivar of ivars) lines.push(INDENT + ivarHeader(ivar));
    lines.push('}');
  }
  lines.push(...memberBlocks(cls.properties, cls.methods), '', '@end');
  return lines.join('\n');
}

export function protocolHeader(protocol: ProtocolDescription): string {
  const lines = [`@protocol ${protocol.name}${adopted(protocol.protocols)}`];

  const required = memberBlocks(protocol.properties, protocol.methods);
  if (required.length > 0) lines.push('', '@required', ...required);

  const optional = memberBlocks(protocol.optionalProperties, protocol.optionalMethods);
  if (optional.length > 0) lines.push('', '@optional', ...optional);

  lines.push('', '@end');
  return lines.join('\n');
}

/** `@interface NSString (Paths)` followed by the category's members. */
export function categoryHeader(category: CategoryDescription): string {
  const decl = `@interface ${category.className} (${category.name})${adopted(category.protocols)}`;
  return [decl, ...memberBlocks(category.properties, category.methods), '', '@end'].join('\n');
}
