import { describe, it, expect } from 'vitest';

import { object, primitive, struct } from '../encoding/typeNode.js';
import { categoryHeader, classHeader, protocolHeader } from './containerInfo.js';
import { ivarHeader } from './ivarInfo.js';
import { methodHeader } from './methodInfo.js';
import {
  encodePropertyAttributes,
  parsePropertyAttributes,
  propertyAccessors,
  propertyHeader,
  propertyType,
} from './propertyInfo.js';

describe('methodHeader', () => {
  it('renders setters with their argument types', () => {
    expect(
      methodHeader({ name: 'setTitle:', typeEncoding: 'v24@0:8@"NSString"16', isClassMethod: false }),
    ).toBe('- (void)setTitle:(NSString *)arg0;');
  });

  it('renders methods without arguments', () => {
    expect(methodHeader({ name: 'count', typeEncoding: 'Q16@0:8', isClassMethod: false })).toBe(
      '- (unsigned long long)count;',
    );
  });

  it('names aggregates and renders class methods', () => {
    expect(
      methodHeader({
        name: 'pointWithOrigin:style:',
        typeEncoding: '@40@0:8{CGPoint=dd}16q32',
        isClassMethod: true,
      }),
    ).toBe('+ (id)pointWithOrigin:(CGPoint)arg0 style:(long long)arg1;');
  });

  it('renders char as BOOL', () => {
    expect(methodHeader({ name: 'setFlag:', typeEncoding: 'c20@0:8c16', isClassMethod: false })).toBe(
      '- (BOOL)setFlag:(BOOL)arg0;',
    );
  });
});

describe('ivarHeader', () => {
  it('renders pointer types without a gap', () => {
    expect(ivarHeader({ name: '_title', typeEncoding: '@"NSString"', offset: 8 })).toBe('NSString *_title;');
  });

  it('renders scalars, bit-fields and BOOL', () => {
    expect(ivarHeader({ name: '_count', typeEncoding: 'i' })).toBe('int _count;');
    expect(ivarHeader({ name: '_flag', typeEncoding: 'b1' })).toBe('int _flag : 1;');
    expect(ivarHeader({ name: '_enabled', typeEncoding: 'c' })).toBe('BOOL _enabled;');
  });

  it('falls back to unknown for bad encodings', () => {
    expect(ivarHeader({ name: '_bad', typeEncoding: '{x' })).toBe('unknown _bad;');
  });
});

describe('parsePropertyAttributes', () => {
  it('parses a retained object property', () => {
    expect(parsePropertyAttributes('T@"NSString",&,N,V_title')).toEqual([
      { kind: 'type', type: object('NSString') },
      { kind: 'retain' },
      { kind: 'nonatomic' },
      { kind: 'ivar', name: '_title' },
    ]);
  });

  it('parses custom accessors and flags', () => {
    expect(parsePropertyAttributes('Ti,R,GisEnabled,SsetOn:,D,W,C')).toEqual([
      { kind: 'type', type: primitive('int') },
      { kind: 'readonly' },
      { kind: 'getter', name: 'isEnabled' },
      { kind: 'setter', name: 'setOn:' },
      { kind: 'dynamic' },
      { kind: 'weak' },
      { kind: 'copy' },
    ]);
  });

  it('decodes aggregate types in place', () => {
    const [type] = parsePropertyAttributes('T{CGPoint="x"d"y"d},N,V_origin');
    expect(type).toEqual({
      kind: 'type',
      type: struct('CGPoint', [
        { type: primitive('double'), name: 'x' },
        { type: primitive('double'), name: 'y' },
      ]),
    });
  });

  it('keeps an undecodable type as a bare type attribute', () => {
    expect(parsePropertyAttributes('T{bad,N')).toEqual([{ kind: 'type' }, { kind: 'nonatomic' }]);
  });

  it('keeps unknown attributes verbatim', () => {
    expect(parsePropertyAttributes('Tq,P,t12')).toEqual([
      { kind: 'type', type: primitive('longLong') },
      { kind: 'other', raw: 'P' },
      { kind: 'other', raw: 't12' },
    ]);
  });

  it('skips empty segments', () => {
    expect(parsePropertyAttributes('N,,R')).toEqual([{ kind: 'nonatomic' }, { kind: 'readonly' }]);
  });

  it('re-encodes to the same text', () => {
    for (const text of ['T@"NSString",&,N,V_title', 'TB,R,GisEnabled,V_enabled', 'T^{__CFString},N']) {
      expect(encodePropertyAttributes(parsePropertyAttributes(text))).toBe(text);
    }
  });
});

describe('propertyHeader', () => {
  it('renders attributes and the synthesized ivar', () => {
    expect(
      propertyHeader({
        name: 'title',
        attributes: parsePropertyAttributes('T@"NSString",C,N,V_title'),
        isClassProperty: false,
      }),
    ).toBe('@property(copy, nonatomic) NSString *title; // @synthesize title=_title');
  });

  it('renders custom getters on read-only properties', () => {
    expect(
      propertyHeader({
        name: 'enabled',
        attributes: parsePropertyAttributes('TB,R,GisEnabled,V_enabled'),
        isClassProperty: false,
      }),
    ).toBe('@property(getter=isEnabled, readonly) BOOL enabled; // @synthesize enabled=_enabled');
  });

  it('renders class properties and dynamic storage', () => {
    expect(
      propertyHeader({ name: 'shared', attributes: parsePropertyAttributes('T@,R,D'), isClassProperty: true }),
    ).toBe('@property(class, readonly) id shared; // @dynamic shared');
  });

  it('synthesizes an ivar of the same name without renaming', () => {
    expect(
      propertyHeader({ name: 'count', attributes: parsePropertyAttributes('Tq,Vcount'), isClassProperty: false }),
    ).toBe('@property long long count; // @synthesize count');
  });
});

describe('property accessors', () => {
  it('derives the default setter', () => {
    const title = { name: 'title', attributes: parsePropertyAttributes('T@"NSString",C'), isClassProperty: false };
    expect(propertyAccessors(title)).toEqual({ getter: 'title', setter: 'setTitle:' });
    expect(propertyType(title)).toEqual(object('NSString'));
  });

  it('has no setter when read-only', () => {
    const enabled = { name: 'enabled', attributes: parsePropertyAttributes('TB,R,GisEnabled'), isClassProperty: false };
    expect(propertyAccessors(enabled)).toEqual({ getter: 'isEnabled' });
  });

  it('uses the declared setter', () => {
    const on = { name: 'on', attributes: parsePropertyAttributes('TB,SturnOn:'), isClassProperty: false };
    expect(propertyAccessors(on)).toEqual({ getter: 'on', setter: 'turnOn:' });
  });

  it('reads unknown when no type is present', () => {
    expect(propertyType({ name: 'x', attributes: [], isClassProperty: false })).toEqual(primitive('unknown'));
  });
});

const title = { name: 'title', attributes: parsePropertyAttributes('T@"NSString",C,N,V_title'), isClassProperty: false };
const shared = { name: 'shared', attributes: parsePropertyAttributes('T@,R,D'), isClassProperty: true };
const count = { name: 'count', typeEncoding: 'Q16@0:8', isClassMethod: false };
const make = { name: 'new', typeEncoding: '@16@0:8', isClassMethod: true };

describe('classHeader', () => {
  it('renders ivars, properties and methods in blocks', () => {
    expect(
      classHeader({
        name: 'Widget',
        superclassName: 'NSObject',
        protocols: ['NSCopying', 'NSCoding'],
        ivars: [
          { name: '_title', typeEncoding: '@"NSString"' },
          { name: '_count', typeEncoding: 'i' },
        ],
        properties: [title, shared],
        methods: [count, make],
      }),
    ).toBe(
      [
        '@interface Widget : NSObject <NSCopying, NSCoding> {',
        '    NSString *_title;',
        '    int _count;',
        '}',
        '',
        '@property(class, readonly) id shared; // @dynamic shared',
        '',
        '@property(copy, nonatomic) NSString *title; // @synthesize title=_title',
        '',
        '+ (id)new;',
        '',
        '- (unsigned long long)count;',
        '',
        '@end',
      ].join('\n'),
    );
  });

  it('omits the ivar braces and empty blocks', () => {
    expect(classHeader({ name: 'Root' })).toBe('@interface Root\n\n@end');
    expect(classHeader({ name: 'Counter', superclassName: 'NSObject', methods: [count] })).toBe(
      '@interface Counter : NSObject\n\n- (unsigned long long)count;\n\n@end',
    );
  });
});

describe('protocolHeader', () => {
  it('separates required and optional members', () => {
    expect(
      protocolHeader({
        name: 'Titled',
        protocols: ['NSObject'],
        properties: [title],
        methods: [count],
        optionalMethods: [make],
      }),
    ).toBe(
      [
        '@protocol Titled <NSObject>',
        '',
        '@required',
        '',
        '@property(copy, nonatomic) NSString *title; // @synthesize title=_title',
        '',
        '- (unsigned long long)count;',
        '',
        '@optional',
        '',
        '+ (id)new;',
        '',
        '@end',
      ].join('\n'),
    );
  });

  it('leaves out sections with no members', () => {
    expect(protocolHeader({ name: 'Marker' })).toBe('@protocol Marker\n\n@end');
    expect(protocolHeader({ name: 'Counting', optionalMethods: [count] })).toBe(
      '@protocol Counting\n\n@optional\n\n- (unsigned long long)count;\n\n@end',
    );
  });
});

describe('categoryHeader', () => {
  it('names the class and the category', () => {
    expect(
      categoryHeader({ name: 'Counting', className: 'NSArray', protocols: ['NSFastEnumeration'], methods: [count] }),
    ).toBe('@interface NSArray (Counting) <NSFastEnumeration>\n\n- (unsigned long long)count;\n\n@end');
  });

  it('renders an empty category', () => {
    expect(categoryHeader({ name: 'Empty', className: 'NSObject' })).toBe('@interface NSObject (Empty)\n\n@end');
  });
});
