import { decode } from '../encoding/decode.js';
import { decoded, decodedField } from '../encoding/prettyPrint.js';
import { field, primitive } from '../encoding/typeNode.js';

export type IvarDescription = {
  name: string;
  typeEncoding: string;
  offset?: number;
};

/** `NSString *_title;`, `int _flags : 3;` */
export function ivarHeader(ivar: IvarDescription): string {
  const type = decode(ivar.typeEncoding);
  if (!type) return `unknown ${ivar.name};`;

  if (type.kind === 'bitField') {
    return decodedField(field(primitive('int'), ivar.name, type.width));
  }
  if (type.kind === 'char' || type.kind === 'uchar') return `BOOL ${ivar.name};`;

  const declaration = decoded(type);
  if (declaration.endsWith('*')) return `${declaration}${ivar.name};`;
  return `${declaration} ${ivar.name};`;
}
