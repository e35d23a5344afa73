export * from './typeNode.js';
export * from './modifier.js';
export { EncodingCursor, popType, skipType } from './cursor.js';
export { decode, decodeOrThrow, decodeWithRemainder, type DecodeResult } from './decode.js';
export { encode, encodeField } from './encode.js';
export {
  DEFAULT_INDENT,
  argumentDeclaration,
  decoded,
  decodedField,
  decodedFields,
} from './prettyPrint.js';
