export { createHeaderParser, type SyntaxNode } from './loadParser.js';
export { builtinType, sizedType } from './cTypeNames.js';
export { parseCHeader, type CDeclaration } from './parseCHeader.js';
