import Parser from 'tree-sitter';

import C from 'tree-sitter-c';

export type SyntaxNode = Parser.SyntaxNode;

export function createHeaderParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(C);
  return parser;
}
