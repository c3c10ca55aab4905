import Parser from 'tree-sitter';

import Rust from 'tree-sitter-rust';

export function createParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Rust);
  return parser;
}
