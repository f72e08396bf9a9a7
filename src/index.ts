export * from './nfa-to-dfa/index.js';
export * from './regex-compiler/ast.js';
export * from './regex-compiler/errors.js';
export { Lexeme, Lexer, Token, type Span } from './regex-compiler/lexer.js';
export { RegexParser, parseRegex } from './regex-compiler/parser.js';
export * from './pipeline.js';
export { Regex } from './regex.js';
