export { Lexer, MAX_LITERAL } from './lexer';
export { LexerError } from './lexer-error';
export { TokenType } from './token-types';
export type { ReservedSymbol } from './token-types';
export type {
  EofToken,
  NumberToken,
  ReservedToken,
  SourceLocation,
  SourcePosition,
  Token,
} from './token';
