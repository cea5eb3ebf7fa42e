import type { ReservedSymbol, TokenType } from './token-types';

/**
 * Source position for error reporting
 */
export interface SourcePosition {
  /** 1-based line number */
  line: number;
  /** 0-based column number */
  column: number;
  /** 0-based character offset from start of input */
  offset: number;
}

/**
 * Source location spanning start to end positions
 */
export interface SourceLocation {
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * An operator token
 */
export interface ReservedToken {
  type: typeof TokenType.RESERVED;
  value: ReservedSymbol;
  loc: SourceLocation;
}

/**
 * An integer literal; `value` is the digit run as written
 */
export interface NumberToken {
  type: typeof TokenType.NUMBER;
  value: string;
  literal: number;
  loc: SourceLocation;
}

/**
 * The single end-of-input marker closing every token sequence
 */
export interface EofToken {
  type: typeof TokenType.EOF;
  value: '';
  loc: SourceLocation;
}

/**
 * A token produced by the lexer
 */
export type Token = ReservedToken | NumberToken | EofToken;
