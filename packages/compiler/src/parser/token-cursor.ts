import type { Token } from '../lexer/token';
import { TokenType, type ReservedSymbol } from '../lexer/token-types';
import { ParserError } from './parser-error';

/**
 * Forward-only cursor over a token sequence
 *
 * Holds the parser state explicitly: the sequence and the index of the token
 * currently examined. The cursor never rewinds and never moves past EOF.
 */
export class TokenCursor {
  private current: number = 0;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly input: string,
  ) {
    const last = tokens[tokens.length - 1];
    if (last === undefined || last.type !== TokenType.EOF) {
      throw new Error('Token sequence must end with an EOF token');
    }
  }

  peek(): Token {
    return this.tokens[this.current];
  }

  /**
   * Advance past the current token if it is the given operator
   */
  consume(op: ReservedSymbol): boolean {
    if (!this.checkReserved(op)) {
      return false;
    }
    this.advance();
    return true;
  }

  /**
   * Advance past the given operator or fail at the current token
   */
  expect(op: ReservedSymbol): void {
    if (!this.checkReserved(op)) {
      throw this.error(`expected '${op}'`);
    }
    this.advance();
  }

  /**
   * Advance past an integer literal and return its value
   */
  expectNumber(): number {
    const token = this.peek();
    if (token.type !== TokenType.NUMBER) {
      throw this.error('expected a number');
    }
    this.advance();
    return token.literal;
  }

  atEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private checkReserved(op: ReservedSymbol): boolean {
    const token = this.peek();
    return token.type === TokenType.RESERVED && token.value === op;
  }

  private advance(): void {
    if (!this.atEnd()) {
      this.current++;
    }
  }

  private error(message: string): ParserError {
    return new ParserError(message, this.input, this.peek().loc.start);
  }
}
