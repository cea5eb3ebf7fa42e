import { LexerError } from './lexer-error';
import type { SourcePosition, Token } from './token';
import { TokenType } from './token-types';

/**
 * Largest literal accepted. `add` and `sub` on x86-64 take at most a
 * sign-extended 32-bit immediate.
 */
export const MAX_LITERAL = 2_147_483_647;

/**
 * Lexer for expression syntax
 *
 * Tokenizes unsigned integer literals and the `+` / `-` operators,
 * skipping whitespace between them.
 */
export class Lexer {
  private input: string = '';
  private position: number = 0;
  private line: number = 1;
  private column: number = 0;

  /**
   * Tokenize an expression string
   *
   * The returned sequence always ends with exactly one EOF token, located at
   * the end of the input.
   */
  tokenize(input: string): Token[] {
    this.input = input;
    this.position = 0;
    this.line = 1;
    this.column = 0;

    const tokens: Token[] = [];

    while (!this.isAtEnd()) {
      this.skipWhitespace();
      if (this.isAtEnd()) break;

      tokens.push(this.nextToken());
    }

    const end = this.currentPosition();
    tokens.push({ type: TokenType.EOF, value: '', loc: { start: end, end } });
    return tokens;
  }

  private isAtEnd(): boolean {
    return this.position >= this.input.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.input[this.position];
  }

  private advance(): string {
    const char = this.input[this.position];
    this.position++;
    if (char === '\n') {
      this.line++;
      this.column = 0;
    } else {
      this.column++;
    }
    return char;
  }

  private currentPosition(): SourcePosition {
    return {
      line: this.line,
      column: this.column,
      offset: this.position,
    };
  }

  private error(message: string, position: SourcePosition = this.currentPosition()): never {
    throw new LexerError(message, this.input, position);
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd() && this.isSpace(this.peek())) {
      this.advance();
    }
  }

  private nextToken(): Token {
    const start = this.currentPosition();
    const char = this.peek();

    if (char === '+' || char === '-') {
      this.advance();
      return { type: TokenType.RESERVED, value: char, loc: { start, end: this.currentPosition() } };
    }

    if (this.isDigit(char)) {
      return this.number(start);
    }

    this.error('cannot tokenize');
  }

  private isSpace(char: string): boolean {
    return (
      char === ' ' ||
      char === '\t' ||
      char === '\n' ||
      char === '\v' ||
      char === '\f' ||
      char === '\r'
    );
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private number(start: SourcePosition): Token {
    let value = '';

    while (!this.isAtEnd() && this.isDigit(this.peek())) {
      value += this.advance();
    }

    const literal = Number.parseInt(value, 10);
    if (literal > MAX_LITERAL) {
      this.error('number out of range', start);
    }

    return {
      type: TokenType.NUMBER,
      value,
      literal,
      loc: { start, end: this.currentPosition() },
    };
  }
}
