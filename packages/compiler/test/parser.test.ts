import { describe, expect, it } from 'vitest';
import { Lexer, TokenType } from '../src/lexer';
import { ParserError, TokenCursor } from '../src/parser';

describe('TokenCursor', () => {
  const lexer = new Lexer();

  function cursor(input: string): TokenCursor {
    return new TokenCursor(lexer.tokenize(input), input);
  }

  function parseError(run: () => unknown): ParserError {
    try {
      run();
    } catch (error) {
      if (error instanceof ParserError) return error;
      throw error;
    }
    throw new Error('expected a ParserError');
  }

  it('starts at the first token', () => {
    const c = cursor('7 + 1');
    expect(c.peek().type).toBe(TokenType.NUMBER);
    expect(c.peek().value).toBe('7');
  });

  it('requires the sequence to end with EOF', () => {
    expect(() => new TokenCursor([], '')).toThrow('Token sequence must end with an EOF token');
  });

  describe('consume', () => {
    it('advances past a matching operator', () => {
      const c = cursor('+1');
      expect(c.consume('+')).toBe(true);
      expect(c.peek().value).toBe('1');
    });

    it('leaves the cursor in place on a different operator', () => {
      const c = cursor('-1');
      expect(c.consume('+')).toBe(false);
      expect(c.peek().value).toBe('-');
    });

    it('does not match numbers', () => {
      const c = cursor('1');
      expect(c.consume('+')).toBe(false);
      expect(c.peek().type).toBe(TokenType.NUMBER);
    });
  });

  describe('expect', () => {
    it('advances past a matching operator', () => {
      const c = cursor('- 3');
      c.expect('-');
      expect(c.peek().value).toBe('3');
    });

    it('fails at the current token otherwise', () => {
      const c = cursor('1 2');
      c.expectNumber();
      const error = parseError(() => c.expect('-'));
      expect(error.reason).toBe("expected '-'");
      expect(error.expression).toBe('1 2');
      expect(error.position.offset).toBe(2);
    });
  });

  describe('expectNumber', () => {
    it('returns the literal and advances', () => {
      const c = cursor('42+');
      expect(c.expectNumber()).toBe(42);
      expect(c.peek().value).toBe('+');
    });

    it('fails on an operator', () => {
      const error = parseError(() => cursor('+1').expectNumber());
      expect(error.reason).toBe('expected a number');
      expect(error.position.offset).toBe(0);
    });

    it('fails on EOF of empty input at position 0', () => {
      const error = parseError(() => cursor('').expectNumber());
      expect(error.reason).toBe('expected a number');
      expect(error.position).toEqual({ line: 1, column: 0, offset: 0 });
      expect(error.message).toBe('expected a number at line 1, column 0');
    });
  });

  describe('atEnd', () => {
    it('is true only on EOF', () => {
      const c = cursor('1');
      expect(c.atEnd()).toBe(false);
      c.expectNumber();
      expect(c.atEnd()).toBe(true);
    });

    it('never moves past EOF', () => {
      const c = cursor('');
      expect(c.consume('+')).toBe(false);
      expect(c.atEnd()).toBe(true);
      expect(c.peek().type).toBe(TokenType.EOF);
    });
  });
});
