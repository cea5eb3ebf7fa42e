/**
 * Error types for expression compilation
 *
 * All errors include the expression string and the position of the offending
 * character or token.
 */

import type { SourcePosition } from './lexer/token';

export type ExpressionErrorKind = 'lexical' | 'syntax';

/**
 * Base class for compilation errors
 */
export abstract class ExpressionError extends Error {
  abstract readonly kind: ExpressionErrorKind;
  /** Short description without position, as shown under the caret */
  readonly reason: string;
  /** The expression that caused the error */
  readonly expression: string;
  /** Position where the error occurred (if available) */
  readonly position: SourcePosition | null;

  constructor(reason: string, expression: string, position: SourcePosition | null = null) {
    const fullMessage = position
      ? `${reason} at line ${position.line}, column ${position.column}`
      : reason;
    super(fullMessage);
    this.name = this.constructor.name;
    this.reason = reason;
    this.expression = expression;
    this.position = position;
  }
}

/**
 * Thrown when a character cannot start a token, or a literal is out of range
 */
export class ExpressionLexicalError extends ExpressionError {
  readonly kind = 'lexical';
}

/**
 * Thrown when a token is not the operator or number the grammar requires
 */
export class ExpressionSyntaxError extends ExpressionError {
  readonly kind = 'syntax';
}
