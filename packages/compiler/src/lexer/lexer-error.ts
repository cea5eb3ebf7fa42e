import type { SourcePosition } from './token';

/**
 * Error thrown during lexical analysis
 */
export class LexerError extends Error {
  /** Short description without position, as shown under the caret */
  readonly reason: string;
  /** The expression that failed to tokenize */
  readonly expression: string;
  /** Position where the error occurred */
  readonly position: SourcePosition;

  constructor(reason: string, expression: string, position: SourcePosition) {
    const fullMessage = `${reason} at line ${position.line}, column ${position.column}`;
    super(fullMessage);
    this.name = 'LexerError';
    this.reason = reason;
    this.expression = expression;
    this.position = position;
  }
}
