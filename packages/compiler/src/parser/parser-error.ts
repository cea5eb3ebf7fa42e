import type { SourcePosition } from '../lexer/token';

/**
 * Error thrown during parsing
 */
export class ParserError extends Error {
  /** Short description without position, as shown under the caret */
  readonly reason: string;
  /** The expression that failed to parse */
  readonly expression: string;
  /** Position where the error occurred */
  readonly position: SourcePosition;

  constructor(reason: string, expression: string, position: SourcePosition) {
    const fullMessage = `${reason} at line ${position.line}, column ${position.column}`;
    super(fullMessage);
    this.name = 'ParserError';
    this.reason = reason;
    this.expression = expression;
    this.position = position;
  }
}
