import type { ExpressionError } from './errors';

/**
 * Optional decoration for the caret and the reason, e.g. terminal colors
 */
export interface DiagnosticStyle {
  caret?: (text: string) => string;
  reason?: (text: string) => string;
}

const plain = (text: string): string => text;

/**
 * Render an error the way it is shown to the user
 *
 * Positioned errors reprint the whole expression and point at the offending
 * column with a caret:
 *
 * ```
 * 1*2
 *  ^ cannot tokenize
 * ```
 */
export function formatDiagnostic(error: ExpressionError, style: DiagnosticStyle = {}): string {
  const caret = style.caret ?? plain;
  const reason = style.reason ?? plain;

  if (error.position === null) {
    return `${reason(error.reason)}\n`;
  }
  const pointer = `${' '.repeat(error.position.offset)}${caret('^')} ${reason(error.reason)}`;
  return `${error.expression}\n${pointer}\n`;
}
