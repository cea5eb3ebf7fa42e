/**
 * Diagnostic reporter
 *
 * Writes usage and compile errors to the error stream and yields the exit
 * status the process should end with.
 */

import { formatDiagnostic, type ExpressionError } from '@exprcc/compiler';
import chalk from 'chalk';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface ReporterOptions {
  color?: boolean;
}

export class Reporter {
  private readonly c: { red: (s: string) => string; bold: (s: string) => string };

  constructor(
    private readonly stream: OutputStream,
    options: ReporterOptions = {},
  ) {
    this.c =
      options.color === true
        ? chalk
        : {
            red: (s: string) => s,
            bold: (s: string) => s,
          };
  }

  /**
   * Report an error that has no position in the expression
   */
  report(message: string): number {
    this.stream.write(`${message}\n`);
    return EXIT_FAILURE;
  }

  /**
   * Report an error with the expression and a caret under the offending column
   */
  reportAt(error: ExpressionError): number {
    this.stream.write(formatDiagnostic(error, { caret: this.c.red, reason: this.c.bold }));
    return EXIT_FAILURE;
  }
}
