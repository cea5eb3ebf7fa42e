/**
 * @exprcc/compiler
 *
 * Compiles `+` / `-` integer expressions to x86-64 assembly whose `main`
 * returns the value of the expression.
 */

import type { Logger } from '@exprcc/logger';
import { CodeGenerator } from './codegen/generator';
import { emitAssembly } from './codegen/emitter';
import type { Instruction } from './codegen/instruction';
import { ExpressionError, ExpressionLexicalError, ExpressionSyntaxError } from './errors';
import { Interpreter, type ExecutionResult } from './interpreter/interpreter';
import { Lexer } from './lexer/lexer';
import { LexerError } from './lexer/lexer-error';
import type { Token } from './lexer/token';
import { ParserError } from './parser/parser-error';
import { TokenCursor } from './parser/token-cursor';

// Re-export error types
export { ExpressionError, ExpressionLexicalError, ExpressionSyntaxError };
export type { ExpressionErrorKind } from './errors';
export { formatDiagnostic } from './diagnostics';
export type { DiagnosticStyle } from './diagnostics';

// Re-export building blocks
export { CodeGenerator, emitAssembly, formatInstruction } from './codegen/index';
export { Interpreter } from './interpreter/interpreter';
export { Lexer, MAX_LITERAL, TokenType } from './lexer/index';
export { TokenCursor } from './parser/index';

// Re-export types
export type { ArithmeticOp, Instruction } from './codegen/index';
export type { ExecutionResult } from './interpreter/interpreter';
export type { SourceLocation, SourcePosition, Token } from './lexer/index';

/**
 * Options for compilation
 */
export interface CompileOptions {
  /** Receives debug events for each pipeline stage */
  logger?: Logger;
}

/**
 * Map internal lexer and parser errors onto the public error types
 */
function translateError(error: unknown): unknown {
  if (error instanceof LexerError) {
    return new ExpressionLexicalError(error.reason, error.expression, error.position);
  }
  if (error instanceof ParserError) {
    return new ExpressionSyntaxError(error.reason, error.expression, error.position);
  }
  return error;
}

/**
 * Tokenize an expression
 *
 * @throws {ExpressionLexicalError} If a character cannot start a token
 *
 * @example
 * ```ts
 * tokenize('1 + 2').map((t) => t.type)
 * // => ['NUMBER', 'RESERVED', 'NUMBER', 'EOF']
 * ```
 */
export function tokenize(expression: string, options: CompileOptions = {}): Token[] {
  let tokens: Token[];
  try {
    tokens = new Lexer().tokenize(expression);
  } catch (error) {
    throw translateError(error);
  }

  options.logger?.debug('tokenize_completed', { tokens: tokens.length });
  return tokens;
}

/**
 * Tokenize and walk an expression, returning the instructions that compute it
 *
 * @throws {ExpressionLexicalError} If a character cannot start a token
 * @throws {ExpressionSyntaxError} If the tokens do not form `number (op number)*`
 */
export function generate(expression: string, options: CompileOptions = {}): Instruction[] {
  const tokens = tokenize(expression, options);

  let instructions: Instruction[];
  try {
    instructions = new CodeGenerator().generate(new TokenCursor(tokens, expression));
  } catch (error) {
    throw translateError(error);
  }

  options.logger?.debug('codegen_completed', { instructions: instructions.length });
  return instructions;
}

/**
 * Compile an expression to an assembly listing
 *
 * @example
 * ```ts
 * compile('5+20-4')
 * // => '.intel_syntax noprefix\n.globl main\nmain:\n  mov rax, 5\n  add rax, 20\n  sub rax, 4\n  ret\n'
 * ```
 */
export function compile(expression: string, options: CompileOptions = {}): string {
  return emitAssembly(generate(expression, options));
}

/**
 * Compile an expression and run the result in the instruction interpreter
 *
 * @example
 * ```ts
 * evaluate('1-2').exitStatus // => 255
 * ```
 */
export function evaluate(expression: string, options: CompileOptions = {}): ExecutionResult {
  return new Interpreter().execute(generate(expression, options));
}
