/**
 * Token types for the expression lexer
 *
 * The accepted language is integer literals joined by binary `+` and `-`.
 */

export const TokenType = {
  // Operators
  RESERVED: 'RESERVED', // + -

  // Literals
  NUMBER: 'NUMBER', // 0, 42, 1024

  // End of input
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

/**
 * Operator characters the lexer turns into RESERVED tokens
 */
export type ReservedSymbol = '+' | '-';
