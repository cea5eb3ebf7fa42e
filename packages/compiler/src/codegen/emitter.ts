import type { Instruction } from './instruction';

const PREAMBLE = ['.intel_syntax noprefix', '.globl main', 'main:'];

export function formatInstruction(instruction: Instruction): string {
  switch (instruction.op) {
    case 'ret':
      return '  ret';
    default:
      return `  ${instruction.op} ${instruction.register}, ${instruction.value}`;
  }
}

/**
 * Render instructions as a GNU assembler listing in Intel syntax, one line per
 * instruction after the `main` preamble. Every line ends with a newline.
 */
export function emitAssembly(instructions: readonly Instruction[]): string {
  const lines = [...PREAMBLE, ...instructions.map(formatInstruction)];
  return lines.map((line) => `${line}\n`).join('');
}
