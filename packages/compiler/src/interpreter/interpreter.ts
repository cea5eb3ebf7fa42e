import type { Instruction } from '../codegen/instruction';

/**
 * Outcome of running a generated program
 */
export interface ExecutionResult {
  /** Signed 64-bit value left in `rax` */
  value: bigint;
  /** Process exit status the host reports for that value (low 8 bits) */
  exitStatus: number;
}

/**
 * Interpreter for generated instructions
 *
 * Simulates `rax` as a 64-bit two's-complement register so results match
 * what the assembled program returns from `main`.
 */
export class Interpreter {
  private rax: bigint = 0n;

  execute(instructions: readonly Instruction[]): ExecutionResult {
    this.rax = 0n;

    for (const instruction of instructions) {
      switch (instruction.op) {
        case 'mov':
          this.rax = BigInt.asIntN(64, BigInt(instruction.value));
          break;
        case 'add':
          this.rax = BigInt.asIntN(64, this.rax + BigInt(instruction.value));
          break;
        case 'sub':
          this.rax = BigInt.asIntN(64, this.rax - BigInt(instruction.value));
          break;
        case 'ret':
          return this.result();
      }
    }

    throw new Error('Program ended without a ret instruction');
  }

  private result(): ExecutionResult {
    return {
      value: this.rax,
      exitStatus: Number(BigInt.asUintN(8, this.rax)),
    };
  }
}
