/**
 * Instructions emitted for the x86-64 target
 *
 * Only `rax` is ever used; it accumulates the running value of the expression.
 */

export type Register = 'rax';

export type ArithmeticOp = 'mov' | 'add' | 'sub';

export interface ArithmeticInstruction {
  op: ArithmeticOp;
  register: Register;
  /** Immediate operand */
  value: number;
}

export interface ReturnInstruction {
  op: 'ret';
}

export type Instruction = ArithmeticInstruction | ReturnInstruction;
