export { emitAssembly, formatInstruction } from './emitter';
export { CodeGenerator } from './generator';
export type {
  ArithmeticInstruction,
  ArithmeticOp,
  Instruction,
  Register,
  ReturnInstruction,
} from './instruction';
