import type { TokenCursor } from '../parser/token-cursor';
import type { ArithmeticOp, Instruction } from './instruction';

/**
 * Code generator for `number ( ('+' number) | ('-' number) )*`
 *
 * There is a single precedence level, so the grammar is walked as one loop:
 * each iteration consumes an operator-number pair and yields one instruction.
 * The cursor is left on EOF after a successful walk.
 */
export class CodeGenerator {
  private instructions: Instruction[] = [];

  generate(cursor: TokenCursor): Instruction[] {
    this.instructions = [];

    this.emit('mov', cursor.expectNumber());

    while (!cursor.atEnd()) {
      if (cursor.consume('+')) {
        this.emit('add', cursor.expectNumber());
        continue;
      }

      cursor.expect('-');
      this.emit('sub', cursor.expectNumber());
    }

    this.instructions.push({ op: 'ret' });
    return this.instructions;
  }

  private emit(op: ArithmeticOp, value: number): void {
    this.instructions.push({ op, register: 'rax', value });
  }
}
