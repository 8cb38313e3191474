import { Instruction, Opcode, Program } from "./opcode";

export class Writer {
  private program: Instruction[] = [];
  compile(): Program {
    return this.program;
  }
  nextIndex(): number {
    return this.program.length;
  }
  access(index: number): this {
    this.program.push({ op: Opcode.Access, index });
    return this;
  }
  constant(value: number): this {
    this.program.push({ op: Opcode.Const, value });
    return this;
  }
  closure(length = 0): this {
    this.program.push({ op: Opcode.Closure, length });
    return this;
  }
  // sets the length of the closure at `index` to cover everything written since
  patchClosure(index: number): this {
    const instruction = this.program[index];
    if (!instruction || instruction.op !== Opcode.Closure) {
      throw new Error(`no closure to patch at ${index}`);
    }
    this.program[index] = {
      op: Opcode.Closure,
      length: this.nextIndex() - index - 1,
    };
    return this;
  }
  grab(): this {
    this.program.push({ op: Opcode.Grab });
    return this;
  }
  apply(): this {
    this.program.push({ op: Opcode.Apply });
    return this;
  }
  return(): this {
    this.program.push({ op: Opcode.Return });
    return this;
  }
  add(): this {
    this.program.push({ op: Opcode.Add });
    return this;
  }
  mul(): this {
    this.program.push({ op: Opcode.Mul });
    return this;
  }
}
