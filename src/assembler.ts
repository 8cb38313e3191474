import { Program } from "./opcode";
import { Writer } from "./writer";

/**
 * Builds programs by hand, mostly for exercising the machine directly.
 *
 *   new Assembler()
 *     .constant(42)
 *     .closure().access(0).endClosure()
 *     .apply()
 *     .return()
 *     .assemble()
 */
export class Assembler {
  private writer = new Writer();
  private openClosures: number[] = [];
  assemble(): Program {
    if (this.openClosures.length > 0) {
      throw new Error(`${this.openClosures.length} closures left open`);
    }
    return this.writer.compile();
  }
  access(index: number): this {
    this.writer.access(index);
    return this;
  }
  constant(value: number): this {
    this.writer.constant(value);
    return this;
  }
  // CLOSURE followed by the GRAB that receives the argument
  closure(): this {
    this.openClosures.push(this.writer.nextIndex());
    this.writer.closure().grab();
    return this;
  }
  endClosure(): this {
    const start = this.openClosures.pop();
    if (start === undefined) throw new Error("not in a closure");
    this.writer.return().patchClosure(start);
    return this;
  }
  grab(): this {
    this.writer.grab();
    return this;
  }
  apply(): this {
    this.writer.apply();
    return this;
  }
  return(): this {
    this.writer.return();
    return this;
  }
  add(): this {
    this.writer.add();
    return this;
  }
  mul(): this {
    this.writer.mul();
    return this;
  }
}
