import { Environment, Value, formatValue } from "./environment";
import { CamError, StepLimitError } from "./errors";
import { Instruction, Opcode, Program, mnemonic } from "./opcode";
import { noMatch } from "./utils";

export class StackUnderflowError extends CamError {
  readonly kind = "StackUnderflow";
  constructor(public instruction: string) {
    super(`stack underflow in ${instruction}`);
  }
}

export class NotCallableError extends CamError {
  readonly kind = "NotCallable";
  constructor(public value: Value) {
    super(`cannot apply ${formatValue(value)}`);
  }
}

export class ArithmeticTypeError extends CamError {
  readonly kind = "ArithmeticTypeError";
  constructor(public instruction: string, public left: Value, public right: Value) {
    super(
      `${instruction} expects two integers, received ${formatValue(
        left
      )} and ${formatValue(right)}`
    );
  }
}

export class IntegerOverflowError extends ArithmeticTypeError {
  constructor(instruction: string, left: Value, right: Value) {
    super(instruction, left, right);
    this.message = `${instruction} of ${formatValue(left)} and ${formatValue(
      right
    )} leaves the safe integer range`;
  }
}

export class InvalidHaltStateError extends CamError {
  readonly kind = "InvalidHaltState";
  constructor(public remaining: Value[]) {
    super(`halted with ${remaining.length} values left on the stack`);
  }
}

export type Frame = { returnAddress: number; env: Environment };

export type TraceEvent = {
  step: number;
  pc: number;
  instruction: Instruction | null;
  stack: readonly Value[];
  env: Environment;
  dumpDepth: number;
};

export type Tracer = (event: TraceEvent) => void;

export type MachineOptions = {
  // initial environment, bound in order: the last value is #0
  globals?: Iterable<Value>;
  // a non-negative integer; unlimited unless set
  maxSteps?: number;
  trace?: Tracer;
};

export function interpret(program: Program, options: MachineOptions = {}): Value {
  return new Machine(program, options).run();
}

class OperandStack {
  private stack: Value[] = [];
  get size(): number {
    return this.stack.length;
  }
  push(value: Value): void {
    this.stack.push(value);
  }
  pop(instruction: string): Value {
    const value = this.stack.pop();
    if (value === undefined) throw new StackUnderflowError(instruction);
    return value;
  }
  toArray(): Value[] {
    return this.stack.slice();
  }
}

class Dump {
  private frames: Frame[] = [];
  get depth(): number {
    return this.frames.length;
  }
  push(frame: Frame): void {
    this.frames.push(frame);
  }
  pop(): Frame | undefined {
    return this.frames.pop();
  }
}

type Step = { tag: "continue" } | { tag: "halt"; result: Value };
const next: Step = { tag: "continue" };

class Machine {
  private pc = 0;
  private stack = new OperandStack();
  private dump = new Dump();
  private env: Environment;
  private steps = 0;
  private maxSteps: number;
  private trace: Tracer | null;
  constructor(private program: Program, options: MachineOptions) {
    this.env = Environment.of(options.globals ?? []);
    this.maxSteps = options.maxSteps ?? Infinity;
    if (
      this.maxSteps !== Infinity &&
      !(Number.isSafeInteger(this.maxSteps) && this.maxSteps >= 0)
    ) {
      throw new RangeError(
        `maxSteps must be a non-negative integer, received ${this.maxSteps}`
      );
    }
    this.trace = options.trace ?? null;
  }
  run(): Value {
    while (true) {
      if (this.steps >= this.maxSteps) throw new StepLimitError(this.maxSteps);
      const instruction = this.program[this.pc] ?? null;
      this.trace?.({
        step: this.steps,
        pc: this.pc,
        instruction,
        stack: this.stack.toArray(),
        env: this.env,
        dumpDepth: this.dump.depth,
      });
      this.steps++;
      this.pc++;
      // running off the end of the code returns like RETURN
      const step = instruction ? this.exec(instruction) : this.return("end of code");
      if (step.tag === "halt") return step.result;
    }
  }
  private exec(instruction: Instruction): Step {
    const name = mnemonic(instruction.op);
    switch (instruction.op) {
      case Opcode.Const:
        this.stack.push({ tag: "int", value: instruction.value });
        return next;
      case Opcode.Access:
        this.stack.push(this.env.lookup(instruction.index));
        return next;
      case Opcode.Closure:
        // the closure starts at the GRAB right after this instruction
        this.stack.push({ tag: "closure", entry: this.pc, env: this.env });
        this.pc += instruction.length;
        return next;
      case Opcode.Grab:
        this.env = this.env.bind(this.stack.pop(name));
        return next;
      case Opcode.Apply: {
        const callable = this.stack.pop(name);
        const argument = this.stack.pop(name);
        if (callable.tag !== "closure") throw new NotCallableError(callable);
        this.dump.push({ returnAddress: this.pc, env: this.env });
        this.env = callable.env;
        this.stack.push(argument);
        this.pc = callable.entry;
        return next;
      }
      case Opcode.Return:
        return this.return(name);
      case Opcode.Add:
      case Opcode.Mul: {
        const right = this.stack.pop(name);
        const left = this.stack.pop(name);
        if (left.tag !== "int" || right.tag !== "int") {
          throw new ArithmeticTypeError(name, left, right);
        }
        const value =
          instruction.op === Opcode.Add
            ? left.value + right.value
            : left.value * right.value;
        if (!Number.isSafeInteger(value)) {
          throw new IntegerOverflowError(name, left, right);
        }
        this.stack.push({ tag: "int", value });
        return next;
      }
      // istanbul ignore next
      default:
        return noMatch(instruction);
    }
  }
  private return(name: string): Step {
    const result = this.stack.pop(name);
    const frame = this.dump.pop();
    if (!frame) {
      if (this.stack.size > 0) {
        throw new InvalidHaltStateError(this.stack.toArray());
      }
      return { tag: "halt", result };
    }
    this.pc = frame.returnAddress;
    this.env = frame.env;
    this.stack.push(result);
    return next;
  }
}
