export enum Opcode {
  Access, // index
  Const, // value
  Closure, // length of the GRAB ... RETURN block that follows
  Grab,
  Apply,
  Return,
  Add,
  Mul,
}

export type Instruction =
  | { op: Opcode.Access; index: number }
  | { op: Opcode.Const; value: number }
  | { op: Opcode.Closure; length: number }
  | { op: Opcode.Grab }
  | { op: Opcode.Apply }
  | { op: Opcode.Return }
  | { op: Opcode.Add }
  | { op: Opcode.Mul };

export type Program = readonly Instruction[];

export function mnemonic(op: Opcode): string {
  return Opcode[op].toUpperCase();
}

export function formatInstruction(instruction: Instruction): string {
  switch (instruction.op) {
    case Opcode.Access:
      return `${mnemonic(instruction.op)} ${instruction.index}`;
    case Opcode.Const:
      return `${mnemonic(instruction.op)} ${instruction.value}`;
    case Opcode.Closure:
      return `${mnemonic(instruction.op)} ${instruction.length}`;
    default:
      return mnemonic(instruction.op);
  }
}
