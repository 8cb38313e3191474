import { Opcode, Program, formatInstruction } from "./opcode";

export function disassemble(program: Program): string {
  const result: string[] = [];
  // index one past the end of each enclosing closure body
  const ends: number[] = [];
  for (const [index, instruction] of program.entries()) {
    while (ends.length > 0 && ends[ends.length - 1] <= index) ends.pop();
    result.push("  ".repeat(ends.length) + formatInstruction(instruction));
    if (instruction.op === Opcode.Closure) {
      ends.push(index + 1 + instruction.length);
    }
  }
  return result.join("\n");
}
