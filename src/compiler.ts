import { Term, checkDepth } from "./ast";
import { CamError } from "./errors";
import { Program } from "./opcode";
import { Writer } from "./writer";
import { noMatch } from "./utils";

export class OutOfScopeError extends CamError {
  readonly kind = "OutOfScope";
  constructor(
    public variable: string,
    public index: number | null,
    public depth: number
  ) {
    super(
      index === null
        ? `variable ${variable} has not been resolved`
        : `variable ${variable} refers to #${index} under ${depth} binders`
    );
  }
}

/**
 * Compile a resolved term. `depth` is the number of binders that enclose
 * it, which for a whole program is the number of globals it was resolved
 * against.
 */
export function compile(term: Term, depth = 0): Program {
  checkDepth(term);
  return new Compiler().compileProgram(term, depth);
}

class Compiler {
  private asm = new Writer();
  compileProgram(term: Term, depth: number): Program {
    this.compileTerm(term, depth);
    this.asm.return();
    return this.asm.compile();
  }
  private compileTerm(term: Term, depth: number): void {
    switch (term.tag) {
      case "variable": {
        const { index } = term;
        if (index === null || !Number.isInteger(index) || index < 0 || index >= depth) {
          throw new OutOfScopeError(term.name, index, depth);
        }
        this.asm.access(index);
        return;
      }
      case "constant":
        this.asm.constant(term.value);
        return;
      case "lambda": {
        const start = this.asm.nextIndex();
        this.asm.closure().grab();
        this.compileTerm(term.body, depth + 1);
        this.asm.return().patchClosure(start);
        return;
      }
      case "application":
        // argument first: APPLY finds the callable on top of the stack
        this.compileTerm(term.argument, depth);
        this.compileTerm(term.func, depth);
        this.asm.apply();
        return;
      case "binaryOp":
        this.compileTerm(term.left, depth);
        this.compileTerm(term.right, depth);
        if (term.operator === "+") {
          this.asm.add();
        } else {
          this.asm.mul();
        }
        return;
      // istanbul ignore next
      default:
        noMatch(term);
    }
  }
}
