import { CamError } from "./errors";
import { Type } from "./types";
import { noMatch } from "./utils";

export type BinaryOperator = "+" | "*";

export type Variable = { tag: "variable"; name: string; index: number | null };
export type Constant = { tag: "constant"; value: number; type: Type | null };
export type Lambda = {
  tag: "lambda";
  parameter: string;
  parameterType: Type | null;
  body: Term;
};
export type Application = { tag: "application"; func: Term; argument: Term };
export type BinaryOp = {
  tag: "binaryOp";
  operator: BinaryOperator;
  left: Term;
  right: Term;
};

// index is the de Bruijn index, filled in by resolve()
export type Term = Variable | Constant | Lambda | Application | BinaryOp;

export function variable(name: string, index: number | null = null): Variable {
  return { tag: "variable", name, index };
}

export function constant(value: number, type: Type | null = null): Constant {
  return { tag: "constant", value, type };
}

export function lambda(
  parameter: string,
  body: Term,
  parameterType: Type | null = null
): Lambda {
  return { tag: "lambda", parameter, parameterType, body };
}

export function apply(func: Term, ...args: Term[]): Term {
  return args.reduce<Term>(
    (acc, argument) => ({ tag: "application", func: acc, argument }),
    func
  );
}

export function binaryOp(
  operator: BinaryOperator,
  left: Term,
  right: Term
): BinaryOp {
  return { tag: "binaryOp", operator, left, right };
}

// deepest term any stage accepts; the tree walkers recurse once per level
export const maxDepth = 500;

export class NestingDepthError extends CamError {
  readonly kind = "NestingTooDeep";
  constructor(public depth: number, public limit: number) {
    super(`term is nested ${depth} deep, more than the limit of ${limit}`);
  }
}

// counted with an explicit stack, so any depth can be measured
export function termDepth(term: Term): number {
  let deepest = 0;
  const pending: [Term, number][] = [[term, 1]];
  let next: [Term, number] | undefined;
  while ((next = pending.pop())) {
    const [current, depth] = next;
    deepest = Math.max(deepest, depth);
    for (const child of children(current)) pending.push([child, depth + 1]);
  }
  return deepest;
}

export function checkDepth(term: Term, limit = maxDepth): void {
  const depth = termDepth(term);
  if (depth > limit) throw new NestingDepthError(depth, limit);
}

function children(term: Term): Term[] {
  switch (term.tag) {
    case "variable":
    case "constant":
      return [];
    case "lambda":
      return [term.body];
    case "application":
      return [term.func, term.argument];
    case "binaryOp":
      return [term.left, term.right];
    // istanbul ignore next
    default:
      return noMatch(term);
  }
}
