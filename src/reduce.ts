import { Term } from "./ast";
import { StepLimitError } from "./errors";
import { freeVariables } from "./resolve";
import { noMatch } from "./utils";

/**
 * Replace the free occurrences of `name` in `term` by `value`. A binder that
 * would capture one of `value`'s free variables is renamed first.
 */
export function substitute(term: Term, name: string, value: Term): Term {
  switch (term.tag) {
    case "variable":
      return term.name === name ? value : term;
    case "constant":
      return term;
    case "lambda": {
      if (term.parameter === name) return term;
      const valueFree = freeVariables(value);
      if (!valueFree.has(term.parameter)) {
        return { ...term, body: substitute(term.body, name, value) };
      }
      const avoid = union(valueFree, freeVariables(term.body));
      avoid.add(name);
      const parameter = freshName(term.parameter, avoid);
      const body = substitute(term.body, term.parameter, {
        tag: "variable",
        name: parameter,
        index: null,
      });
      return { ...term, parameter, body: substitute(body, name, value) };
    }
    case "application":
      return {
        tag: "application",
        func: substitute(term.func, name, value),
        argument: substitute(term.argument, name, value),
      };
    case "binaryOp":
      return {
        ...term,
        left: substitute(term.left, name, value),
        right: substitute(term.right, name, value),
      };
    // istanbul ignore next
    default:
      return noMatch(term);
  }
}

/**
 * One leftmost-outermost step, or null when the term is in normal form.
 * Lambda bodies are not reduced.
 */
export function reduceStep(term: Term): Term | null {
  switch (term.tag) {
    case "variable":
    case "constant":
    case "lambda":
      return null;
    case "application": {
      const func = reduceStep(term.func);
      if (func) return { ...term, func };
      if (term.func.tag === "lambda") {
        return substitute(term.func.body, term.func.parameter, term.argument);
      }
      const argument = reduceStep(term.argument);
      if (argument) return { ...term, argument };
      return null;
    }
    case "binaryOp": {
      const left = reduceStep(term.left);
      if (left) return { ...term, left };
      const right = reduceStep(term.right);
      if (right) return { ...term, right };
      if (term.left.tag === "constant" && term.right.tag === "constant") {
        const value =
          term.operator === "+"
            ? term.left.value + term.right.value
            : term.left.value * term.right.value;
        return { tag: "constant", value, type: null };
      }
      return null;
    }
    // istanbul ignore next
    default:
      return noMatch(term);
  }
}

export function normalize(term: Term, maxSteps = 10_000): Term {
  for (let step = 0; step < maxSteps; step++) {
    const next = reduceStep(term);
    if (!next) return term;
    term = next;
  }
  throw new StepLimitError(maxSteps);
}

function freshName(base: string, avoid: Set<string>): string {
  for (let n = 1; ; n++) {
    const name = `${base}_${n}`;
    if (!avoid.has(name)) return name;
  }
}

function union<T>(left: Set<T>, right: Set<T>): Set<T> {
  return new Set([...left, ...right]);
}
