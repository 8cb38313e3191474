import { Term, checkDepth } from "./ast";
import { CamError } from "./errors";
import { DuplicateScopeMemberError, Scope } from "./scope";
import { noMatch } from "./utils";

export class UnboundVariableError extends CamError {
  readonly kind = "UnboundVariable";
  constructor(public variable: string) {
    super(`unbound variable: ${variable}`);
  }
}

export class DuplicateGlobalError extends CamError {
  readonly kind = "DuplicateGlobal";
  constructor(public variable: string) {
    super(`duplicate global: ${variable}`);
  }
}

/**
 * Annotate every variable with its de Bruijn index: the number of binders
 * between the use and the binder that introduced its name. `globals` act as
 * binders enclosing the whole term, `globals[0]` outermost.
 */
export function resolve(term: Term, globals: readonly string[] = []): Term {
  checkDepth(term);
  return resolveTerm(term, globalScope(globals), globals.length);
}

function globalScope(globals: readonly string[]): Scope<string, number> {
  try {
    return Scope.from(
      globals.map((name, depth): [string, number] => [name, depth])
    );
  } catch (error) {
    if (error instanceof DuplicateScopeMemberError) {
      throw new DuplicateGlobalError(String(error.key));
    }
    throw error;
  }
}

function resolveTerm(
  term: Term,
  scope: Scope<string, number>,
  depth: number
): Term {
  switch (term.tag) {
    case "variable": {
      if (!scope.has(term.name)) throw new UnboundVariableError(term.name);
      const index = depth - scope.get(term.name) - 1;
      return { tag: "variable", name: term.name, index };
    }
    case "constant":
      return { ...term };
    case "lambda":
      return {
        ...term,
        body: resolveTerm(
          term.body,
          scope.extend(term.parameter, depth),
          depth + 1
        ),
      };
    case "application":
      return {
        tag: "application",
        func: resolveTerm(term.func, scope, depth),
        argument: resolveTerm(term.argument, scope, depth),
      };
    case "binaryOp":
      return {
        ...term,
        left: resolveTerm(term.left, scope, depth),
        right: resolveTerm(term.right, scope, depth),
      };
    // istanbul ignore next
    default:
      return noMatch(term);
  }
}

export function freeVariables(term: Term): Set<string> {
  switch (term.tag) {
    case "variable":
      return new Set([term.name]);
    case "constant":
      return new Set();
    case "lambda": {
      const free = freeVariables(term.body);
      free.delete(term.parameter);
      return free;
    }
    case "application":
      return union(freeVariables(term.func), freeVariables(term.argument));
    case "binaryOp":
      return union(freeVariables(term.left), freeVariables(term.right));
    // istanbul ignore next
    default:
      return noMatch(term);
  }
}

function union<T>(left: Set<T>, right: Set<T>): Set<T> {
  for (const item of right) left.add(item);
  return left;
}
