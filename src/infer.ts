import { Term, checkDepth } from "./ast";
import { UnboundVariableError } from "./resolve";
import { Scope } from "./scope";
import { Type, TypeVarGenerator, arrow, intType } from "./types";
import { Substitution, TypeMismatchError } from "./unify";
import { noMatch } from "./utils";

export type TypeContext = Scope<string, Type>;

export function createContext(entries: Record<string, Type> = {}): TypeContext {
  return Scope.from(Object.entries(entries));
}

/**
 * Infer the monomorphic type of a term. Each call starts from an empty
 * substitution; pass a generator to control the numbering of the type
 * variables it allocates.
 */
export function inferType(
  term: Term,
  context: TypeContext = Scope.empty<string, Type>(),
  generator = new TypeVarGenerator()
): Type {
  checkDepth(term);
  const inference = new Inference(generator);
  return inference.resolve(inference.infer(term, context));
}

class Inference {
  private substitution = new Substitution();
  constructor(private generator: TypeVarGenerator) {}
  resolve(type: Type): Type {
    return this.substitution.resolve(type);
  }
  infer(term: Term, context: TypeContext): Type {
    switch (term.tag) {
      case "constant":
        return term.type ?? intType;
      case "variable":
        if (!context.has(term.name)) throw new UnboundVariableError(term.name);
        return context.get(term.name);
      case "lambda": {
        const parameterType = term.parameterType ?? this.generator.next();
        const bodyType = this.infer(
          term.body,
          context.extend(term.parameter, parameterType)
        );
        return arrow(parameterType, bodyType);
      }
      case "application": {
        const func = this.infer(term.func, context);
        const argument = this.infer(term.argument, context);
        const result = this.generator.next();
        try {
          this.substitution.unify(func, arrow(argument, result));
        } catch (error) {
          if (error instanceof TypeMismatchError) {
            throw error.inApplication({
              func: this.resolve(func),
              argument: this.resolve(argument),
            });
          }
          throw error;
        }
        return this.resolve(result);
      }
      case "binaryOp":
        this.substitution.unify(this.infer(term.left, context), intType);
        this.substitution.unify(this.infer(term.right, context), intType);
        return intType;
      // istanbul ignore next
      default:
        return noMatch(term);
    }
  }
}
