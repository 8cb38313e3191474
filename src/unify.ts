import { CamError } from "./errors";
import { Type, TypeVar, arrow, formatType } from "./types";

export type ApplicationTypes = { func: Type; argument: Type };

export class TypeMismatchError extends CamError {
  readonly kind = "TypeMismatch";
  public application: ApplicationTypes | null = null;
  constructor(public left: Type, public right: Type) {
    super(`type mismatch: ${formatType(left)} and ${formatType(right)}`);
  }
  // the innermost application that failed keeps its annotation
  inApplication(application: ApplicationTypes): this {
    if (this.application) return this;
    this.application = application;
    this.message += ` (applying ${formatType(application.func)} to ${formatType(
      application.argument
    )})`;
    return this;
  }
}

export class InfiniteTypeError extends TypeMismatchError {
  constructor(left: TypeVar, right: Type) {
    super(left, right);
    this.message = `infinite type: ${formatType(left)} occurs in ${formatType(
      right
    )}`;
  }
}

export class Substitution {
  private bindings = new Map<number, Type>();
  get size(): number {
    return this.bindings.size;
  }
  unify(left: Type, right: Type): void {
    left = this.deref(left);
    right = this.deref(right);
    if (left.tag === "var" && right.tag === "var" && left.id === right.id) {
      return;
    }
    if (left.tag === "var") {
      this.bind(left, right);
      return;
    }
    if (right.tag === "var") {
      this.bind(right, left);
      return;
    }
    if (left.tag === "arrow" && right.tag === "arrow") {
      this.unify(left.from, right.from);
      this.unify(left.to, right.to);
      return;
    }
    if (left.tag === "const" && right.tag === "const" && left.name === right.name) {
      return;
    }
    throw new TypeMismatchError(this.resolve(left), this.resolve(right));
  }
  resolve(type: Type): Type {
    type = this.deref(type);
    if (type.tag !== "arrow") return type;
    return arrow(this.resolve(type.from), this.resolve(type.to));
  }
  deref(type: Type): Type {
    const visited = new Set<number>();
    while (type.tag === "var") {
      // istanbul ignore next
      if (visited.has(type.id)) throw new Error("loop in substitution");
      visited.add(type.id);
      const next = this.bindings.get(type.id);
      if (!next) break;
      type = next;
    }
    return type;
  }
  private bind(variable: TypeVar, type: Type): void {
    if (this.occurs(variable, type)) {
      throw new InfiniteTypeError(variable, this.resolve(type));
    }
    // istanbul ignore next
    if (this.bindings.has(variable.id)) {
      throw new Error(`t${variable.id} is already bound`);
    }
    this.bindings.set(variable.id, type);
  }
  private occurs(variable: TypeVar, type: Type): boolean {
    type = this.deref(type);
    switch (type.tag) {
      case "var":
        return type.id === variable.id;
      case "arrow":
        return this.occurs(variable, type.from) || this.occurs(variable, type.to);
      case "const":
        return false;
    }
  }
}
