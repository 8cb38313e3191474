import { CamError } from "./errors";

export type Closure = { tag: "closure"; entry: number; env: Environment };

export type Value =
  | { tag: "int"; value: number }
  | { tag: "atom"; name: string }
  | Closure;

export function int(value: number): Value {
  return { tag: "int", value };
}

export function atom(name: string): Value {
  return { tag: "atom", name };
}

export function formatValue(value: Value): string {
  switch (value.tag) {
    case "int":
      return String(value.value);
    case "atom":
      return value.name;
    case "closure":
      return `<closure@${value.entry}>`;
  }
}

export class VariableAccessError extends CamError {
  readonly kind = "VariableAccessError";
  constructor(public index: number, public size: number) {
    super(`cannot access #${index} in an environment of ${size} bindings`);
  }
}

class Binding {
  constructor(
    public readonly value: Value,
    public readonly next: Binding | undefined
  ) {}
}

/**
 * Immutable sequence of bound values, index 0 being the most recent
 * binding. Extending shares the tail, so a closure's captured environment
 * stays valid however the machine's current environment changes later.
 */
export class Environment {
  static readonly empty = new Environment(undefined, 0);
  private constructor(
    private readonly top: Binding | undefined,
    public readonly size: number
  ) {}
  // values are bound in order, so the last one ends up at index 0
  static of(values: Iterable<Value>): Environment {
    let env = Environment.empty;
    for (const value of values) env = env.bind(value);
    return env;
  }
  bind(value: Value): Environment {
    return new Environment(new Binding(value, this.top), this.size + 1);
  }
  lookup(index: number): Value {
    let binding = this.top;
    for (let i = 0; binding && i < index; i++) {
      binding = binding.next;
    }
    if (!Number.isInteger(index) || index < 0 || !binding) {
      throw new VariableAccessError(index, this.size);
    }
    return binding.value;
  }
  toArray(): Value[] {
    const values: Value[] = [];
    for (let binding = this.top; binding; binding = binding.next) {
      values.push(binding.value);
    }
    return values;
  }
}
