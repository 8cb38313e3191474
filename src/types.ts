export type TypeVar = { tag: "var"; id: number };
export type TypeArrow = { tag: "arrow"; from: Type; to: Type };
export type TypeConst = { tag: "const"; name: string };
export type Type = TypeVar | TypeArrow | TypeConst;

export function typeVar(id: number): TypeVar {
  return { tag: "var", id };
}

export function arrow(from: Type, to: Type): TypeArrow {
  return { tag: "arrow", from, to };
}

export function typeConst(name: string): TypeConst {
  return { tag: "const", name };
}

export const intType = typeConst("Int");

/**
 * Source of fresh type variables. Each inference run owns one, so runs
 * never observe each other's counters.
 */
export class TypeVarGenerator {
  private counter = 0;
  next(): TypeVar {
    return typeVar(this.counter++);
  }
  reset(): void {
    this.counter = 0;
  }
}

export function formatType(type: Type): string {
  switch (type.tag) {
    case "var":
      return `t${type.id}`;
    case "const":
      return type.name;
    case "arrow": {
      const from = formatType(type.from);
      const to = formatType(type.to);
      return type.from.tag === "arrow" ? `(${from}) -> ${to}` : `${from} -> ${to}`;
    }
  }
}
