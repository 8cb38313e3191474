import {
  Environment,
  VariableAccessError,
  atom,
  formatValue,
  int,
} from "./environment";

it("puts the most recent binding at index 0", () => {
  const env = Environment.of([int(1), int(2), int(3)]);
  expect(env.size).toEqual(3);
  expect(env.lookup(0)).toEqual(int(3));
  expect(env.lookup(2)).toEqual(int(1));
  expect(env.toArray()).toEqual([int(3), int(2), int(1)]);
});

it("shares the tail when extended", () => {
  const base = Environment.of([int(1)]);
  const extended = base.bind(atom("a"));
  expect(extended.toArray()).toEqual([atom("a"), int(1)]);
  expect(base.toArray()).toEqual([int(1)]);
  expect(Environment.empty.size).toEqual(0);
});

it("rejects indices outside the environment", () => {
  const env = Environment.of([int(1), int(2)]);
  expect(() => env.lookup(2)).toThrowError(
    "cannot access #2 in an environment of 2 bindings"
  );
  expect(() => env.lookup(-1)).toThrowError(VariableAccessError);
  expect(() => env.lookup(0.5)).toThrowError(VariableAccessError);
  expect(() => Environment.empty.lookup(0)).toThrowError(VariableAccessError);
});

it("formats values", () => {
  expect(formatValue(int(-4))).toEqual("-4");
  expect(formatValue(atom("y"))).toEqual("y");
  expect(
    formatValue({ tag: "closure", entry: 3, env: Environment.empty })
  ).toEqual("<closure@3>");
});
