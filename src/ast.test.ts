import {
  NestingDepthError,
  Term,
  binaryOp,
  constant,
  lambda,
  termDepth,
  variable,
} from "./ast";
import { compile } from "./compiler";
import { int } from "./environment";
import { inferType } from "./infer";
import { interpret } from "./interpreter";
import { resolve } from "./resolve";
import { thrown } from "./testing";

// 0 + 1 + 1 + ..., one level per operand
const sum = (operands: number): Term => {
  let term: Term = constant(0);
  for (let i = 1; i < operands; i++) term = binaryOp("+", term, constant(1));
  return term;
};

it("measures term depth", () => {
  expect(termDepth(constant(1))).toEqual(1);
  expect(termDepth(lambda("x", binaryOp("*", variable("x"), constant(2))))).toEqual(3);
  expect(termDepth(sum(100_000))).toEqual(100_000);
});

it("accepts terms up to the depth limit", () => {
  const program = compile(resolve(sum(500)));
  expect(interpret(program)).toEqual(int(499));
  expect(inferType(sum(500))).toEqual({ tag: "const", name: "Int" });
});

it("rejects deeper terms before walking them", () => {
  const deep = sum(501);
  const error = thrown(() => resolve(deep));
  expect(error).toBeInstanceOf(NestingDepthError);
  expect(error).toMatchObject({ kind: "NestingTooDeep", depth: 501, limit: 500 });
  expect(error).toHaveProperty(
    "message",
    "term is nested 501 deep, more than the limit of 500"
  );
  expect(() => compile(deep)).toThrowError(NestingDepthError);
  expect(() => inferType(deep)).toThrowError(NestingDepthError);
  expect(() => resolve(sum(3000))).toThrowError(NestingDepthError);
});
