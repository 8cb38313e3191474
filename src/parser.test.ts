import { apply, binaryOp, constant, lambda, variable } from "./ast";
import { ParseError, parseSource as parse } from "./parser";
import { formatTerm } from "./printer";
import { arrow, typeConst } from "./types";

const Bool = typeConst("Bool");
const Int = typeConst("Int");

function parseError(source: string): ParseError {
  try {
    parse(source);
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error(`${source} parsed`);
}

it("parses atoms", () => {
  expect(parse("42")).toEqual(constant(42));
  expect(parse("x")).toEqual(variable("x"));
  expect(parse("((x))")).toEqual(variable("x"));
});

it("parses lambdas", () => {
  expect(parse("(lambda x. x)")).toEqual(lambda("x", variable("x")));
  expect(parse("(lambda x. lambda y. x)")).toEqual(
    lambda("x", lambda("y", variable("x")))
  );
});

it("parses parameter annotations", () => {
  expect(parse("(lambda f:Bool -> Bool. (f true))")).toEqual(
    lambda("f", apply(variable("f"), variable("true")), arrow(Bool, Bool))
  );
  expect(parse("(lambda g:Int -> Int -> Int. g)")).toEqual(
    lambda("g", variable("g"), arrow(Int, arrow(Int, Int)))
  );
  expect(parse("(lambda g:(Int -> Int) -> Int. g)")).toEqual(
    lambda("g", variable("g"), arrow(arrow(Int, Int), Int))
  );
});

it("left-folds applications", () => {
  expect(parse("(f a b)")).toEqual(
    apply(apply(variable("f"), variable("a")), variable("b"))
  );
  expect(parse("((lambda x. x) 42)")).toEqual(
    apply(lambda("x", variable("x")), constant(42))
  );
});

it("parses binary operators", () => {
  expect(parse("(x + 1)")).toEqual(binaryOp("+", variable("x"), constant(1)));
  expect(parse("(f x * 2)")).toEqual(
    binaryOp("*", apply(variable("f"), variable("x")), constant(2))
  );
  expect(parse("(lambda x. x + 1)")).toEqual(
    lambda("x", binaryOp("+", variable("x"), constant(1)))
  );
});

it("reports a missing terminator", () => {
  const error = parseError("(x");
  expect(error.kind).toEqual("SyntaxError");
  expect(error.expected).toEqual('")"');
  expect(error.position).toEqual({ offset: 2, line: 1, col: 3 });
  expect(error.message).toEqual('expected ")", received end of input at 1:3');
});

it("reports trailing input", () => {
  expect(parseError("(x))").message).toEqual(
    'expected end of input, received ")" at 1:4'
  );
});

it("reports an unterminated lambda", () => {
  expect(parseError("(lambda x (x))").message).toEqual(
    'expected ".", received "(" at 1:11'
  );
  expect(parseError("(lambda x.").message).toEqual(
    "expected expression, received end of input at 1:11"
  );
});

it("reports unexpected characters", () => {
  expect(parseError("(x - 1)").message).toEqual(
    'expected ")", received unexpected character "-" at 1:4'
  );
});

it("reports empty input", () => {
  expect(parseError("").message).toEqual(
    "expected expression, received end of input at 1:1"
  );
});

it("reports a missing type", () => {
  expect(parseError("(lambda x:. x)").message).toEqual(
    'expected type, received "." at 1:11'
  );
});

it("prints terms back as source", () => {
  const source = "(lambda f:(Int -> Int) -> Int. (f (lambda x. (x + 1))))";
  expect(formatTerm(parse(source))).toEqual(source);
  expect(formatTerm(parse("(f a b)"))).toEqual("((f a) b)");
});

it("rejects integers past the safe range", () => {
  expect(parse("9007199254740991")).toEqual(constant(9007199254740991));
  expect(parseError("(9007199254740993 + 0)").message).toEqual(
    "expected integer at most 9007199254740991, received integer 9007199254740993 at 1:2"
  );
});

const nested = (levels: number) => {
  let source = "0";
  for (let i = 0; i < levels; i++) source = `((lambda x. (${source} + x)) 1)`;
  return source;
};

it("parses up to the nesting limit", () => {
  expect(parse(`${"(".repeat(500)}1${")".repeat(500)}`)).toEqual(constant(1));
  expect(parseError(`${"(".repeat(501)}1${")".repeat(501)}`).message).toEqual(
    'expected shallower nesting, received "(" at 1:501'
  );
  // four levels of nesting each: two applications, a lambda and a sum
  expect(formatTerm(parse(nested(125)))).toEqual(nested(125));
  expect(parseError(nested(126))).toMatchObject({
    kind: "SyntaxError",
    expected: "shallower nesting",
  });
});

it("limits the depth of the parsed term", () => {
  const chain = (args: number) => `f${" 1".repeat(args)}`;
  expect(parse(chain(499))).toMatchObject({ tag: "application" });
  expect(parseError(chain(500)).message).toEqual(
    "expected shallower nesting, received end of input at 1:1002"
  );
  const arrows = (count: number) =>
    `lambda x:${"Int -> ".repeat(count)}Int. x`;
  expect(parse(arrows(499))).toMatchObject({ tag: "lambda" });
  expect(parseError(arrows(500))).toMatchObject({
    expected: "shallower nesting",
    received: { tag: "->" },
  });
});
