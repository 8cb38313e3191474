import { lex } from "./lexer";

it("has a lexer", () => {
  const tokens = lex("(lambda x. (x + 1))");
  expect(tokens.map((token) => token.tag)).toEqual([
    "(",
    "lambda",
    "identifier",
    ".",
    "(",
    "identifier",
    "+",
    "integer",
    ")",
    ")",
  ]);
});

it("records positions across lines", () => {
  expect(lex("f\n  42")).toEqual([
    { tag: "identifier", value: "f", position: { offset: 0, line: 1, col: 1 } },
    { tag: "integer", value: 42, position: { offset: 4, line: 2, col: 3 } },
  ]);
});

it("lexes type annotations", () => {
  expect(lex("x:Bool -> Int").map((token) => token.tag)).toEqual([
    "identifier",
    ":",
    "identifier",
    "->",
    "identifier",
  ]);
});

it("only treats the whole word as a keyword", () => {
  expect(lex("lambda_1")).toEqual([
    {
      tag: "identifier",
      value: "lambda_1",
      position: { offset: 0, line: 1, col: 1 },
    },
  ]);
});

it("stops at the first unexpected character", () => {
  expect(lex("x - 1")).toEqual([
    { tag: "identifier", value: "x", position: { offset: 0, line: 1, col: 1 } },
    { tag: "error", value: "-", position: { offset: 2, line: 1, col: 3 } },
  ]);
});

it("keeps integers past the safe range as written", () => {
  expect(lex("9007199254740991 99999999999999999999")).toEqual([
    {
      tag: "integer",
      value: 9007199254740991,
      position: { offset: 0, line: 1, col: 1 },
    },
    {
      tag: "largeInteger",
      value: "99999999999999999999",
      position: { offset: 17, line: 1, col: 18 },
    },
  ]);
});
