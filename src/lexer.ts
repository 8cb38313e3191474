import * as moo from "moo";
import { Position, Token, isPunctuation, punctuation } from "./token";

const keywords = new Set(["lambda"]);

const lexer = moo.compile({
  whitespace: { match: /\s+/, lineBreaks: true },
  integer: /[0-9]+/,
  identifier: {
    match: /[A-Za-z][A-Za-z0-9_]*/,
    type: (value: string) => (keywords.has(value) ? value : "identifier"),
  },
  ...Object.fromEntries(punctuation.map((op) => [op, op])),
  error: moo.error,
});

export function lex(source: string): Token[] {
  const tokens: Token[] = [];
  for (const token of Array.from(lexer.reset(source))) {
    const position = positionOf(token);
    if (token.type === "whitespace") continue;
    if (token.type === "integer") {
      const value = Number(token.text);
      if (Number.isSafeInteger(value)) {
        tokens.push({ tag: "integer", value, position });
      } else {
        tokens.push({ tag: "largeInteger", value: token.text, position });
      }
    } else if (token.type === "identifier") {
      tokens.push({ tag: "identifier", value: token.text, position });
    } else if (token.type === "lambda") {
      tokens.push({ tag: "lambda", position });
    } else if (isPunctuation(token.type)) {
      tokens.push({ tag: token.type, position });
    } else {
      // the error rule swallows the rest of the input; report its first character
      tokens.push({ tag: "error", value: token.text.charAt(0), position });
      break;
    }
  }
  return tokens;
}

export function endOfInput(source: string): Token {
  const lines = source.split("\n");
  const last = lines[lines.length - 1];
  return {
    tag: "endOfInput",
    position: { offset: source.length, line: lines.length, col: last.length + 1 },
  };
}

function positionOf(token: moo.Token): Position {
  return { offset: token.offset, line: token.line, col: token.col };
}
