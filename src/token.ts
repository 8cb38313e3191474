export type Position = { offset: number; line: number; col: number };

export const punctuation = ["->", "(", ")", ".", ":", "+", "*"] as const;
export type Punctuation = (typeof punctuation)[number];

export type Token = (
  | { tag: "lambda" }
  | { tag: "integer"; value: number }
  // a literal past Number.MAX_SAFE_INTEGER, kept as written
  | { tag: "largeInteger"; value: string }
  | { tag: "identifier"; value: string }
  | { tag: Punctuation }
  | { tag: "error"; value: string }
  | { tag: "endOfInput" }
) & { position: Position };

export function isPunctuation(value: string | undefined): value is Punctuation {
  return punctuation.some((op) => op === value);
}

export function describeToken(token: Token): string {
  switch (token.tag) {
    case "integer":
    case "largeInteger":
      return `integer ${token.value}`;
    case "identifier":
      return `identifier "${token.value}"`;
    case "error":
      return `unexpected character "${token.value}"`;
    case "endOfInput":
      return "end of input";
    default:
      return `"${token.tag}"`;
  }
}
