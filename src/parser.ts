import { BinaryOperator, Term, maxDepth } from "./ast";
import { CamError } from "./errors";
import { endOfInput, lex } from "./lexer";
import { Position, Token, describeToken } from "./token";
import { Type, arrow, typeConst } from "./types";

interface IParseState {
  token(): Token;
  advance(): void;
  enter(token: Token): void;
  leave(): void;
}

type Parser<T> = (state: IParseState) => T;

// a parsed term and the depth of its tree
type Parsed = { term: Term; depth: number };

class ParseState implements IParseState {
  private index = 0;
  private nesting = 0;
  constructor(private tokens: Token[], private end: Token) {}
  token(): Token {
    return this.tokens[this.index] ?? this.end;
  }
  advance(): void {
    this.index++;
  }
  // parentheses and lambda bodies are parsed by recursion, so they are bounded
  enter(token: Token): void {
    if (this.nesting >= maxDepth) {
      throw new ParseError("shallower nesting", token);
    }
    this.nesting++;
  }
  leave(): void {
    this.nesting--;
  }
}

export class ParseError extends CamError {
  readonly kind = "SyntaxError";
  public position: Position;
  constructor(public expected: string, public received: Token) {
    const { line, col } = received.position;
    super(
      `expected ${expected}, received ${describeToken(received)} at ${line}:${col}`
    );
    this.position = received.position;
  }
}

export function parse(tokens: Token[], end = endOfInput("")): Term {
  return matchProgram(new ParseState(tokens, end));
}

export function parseSource(source: string): Term {
  return parse(lex(source), endOfInput(source));
}

const matchProgram: Parser<Term> = (state) => {
  const { term } = matchForm(state);
  match(state, "endOfInput");
  return term;
};

const matchForm: Parser<Parsed> = (state) => {
  const keyword = check(state, "lambda");
  if (keyword) {
    state.enter(keyword);
    const parameter = match(state, "identifier").value;
    const parameterType = check(state, ":") ? matchType(state) : null;
    match(state, ".");
    const body = matchForm(state);
    state.leave();
    return node(
      state,
      { tag: "lambda", parameter, parameterType, body: body.term },
      body
    );
  }

  const left = matchApplication(state);
  const operator = checkOperator(state);
  if (!operator) return left;
  const right = matchApplication(state);
  return node(
    state,
    { tag: "binaryOp", operator, left: left.term, right: right.term },
    left,
    right
  );
};

const matchApplication: Parser<Parsed> = (state) => {
  let func = matchAtom(state);
  let argument: Parsed | null;
  while ((argument = checkAtom(state))) {
    func = node(
      state,
      { tag: "application", func: func.term, argument: argument.term },
      func,
      argument
    );
  }
  return func;
};

const matchAtom: Parser<Parsed> = (state) => {
  return assert(state, "expression", checkAtom(state));
};

const checkAtom: Parser<Parsed | null> = (state) => {
  const token = state.token();
  switch (token.tag) {
    case "integer":
      state.advance();
      return node(state, { tag: "constant", value: token.value, type: null });
    case "largeInteger":
      throw new ParseError(`integer at most ${Number.MAX_SAFE_INTEGER}`, token);
    case "identifier":
      state.advance();
      return node(state, { tag: "variable", name: token.value, index: null });
    case "(": {
      state.enter(token);
      state.advance();
      const inner = matchForm(state);
      match(state, ")");
      state.leave();
      return inner;
    }
    default:
      return null;
  }
};

const checkOperator: Parser<BinaryOperator | null> = (state) => {
  if (check(state, "+")) return "+";
  if (check(state, "*")) return "*";
  return null;
};

const matchType: Parser<Type> = (state) => {
  const from = matchTypeAtom(state);
  const arrowToken = check(state, "->");
  if (!arrowToken) return from;
  state.enter(arrowToken);
  const to = matchType(state);
  state.leave();
  return arrow(from, to);
};

const matchTypeAtom: Parser<Type> = (state) => {
  const name = check(state, "identifier");
  if (name) return typeConst(name.value);
  const paren = check(state, "(");
  if (paren) {
    state.enter(paren);
    const type = matchType(state);
    match(state, ")");
    state.leave();
    return type;
  }
  throw new ParseError("type", state.token());
};

// utilities

function check<Tag extends Token["tag"]>(
  state: IParseState,
  tag: Tag
): (Token & { tag: Tag }) | null {
  const token = state.token();
  if (isTag(token, tag)) {
    state.advance();
    return token;
  } else {
    return null;
  }
}

function match<Tag extends Token["tag"]>(
  state: IParseState,
  tag: Tag
): Token & { tag: Tag } {
  const token = state.token();
  if (isTag(token, tag)) {
    state.advance();
    return token;
  } else {
    throw new ParseError(tag === "endOfInput" ? "end of input" : `"${tag}"`, token);
  }
}

function isTag<Tag extends Token["tag"]>(
  token: Token,
  tag: Tag
): token is Token & { tag: Tag } {
  return token.tag === tag;
}

function node(state: IParseState, term: Term, ...children: Parsed[]): Parsed {
  const depth = 1 + Math.max(0, ...children.map((child) => child.depth));
  if (depth > maxDepth) {
    throw new ParseError("shallower nesting", state.token());
  }
  return { term, depth };
}

function assert<T>(state: IParseState, expected: string, res: T | null): T {
  if (res === null) {
    throw new ParseError(expected, state.token());
  }
  return res;
}
