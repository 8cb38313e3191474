import { compile } from "./compiler";
import { Value } from "./environment";
import { createContext, inferType } from "./infer";
import { Tracer, interpret } from "./interpreter";
import { parseSource } from "./parser";
import { resolve } from "./resolve";
import { Type } from "./types";

export type RunOptions = {
  // free identifiers the program may use, and the values they start with
  globals?: Record<string, Value>;
  // when given, the program is type-checked against these types first
  types?: Record<string, Type>;
  maxSteps?: number;
  trace?: Tracer;
};

export function run(source: string, options: RunOptions = {}): Value {
  const term = parseSource(source);
  if (options.types) {
    inferType(term, createContext(options.types));
  }
  const globals = Object.entries(options.globals ?? {});
  const names = globals.map(([name]) => name);
  const program = compile(resolve(term, names), names.length);
  return interpret(program, {
    globals: globals.map(([, value]) => value),
    maxSteps: options.maxSteps,
    trace: options.trace,
  });
}

export function check(source: string, types: Record<string, Type> = {}): Type {
  return inferType(parseSource(source), createContext(types));
}

export * from "./ast";
export * from "./errors";
export * from "./token";
export * from "./types";
export * from "./opcode";
export * from "./environment";
export { lex } from "./lexer";
export { parse, parseSource, ParseError } from "./parser";
export { Scope, KeyNotFoundError, DuplicateScopeMemberError } from "./scope";
export {
  resolve,
  freeVariables,
  UnboundVariableError,
  DuplicateGlobalError,
} from "./resolve";
export { Substitution, TypeMismatchError, InfiniteTypeError } from "./unify";
export { inferType, createContext, TypeContext } from "./infer";
export { compile, OutOfScopeError } from "./compiler";
export { Assembler } from "./assembler";
export { disassemble } from "./disassembler";
export {
  interpret,
  MachineOptions,
  TraceEvent,
  Tracer,
  Frame,
  StackUnderflowError,
  NotCallableError,
  ArithmeticTypeError,
  IntegerOverflowError,
  InvalidHaltStateError,
} from "./interpreter";
export { formatTraceEvent, consoleTracer, collectTrace } from "./trace";
export { formatTerm, FormatOptions } from "./printer";
export { substitute, reduceStep, normalize } from "./reduce";
