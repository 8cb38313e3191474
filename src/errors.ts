export type ErrorKind =
  | "SyntaxError"
  | "UnboundVariable"
  | "DuplicateGlobal"
  | "OutOfScope"
  | "TypeMismatch"
  | "VariableAccessError"
  | "StackUnderflow"
  | "NotCallable"
  | "ArithmeticTypeError"
  | "InvalidHaltState"
  | "StepLimitExceeded"
  | "NestingTooDeep";

/**
 * Base class of every failure raised by the pipeline. `kind` discriminates
 * the failure without `instanceof` checks across module boundaries.
 */
export abstract class CamError extends Error {
  abstract readonly kind: ErrorKind;
}

export class StepLimitError extends CamError {
  readonly kind = "StepLimitExceeded";
  constructor(public limit: number) {
    super(`step limit of ${limit} exceeded`);
  }
}
