import { Term } from "./ast";
import { formatType } from "./types";
import { noMatch } from "./utils";

export type FormatOptions = {
  // print resolved variables as #index instead of by name
  indices?: boolean;
};

export function formatTerm(term: Term, options: FormatOptions = {}): string {
  switch (term.tag) {
    case "variable":
      return options.indices && term.index !== null ? `#${term.index}` : term.name;
    case "constant":
      return String(term.value);
    case "lambda": {
      const annotation = term.parameterType
        ? `:${formatType(term.parameterType)}`
        : "";
      const body = formatTerm(term.body, options);
      return `(lambda ${term.parameter}${annotation}. ${body})`;
    }
    case "application":
      return `(${formatTerm(term.func, options)} ${formatTerm(
        term.argument,
        options
      )})`;
    case "binaryOp":
      return `(${formatTerm(term.left, options)} ${term.operator} ${formatTerm(
        term.right,
        options
      )})`;
    // istanbul ignore next
    default:
      return noMatch(term);
  }
}
