import { formatValue } from "./environment";
import { TraceEvent, Tracer } from "./interpreter";
import { formatInstruction } from "./opcode";

export function formatTraceEvent(event: TraceEvent): string {
  const instruction = event.instruction
    ? formatInstruction(event.instruction)
    : "(end)";
  const stack = event.stack.map(formatValue).join(" ");
  const env = event.env.toArray().map(formatValue).join(" ");
  return `${event.step} | ${event.pc} | ${instruction} | [${stack}] | [${env}] | ${event.dumpDepth}`;
}

export const consoleTracer: Tracer = (event) => {
  console.log(formatTraceEvent(event));
};

export function collectTrace(): { tracer: Tracer; lines: string[] } {
  const lines: string[] = [];
  return { tracer: (event) => lines.push(formatTraceEvent(event)), lines };
}
