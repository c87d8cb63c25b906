/**
 * Execution tracing
 *
 * When tracing is on, the engine reports one event before each
 * instruction and one more when it returns.
 */

import { StepLimitError } from './errors.js';

export interface TraceEvent {
  kind: 'step' | 'return';
  /** index of the next instruction */
  position: number;
  /** stack depth */
  depth: number;
  /** bound variable names, in binding order */
  vars: string[];
  /** mnemonic of the instruction about to run (step events only) */
  insn?: string;
}

export type Tracer = (event: TraceEvent) => void;

export interface ExecuteOptions {
  trace?: boolean;
  /** defaults to consoleTracer */
  tracer?: Tracer;
}

export function formatTraceEvent(event: TraceEvent): string {
  const label = event.kind === 'step' ? `RUN: ${event.insn ?? '?'}` : 'RETURN';
  return `${label} (pos=${event.position} depth=${event.depth} vars=${event.vars.join('')})`;
}

export const consoleTracer: Tracer = (event) => {
  console.error(formatTraceEvent(event));
};

/**
 * Tracer that collects events in memory
 */
export function collectingTracer(): { tracer: Tracer; events: TraceEvent[] } {
  const events: TraceEvent[] = [];
  return { tracer: (event) => events.push(event), events };
}

/**
 * Bound a run from the outside: throws StepLimitError once more than
 * `maxSteps` instructions have been traced, counting nested closure calls.
 * Events are forwarded to `next` when given.
 */
export function stepLimitTracer(maxSteps: number, next?: Tracer): Tracer {
  let steps = 0;
  return (event) => {
    if (event.kind === 'step' && ++steps > maxSteps) {
      throw new StepLimitError(maxSteps);
    }
    next?.(event);
  };
}
