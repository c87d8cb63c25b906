/**
 * Compile and runtime errors
 *
 * Syntax errors carry the source text and a zero-based offset into it.
 * Runtime errors carry the failing Code together with the frame state at
 * the moment of failure so a caller can render full diagnostics.
 */

import type { Code } from './compiler.js';
import { type Stack, type Vars, formatStack, formatVars } from './value.js';

/**
 * Hard syntax error: unknown character, missing operand, duplicate label
 */
export class RekordSyntaxError extends Error {
  constructor(
    public readonly reason: string,
    public readonly text: string,
    public readonly offset: number
  ) {
    super(`${reason} (offset=${offset})`);
    this.name = 'RekordSyntaxError';
  }
}

/**
 * Unterminated closure body; more input may still complete the program
 */
export class IncompleteSyntaxError extends RekordSyntaxError {
  constructor(reason: string, text: string, offset: number) {
    super(reason, text, offset);
    this.name = 'IncompleteSyntaxError';
  }
}

/**
 * Runtime fault raised by the execution engine or a closure call
 */
export class RunError extends Error {
  constructor(
    message: string,
    public readonly code: Code,
    public readonly vars: Vars,
    public readonly stack: Stack,
    public readonly position: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RunError';
  }

  /** Source offset of the failing instruction within `code.text` */
  get textOffset(): number {
    return this.code.textOffset(this.position);
  }
}

/**
 * Thrown by a step-limit tracer when a run exceeds its budget
 */
export class StepLimitError extends Error {
  constructor(public readonly maxSteps: number) {
    super(`Exceeded step limit: ${maxSteps}`);
    this.name = 'StepLimitError';
  }
}

/**
 * Render the source line containing `offset` with a caret under it
 */
export function pointAt(text: string, offset: number): string[] {
  const lineStart = offset > 0 ? text.lastIndexOf('\n', offset - 1) + 1 : 0;
  const newline = text.indexOf('\n', offset);
  const lineEnd = newline === -1 ? text.length : newline;
  const line = text.slice(lineStart, lineEnd);
  return [`  ${line}`, `  ${' '.repeat(offset - lineStart)}^`];
}

/**
 * Multi-line description of a syntax or runtime error
 *
 * Runtime errors list the stack and variables of the failing frame and
 * then follow nested closure failures through `cause`.
 */
export function formatDiagnostic(error: unknown): string {
  if (error instanceof RekordSyntaxError) {
    return [`${error.name}: ${error.reason} at offset ${error.offset}`, ...pointAt(error.text, error.offset)].join('\n');
  }

  if (error instanceof RunError) {
    const lines: string[] = [];
    let current: unknown = error;
    let first = true;
    while (current instanceof RunError) {
      const offset = current.textOffset;
      lines.push(`${first ? '' : 'caused by: '}${current.name}: ${current.message} at offset ${offset}`);
      lines.push(...pointAt(current.code.text, offset));
      lines.push(`  stack: ${formatStack(current.stack)}`);
      lines.push(`  vars: ${formatVars(current.vars)}`);
      current = current.cause;
      first = false;
    }
    return lines.join('\n');
  }

  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
