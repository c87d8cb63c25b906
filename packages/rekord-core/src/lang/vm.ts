/**
 * Execution engine
 *
 * Runs a Code against one frame: a variable environment and a value
 * stack, both owned exclusively by this run. The loop stops when the
 * position reaches the end of the stream; any fault aborts the run with a
 * RunError.
 */

import type { Code } from './compiler.js';
import { type Insn, insnMnemonic } from './insn.js';
import { type Stack, type Value, type Vars, RecordObj, valuesEqual } from './value.js';
import { ClosureObj } from './closure.js';
import { RunError } from './errors.js';
import { type ExecuteOptions, type Tracer, consoleTracer } from './trace.js';

export interface ExecuteResult {
  vars: Vars;
  stack: Stack;
  position: number;
}

/**
 * One execution frame
 */
export class VM {
  /** Index of the next instruction */
  public position: number;

  private tracer: Tracer | null;

  constructor(
    public readonly code: Code,
    public readonly vars: Vars = new Map(),
    public readonly stack: Stack = [],
    position: number = 0,
    private readonly options: ExecuteOptions = {}
  ) {
    this.position = position;
    this.tracer = options.trace ? (options.tracer ?? consoleTracer) : null;
  }

  push(value: Value): void {
    this.stack.push(value);
  }

  pop(): Value {
    const value = this.stack.pop();
    if (value === undefined) {
      throw new Error('Stack underflow');
    }
    return value;
  }

  popRecord(): RecordObj {
    const value = this.pop();
    if (value.kind !== 'record') {
      throw new Error('Expected a record, got a closure');
    }
    return value;
  }

  popClosure(): ClosureObj {
    const value = this.pop();
    if (value.kind !== 'closure') {
      throw new Error('Expected a closure, got a record');
    }
    return value;
  }

  lookup(name: string): Value {
    const value = this.vars.get(name);
    if (value === undefined) {
      throw new Error(`Unbound variable: '${name}'`);
    }
    return value;
  }

  /**
   * Run until the end of the instruction stream
   */
  run(): ExecuteResult {
    const length = this.code.length;

    while (this.position < length) {
      const start = this.position;
      const insn = this.code.instructions[start];
      try {
        this.emitTrace('step', insnMnemonic(insn));
        this.position = this.step(insn, start);
      } catch (error) {
        throw new RunError(
          error instanceof Error ? error.message : String(error),
          this.code,
          this.vars,
          this.stack,
          start,
          { cause: error }
        );
      }
    }

    this.emitTrace('return');
    return { vars: this.vars, stack: this.stack, position: this.position };
  }

  /**
   * Execute one instruction and return the next position
   */
  private step(insn: Insn, position: number): number {
    const next = position + 1;

    switch (insn.kind) {
      case 'push-record':
        this.push(new RecordObj());
        return next;

      case 'pop':
        this.pop();
        return next;

      case 'jump': {
        const target = this.code.labels.get(insn.label);
        if (target === undefined) {
          throw new Error(`Unknown label: '${insn.label}'`);
        }
        return target;
      }

      case 'skip-if-not-equal': {
        const x = this.pop();
        const y = this.pop();
        return valuesEqual(x, y) ? next : this.skip(next);
      }

      case 'skip-if-equal': {
        const x = this.pop();
        const y = this.pop();
        return valuesEqual(x, y) ? this.skip(next) : next;
      }

      case 'field-read': {
        const record = this.popRecord();
        const value = record.get(insn.name);
        if (value === undefined) {
          throw new Error(`Missing field: '${insn.name}'`);
        }
        this.push(value);
        return next;
      }

      case 'bind':
        this.vars.set(insn.name, this.pop());
        return next;

      case 'field-write': {
        const record = this.popRecord();
        const value = this.pop();
        record.set(insn.name, value);
        return next;
      }

      case 'make-closure': {
        const child = this.code.children[insn.child];
        if (child === undefined) {
          throw new Error(`Unknown closure body: ${insn.child}`);
        }
        const captured: Vars = new Map();
        for (const name of child.freeVars) {
          captured.set(name, this.lookup(name));
        }
        this.push(new ClosureObj(child, captured, [], 0));
        return next;
      }

      case 'apply': {
        const arg = this.pop();
        const closure = this.popClosure();
        this.push(closure.call(arg, this.options));
        return next;
      }

      case 'name':
        this.push(this.lookup(insn.name));
        return next;

      default:
        return assertUnknown(insn);
    }
  }

  /** Skip the instruction at `next`, never moving past the end */
  private skip(next: number): number {
    return Math.min(next + 1, this.code.length);
  }

  private emitTrace(kind: 'step' | 'return', insn?: string): void {
    if (!this.tracer) return;
    this.tracer({
      kind,
      position: this.position,
      depth: this.stack.length,
      vars: Array.from(this.vars.keys()),
      insn,
    });
  }
}

function assertUnknown(insn: never): never {
  throw new Error(`Unknown instruction: ${JSON.stringify(insn)}`);
}

/**
 * Run `code` from `position` against the given frame
 *
 * `vars` and `stack` are updated in place and returned.
 */
export function execute(
  code: Code,
  vars: Vars = new Map(),
  stack: Stack = [],
  position: number = 0,
  options: ExecuteOptions = {}
): ExecuteResult {
  return new VM(code, vars, stack, position, options).run();
}
