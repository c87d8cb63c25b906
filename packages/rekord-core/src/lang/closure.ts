/**
 * Closure - a compiled body plus a private snapshot of its free variables
 *
 * Each call starts from the captured snapshot, so a closure's own bindings
 * and stack never change between calls. Records it reaches may still be
 * mutated; they are shared by reference.
 */

import { type Code, compile } from './compiler.js';
import type { Stack, Value, Vars } from './value.js';
import { RunError } from './errors.js';
import type { ExecuteOptions } from './trace.js';
import { execute } from './vm.js';

export class ClosureObj {
  readonly kind = 'closure' as const;

  constructor(
    public readonly code: Code,
    public readonly vars: Vars,
    public readonly stack: Stack = [],
    public readonly position: number = 0
  ) {}

  /**
   * Compile `text` and wrap it as a closure with the given frame
   */
  static fromSource(text: string, vars: Vars = new Map(), stack: Stack = [], position: number = 0): ClosureObj {
    return new ClosureObj(compile(text), vars, stack, position);
  }

  /**
   * Call with one argument; the body must leave exactly one value
   */
  call(arg: Value, options: ExecuteOptions = {}): Value {
    const result = execute(this.code, new Map(this.vars), [...this.stack, arg], this.position, options);
    if (result.stack.length !== 1) {
      throw new RunError(
        `On closure return, stack size should be 1, but was: ${result.stack.length}`,
        this.code,
        result.vars,
        result.stack,
        result.position
      );
    }
    return result.stack[0];
  }

  toString(): string {
    return `[${this.code.text}]`;
  }
}
