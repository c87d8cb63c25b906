/**
 * Interactive session
 *
 * Holds the variables and stack that persist between inputs, buffers
 * input while a closure body is still open, and answers the `%` commands.
 * The session only returns text; reading and printing is left to the
 * caller.
 */

import {
  compile,
  execute,
  formatDiagnostic,
  formatValue,
  IncompleteSyntaxError,
  stepLimitTracer,
  consoleTracer,
  type ExecuteOptions,
  type ExecuteResult,
  type Stack,
  type Tracer,
  type Vars,
} from 'rekord-core';

export type FeedStatus = 'ready' | 'continue' | 'exit';

export interface FeedResult {
  output: string[];
  status: FeedStatus;
}

export interface SessionOptions {
  debug?: boolean;
  /** bound every run to this many instructions */
  maxSteps?: number;
  /** sink for trace events while debug mode is on */
  tracer?: Tracer;
}

export const SPECIAL_COMMANDS = "Special commands: '%exit' '%info' '%debug' '%reset' '%help'";

export class Session {
  public vars: Vars = new Map();
  public stack: Stack = [];
  public debug: boolean;

  private pending: string = '';
  private readonly maxSteps: number | undefined;
  private readonly tracer: Tracer;

  constructor(options: SessionOptions = {}) {
    this.debug = options.debug ?? false;
    this.maxSteps = options.maxSteps;
    this.tracer = options.tracer ?? consoleTracer;
  }

  get prompt(): string {
    return this.pending ? '- ' : '> ';
  }

  get isPending(): boolean {
    return this.pending !== '';
  }

  private get idleStatus(): FeedStatus {
    return this.pending ? 'continue' : 'ready';
  }

  /**
   * Handle one line of input
   */
  feed(line: string): FeedResult {
    if (line.trim() === '') {
      return { output: [], status: this.idleStatus };
    }
    // commands leave any pending input in place
    if (line.startsWith('%')) {
      return this.command(line.trim());
    }

    const text = this.pending + line;
    this.pending = '';

    try {
      const result = this.run(text, new Map(this.vars), [...this.stack]);
      this.vars = result.vars;
      this.stack = result.stack;
      return { output: [], status: 'ready' };
    } catch (error) {
      if (error instanceof IncompleteSyntaxError) {
        this.pending = error.text + '\n';
        return { output: [], status: 'continue' };
      }
      return { output: [formatDiagnostic(error)], status: 'ready' };
    }
  }

  /**
   * Compile and run a complete program against the session state
   *
   * Unlike `feed`, errors are thrown to the caller.
   */
  runSource(text: string): ExecuteResult {
    const result = this.run(text, this.vars, this.stack);
    this.vars = result.vars;
    this.stack = result.stack;
    return result;
  }

  /**
   * Render the session state the way `%info` shows it; the stack is
   * listed from the top
   */
  info(): string[] {
    const lines = ['Vars:'];
    for (const [name, value] of this.vars) {
      lines.push(` ${name}: ${formatValue(value)}`);
    }
    lines.push('Stack:');
    const top = this.stack.length - 1;
    for (let i = top; i >= 0; i--) {
      lines.push(` ${top - i}: ${formatValue(this.stack[i])}`);
    }
    return lines;
  }

  reset(): void {
    this.vars = new Map();
    this.stack = [];
    this.pending = '';
  }

  private run(text: string, vars: Vars, stack: Stack): ExecuteResult {
    const code = compile(text);
    return execute(code, vars, stack, 0, this.executeOptions());
  }

  private executeOptions(): ExecuteOptions {
    if (this.maxSteps === undefined) {
      return { trace: this.debug, tracer: this.tracer };
    }
    return {
      trace: true,
      tracer: stepLimitTracer(this.maxSteps, this.debug ? this.tracer : undefined),
    };
  }

  private command(text: string): FeedResult {
    switch (text) {
      case '%exit':
      case '%e':
        return { output: [], status: 'exit' };

      case '%debug':
      case '%d':
        this.debug = !this.debug;
        return { output: [`Debug mode: ${this.debug ? 'ON' : 'OFF'}`], status: this.idleStatus };

      case '%info':
      case '%i':
        return { output: this.info(), status: this.idleStatus };

      case '%reset':
      case '%r':
        this.reset();
        return { output: ['Session reset'], status: 'ready' };

      case '%help':
      case '%h':
        return { output: [SPECIAL_COMMANDS], status: this.idleStatus };

      default:
        return { output: [`Unknown special command: ${text}`, SPECIAL_COMMANDS], status: this.idleStatus };
    }
  }
}
