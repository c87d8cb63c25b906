/**
 * Compiler - source text to Code
 *
 * A single left-to-right scan. Every identifier character is an
 * instruction of its own; `.`, `@`, `:`, `=` and `=.` take exactly one
 * identifier character as operand; `[...]` bodies are compiled
 * recursively into child Codes.
 */

import { type Insn, SIMPLE_OPCODES, insnMnemonic } from './insn.js';
import { IncompleteSyntaxError, RekordSyntaxError } from './errors.js';

/** Characters that only exist for visual grouping */
const NO_OP_CHARS = new Set([' ', '\n', '(', ')', '{', '}', ';']);

const NAME_CHAR = /^[A-Za-z0-9_]$/;

export function isNameChar(c: string): boolean {
  return NAME_CHAR.test(c);
}

/**
 * Compiled program: instructions, labels, closure bodies and the map back
 * to source offsets. Never mutated after construction.
 */
export class Code {
  private assigned: ReadonlySet<string> | null = null;
  private free: ReadonlySet<string> | null = null;

  constructor(
    public readonly text: string,
    public readonly instructions: readonly Insn[],
    public readonly labels: ReadonlyMap<string, number>,
    public readonly children: readonly Code[],
    public readonly offsets: readonly number[]
  ) {}

  get length(): number {
    return this.instructions.length;
  }

  /**
   * Source offset of the instruction at `position`; the end of the text
   * for positions at or past the end of the stream.
   */
  textOffset(position: number): number {
    if (position >= this.instructions.length || position < 0) {
      return this.text.length;
    }
    return this.offsets[position];
  }

  /**
   * Names this Code assigns with bind or field-write
   */
  get assignedVars(): ReadonlySet<string> {
    if (this.assigned === null) {
      const names = new Set<string>();
      for (const insn of this.instructions) {
        if (insn.kind === 'bind' || insn.kind === 'field-write') {
          names.add(insn.name);
        }
      }
      this.assigned = names;
    }
    return this.assigned;
  }

  /**
   * Names read here or by a nested body that this Code does not assign
   * itself. These are what a closure over this Code captures.
   */
  get freeVars(): ReadonlySet<string> {
    if (this.free === null) {
      const names = new Set<string>();
      for (const insn of this.instructions) {
        if (insn.kind === 'name') {
          names.add(insn.name);
        }
      }
      for (const child of this.children) {
        for (const name of child.freeVars) {
          names.add(name);
        }
      }
      for (const name of this.assignedVars) {
        names.delete(name);
      }
      this.free = names;
    }
    return this.free;
  }

  /**
   * Human-readable instruction listing, one line per instruction, with
   * labels and nested bodies
   */
  listing(indent: string = ''): string {
    const labelsAt = new Map<number, string[]>();
    for (const [name, index] of this.labels) {
      const names = labelsAt.get(index) ?? [];
      names.push(name);
      labelsAt.set(index, names);
    }

    const lines: string[] = [];
    for (let i = 0; i <= this.instructions.length; i++) {
      for (const name of labelsAt.get(i) ?? []) {
        lines.push(`${indent}:${name}`);
      }
      if (i === this.instructions.length) break;
      const insn = this.instructions[i];
      lines.push(`${indent}${String(i).padStart(4)}  ${insnMnemonic(insn)}`);
      if (insn.kind === 'make-closure') {
        lines.push(this.children[insn.child].listing(indent + '      '));
      }
    }
    return lines.join('\n');
  }

  toString(): string {
    return this.text;
  }
}

/**
 * Scanner over one body of source text
 *
 * Nested bodies are compiled by a fresh Compiler over a sub-range of the
 * same source, so syntax errors always report offsets into the outermost
 * text.
 */
export class Compiler {
  private pos: number;
  private instructions: Insn[] = [];
  private labels = new Map<string, number>();
  private children: Code[] = [];
  private offsets: number[] = [];

  constructor(
    private source: string,
    private start: number = 0,
    private end: number = source.length
  ) {
    this.pos = start;
  }

  compile(): Code {
    while (this.pos < this.end) {
      const begin = this.pos;
      const c = this.source[this.pos++];

      if (NO_OP_CHARS.has(c)) {
        continue;
      }

      if (c === '#') {
        this.skipComment();
        continue;
      }

      const simple = SIMPLE_OPCODES.get(c);
      if (simple) {
        this.emit(simple, begin);
        continue;
      }

      if (isNameChar(c)) {
        this.emit({ kind: 'name', name: c }, begin);
        continue;
      }

      switch (c) {
        case '.':
          this.emit({ kind: 'field-read', name: this.expectName("'.'") }, begin);
          break;
        case '@':
          this.emit({ kind: 'jump', label: this.expectName("'@'") }, begin);
          break;
        case ':':
          this.defineLabel();
          break;
        case '=':
          if (this.peek() === '.') {
            this.pos++;
            this.emit({ kind: 'field-write', name: this.expectName("'=.'") }, begin);
          } else {
            this.emit({ kind: 'bind', name: this.expectName("'='") }, begin);
          }
          break;
        case '[':
          this.compileChild(begin);
          break;
        default:
          throw this.error(`Unknown instruction: '${c}'`, begin);
      }
    }

    const code = new Code(
      this.source.slice(this.start, this.end),
      this.instructions,
      this.labels,
      this.children,
      this.offsets
    );

    if (process.env.DEBUG_COMPILE) {
      console.error(`[Compiler] ${JSON.stringify(code.text)}\n${code.listing()}`);
    }

    return code;
  }

  private emit(insn: Insn, begin: number): void {
    this.instructions.push(insn);
    this.offsets.push(begin - this.start);
  }

  private peek(): string | undefined {
    return this.pos < this.end ? this.source[this.pos] : undefined;
  }

  private skipComment(): void {
    while (this.pos < this.end && this.source[this.pos] !== '\n') {
      this.pos++;
    }
  }

  /**
   * Consume the single identifier character a prefix operator requires
   */
  private expectName(after: string): string {
    const c = this.peek();
    if (c === undefined || !isNameChar(c)) {
      const got = c === undefined ? 'end of input' : `'${c}'`;
      throw this.error(`Expected a name after ${after}, got: ${got}`, this.pos);
    }
    this.pos++;
    return c;
  }

  private defineLabel(): void {
    const at = this.pos;
    const name = this.expectName("':'");
    if (this.labels.has(name)) {
      throw this.error(`Duplicate label: '${name}'`, at);
    }
    this.labels.set(name, this.instructions.length);
  }

  /**
   * Find the matching `]` by depth counting and compile the body between
   */
  private compileChild(begin: number): void {
    const bodyStart = this.pos;
    let depth = 1;
    while (depth > 0) {
      if (this.pos >= this.end) {
        throw new IncompleteSyntaxError("Missing terminating ']'", this.source, this.end);
      }
      const c = this.source[this.pos++];
      if (c === '[') {
        depth++;
      } else if (c === ']') {
        depth--;
      }
    }

    const child = new Compiler(this.source, bodyStart, this.pos - 1).compile();
    this.emit({ kind: 'make-closure', child: this.children.length }, begin);
    this.children.push(child);
  }

  private error(message: string, offset: number): RekordSyntaxError {
    return new RekordSyntaxError(message, this.source, offset);
  }
}

/**
 * Compile source text into a Code
 */
export function compile(text: string): Code {
  return new Compiler(text).compile();
}
