/**
 * Instruction set
 *
 * The compiler lowers source text into a flat list of these instructions.
 * Operands (a one-character name or a child index) are carried inline, so a
 * position is simply an index into the list.
 */

/** push a new, empty record (`*`) */
export interface PushRecordInsn {
  kind: 'push-record';
}

/** pop and discard the top value (`^`) */
export interface PopInsn {
  kind: 'pop';
}

/** unconditional transfer to a label (`@N`) */
export interface JumpInsn {
  kind: 'jump';
  label: string;
}

/** pop x then y; skip the next instruction if they differ (`?`) */
export interface SkipIfNotEqualInsn {
  kind: 'skip-if-not-equal';
}

/** pop x then y; skip the next instruction if they are equal (`/`) */
export interface SkipIfEqualInsn {
  kind: 'skip-if-equal';
}

/** pop a record and push one of its fields (`.N`) */
export interface FieldReadInsn {
  kind: 'field-read';
  name: string;
}

/** pop a value into a variable (`=N`) */
export interface BindInsn {
  kind: 'bind';
  name: string;
}

/** pop the target record, then the value, and store the field (`=.N`) */
export interface FieldWriteInsn {
  kind: 'field-write';
  name: string;
}

/** capture the free variables of a child body and push a closure (`[...]`) */
export interface MakeClosureInsn {
  kind: 'make-closure';
  child: number;
}

/** pop the argument, then the closure, and push the call's result (`!`) */
export interface ApplyInsn {
  kind: 'apply';
}

/** push the value bound to a variable */
export interface NameInsn {
  kind: 'name';
  name: string;
}

export type Insn =
  | PushRecordInsn
  | PopInsn
  | JumpInsn
  | SkipIfNotEqualInsn
  | SkipIfEqualInsn
  | FieldReadInsn
  | BindInsn
  | FieldWriteInsn
  | MakeClosureInsn
  | ApplyInsn
  | NameInsn;

export type InsnKind = Insn['kind'];

/**
 * Single-character opcodes that take no operand
 */
export const SIMPLE_OPCODES: ReadonlyMap<string, Insn> = new Map<string, Insn>([
  ['*', { kind: 'push-record' }],
  ['^', { kind: 'pop' }],
  ['?', { kind: 'skip-if-not-equal' }],
  ['/', { kind: 'skip-if-equal' }],
  ['!', { kind: 'apply' }],
]);

/**
 * Render an instruction the way it is written in source, used by traces
 * and listings. Closure bodies show as `[#index]`.
 */
export function insnMnemonic(insn: Insn): string {
  switch (insn.kind) {
    case 'push-record':
      return '*';
    case 'pop':
      return '^';
    case 'skip-if-not-equal':
      return '?';
    case 'skip-if-equal':
      return '/';
    case 'apply':
      return '!';
    case 'jump':
      return `@${insn.label}`;
    case 'field-read':
      return `.${insn.name}`;
    case 'bind':
      return `=${insn.name}`;
    case 'field-write':
      return `=.${insn.name}`;
    case 'make-closure':
      return `[#${insn.child}]`;
    case 'name':
      return insn.name;
  }
}
