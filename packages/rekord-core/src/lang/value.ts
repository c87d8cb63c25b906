/**
 * Value system
 *
 * The language has exactly two kinds of value: mutable records and
 * closures. Records are shared by reference, so a field write is visible
 * through every variable, stack slot or field that holds the record.
 */

import type { ClosureObj } from './closure.js';

export type Value = RecordObj | ClosureObj;

/** Variable environment of one execution frame */
export type Vars = Map<string, Value>;

/** Value stack of one execution frame (top is the last element) */
export type Stack = Value[];

/**
 * Record - mutable mapping from field name to value
 *
 * Fields may hold the record itself or closures over it, so records can
 * form cycles.
 */
export class RecordObj {
  readonly kind = 'record' as const;

  constructor(public readonly fields: Map<string, Value> = new Map()) {}

  get(name: string): Value | undefined {
    return this.fields.get(name);
  }

  set(name: string, value: Value): void {
    this.fields.set(name, value);
  }

  has(name: string): boolean {
    return this.fields.has(name);
  }
}

export function makeRecord(fields?: Iterable<[string, Value]>): RecordObj {
  return new RecordObj(new Map(fields));
}

/**
 * Equality used by the skip instructions
 *
 * Records compare structurally. A pair of records that is already being
 * compared further up is assumed equal, which makes cyclic records
 * terminate. Closures are only equal to themselves.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  return equalWith(a, b, new Map());
}

function equalWith(a: Value, b: Value, inProgress: Map<RecordObj, Set<RecordObj>>): boolean {
  if (a === b) return true;

  if (a.kind !== 'record' || b.kind !== 'record') {
    return false;
  }

  let seen = inProgress.get(a);
  if (seen?.has(b)) return true;
  if (!seen) {
    seen = new Set();
    inProgress.set(a, seen);
  }

  if (a.fields.size !== b.fields.size) return false;

  seen.add(b);
  for (const [name, value] of a.fields) {
    const other = b.fields.get(name);
    if (other === undefined || !equalWith(value, other, inProgress)) {
      return false;
    }
  }
  return true;
}

/**
 * Render a value for the REPL and for diagnostics
 *
 * Records print their fields in insertion order; a record that is already
 * being printed shows as {...}.
 */
export function formatValue(value: Value): string {
  return formatWith(value, new Set());
}

function formatWith(value: Value, active: Set<RecordObj>): string {
  switch (value.kind) {
    case 'closure': {
      const base = `[${value.code.text}]`;
      if (value.stack.length === 0 && value.position === 0) {
        return base;
      }
      return `${base} (stack: ${value.stack.length}, pos: ${value.position})`;
    }
    case 'record': {
      if (active.has(value)) return '{...}';
      if (value.fields.size === 0) return '{}';
      active.add(value);
      const parts: string[] = [];
      for (const [name, field] of value.fields) {
        parts.push(`${name}: ${formatWith(field, active)}`);
      }
      active.delete(value);
      return `{${parts.join(', ')}}`;
    }
  }
}

/**
 * Render a variable environment as `{name: value, ...}`
 */
export function formatVars(vars: Vars): string {
  const parts: string[] = [];
  for (const [name, value] of vars) {
    parts.push(`${name}: ${formatValue(value)}`);
  }
  return `{${parts.join(', ')}}`;
}

/**
 * Render a stack bottom-first as `[a, b, ...]`
 */
export function formatStack(stack: Stack): string {
  return `[${stack.map(formatValue).join(', ')}]`;
}
