/**
 * Rekord Core - compiler and virtual machine for the Rekord language
 *
 * This is the core library containing:
 * - Compiler (source text to Code)
 * - Instruction set
 * - Execution engine and closures
 * - Values (records, closures) with structural equality
 * - Errors, diagnostics and tracing
 */

export { compile, Compiler, Code, isNameChar } from './lang/compiler.js';
export { execute, VM, type ExecuteResult } from './lang/vm.js';
export { ClosureObj } from './lang/closure.js';
export {
  RecordObj,
  makeRecord,
  valuesEqual,
  formatValue,
  formatVars,
  formatStack,
  type Value,
  type Vars,
  type Stack,
} from './lang/value.js';
export { type Insn, type InsnKind, insnMnemonic } from './lang/insn.js';
export {
  RekordSyntaxError,
  IncompleteSyntaxError,
  RunError,
  StepLimitError,
  formatDiagnostic,
  pointAt,
} from './lang/errors.js';
export {
  consoleTracer,
  collectingTracer,
  stepLimitTracer,
  formatTraceEvent,
  type TraceEvent,
  type Tracer,
  type ExecuteOptions,
} from './lang/trace.js';
