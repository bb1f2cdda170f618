/**
 * gatework — Combinational logic from composable, demand-evaluated elements
 *
 * Main entry point. Exports all public API.
 */

// Core elements, errors and evaluation state
export {
  Element,
  validateInputs,
  exactly,
  NONE,
  VARIADIC,
  Vcc,
  Ground,
  VCC,
  GROUND,
  Inverter,
  And,
  Or,
  Xor,
  Nand,
  HalfAdder,
  FullAdder,
  Multiplexer2,
  Multiplexer4,
  Switch,
  Wire,
  ConstructionError,
  EvaluationError,
  isCircuitError,
  isEvaluating,
  evaluationDepth,
} from './core';

// Runtime and standard prelude
export {
  tryEvaluate,
  evaluateWithFallback,
  truthTable,
  toBits,
  vcc,
  ground,
  lit,
  not,
  and,
  or,
  xor,
  nand,
  halfAdder,
  fullAdder,
  mux,
  mux4,
  toggle,
  wire,
} from './runtime';

// Configuration
export {
  MAX_EVALUATION_DEPTH,
  MAX_TRUTH_TABLE_INPUTS,
  LOG_PREFIX,
} from './config';

// Re-export types
export type { EvalResult } from './runtime';
export type {
  Frame,
  Signal,
  Output,
  AdderOutput,
  ElementKind,
  Arity,
  ConstructionFailure,
  EvaluationFailure,
  TruthRow,
} from './core';
