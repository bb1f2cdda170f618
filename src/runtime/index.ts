/**
 * Runtime — Helpers for building and driving circuits.
 *
 * This module handles:
 * - Standard prelude (factory helpers)
 * - Evaluation with errors reported as values
 * - Truth-table enumeration
 */

export { tryEvaluate, evaluateWithFallback } from './evaluator';
export type { EvalResult } from './evaluator';

export { truthTable, toBits } from './truth-table';

export {
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
} from './prelude';
