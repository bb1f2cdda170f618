/**
 * Core — Pure logic primitives for gatework.
 *
 * Elements, gates and composite circuits, plus the evaluation stack that
 * guards them. No I/O, no timers — just recursive evaluation.
 */

export { Element, validateInputs, exactly, NONE, VARIADIC } from './element';
export { Vcc, Ground, VCC, GROUND } from './sources';
export { Inverter, And, Or, Xor, Nand } from './gates';
export { HalfAdder, FullAdder, Multiplexer2, Multiplexer4 } from './circuits';
export { Switch } from './switch';
export { Wire } from './wire';
export { ConstructionError, EvaluationError, isCircuitError } from './errors';
export { isEvaluating, evaluationDepth } from './frame';
export type { Frame } from './frame';

export type {
  Signal,
  Output,
  AdderOutput,
  ElementKind,
  Arity,
  ConstructionFailure,
  EvaluationFailure,
  TruthRow,
} from './types';
