/**
 * Core Types — Shared type definitions for gatework.
 *
 * This file contains interfaces and types used across multiple modules.
 * Keeping them separate prevents circular dependencies.
 */

// --- Signal Types ---

/** A single boolean value flowing between elements. No unknown state. */
export type Signal = boolean;

/** What an element produces: one signal, or an ordered tuple of them */
export type Output = Signal | readonly Signal[];

/** Adder result, always ordered (sum, carry) */
export type AdderOutput = readonly [sum: Signal, carry: Signal];

// --- Element Types ---

export type ElementKind =
  | 'Vcc'
  | 'Ground'
  | 'Inverter'
  | 'And'
  | 'Or'
  | 'Xor'
  | 'Nand'
  | 'HalfAdder'
  | 'FullAdder'
  | 'Multiplexer2'
  | 'Multiplexer4'
  | 'Switch'
  | 'Wire';

/** Accepted input count for an element kind (inclusive bounds) */
export interface Arity {
  min: number;
  max: number;
}

// --- Error Types ---

export type ConstructionFailure = 'arity' | 'missing-input' | 'already-connected';

export type EvaluationFailure = 'cycle' | 'depth' | 'unconnected';

// --- Truth Tables ---

/** One row of an enumerated truth table */
export interface TruthRow<TOut> {
  inputs: Signal[];
  output: TOut;
}
