/**
 * Errors raised while wiring or evaluating a circuit.
 *
 * Both carry a machine-readable reason and the description of the element
 * that failed, e.g. `And "carry"`.
 */

import type { ConstructionFailure, EvaluationFailure } from './types';

export class ConstructionError extends Error {
  readonly reason: ConstructionFailure;
  readonly element: string;

  constructor(reason: ConstructionFailure, element: string, detail: string) {
    super(`${element}: ${detail}`);
    this.name = 'ConstructionError';
    this.reason = reason;
    this.element = element;
  }
}

export class EvaluationError extends Error {
  readonly reason: EvaluationFailure;
  readonly element: string;

  constructor(reason: EvaluationFailure, element: string, detail: string) {
    super(`${element}: ${detail}`);
    this.name = 'EvaluationError';
    this.reason = reason;
    this.element = element;
  }
}

/** True for the two error kinds this library raises */
export function isCircuitError(e: unknown): e is ConstructionError | EvaluationError {
  return e instanceof ConstructionError || e instanceof EvaluationError;
}
