/**
 * Evaluator — Evaluate a circuit and report failure as a value.
 */

import { LOG_PREFIX } from '../config';
import { isCircuitError } from '../core/errors';
import type { ConstructionError, EvaluationError } from '../core/errors';
import type { Element } from '../core/element';
import type { Output } from '../core/types';

export interface EvalResult<TOut extends Output> {
  success: boolean;
  error?: ConstructionError | EvaluationError;
  value?: TOut;
}

/**
 * Evaluate element, catching the library's own errors.
 * Anything else (a bug, a stack overflow) still propagates.
 */
export function tryEvaluate<TOut extends Output>(element: Element<TOut, Output>): EvalResult<TOut> {
  try {
    return { success: true, value: element.evaluate() };
  } catch (e) {
    if (!isCircuitError(e)) throw e;

    console.warn(`${LOG_PREFIX} ${String(element)} failed to evaluate: ${e.message}`);
    return { success: false, error: e };
  }
}

/**
 * Evaluate element and fall back to another circuit on error.
 * The original error is kept; the value comes from the fallback.
 */
export function evaluateWithFallback<TOut extends Output>(
  element: Element<TOut, Output>,
  fallback: Element<TOut, Output>
): { result: EvalResult<TOut>; usedFallback: boolean } {
  const result = tryEvaluate(element);

  if (result.success) {
    return { result, usedFallback: false };
  }

  const fallbackResult = tryEvaluate(fallback);

  return {
    result: { ...result, value: fallbackResult.value },
    usedFallback: true,
  };
}
