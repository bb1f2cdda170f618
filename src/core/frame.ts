/**
 * Frame — The stack of elements currently being evaluated.
 *
 * Evaluation is a plain synchronous recursion, so a single module-level
 * stack is enough to see a loop in the wiring or an overly deep chain
 * before the JS engine's own stack overflows.
 */

import { MAX_EVALUATION_DEPTH } from '../config';
import { EvaluationError } from './errors';

/** Anything that can sit on the evaluation stack (described by toString) */
export interface Frame {
  toString(): string;
}

const stack: Frame[] = [];
const active = new Set<Frame>();

/** Run compute() with element pushed on the evaluation stack */
export function enterFrame<T>(element: Frame, compute: () => T): T {
  if (active.has(element)) {
    const loop = [...stack.slice(stack.indexOf(element)), element];
    throw new EvaluationError(
      'cycle',
      String(element),
      `cycle detected (${loop.map(String).join(' -> ')})`
    );
  }
  if (stack.length >= MAX_EVALUATION_DEPTH) {
    throw new EvaluationError(
      'depth',
      String(element),
      `evaluation depth exceeded ${MAX_EVALUATION_DEPTH}`
    );
  }

  stack.push(element);
  active.add(element);
  try {
    return compute();
  } finally {
    stack.pop();
    active.delete(element);
  }
}

/** Is element somewhere on the current evaluation stack? */
export function isEvaluating(element: Frame): boolean {
  return active.has(element);
}

/** Current nesting depth (0 outside of any evaluate() call) */
export function evaluationDepth(): number {
  return stack.length;
}
