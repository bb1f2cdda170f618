/**
 * Element — Anything that evaluates to a signal (or a tuple of signals)
 * from zero or more input elements.
 *
 * Inputs are plain shared references: one Vcc may feed any number of gates.
 * Nothing is cached; every evaluate() walks the whole input subtree again.
 */

import { ConstructionError } from './errors';
import { enterFrame } from './frame';
import type { Arity, ElementKind, Output, Signal } from './types';

/** No inputs */
export const NONE: Arity = { min: 0, max: 0 };

/** One or more inputs */
export const VARIADIC: Arity = { min: 1, max: Infinity };

/** Exactly n inputs */
export const exactly = (n: number): Arity => ({ min: n, max: n });

/**
 * Base class for every element.
 *
 * TOut is what evaluate() returns; TIn is what each input produces.
 */
export abstract class Element<TOut extends Output = Signal, TIn extends Output = Output> {
  readonly kind: ElementKind;
  protected _inputs: readonly Element<TIn>[];
  private _label: string | null = null;

  protected constructor(kind: ElementKind, inputs: readonly Element<TIn>[], arity: Arity) {
    this.kind = kind;
    this._inputs = validateInputs(kind, inputs, arity);
  }

  /** Ordered input references */
  get inputs(): readonly Element<TIn>[] {
    return this._inputs;
  }

  get label(): string | null {
    return this._label;
  }

  /** Attach a label used in error messages */
  named(label: string): this {
    this._label = label;
    return this;
  }

  /** Recompute this element's output from the current state of its inputs */
  evaluate(): TOut {
    return enterFrame(this, () => this.compute());
  }

  protected abstract compute(): TOut;

  toString(): string {
    return this._label === null ? this.kind : `${this.kind} "${this._label}"`;
  }
}

/** Check input count and presence; returns a frozen copy of the list */
export function validateInputs<TIn extends Output>(
  kind: ElementKind,
  inputs: readonly Element<TIn>[],
  arity: Arity
): readonly Element<TIn>[] {
  if (!Array.isArray(inputs)) {
    throw new ConstructionError('missing-input', kind, 'expected an array of inputs');
  }
  if (inputs.length < arity.min || inputs.length > arity.max) {
    throw new ConstructionError('arity', kind, `expected ${describeArity(arity)}, got ${inputs.length}`);
  }
  inputs.forEach((input, i) => {
    if (!(input instanceof Element)) {
      throw new ConstructionError('missing-input', kind, `input ${i} is not an element`);
    }
  });
  return Object.freeze([...inputs]);
}

function describeArity({ min, max }: Arity): string {
  const plural = (n: number) => (n === 1 ? 'input' : 'inputs');
  if (min === max) return `exactly ${min} ${plural(min)}`;
  if (max === Infinity) return `at least ${min} ${plural(min)}`;
  return `${min} to ${max} inputs`;
}
