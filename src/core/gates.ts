/**
 * Gates — Boolean reductions over evaluated inputs.
 *
 * Every input is evaluated on every call (no short-circuit), so a broken
 * subtree is reported whatever its siblings evaluate to.
 */

import { Element, VARIADIC, exactly } from './element';
import type { Signal } from './types';

export class Inverter extends Element<Signal, Signal> {
  constructor(inputs: readonly [Element]) {
    super('Inverter', inputs, exactly(1));
  }

  protected compute(): Signal {
    return !this._inputs[0].evaluate();
  }
}

/** True iff every input is true */
export class And extends Element<Signal, Signal> {
  constructor(inputs: readonly Element[]) {
    super('And', inputs, VARIADIC);
  }

  protected compute(): Signal {
    return this._inputs.map((input) => input.evaluate()).every((v) => v);
  }
}

/** True iff at least one input is true */
export class Or extends Element<Signal, Signal> {
  constructor(inputs: readonly Element[]) {
    super('Or', inputs, VARIADIC);
  }

  protected compute(): Signal {
    return this._inputs.map((input) => input.evaluate()).some((v) => v);
  }
}

/**
 * True iff exactly one input is true.
 *
 * This is the one-hot reading for N > 2, not parity: Xor(1, 1, 1) is false.
 */
export class Xor extends Element<Signal, Signal> {
  constructor(inputs: readonly Element[]) {
    super('Xor', inputs, VARIADIC);
  }

  protected compute(): Signal {
    return this._inputs.filter((input) => input.evaluate()).length === 1;
  }
}

/** Negated And over the same two inputs */
export class Nand extends Element<Signal, Signal> {
  private readonly and: And;

  constructor(inputs: readonly [Element, Element]) {
    super('Nand', inputs, exactly(2));
    this.and = new And(this._inputs);
  }

  protected compute(): Signal {
    return !this.and.evaluate();
  }
}
