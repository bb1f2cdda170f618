/**
 * Circuits — Composite elements wired purely from smaller gates.
 *
 * Each composite builds its inner gates once at construction and evaluates
 * them afresh on every call. Nothing here reduces booleans directly.
 */

import { Element, exactly, validateInputs } from './element';
import { And, Inverter, Or, Xor } from './gates';
import type { AdderOutput, Signal } from './types';

/**
 * Adds two bits: (sum, carry) = (i0 xor i1, i0 and i1).
 *
 * sum and carry are the inner gates themselves, so either can feed another
 * element without evaluating the other.
 */
export class HalfAdder extends Element<AdderOutput, Signal> {
  readonly sum: Xor;
  readonly carry: And;

  constructor(i0: Element, i1: Element) {
    super('HalfAdder', [i0, i1], exactly(2));
    this.sum = new Xor(this._inputs).named('sum');
    this.carry = new And(this._inputs).named('carry');
  }

  protected compute(): AdderOutput {
    return [this.sum.evaluate(), this.carry.evaluate()];
  }
}

/**
 * Adds two bits and a carry-in from two chained half adders.
 *
 * The low half adds i0 and i1; the high half adds the carry-in to that sum.
 * Either half can carry, never both.
 */
export class FullAdder extends Element<AdderOutput, Signal> {
  readonly sum: Xor;
  readonly carry: Or;

  constructor(carryIn: Element, i0: Element, i1: Element) {
    super('FullAdder', [carryIn, i0, i1], exactly(3));
    const [cin, a, b] = this._inputs;
    const low = new HalfAdder(a, b);
    const high = new HalfAdder(cin, low.sum);
    this.sum = high.sum;
    this.carry = new Or([low.carry, high.carry]).named('carry');
  }

  protected compute(): AdderOutput {
    return [this.sum.evaluate(), this.carry.evaluate()];
  }
}

/** Picks i1 when select is high, i0 when it is low */
export class Multiplexer2 extends Element<Signal, Signal> {
  private readonly out: Or;

  constructor(select: Element, i0: Element, i1: Element) {
    super('Multiplexer2', [select, i0, i1], exactly(3));
    const [sel, a, b] = this._inputs;
    this.out = new Or([
      new And([sel, b]),
      new And([new Inverter([sel]), a]),
    ]);
  }

  protected compute(): Signal {
    return this.out.evaluate();
  }
}

/**
 * Picks inputs[2 * s1 + s0] using three two-way multiplexers.
 *
 * Inputs are listed as [s0, s1, i0, i1, i2, i3].
 */
export class Multiplexer4 extends Element<Signal, Signal> {
  private readonly out: Multiplexer2;

  constructor(selects: readonly [Element, Element], inputs: readonly [Element, Element, Element, Element]) {
    super(
      'Multiplexer4',
      [
        ...validateInputs('Multiplexer4', selects, exactly(2)),
        ...validateInputs('Multiplexer4', inputs, exactly(4)),
      ],
      exactly(6)
    );
    const [s0, s1, i0, i1, i2, i3] = this._inputs;
    const lo = new Multiplexer2(s0, i0, i1);
    const hi = new Multiplexer2(s0, i2, i3);
    this.out = new Multiplexer2(s1, lo, hi);
  }

  protected compute(): Signal {
    return this.out.evaluate();
  }
}
