/**
 * Wire — An input whose driver is attached after construction.
 *
 * This is the only way to leave an input undriven or to close a loop;
 * both are reported when the wire is evaluated.
 */

import { Element, NONE, exactly, validateInputs } from './element';
import { ConstructionError, EvaluationError } from './errors';
import type { Signal } from './types';

export class Wire extends Element<Signal, Signal> {
  constructor() {
    super('Wire', [], NONE);
  }

  get connected(): boolean {
    return this._inputs.length > 0;
  }

  /** Attach the driving element. A wire is driven at most once. */
  connect(source: Element): this {
    if (this.connected) {
      throw new ConstructionError('already-connected', String(this), 'already has a driver');
    }
    this._inputs = validateInputs('Wire', [source], exactly(1));
    return this;
  }

  protected compute(): Signal {
    if (!this.connected) {
      throw new EvaluationError('unconnected', String(this), 'evaluated before connect()');
    }
    return this._inputs[0].evaluate();
  }
}
