/**
 * Switch — The one stateful element.
 *
 * Passes its input through, inverted while flipped. flip() only toggles the
 * flag; the new value shows up on the next evaluate().
 */

import { LOG_PREFIX } from '../config';
import { Element, exactly } from './element';
import { isEvaluating } from './frame';
import type { Signal } from './types';

export class Switch extends Element<Signal, Signal> {
  private _flipped = false;

  constructor(input: Element) {
    super('Switch', [input], exactly(1));
  }

  get flipped(): boolean {
    return this._flipped;
  }

  /** Toggle the inversion flag */
  flip(): void {
    // Toggling mid-evaluation is unsupported; the in-flight result may mix both states
    if (isEvaluating(this)) {
      console.warn(`${LOG_PREFIX} ${String(this)} flipped while it is being evaluated.`);
    }
    this._flipped = !this._flipped;
  }

  protected compute(): Signal {
    const base = this._inputs[0].evaluate();
    return this._flipped ? !base : base;
  }
}
