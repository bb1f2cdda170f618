/**
 * Sources — Zero-input elements with a fixed output.
 */

import { Element, NONE } from './element';
import type { Signal } from './types';

/** Constant high */
export class Vcc extends Element<Signal, never> {
  constructor() {
    super('Vcc', [], NONE);
  }

  protected compute(): Signal {
    return true;
  }
}

/** Constant low */
export class Ground extends Element<Signal, never> {
  constructor() {
    super('Ground', [], NONE);
  }

  protected compute(): Signal {
    return false;
  }
}

/** Shared high source */
export const VCC = new Vcc();

/** Shared low source */
export const GROUND = new Ground();
