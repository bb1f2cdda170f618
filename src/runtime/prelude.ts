/**
 * Standard Prelude — Short factory helpers for wiring circuits.
 *
 * These are thin wrappers over the element constructors, so a circuit reads
 * like the expression it computes: mux(sel, a, b), or(and(a, b), c).
 */

import { VCC, GROUND } from '../core/sources';
import { Inverter, And, Or, Xor, Nand } from '../core/gates';
import { HalfAdder, FullAdder, Multiplexer2, Multiplexer4 } from '../core/circuits';
import { Switch } from '../core/switch';
import { Wire } from '../core/wire';
import type { Element } from '../core/element';
import type { Signal } from '../core/types';

// --- Sources ---

/** The shared high source */
export const vcc = (): Element => VCC;

/** The shared low source */
export const ground = (): Element => GROUND;

/** Constant source for a literal boolean */
export const lit = (value: Signal): Element => (value ? VCC : GROUND);

// --- Gates ---

export const not = (a: Element): Inverter => new Inverter([a]);

export const and = (...xs: Element[]): And => new And(xs);

export const or = (...xs: Element[]): Or => new Or(xs);

/** One-hot: true iff exactly one argument is true */
export const xor = (...xs: Element[]): Xor => new Xor(xs);

export const nand = (a: Element, b: Element): Nand => new Nand([a, b]);

// --- Circuits ---

export const halfAdder = (a: Element, b: Element): HalfAdder => new HalfAdder(a, b);

export const fullAdder = (carryIn: Element, a: Element, b: Element): FullAdder =>
  new FullAdder(carryIn, a, b);

/** select high picks b, low picks a */
export const mux = (select: Element, a: Element, b: Element): Multiplexer2 =>
  new Multiplexer2(select, a, b);

export const mux4 = (
  selects: readonly [Element, Element],
  inputs: readonly [Element, Element, Element, Element]
): Multiplexer4 => new Multiplexer4(selects, inputs);

// --- Drivers ---

/** A flippable pass-through of e */
export const toggle = (e: Element): Switch => new Switch(e);

/** An unconnected wire, for feedback or late wiring */
export const wire = (): Wire => new Wire();
