/**
 * Truth Table — Enumerate every input assignment of a circuit.
 *
 * The circuit is built once over switches sitting on GROUND; each row flips
 * the switches to its bits and re-evaluates.
 */

import { MAX_TRUTH_TABLE_INPUTS } from '../config';
import { GROUND } from '../core/sources';
import { Switch } from '../core/switch';
import type { Element } from '../core/element';
import type { Output, Signal, TruthRow } from '../core/types';

/** Bits of a non-negative integer n, most significant first, padded to width */
export function toBits(n: number, width: number): Signal[] {
  return Array.from({ length: width }, (_, i) => Math.floor(n / 2 ** (width - 1 - i)) % 2 === 1);
}

/**
 * Rows for all 2^arity assignments in ascending order.
 * Input 0 is the most significant bit.
 */
export function truthTable<TOut extends Output>(
  arity: number,
  build: (inputs: readonly Element[]) => Element<TOut, Output>
): TruthRow<TOut>[] {
  if (!Number.isInteger(arity) || arity < 0 || arity > MAX_TRUTH_TABLE_INPUTS) {
    throw new RangeError(
      `truth table arity must be an integer from 0 to ${MAX_TRUTH_TABLE_INPUTS}, got ${arity}`
    );
  }

  const switches = Array.from({ length: arity }, (_, i) => new Switch(GROUND).named(`in${i}`));
  const circuit = build(switches);

  const rows: TruthRow<TOut>[] = [];
  for (let n = 0; n < 2 ** arity; n++) {
    const inputs = toBits(n, arity);
    switches.forEach((s, i) => {
      if (s.flipped !== inputs[i]) s.flip();
    });
    rows.push({ inputs, output: circuit.evaluate() });
  }
  return rows;
}
