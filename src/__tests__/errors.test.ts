import { describe, it, expect } from 'vitest';
import { MAX_EVALUATION_DEPTH } from '../config';
import { VCC, GROUND } from '../core/sources';
import { Inverter, And, Or, Nand } from '../core/gates';
import { HalfAdder, Multiplexer4 } from '../core/circuits';
import { Switch } from '../core/switch';
import { Wire } from '../core/wire';
import { ConstructionError, EvaluationError, isCircuitError } from '../core/errors';
import { evaluationDepth, isEvaluating } from '../core/frame';
import type { Element } from '../core/element';

/** Catch and return whatever fn throws */
function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected an error');
}

/** A chain of n inverters over VCC */
function inverterChain(n: number): Element {
  let e: Element = VCC;
  for (let i = 0; i < n; i++) {
    e = new Inverter([e]);
  }
  return e;
}

describe('construction errors', () => {
  it('rejects an empty input list', () => {
    const err = caught(() => new And([]));
    expect(err).toBeInstanceOf(ConstructionError);
    expect(err).toMatchObject({
      name: 'ConstructionError',
      reason: 'arity',
      element: 'And',
      message: 'And: expected at least 1 input, got 0',
    });
  });

  // Reflect.construct stands in for an untyped caller
  it('rejects too many inputs for a fixed-arity element', () => {
    const err = caught(() => Reflect.construct(Inverter, [[VCC, GROUND]]));
    expect(err).toMatchObject({
      reason: 'arity',
      message: 'Inverter: expected exactly 1 input, got 2',
    });
  });

  it('rejects a Nand with one input', () => {
    const err = caught(() => Reflect.construct(Nand, [[VCC]]));
    expect(err).toMatchObject({
      reason: 'arity',
      message: 'Nand: expected exactly 2 inputs, got 1',
    });
  });

  it('rejects a missing input', () => {
    const err = caught(() => Reflect.construct(HalfAdder, [VCC, undefined]));
    expect(err).toBeInstanceOf(ConstructionError);
    expect(err).toMatchObject({
      reason: 'missing-input',
      element: 'HalfAdder',
      message: 'HalfAdder: input 1 is not an element',
    });
  });

  it('rejects a raw boolean in place of an element', () => {
    const err = caught(() => Reflect.construct(Or, [[VCC, true]]));
    expect(err).toMatchObject({ reason: 'missing-input', message: 'Or: input 1 is not an element' });
  });

  it('rejects a non-array input list', () => {
    const err = caught(() => Reflect.construct(And, [VCC]));
    expect(err).toMatchObject({ reason: 'missing-input', message: 'And: expected an array of inputs' });
  });

  it('rejects a wrong number of multiplexer selects', () => {
    const err = caught(() =>
      Reflect.construct(Multiplexer4, [[VCC, GROUND, VCC], [VCC, VCC, VCC, VCC]])
    );
    expect(err).toMatchObject({
      reason: 'arity',
      message: 'Multiplexer4: expected exactly 2 inputs, got 3',
    });
  });

  it('rejects connecting a wire twice', () => {
    const w = new Wire().named('bus').connect(VCC);
    const err = caught(() => w.connect(GROUND));
    expect(err).toMatchObject({
      reason: 'already-connected',
      element: 'Wire "bus"',
      message: 'Wire "bus": already has a driver',
    });
    expect(w.evaluate()).toBe(true);
  });
});

describe('evaluation errors', () => {
  it('reports an unconnected wire', () => {
    const w = new Wire().named('floating');
    const gate = new And([VCC, w]);

    const err = caught(() => gate.evaluate());
    expect(err).toBeInstanceOf(EvaluationError);
    expect(err).toMatchObject({
      name: 'EvaluationError',
      reason: 'unconnected',
      element: 'Wire "floating"',
      message: 'Wire "floating": evaluated before connect()',
    });
  });

  it('reports an unconnected wire even when a sibling decides the result', () => {
    const err = caught(() => new And([GROUND, new Wire()]).evaluate());
    expect(err).toMatchObject({ reason: 'unconnected' });
  });

  it('evaluates a wire once connected', () => {
    const w = new Wire();
    const gate = new Inverter([w]);
    w.connect(GROUND);
    expect(w.connected).toBe(true);
    expect(w.inputs).toEqual([GROUND]);
    expect(gate.evaluate()).toBe(true);
  });

  it('reports a cycle with its path', () => {
    const feedback = new Wire().named('fb');
    const gate = new Or([VCC, feedback]).named('loop');
    feedback.connect(gate);

    const err = caught(() => gate.evaluate());
    expect(err).toBeInstanceOf(EvaluationError);
    expect(err).toMatchObject({
      reason: 'cycle',
      element: 'Or "loop"',
      message: 'Or "loop": cycle detected (Or "loop" -> Wire "fb" -> Or "loop")',
    });
  });

  it('reports a cycle through a switch', () => {
    const feedback = new Wire();
    const s = new Switch(feedback);
    feedback.connect(new Inverter([s]));

    const err = caught(() => s.evaluate());
    expect(err).toMatchObject({
      reason: 'cycle',
      message: 'Switch: cycle detected (Switch -> Wire -> Inverter -> Switch)',
    });
  });

  it('does not mistake a shared input for a cycle', () => {
    const shared = new And([VCC, VCC]);
    const gate = new Or([shared, new Inverter([shared]), shared]);
    expect(gate.evaluate()).toBe(true);
  });

  it('evaluates a chain right up to the depth bound', () => {
    // n inverters plus the source use n + 1 frames
    const chain = inverterChain(MAX_EVALUATION_DEPTH - 1);
    expect(chain.evaluate()).toBe(false);
  });

  it('reports a chain deeper than the bound', () => {
    const chain = inverterChain(MAX_EVALUATION_DEPTH);
    const err = caught(() => chain.evaluate());
    expect(err).toMatchObject({
      reason: 'depth',
      element: 'Vcc',
      message: `Vcc: evaluation depth exceeded ${MAX_EVALUATION_DEPTH}`,
    });
  });

  it('leaves the evaluation stack empty after a failure', () => {
    const feedback = new Wire();
    const gate = new And([feedback]);
    feedback.connect(gate);

    caught(() => gate.evaluate());
    expect(evaluationDepth()).toBe(0);
    expect(isEvaluating(gate)).toBe(false);

    // the same shared source still evaluates normally afterwards
    expect(new And([VCC, VCC]).evaluate()).toBe(true);
  });
});

describe('isCircuitError', () => {
  it('recognizes both error kinds only', () => {
    expect(isCircuitError(new ConstructionError('arity', 'And', 'x'))).toBe(true);
    expect(isCircuitError(new EvaluationError('cycle', 'Or', 'x'))).toBe(true);
    expect(isCircuitError(new Error('x'))).toBe(false);
    expect(isCircuitError('x')).toBe(false);
  });
});
