import type { Dual } from '../Dual';
import { cos, div, sin } from '../Dispatch';
import type { MultivariateFunction, ScalarFunction } from '../Derivatives';

export interface SampleFunction {
  readonly formula: string;
  readonly fn: ScalarFunction;
}

export interface SampleObjective {
  readonly formula: string;
  readonly arity: number;
  readonly fn: MultivariateFunction;
}

/** One-variable functions the `derive` command can evaluate. */
export const sampleFunctions: Record<string, SampleFunction> = {
  'square-plus-two': { formula: 'x*x + 2', fn: x => x.mul(x).add(2) },
  cube: { formula: 'x^3', fn: x => x.pow(3) },
  reciprocal: { formula: '1/x', fn: x => div(1, x) },
  sqrt: { formula: 'x^0.5', fn: x => x.pow(0.5) },
  sin: { formula: 'sin(x)', fn: x => sin(x) },
  wave: { formula: 'sin(x) * cos(x)', fn: x => sin(x).mul(cos(x)) },
  'self-power': { formula: 'x^x', fn: x => x.pow(x) },
};

function pair(xs: Dual[]): [Dual, Dual] {
  const [a, b] = xs;
  if (a === undefined || b === undefined) {
    throw new RangeError(`Expected 2 variables, got ${xs.length}`);
  }
  return [a, b];
}

/** Two-variable objectives the `minimize` command can descend. */
export const sampleObjectives: Record<string, SampleObjective> = {
  paraboloid: {
    formula: 'a*a + b*b',
    arity: 2,
    fn: xs => {
      const [a, b] = pair(xs);
      return a.mul(a).add(b.mul(b));
    },
  },
  'shifted-bowl': {
    formula: '(a-1)^2 + 2*(b+2)^2',
    arity: 2,
    fn: xs => {
      const [a, b] = pair(xs);
      return a.sub(1).pow(2).add(b.add(2).pow(2).mul(2));
    },
  },
};
