import { Dual } from './Dual';

/**
 * A function of one differentiable variable.
 * @public
 */
export type ScalarFunction = (x: Dual) => Dual;

/**
 * A function of several differentiable variables returning a scalar.
 * @public
 */
export type MultivariateFunction = (xs: Dual[]) => Dual;

/**
 * Value and gradient of a multivariate function at a point.
 * @public
 */
export interface GradientResult {
  value: number;
  gradient: number[];
}

/**
 * Evaluates f at x0 with x0 seeded as the active variable.
 */
export function valueAndDerivative(f: ScalarFunction, x0: number): { value: number; derivative: number } {
  const y = f(Dual.variable(x0, 'x'));
  return { value: y.value, derivative: y.derivative };
}

/**
 * df/dx at x0.
 *
 * @example
 * ```ts
 * derivative(x => x.mul(x).add(2), 3); // 6
 * ```
 */
export function derivative(f: ScalarFunction, x0: number): number {
  return valueAndDerivative(f, x0).derivative;
}

/**
 * Rate of change of f at `point` along `direction`, in a single forward pass:
 * variable i is seeded with direction[i], so all of them are active together
 * and their contributions sum.
 */
export function directionalDerivative(f: MultivariateFunction, point: number[], direction: number[]): number {
  if (point.length !== direction.length) {
    throw new RangeError(`Direction has ${direction.length} components, point has ${point.length}`);
  }
  const xs = point.map((v, i) => new Dual(v, direction[i], `x${i}`));
  return f(xs).derivative;
}

/**
 * Gradient of f at `point`, one forward pass per coordinate with only that
 * coordinate active.
 */
export function gradient(f: MultivariateFunction, point: number[]): GradientResult {
  if (point.length === 0) {
    return { value: f([]).value, gradient: [] };
  }
  let value = 0;
  const grad = point.map((_, i) => {
    const xs = point.map((v, j) => new Dual(v, i === j ? 1 : 0, `x${j}`));
    const y = f(xs);
    value = y.value;
    return y.derivative;
  });
  return { value, gradient: grad };
}
