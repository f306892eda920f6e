import { gradient, type MultivariateFunction } from './Derivatives';

/**
 * Configuration options for steepest-descent minimization.
 * @public
 */
export interface GradientDescentOptions {
  /** Step size applied to the gradient (default: 0.25) */
  learningRate?: number;
  /** Stop once every partial derivative is within this bound (default: 1e-5) */
  tolerance?: number;
  /** Maximum number of iterations (default: 10000) */
  maxIterations?: number;
  /** Print progress information (default: false) */
  verbose?: boolean;
}

/**
 * Result object returned by minimize.
 * @public
 */
export interface GradientDescentResult {
  /** Whether the gradient fell within tolerance */
  success: boolean;
  /** Final point */
  point: number[];
  /** Objective value at the final point */
  value: number;
  /** Gradient at the final point */
  gradient: number[];
  /** Number of steps taken */
  iterations: number;
  /** Reason for termination */
  convergenceReason: string;
}

function maxAbs(values: number[]): number {
  return values.reduce((m, g) => Math.max(m, Math.abs(g)), 0);
}

/**
 * Minimizes f by steepest descent, x ← x - learningRate * ∇f(x), with the
 * gradient computed by forward-mode passes.
 *
 * @example
 * ```ts
 * const result = minimize(([a, b]) => a.mul(a).add(b.mul(b)), [3, -4]);
 * console.log(result.point); // ~[0, 0]
 * ```
 */
export function minimize(
  f: MultivariateFunction,
  start: number[],
  options: GradientDescentOptions = {}
): GradientDescentResult {
  const {
    learningRate = 0.25,
    tolerance = 1e-5,
    maxIterations = 10000,
    verbose = false,
  } = options;

  if (!(learningRate > 0)) {
    throw new RangeError(`learningRate must be positive, got ${learningRate}`);
  }
  if (!(tolerance >= 0)) {
    throw new RangeError(`tolerance must be non-negative, got ${tolerance}`);
  }
  if (!Number.isInteger(maxIterations) || maxIterations <= 0) {
    throw new RangeError(`maxIterations must be a positive integer, got ${maxIterations}`);
  }

  let point = [...start];
  let { value, gradient: grad } = gradient(f, point);
  let gradientNorm = maxAbs(grad);

  if (verbose) {
    console.log(`Gradient descent from [${point.join(', ')}]`);
  }

  let iterations = 0;
  while (gradientNorm > tolerance && iterations < maxIterations) {
    iterations++;
    if (verbose) {
      console.log(`  iter ${iterations}: f=${value.toFixed(6)}, max|∇|=${gradientNorm.toExponential(2)}`);
    }
    point = point.map((x, i) => x - learningRate * grad[i]);
    ({ value, gradient: grad } = gradient(f, point));
    gradientNorm = maxAbs(grad);
  }

  const success = gradientNorm <= tolerance;
  const convergenceReason = success ? 'Gradient within tolerance' : 'Maximum iterations reached';

  if (verbose) {
    console.log(`${convergenceReason}: f=${value.toFixed(6)} at [${point.join(', ')}] after ${iterations} iterations`);
  }

  return { success, point, value, gradient: grad, iterations, convergenceReason };
}
