/**
 * Conditional console.log that only outputs when VERBOSE=true environment variable is set.
 *
 * Run with verbose output:
 *   VERBOSE=true npm test
 */
export function testLog(...args: unknown[]): void {
  if (process.env.VERBOSE === 'true') {
    console.log(...args);
  }
}

/**
 * Central finite difference of a plain function.
 */
export function numericalDerivative(f: (x: number) => number, x0: number, eps = 1e-6): number {
  return (f(x0 + eps) - f(x0 - eps)) / (2 * eps);
}

export function numericalGradient(
  fn: (...args: number[]) => number,
  inputs: number[],
  epsilon: number = 1e-5
): number[] {
  const grads: number[] = [];
  for (let i = 0; i < inputs.length; i++) {
    const inputsPlus = [...inputs];
    const inputsMinus = [...inputs];
    inputsPlus[i] += epsilon;
    inputsMinus[i] -= epsilon;
    grads.push((fn(...inputsPlus) - fn(...inputsMinus)) / (2 * epsilon));
  }
  return grads;
}
