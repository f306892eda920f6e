/**
 * Example: minimize f(a, b) = a² + b² by gradient descent from a random start.
 *
 * Each step takes the partial derivatives from forward-mode passes, then moves
 * a quarter of the gradient downhill.
 */

import { Dual, minimize } from '../src/index';

const paraboloid = ([a, b]: Dual[]): Dual => a.mul(a).add(b.mul(b));

const low = -10;
const high = 10;
const start = [Math.random() * (high - low) + low, Math.random() * (high - low) + low];

console.log(`starting from ${start[0]}, ${start[1]}`);

const result = minimize(paraboloid, start, { learningRate: 0.25, tolerance: 1e-5, verbose: true });

console.log(`the minimum of f is at ${result.point.join(', ')}`);
console.log(new Dual(result.value, 0, 'f').toString());
result.gradient.forEach((g, i) => console.log(`df/dx${i} = ${g}`));
