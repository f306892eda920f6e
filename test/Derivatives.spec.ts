import { Dual } from "../src/Dual";
import { derivative, directionalDerivative, gradient, valueAndDerivative } from "../src/Derivatives";
import { sin } from "../src/Dispatch";
import { numericalGradient } from "./testUtils";

describe('single-variable helpers', () => {
  it('differentiates x*x + 2 at 3', () => {
    expect(derivative(x => x.mul(x).add(2), 3)).toBe(6);
  });

  it('returns value and derivative together', () => {
    expect(valueAndDerivative(x => sin(x), 0)).toEqual({ value: 0, derivative: 1 });
    expect(valueAndDerivative(x => x.pow(3), 2)).toEqual({ value: 8, derivative: 12 });
  });
});

describe('directionalDerivative', () => {
  const product = ([a, b]: Dual[]) => a.mul(b);

  it('sums the contributions of every seeded variable', () => {
    expect(directionalDerivative(product, [2, 3], [1, 1])).toBe(5);
    expect(directionalDerivative(product, [2, 3], [1, 0])).toBe(3);
    expect(directionalDerivative(product, [2, 3], [0, 2])).toBe(4);
  });

  it('equals the gradient dotted with the direction', () => {
    const f = ([a, b]: Dual[]) => a.mul(sin(b));
    const point = [1.5, 0.7];
    const { gradient: g } = gradient(f, point);
    expect(directionalDerivative(f, point, [1, 1])).toBeCloseTo(g[0] + g[1], 12);
    expect(directionalDerivative(f, point, [-2, 0.5])).toBeCloseTo(-2 * g[0] + 0.5 * g[1], 12);
  });

  it('requires one direction component per variable', () => {
    expect(() => directionalDerivative(product, [2, 3], [1])).toThrow(RangeError);
  });
});

describe('gradient', () => {
  it('computes exact partials of a paraboloid', () => {
    const result = gradient(([a, b]) => a.mul(a).add(b.mul(b)), [3, -4]);
    expect(result).toEqual({ value: 25, gradient: [6, -8] });
  });

  it('matches finite differences', () => {
    const f = ([a, b, c]: Dual[]) => a.mul(b).add(c.exp()).div(b.pow(2).add(1));
    const plain = (a: number, b: number, c: number) => (a * b + Math.exp(c)) / (b * b + 1);
    const point = [0.4, -1.3, 0.8];
    const { value, gradient: g } = gradient(f, point);
    expect(value).toBeCloseTo(plain(0.4, -1.3, 0.8), 12);
    const numeric = numericalGradient(plain, point);
    g.forEach((gi, i) => expect(gi).toBeCloseTo(numeric[i], 5));
  });

  it('handles a function of no variables', () => {
    expect(gradient(() => Dual.constant(7), [])).toEqual({ value: 7, gradient: [] });
  });
});
