import { Dual } from "../src/Dual";
import { DualArithmetic } from "../src/DualArithmetic";
import { add, div, exp, log, lt, mul, pow, sqrt, sub } from "../src/Dispatch";
import { DomainError } from "../src/Errors";
import { numericalDerivative } from "./testUtils";

// (value, derivative) pairs; none with a zero value so that quotients are defined.
const samples: Array<[number, number]> = [[1.5, 0.5], [-2, 1], [0.3, -1.2], [4, 0], [7.25, 3]];

describe('chain-rule properties', () => {
  it('addition is linear in the derivative', () => {
    for (const [va, da] of samples) {
      for (const [vb, db] of samples) {
        const a = new Dual(va, da);
        const b = new Dual(vb, db);
        expect(add(a, b).derivative).toBeCloseTo(da + db, 12);
      }
    }
  });

  it('scaling by a constant scales the derivative', () => {
    for (const [va, da] of samples) {
      for (const c of [-3, 0, 0.5, 10]) {
        expect(mul(c, new Dual(va, da)).derivative).toBeCloseTo(c * da, 12);
      }
    }
  });

  it('follows the product rule', () => {
    for (const [va, da] of samples) {
      for (const [vb, db] of samples) {
        const p = mul(new Dual(va, da), new Dual(vb, db));
        expect(p.value).toBeCloseTo(va * vb, 12);
        expect(p.derivative).toBeCloseTo(da * vb + va * db, 12);
      }
    }
  });

  it('follows the quotient rule', () => {
    for (const [va, da] of samples) {
      for (const [vb, db] of samples) {
        const q = div(new Dual(va, da), new Dual(vb, db));
        expect(q.value).toBeCloseTo(va / vb, 12);
        expect(q.derivative).toBeCloseTo((da * vb - va * db) / vb ** 2, 10);
      }
    }
  });

  it('follows the power rule for constant exponents', () => {
    for (const [va, da] of samples.filter(([v]) => v > 0)) {
      for (const p of [-2, -0.5, 0.5, 1, 2, 3.5]) {
        const y = pow(new Dual(va, da), p);
        expect(y.value).toBeCloseTo(va ** p, 10);
        expect(y.derivative).toBeCloseTo(p * va ** (p - 1) * da, 10);
      }
    }
  });

  it('treats plain numbers as zero-derivative Duals', () => {
    for (const [va, da] of samples) {
      const a = new Dual(va, da);
      for (const n of [-1.5, 2, 9]) {
        const c = new Dual(n, 0);
        expect(add(a, n).derivative).toBe(add(a, c).derivative);
        expect(sub(n, a).derivative).toBe(sub(c, a).derivative);
        expect(mul(a, n).derivative).toBe(mul(a, c).derivative);
        expect(div(n, a).derivative).toBe(div(c, a).derivative);
      }
    }
  });

  it('compares values whatever the derivatives', () => {
    for (const [va] of samples) {
      for (const [vb] of samples) {
        expect(lt(new Dual(va, 100), new Dual(vb, -100))).toBe(va < vb);
        expect(lt(new Dual(va, -7), vb)).toBe(va < vb);
      }
    }
  });
});

describe('exp, log and sqrt', () => {
  it('exp is its own derivative', () => {
    const y = exp(Dual.variable(1.3));
    expect(y.value).toBe(Math.exp(1.3));
    expect(y.derivative).toBe(Math.exp(1.3));
  });

  it('log has derivative 1/x', () => {
    const y = log(Dual.variable(4));
    expect(y.value).toBe(Math.log(4));
    expect(y.derivative).toBe(0.25);
  });

  it('sqrt has derivative 1/(2 sqrt x)', () => {
    const y = sqrt(Dual.variable(9));
    expect(y.value).toBe(3);
    expect(y.derivative).toBeCloseTo(1 / 6, 12);
  });

  it('sqrt of zero is fine for constants and undefined for active variables', () => {
    expect(sqrt(new Dual(0)).value).toBe(0);
    expect(() => sqrt(Dual.variable(0, 'x'))).toThrow('sqrt(x) is not differentiable at 0');
    expect(() => sqrt(new Dual(-1))).toThrow(DomainError);
  });

  it('reports a value that overflows', () => {
    expect(() => exp(new Dual(1000, 1, 'x'))).toThrow('exp(x) overflows at 1000: Infinity');
    expect(() => exp(new Dual(1000, 0, 'c'))).toThrow(DomainError);
    expect(() => pow(new Dual(10, 1, 'x'), 400)).toThrow('(x^400) overflows at 10: Infinity');
  });

  it('differentiates log(x^2 + 1) / x against a finite difference', () => {
    const f = (x: Dual) => log(pow(x, 2).add(1)).div(x);
    const plain = (x: number) => Math.log(x * x + 1) / x;
    for (const x0 of [0.5, 2, -3]) {
      const y = f(Dual.variable(x0));
      expect(y.value).toBeCloseTo(plain(x0), 12);
      expect(y.derivative).toBeCloseTo(numericalDerivative(plain, x0), 5);
    }
  });
});

describe('DualArithmetic.chain', () => {
  it('skips the slope for an inactive input', () => {
    const slope = vi.fn(() => Infinity);
    const y = DualArithmetic.chain(new Dual(2), 5, slope, 'f(c)');
    expect(y.derivative).toBe(0);
    expect(slope).not.toHaveBeenCalled();
  });

  it('multiplies the slope by the incoming derivative', () => {
    const y = DualArithmetic.chain(new Dual(2, 3), 5, () => 4, 'f(x)');
    expect([y.value, y.derivative, y.label]).toEqual([5, 12, 'f(x)']);
  });
});
