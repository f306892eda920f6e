import { Dual } from './Dual';
import { DivisionByZeroError, DomainError } from './Errors';

export class DualArithmetic {
  /**
   * Applies the chain rule for a unary function: the outgoing derivative is
   * `slope(x.value) * x.derivative`. The slope is skipped for inactive inputs,
   * so a constant never picks up a derivative from a singular slope.
   */
  static chain(x: Dual, value: number, slope: () => number, label: string): Dual {
    if (!Number.isFinite(value)) {
      throw new DomainError(`${label} overflows at ${x.value}: ${value}`);
    }
    const derivative = x.derivative === 0 ? 0 : slope() * x.derivative;
    if (!Number.isFinite(derivative)) {
      throw new DomainError(`${label} is not differentiable at ${x.value}`);
    }
    return new Dual(value, derivative, label);
  }

  static add(a: Dual, b: Dual): Dual {
    return new Dual(
      a.value + b.value,
      a.derivative + b.derivative,
      `(${a.label}+${b.label})`
    );
  }

  static sub(a: Dual, b: Dual): Dual {
    return new Dual(
      a.value - b.value,
      a.derivative - b.derivative,
      `(${a.label}-${b.label})`
    );
  }

  static mul(a: Dual, b: Dual): Dual {
    return new Dual(
      a.value * b.value,
      a.derivative * b.value + a.value * b.derivative,
      `(${a.label}*${b.label})`
    );
  }

  static div(a: Dual, b: Dual): Dual {
    if (b.value === 0) {
      throw new DivisionByZeroError(`Division by zero encountered in div: ${a.label}/${b.label}`);
    }
    return new Dual(
      a.value / b.value,
      (a.derivative * b.value - a.value * b.derivative) / (b.value ** 2),
      `(${a.label}/${b.label})`
    );
  }

  static neg(a: Dual): Dual {
    return new Dual(-a.value, -a.derivative, `(-${a.label})`);
  }

  /**
   * Power with a constant exponent: d(a^p) = p * a^(p-1) * da.
   */
  static pow(a: Dual, exp: number): Dual {
    if (!Number.isFinite(exp)) {
      throw new DomainError(`Exponent must be a finite number, got ${exp}`);
    }
    if (a.value < 0 && !Number.isInteger(exp)) {
      throw new DomainError(`Cannot raise negative base (${a.value}) to non-integer exponent (${exp})`);
    }
    if (a.value === 0 && exp < 0) {
      throw new DivisionByZeroError(`0 cannot be raised to a negative power: ${exp}`);
    }
    const label = `(${a.label}^${exp})`;
    if (exp === 0) return new Dual(1, 0, label);
    return DualArithmetic.chain(a, a.value ** exp, () => exp * a.value ** (exp - 1), label);
  }

  /**
   * Power with a differentiable exponent, through a^b = exp(b * ln a).
   * An inactive exponent takes the constant-exponent rule instead, which
   * does not need the logarithm.
   */
  static powDual(a: Dual, b: Dual): Dual {
    if (b.derivative === 0) {
      return DualArithmetic.pow(a, b.value);
    }
    if (a.value <= 0) {
      throw new DomainError(`Base must be positive when the exponent is differentiated: ${a.value}^${b.label}`);
    }
    const value = a.value ** b.value;
    return new Dual(
      value,
      value * (b.derivative * Math.log(a.value) + b.value * a.derivative / a.value),
      `(${a.label}^${b.label})`
    );
  }

  static abs(a: Dual): Dual {
    const label = `abs(${a.label})`;
    return a.value < 0
      ? new Dual(-a.value, -a.derivative, label)
      : new Dual(a.value, a.derivative, label);
  }

  static exp(a: Dual): Dual {
    const e = Math.exp(a.value);
    return DualArithmetic.chain(a, e, () => e, `exp(${a.label})`);
  }

  static log(a: Dual): Dual {
    if (a.value <= 0) {
      throw new DomainError(`Logarithm undefined for non-positive value: ${a.value}`);
    }
    return DualArithmetic.chain(a, Math.log(a.value), () => 1 / a.value, `log(${a.label})`);
  }

  static sqrt(a: Dual): Dual {
    if (a.value < 0) {
      throw new DomainError(`Cannot take sqrt of negative number: ${a.value}`);
    }
    const root = Math.sqrt(a.value);
    return DualArithmetic.chain(a, root, () => 0.5 / root, `sqrt(${a.label})`);
  }
}
