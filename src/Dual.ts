import {
  abs, acos, add, asin, atan, cos, div, eq, exp, gt, gte, log, lt, lte, mul, neg, neq, pow, sin, sqrt, sub, tan,
  type Operand,
} from './Dispatch';
import { DomainError } from './Errors';

/**
 * A scalar paired with its derivative, for forward-mode automatic differentiation.
 *
 * `derivative` is the rate of change of `value` when every active independent
 * variable (one seeded with a nonzero derivative) is perturbed at once; the
 * contributions of several active variables are summed into this one slot.
 * Instances are immutable: every operation returns a new Dual.
 * @public
 */
export class Dual {
  /**
   * The function value at the evaluation point.
   * @public
   */
  readonly value: number;

  /**
   * The derivative of `value` along the seeded direction.
   * @public
   */
  readonly derivative: number;

  /**
   * Optional label for debugging; operations compose the labels of their operands.
   * @public
   */
  readonly label: string;

  constructor(value: number, derivative = 0, label = "") {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new DomainError(`Invalid value passed to Dual${label ? ` ${label}` : ''}: ${value}`);
    }
    if (typeof derivative !== 'number' || !Number.isFinite(derivative)) {
      throw new DomainError(`Derivative${label ? ` of ${label}` : ''} is not finite: ${derivative}`);
    }
    this.value = value;
    this.derivative = derivative;
    this.label = label;
  }

  /**
   * Creates an active independent variable (derivative seeded with 1).
   */
  static variable(value: number, label = ""): Dual {
    return new Dual(value, 1, label);
  }

  /**
   * Creates an inactive input; behaves exactly like the plain number `value`.
   */
  static constant(value: number, label = String(value)): Dual {
    return new Dual(value, 0, label);
  }

  /**
   * Whether this value carries a nonzero derivative.
   */
  get isActive(): boolean {
    return this.derivative !== 0;
  }

  add(other: Operand): Dual {
    return add(this, other);
  }

  sub(other: Operand): Dual {
    return sub(this, other);
  }

  mul(other: Operand): Dual {
    return mul(this, other);
  }

  /**
   * Divides this by other.
   * @throws DivisionByZeroError when the divisor's value is 0.
   */
  div(other: Operand): Dual {
    return div(this, other);
  }

  /**
   * Raises this to `exponent`. A plain number (or an inactive Dual) takes the
   * constant-exponent rule; an active exponent needs a positive base.
   */
  pow(exponent: Operand): Dual {
    return pow(this, exponent);
  }

  neg(): Dual {
    return neg(this);
  }

  abs(): Dual {
    return abs(this);
  }

  sqrt(): Dual {
    return sqrt(this);
  }

  exp(): Dual {
    return exp(this);
  }

  log(): Dual {
    return log(this);
  }

  sin(): Dual {
    return sin(this);
  }

  cos(): Dual {
    return cos(this);
  }

  tan(): Dual {
    return tan(this);
  }

  asin(): Dual {
    return asin(this);
  }

  acos(): Dual {
    return acos(this);
  }

  atan(): Dual {
    return atan(this);
  }

  // Comparisons look at values only.

  lt(other: Operand): boolean {
    return lt(this, other);
  }

  lte(other: Operand): boolean {
    return lte(this, other);
  }

  gt(other: Operand): boolean {
    return gt(this, other);
  }

  gte(other: Operand): boolean {
    return gte(this, other);
  }

  eq(other: Operand): boolean {
    return eq(this, other);
  }

  neq(other: Operand): boolean {
    return neq(this, other);
  }

  /**
   * Returns string representation for debugging.
   */
  toString(): string {
    return `Dual(value=${this.value.toFixed(4)}, derivative=${this.derivative.toFixed(4)}, label=${this.label})`;
  }
}
