import { Dual } from './Dual';
import { DualArithmetic } from './DualArithmetic';
import { DualTrig } from './DualTrig';
import { UnsupportedOperandError } from './Errors';

/**
 * Anything an operation accepts: a differentiable value, or a plain number
 * standing for a constant with zero derivative.
 * @public
 */
export type Operand = Dual | number;

/**
 * An operand tagged with its kind.
 * @public
 */
export type Classified =
  | { kind: 'dual'; dual: Dual }
  | { kind: 'plain'; value: number };

/**
 * Chain-rule implementations of one binary operation, per operand kind.
 * Where `dualPlain` or `plainDual` is absent the plain operand is lifted to
 * a constant Dual and `dual` is used.
 */
export interface BinaryRule {
  readonly name: string;
  readonly plain: (a: number, b: number) => number;
  readonly dual: (a: Dual, b: Dual) => Dual;
  readonly dualPlain?: (a: Dual, b: number) => Dual;
  readonly plainDual?: (a: number, b: Dual) => Dual;
}

export interface UnaryRule {
  readonly name: string;
  readonly plain: (x: number) => number;
  readonly dual: (x: Dual) => Dual;
}

export interface ComparisonRule {
  readonly name: string;
  readonly compare: (a: number, b: number) => boolean;
}

function describeKind(operand: unknown): string {
  if (operand === null) return 'null';
  if (Array.isArray(operand)) return 'array';
  return typeof operand;
}

/**
 * Tags an operand as a Dual or a plain number.
 * @throws UnsupportedOperandError for any other kind of value.
 */
export function classify(operand: unknown, operation = 'operation'): Classified {
  if (operand instanceof Dual) return { kind: 'dual', dual: operand };
  if (typeof operand === 'number') return { kind: 'plain', value: operand };
  throw new UnsupportedOperandError(describeKind(operand), operation);
}

/**
 * Normalizes an operand to a Dual; a plain number becomes a constant (derivative 0).
 */
export function lift(operand: Operand): Dual {
  const c = classify(operand, 'lift');
  return c.kind === 'dual' ? c.dual : Dual.constant(c.value);
}

export function applyBinary(rule: BinaryRule, a: unknown, b: unknown): Operand {
  const left = classify(a, rule.name);
  const right = classify(b, rule.name);
  switch (left.kind) {
    case 'plain':
      if (right.kind === 'plain') return rule.plain(left.value, right.value);
      return rule.plainDual
        ? rule.plainDual(left.value, right.dual)
        : rule.dual(Dual.constant(left.value), right.dual);
    case 'dual':
      if (right.kind === 'dual') return rule.dual(left.dual, right.dual);
      return rule.dualPlain
        ? rule.dualPlain(left.dual, right.value)
        : rule.dual(left.dual, Dual.constant(right.value));
  }
}

export function applyUnary(rule: UnaryRule, x: unknown): Operand {
  const c = classify(x, rule.name);
  return c.kind === 'dual' ? rule.dual(c.dual) : rule.plain(c.value);
}

export function applyComparison(rule: ComparisonRule, a: unknown, b: unknown): boolean {
  return rule.compare(primal(classify(a, rule.name)), primal(classify(b, rule.name)));
}

function primal(c: Classified): number {
  return c.kind === 'dual' ? c.dual.value : c.value;
}

// Rules call through lambdas so that nothing here touches DualArithmetic or
// DualTrig while the module graph is still loading.

export const ADD: BinaryRule = {
  name: 'add',
  plain: (a, b) => a + b,
  dual: (a, b) => DualArithmetic.add(a, b),
};

export const SUB: BinaryRule = {
  name: 'sub',
  plain: (a, b) => a - b,
  dual: (a, b) => DualArithmetic.sub(a, b),
};

export const MUL: BinaryRule = {
  name: 'mul',
  plain: (a, b) => a * b,
  dual: (a, b) => DualArithmetic.mul(a, b),
};

export const DIV: BinaryRule = {
  name: 'div',
  plain: (a, b) => a / b,
  dual: (a, b) => DualArithmetic.div(a, b),
};

export const POW: BinaryRule = {
  name: 'pow',
  plain: (a, b) => a ** b,
  dual: (a, b) => DualArithmetic.powDual(a, b),
  dualPlain: (a, p) => DualArithmetic.pow(a, p),
};

const unary = (name: string, plain: (x: number) => number, dual: (x: Dual) => Dual): UnaryRule =>
  ({ name, plain, dual });

export const NEG = unary('neg', x => -x, x => DualArithmetic.neg(x));
export const ABS = unary('abs', Math.abs, x => DualArithmetic.abs(x));
export const SQRT = unary('sqrt', Math.sqrt, x => DualArithmetic.sqrt(x));
export const EXP = unary('exp', Math.exp, x => DualArithmetic.exp(x));
export const LOG = unary('log', Math.log, x => DualArithmetic.log(x));
export const SIN = unary('sin', Math.sin, x => DualTrig.sin(x));
export const COS = unary('cos', Math.cos, x => DualTrig.cos(x));
export const TAN = unary('tan', Math.tan, x => DualTrig.tan(x));
export const ASIN = unary('asin', Math.asin, x => DualTrig.asin(x));
export const ACOS = unary('acos', Math.acos, x => DualTrig.acos(x));
export const ATAN = unary('atan', Math.atan, x => DualTrig.atan(x));

export const LT: ComparisonRule = { name: 'lt', compare: (a, b) => a < b };
export const LTE: ComparisonRule = { name: 'lte', compare: (a, b) => a <= b };
export const GT: ComparisonRule = { name: 'gt', compare: (a, b) => a > b };
export const GTE: ComparisonRule = { name: 'gte', compare: (a, b) => a >= b };
export const EQ: ComparisonRule = { name: 'eq', compare: (a, b) => a === b };
export const NEQ: ComparisonRule = { name: 'neq', compare: (a, b) => a !== b };

// Binary operations: plain/plain stays a number, anything involving a Dual is a Dual.

export function add(a: number, b: number): number;
export function add(a: Dual, b: Operand): Dual;
export function add(a: Operand, b: Dual): Dual;
export function add(a: Operand, b: Operand): Operand;
export function add(a: Operand, b: Operand): Operand {
  return applyBinary(ADD, a, b);
}

export function sub(a: number, b: number): number;
export function sub(a: Dual, b: Operand): Dual;
export function sub(a: Operand, b: Dual): Dual;
export function sub(a: Operand, b: Operand): Operand;
export function sub(a: Operand, b: Operand): Operand {
  return applyBinary(SUB, a, b);
}

export function mul(a: number, b: number): number;
export function mul(a: Dual, b: Operand): Dual;
export function mul(a: Operand, b: Dual): Dual;
export function mul(a: Operand, b: Operand): Operand;
export function mul(a: Operand, b: Operand): Operand {
  return applyBinary(MUL, a, b);
}

/**
 * Quotient rule. A Dual divisor whose value is 0 raises DivisionByZeroError;
 * two plain numbers divide as usual.
 */
export function div(a: number, b: number): number;
export function div(a: Dual, b: Operand): Dual;
export function div(a: Operand, b: Dual): Dual;
export function div(a: Operand, b: Operand): Operand;
export function div(a: Operand, b: Operand): Operand {
  return applyBinary(DIV, a, b);
}

/**
 * Power. A plain exponent uses the constant-exponent rule, which works for
 * any base the real power allows; an active Dual exponent needs a positive base.
 */
export function pow(a: number, b: number): number;
export function pow(a: Dual, b: Operand): Dual;
export function pow(a: Operand, b: Dual): Dual;
export function pow(a: Operand, b: Operand): Operand;
export function pow(a: Operand, b: Operand): Operand {
  return applyBinary(POW, a, b);
}

// Unary functions: Dual in, Dual out; number in, number out.

export function neg(x: number): number;
export function neg(x: Dual): Dual;
export function neg(x: Operand): Operand;
export function neg(x: Operand): Operand {
  return applyUnary(NEG, x);
}

export function abs(x: number): number;
export function abs(x: Dual): Dual;
export function abs(x: Operand): Operand;
export function abs(x: Operand): Operand {
  return applyUnary(ABS, x);
}

export function sqrt(x: number): number;
export function sqrt(x: Dual): Dual;
export function sqrt(x: Operand): Operand;
export function sqrt(x: Operand): Operand {
  return applyUnary(SQRT, x);
}

export function exp(x: number): number;
export function exp(x: Dual): Dual;
export function exp(x: Operand): Operand;
export function exp(x: Operand): Operand {
  return applyUnary(EXP, x);
}

export function log(x: number): number;
export function log(x: Dual): Dual;
export function log(x: Operand): Operand;
export function log(x: Operand): Operand {
  return applyUnary(LOG, x);
}

export function sin(x: number): number;
export function sin(x: Dual): Dual;
export function sin(x: Operand): Operand;
export function sin(x: Operand): Operand {
  return applyUnary(SIN, x);
}

export function cos(x: number): number;
export function cos(x: Dual): Dual;
export function cos(x: Operand): Operand;
export function cos(x: Operand): Operand {
  return applyUnary(COS, x);
}

export function tan(x: number): number;
export function tan(x: Dual): Dual;
export function tan(x: Operand): Operand;
export function tan(x: Operand): Operand {
  return applyUnary(TAN, x);
}

export function asin(x: number): number;
export function asin(x: Dual): Dual;
export function asin(x: Operand): Operand;
export function asin(x: Operand): Operand {
  return applyUnary(ASIN, x);
}

export function acos(x: number): number;
export function acos(x: Dual): Dual;
export function acos(x: Operand): Operand;
export function acos(x: Operand): Operand {
  return applyUnary(ACOS, x);
}

export function atan(x: number): number;
export function atan(x: Dual): Dual;
export function atan(x: Operand): Operand;
export function atan(x: Operand): Operand {
  return applyUnary(ATAN, x);
}

export function lt(a: Operand, b: Operand): boolean {
  return applyComparison(LT, a, b);
}

export function lte(a: Operand, b: Operand): boolean {
  return applyComparison(LTE, a, b);
}

export function gt(a: Operand, b: Operand): boolean {
  return applyComparison(GT, a, b);
}

export function gte(a: Operand, b: Operand): boolean {
  return applyComparison(GTE, a, b);
}

export function eq(a: Operand, b: Operand): boolean {
  return applyComparison(EQ, a, b);
}

export function neq(a: Operand, b: Operand): boolean {
  return applyComparison(NEQ, a, b);
}
