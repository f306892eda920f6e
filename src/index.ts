export { Dual } from './Dual';
export { DualArithmetic } from './DualArithmetic';
export { DualTrig } from './DualTrig';
export {
  add, sub, mul, div, pow, neg, abs, sqrt, exp, log,
  sin, cos, tan, asin, acos, atan,
  lt, lte, gt, gte, eq, neq,
  classify, lift,
} from './Dispatch';
export type { Operand, Classified, BinaryRule, UnaryRule, ComparisonRule } from './Dispatch';
export { AutodiffError, DivisionByZeroError, DomainError, UnsupportedOperandError } from './Errors';
export { derivative, valueAndDerivative, directionalDerivative, gradient } from './Derivatives';
export type { ScalarFunction, MultivariateFunction, GradientResult } from './Derivatives';
export { minimize, type GradientDescentOptions, type GradientDescentResult } from './GradientDescent';
