/**
 * Base class for every failure raised while evaluating a differentiable expression.
 * @public
 */
export class AutodiffError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AutodiffError';
  }
}

/**
 * Raised when a divisor's value is exactly zero.
 * @public
 */
export class DivisionByZeroError extends AutodiffError {
  constructor(message: string) {
    super(message);
    this.name = 'DivisionByZeroError';
  }
}

/**
 * Raised when an operation is evaluated outside the domain of its function,
 * or when its value or derivative would not be a finite number.
 * @public
 */
export class DomainError extends AutodiffError {
  constructor(message: string) {
    super(message);
    this.name = 'DomainError';
  }
}

/**
 * Raised by the dispatch layer for an operand that is neither a Dual nor a number.
 * @public
 */
export class UnsupportedOperandError extends AutodiffError {
  readonly operandKind: string;

  constructor(operandKind: string, operation: string) {
    super(`Unsupported operand kind for ${operation}: ${operandKind}`);
    this.name = 'UnsupportedOperandError';
    this.operandKind = operandKind;
  }
}
