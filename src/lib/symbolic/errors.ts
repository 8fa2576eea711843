/**
 * Symbolic engine errors
 * Only these are allowed to escape the engine; numeric sampling failures are
 * reported as values by the limit analyzer instead.
 */

/** Base class for errors raised by the symbolic engine */
export class SymbolicError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SymbolicError";
  }
}

/** Raised when constant folding meets a division by an exact zero */
export class DivisionByZeroError extends SymbolicError {
  constructor(public readonly numerator: number) {
    super("Division by zero");
    this.name = "DivisionByZeroError";
  }
}

/** Raised when an operator tag outside the closed enumeration reaches a pass */
export class UnknownOperatorError extends SymbolicError {
  constructor(public readonly operator: string) {
    super(`Unknown operator: ${operator}`);
    this.name = "UnknownOperatorError";
  }
}

/**
 * Exhaustiveness guard for switches over operator tags.
 * Unreachable for typed callers; throws for values smuggled in at runtime.
 */
export function unknownOperator(operator: never): never {
  throw new UnknownOperatorError(String(operator));
}
