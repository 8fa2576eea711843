/**
 * Expression Simplifier
 * Term rewriting to a fixed point: constant folding, identity elimination,
 * distribution, coefficient folding, like-term combination and perfect squares.
 */

import { DivisionByZeroError, unknownOperator } from "./errors.ts";
import {
  type BinaryNode,
  type BinaryOperator,
  type ConstantNode,
  type Expression,
  type Operand,
  type UnaryNode,
  add,
  binary,
  compareExpressions,
  constant,
  expressionEquals,
  isConstant,
  mul,
  pow,
  toExpression,
  unary,
} from "./expression.ts";

/** Upper bound on rewrite rounds before `simplify` gives up and returns */
export const MAX_SIMPLIFY_ROUNDS = 100;

/** Options for `simplify` */
export interface SimplifyOptions {
  /** Maximum number of rewrite rounds (default: MAX_SIMPLIFY_ROUNDS) */
  maxIterations?: number;
}

// =============================================================================
// FIXED POINT
// =============================================================================

/**
 * Simplify an expression by repeating `simplifyOnce` until the tree stops
 * changing. If the round budget runs out first, the last tree is returned.
 *
 * @throws DivisionByZeroError when constant folding divides by an exact zero
 *
 * @example
 * simplify(add(x, x));                           // 2 * x
 * simplify(add(add(pow(x, 2), mul(mul(2, x), y)), pow(y, 2))); // (x + y)^2
 */
export function simplify(expr: Operand, options: SimplifyOptions = {}): Expression {
  const { maxIterations = MAX_SIMPLIFY_ROUNDS } = options;

  let current = toExpression(expr);
  for (let round = 0; round < maxIterations; round++) {
    const next = simplifyOnce(current);
    if (expressionEquals(next, current)) return next;
    current = next;
  }
  return current;
}

// =============================================================================
// ONE ROUND
// =============================================================================

/**
 * Apply one bottom-up rewrite round. Children are simplified before the parent
 * rule fires, except for distribution, which inspects the raw operands.
 */
export function simplifyOnce(expr: Expression): Expression {
  switch (expr.type) {
    case "symbol":
    case "constant":
      return expr;

    case "unary":
      return simplifyUnary(expr);

    case "binary":
      return simplifyBinary(expr);
  }
}

/** Simplify unary node */
function simplifyUnary(node: UnaryNode): Expression {
  const operand = simplifyOnce(node.operand);

  switch (node.operator) {
    case "negate":
      // -(-x) → x
      if (operand.type === "unary" && operand.operator === "negate") return operand.operand;
      break;

    case "sqrt":
      if (operand.type === "constant" && operand.value >= 0) return constant(Math.sqrt(operand.value));
      // sqrt(x^2) → |x|
      if (operand.type === "binary" && operand.operator === "pow" && isConstant(operand.right, 2)) {
        return unary("abs", operand.left);
      }
      break;

    case "abs":
      if (operand.type === "constant") return constant(Math.abs(operand.value));
      // |-x| → |x|
      if (operand.type === "unary" && operand.operator === "negate") {
        return unary("abs", operand.operand);
      }
      break;

    default:
      return unknownOperator(node.operator);
  }

  return unary(node.operator, operand);
}

/** Simplify binary node - distribution first, then folding, identities, terms */
function simplifyBinary(node: BinaryNode): Expression {
  const distributed = distribute(node);
  if (distributed) return simplifyOnce(distributed);

  const left = simplifyOnce(node.left);
  const right = simplifyOnce(node.right);

  if (left.type === "constant" && right.type === "constant") {
    return foldConstants(node.operator, left, right);
  }

  const associated = associateCoefficients(node.operator, left, right);
  if (associated) return simplifyOnce(associated);

  const identity = applyIdentity(node.operator, left, right);
  if (identity) return identity;

  const result = binary(node.operator, left, right);
  return node.operator === "add" ? combineLikeTerms(result) : result;
}

/** a*(b+c) → a*b + a*c and (a+b)*c → a*c + b*c, matched on raw operands */
function distribute(node: BinaryNode): Expression | null {
  if (node.operator !== "mul") return null;

  const { left, right } = node;
  if (right.type === "binary" && right.operator === "add") {
    return add(mul(left, right.left), mul(left, right.right));
  }
  if (left.type === "binary" && left.operator === "add") {
    return add(mul(left.left, right), mul(left.right, right));
  }
  return null;
}

/** Evaluate an operator over two constants */
function foldConstants(op: BinaryOperator, left: ConstantNode, right: ConstantNode): ConstantNode {
  switch (op) {
    case "add":
      return constant(left.value + right.value);
    case "sub":
      return constant(left.value - right.value);
    case "mul":
      return constant(left.value * right.value);
    case "div":
      if (right.value === 0) throw new DivisionByZeroError(left.value);
      return constant(left.value / right.value);
    case "pow":
      return constant(left.value ** right.value);
    default:
      return unknownOperator(op);
  }
}

/** (k1*x)*k2 → (k1*k2)*x and k1*(k2*x) → (k1*k2)*x */
function associateCoefficients(op: BinaryOperator, left: Expression, right: Expression): Expression | null {
  if (op !== "mul") return null;

  if (left.type === "binary" && left.operator === "mul" && left.left.type === "constant" && right.type === "constant") {
    return mul(left.left.value * right.value, left.right);
  }
  if (left.type === "constant" && right.type === "binary" && right.operator === "mul" && right.left.type === "constant") {
    return mul(left.value * right.left.value, right.right);
  }
  return null;
}

/** Identity and zero rules */
function applyIdentity(op: BinaryOperator, left: Expression, right: Expression): Expression | null {
  switch (op) {
    case "add":
      if (isConstant(left, 0)) return right;
      if (isConstant(right, 0)) return left;
      break;
    case "mul":
      if (isConstant(left, 0) || isConstant(right, 0)) return constant(0);
      if (isConstant(left, 1)) return right;
      if (isConstant(right, 1)) return left;
      break;
    case "sub":
      if (isConstant(right, 0)) return left;
      break;
    case "div":
      if (isConstant(right, 1)) return left;
      break;
    case "pow":
      if (isConstant(right, 0)) return constant(1);
      if (isConstant(right, 1)) return left;
      break;
  }
  return null;
}

// =============================================================================
// LIKE TERMS
// =============================================================================

/** Flatten a chain of additions into its terms, left to right */
export function flattenAddition(expr: Expression): Expression[] {
  if (expr.type === "binary" && expr.operator === "add") {
    return [...flattenAddition(expr.left), ...flattenAddition(expr.right)];
  }
  return [expr];
}

/** Flatten a chain of multiplications into its factors, left to right */
export function flattenMultiplication(expr: Expression): Expression[] {
  if (expr.type === "binary" && expr.operator === "mul") {
    return [...flattenMultiplication(expr.left), ...flattenMultiplication(expr.right)];
  }
  return [expr];
}

/** A term split into its numeric coefficient and symbolic base */
interface TermGroup {
  base: Expression;
  coefficient: number;
}

/** `k * base` yields (k, base); anything else has coefficient 1 */
function splitCoefficient(term: Expression): TermGroup {
  if (term.type === "binary" && term.operator === "mul" && term.left.type === "constant") {
    return { coefficient: term.left.value, base: term.right };
  }
  return { coefficient: 1, base: term };
}

/**
 * Combine like terms in a sum: a*x + b*x → (a+b)*x
 * Groups by structural equality of the base and keeps first-appearance order.
 */
function combineLikeTerms(expr: BinaryNode): Expression {
  const square = recognizePerfectSquare(expr);
  if (square) return square;

  const groups: TermGroup[] = [];
  for (const term of flattenAddition(expr)) {
    const { coefficient, base } = splitCoefficient(term);
    const group = groups.find((g) => expressionEquals(g.base, base));
    if (group) {
      group.coefficient += coefficient;
    } else {
      groups.push({ coefficient, base });
    }
  }

  const terms = groups
    .filter((g) => g.coefficient !== 0)
    .map((g) => (g.coefficient === 1 ? g.base : mul(g.coefficient, g.base)));

  const [first, ...rest] = terms;
  if (!first) return constant(0);
  return rest.reduce<Expression>((sum, term) => add(sum, term), first);
}

// =============================================================================
// PERFECT SQUARES
// =============================================================================

/** Base of `a^2` when the exponent is literally 2 */
function squaredBase(expr: Expression): Expression | null {
  if (expr.type === "binary" && expr.operator === "pow" && isConstant(expr.right, 2)) {
    return expr.left;
  }
  return null;
}

/** Check for `2*a*b` in any factor order and nesting */
function isDoubleProduct(expr: Expression, a: Expression, b: Expression): boolean {
  if (expr.type !== "binary" || expr.operator !== "mul") return false;

  let hasTwo = false;
  const remaining: Expression[] = [];
  for (const factor of flattenMultiplication(expr)) {
    if (!hasTwo && isConstant(factor, 2)) {
      hasTwo = true;
    } else {
      remaining.push(factor);
    }
  }

  const [p, q] = remaining;
  if (!hasTwo || remaining.length !== 2 || !p || !q) return false;
  return (
    (expressionEquals(p, a) && expressionEquals(q, b)) ||
    (expressionEquals(p, b) && expressionEquals(q, a))
  );
}

const PERMUTATIONS: ReadonlyArray<readonly [number, number, number]> = [
  [0, 1, 2],
  [0, 2, 1],
  [1, 0, 2],
  [1, 2, 0],
  [2, 0, 1],
  [2, 1, 0],
];

/** a^2 + 2*a*b + b^2 → (a+b)^2, for sums of exactly three terms */
function recognizePerfectSquare(expr: BinaryNode): Expression | null {
  const terms = flattenAddition(expr);
  if (terms.length !== 3) return null;

  for (const [i, j, k] of PERMUTATIONS) {
    const squareA = terms[i];
    const product = terms[j];
    const squareB = terms[k];
    if (!squareA || !product || !squareB) continue;

    const a = squaredBase(squareA);
    const b = squaredBase(squareB);
    if (a && b && isDoubleProduct(product, a, b)) {
      const roots: [Expression, Expression] = compareExpressions(a, b) <= 0 ? [a, b] : [b, a];
      return pow(add(roots[0], roots[1]), 2);
    }
  }
  return null;
}
