/**
 * Substitution and numeric evaluation of expressions
 */

import {
  type Expression,
  type Operand,
  type Variable,
  binary,
  constant,
  toExpression,
  unary,
  variableName,
} from "./expression.ts";
import { simplifyOnce } from "./simplify.ts";

/**
 * Substitute `value` for every occurrence of `variable` and fold each node with
 * one simplification round as the recursion unwinds. Returns a constant when the
 * expression is fully determined, otherwise the residual tree.
 *
 * @throws DivisionByZeroError when a denominator folds to an exact zero
 *
 * @example
 * evaluate(add(add(pow(x, 2), mul(3, x)), 2), "x", 2); // constant 12
 * evaluate(add(x, y), "x", 1);                         // 1 + y
 */
export function evaluate(expr: Operand, variable: Variable, value: number): Expression {
  return evaluateNode(toExpression(expr), variableName(variable), value);
}

function evaluateNode(expr: Expression, name: string, value: number): Expression {
  switch (expr.type) {
    case "symbol":
      return expr.name === name ? constant(value) : expr;
    case "constant":
      return expr;
    case "unary":
      return simplifyOnce(unary(expr.operator, evaluateNode(expr.operand, name, value)));
    case "binary":
      return simplifyOnce(
        binary(expr.operator, evaluateNode(expr.left, name, value), evaluateNode(expr.right, name, value)),
      );
  }
}

/** Check whether `variable` occurs anywhere in the expression */
export function hasVariable(expr: Expression, variable: Variable): boolean {
  const name = variableName(variable);

  function search(node: Expression): boolean {
    switch (node.type) {
      case "symbol":
        return node.name === name;
      case "constant":
        return false;
      case "unary":
        return search(node.operand);
      case "binary":
        return search(node.left) || search(node.right);
    }
  }

  return search(expr);
}

/** Collect all symbol names in an expression, sorted */
export function freeVariables(expr: Expression): string[] {
  const names = new Set<string>();

  function traverse(node: Expression): void {
    switch (node.type) {
      case "symbol":
        names.add(node.name);
        break;
      case "constant":
        break;
      case "unary":
        traverse(node.operand);
        break;
      case "binary":
        traverse(node.left);
        traverse(node.right);
        break;
    }
  }

  traverse(expr);
  return Array.from(names).sort();
}
