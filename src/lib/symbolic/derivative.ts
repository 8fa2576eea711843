/**
 * Symbolic differentiation by structural recursion
 */

import { unknownOperator } from "./errors.ts";
import {
  type BinaryNode,
  type Expression,
  type Operand,
  type UnaryNode,
  type Variable,
  abs,
  add,
  constant,
  div,
  mul,
  neg,
  pow,
  sqrt,
  sub,
  toExpression,
  variableName,
} from "./expression.ts";
import { simplify } from "./simplify.ts";

/**
 * Differentiate an expression with respect to a variable and simplify the result
 *
 * The power rule treats the exponent as a constant, so expressions like `x^x`
 * get a wrong derivative. This is a known limitation and is not detected.
 *
 * @example
 * derivative(add(add(pow(x, 2), mul(3, x)), 2), "x"); // 2 * x + 3
 * derivative(5, "x");                                  // 0
 */
export function derivative(expr: Operand, variable: Variable): Expression {
  return simplify(rawDerivative(toExpression(expr), variableName(variable)));
}

/** Unsimplified derivative tree */
export function rawDerivative(expr: Expression, name: string): Expression {
  switch (expr.type) {
    case "constant":
      return constant(0);
    case "symbol":
      return constant(expr.name === name ? 1 : 0);
    case "unary":
      return differentiateUnary(expr, name);
    case "binary":
      return differentiateBinary(expr, name);
  }
}

function differentiateBinary(node: BinaryNode, name: string): Expression {
  const f = node.left;
  const g = node.right;

  switch (node.operator) {
    case "add":
      return add(rawDerivative(f, name), rawDerivative(g, name));
    case "sub":
      return sub(rawDerivative(f, name), rawDerivative(g, name));
    case "mul":
      // f'g + fg'
      return add(mul(rawDerivative(f, name), g), mul(f, rawDerivative(g, name)));
    case "div":
      // (f'g - fg') / g^2
      return div(sub(mul(rawDerivative(f, name), g), mul(f, rawDerivative(g, name))), pow(g, 2));
    case "pow":
      // n * f^(n-1) * f'
      return mul(mul(g, pow(f, sub(g, 1))), rawDerivative(f, name));
    default:
      return unknownOperator(node.operator);
  }
}

function differentiateUnary(node: UnaryNode, name: string): Expression {
  const f = node.operand;

  switch (node.operator) {
    case "negate":
      return neg(rawDerivative(f, name));
    case "sqrt":
      // f' / (2 * sqrt(f))
      return div(rawDerivative(f, name), mul(2, sqrt(f)));
    case "abs":
      // f' * f / |f|
      return div(mul(rawDerivative(f, name), f), abs(f));
    default:
      return unknownOperator(node.operator);
  }
}
