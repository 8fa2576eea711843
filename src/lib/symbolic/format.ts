/**
 * Expression Formatting
 * Renders expression trees back to text with minimal parentheses
 */

import type { BinaryOperator, Expression, UnaryNode } from "./expression.ts";
import { BINARY_PRECEDENCE, NEGATE_PRECEDENCE, isRightAssociative } from "./operators.ts";

/** Options for expression formatting */
export interface FormatOptions {
  /** Use Unicode operators (× ÷ −, √, |x|, superscript exponents) */
  unicode?: boolean;
  /** Add spaces around binary operators other than ^ */
  spaces?: boolean;
}

/** Precedence of anything that never needs parentheses */
const ATOM_PRECEDENCE = 6;

const ASCII_OPERATORS: Record<BinaryOperator, string> = {
  add: "+",
  sub: "-",
  mul: "*",
  div: "/",
  pow: "^",
};

const UNICODE_OPERATORS: Record<BinaryOperator, string> = {
  add: "+",
  sub: "−",
  mul: "×",
  div: "÷",
  pow: "^",
};

const SUPERSCRIPT_DIGITS = "⁰¹²³⁴⁵⁶⁷⁸⁹";

function precedenceOf(expr: Expression): number {
  switch (expr.type) {
    case "symbol":
      return ATOM_PRECEDENCE;
    case "constant":
      return expr.value < 0 ? NEGATE_PRECEDENCE : ATOM_PRECEDENCE;
    case "unary":
      return expr.operator === "negate" ? NEGATE_PRECEDENCE : ATOM_PRECEDENCE;
    case "binary":
      return BINARY_PRECEDENCE[expr.operator];
  }
}

function formatNumber(value: number, unicode: boolean): string {
  if (value === Infinity) return unicode ? "∞" : "Infinity";
  if (value === -Infinity) return unicode ? "−∞" : "-Infinity";
  const text = String(value);
  return unicode ? text.replace("-", "−") : text;
}

/**
 * Format an expression as human-readable text
 * ASCII output (the default) can be read back by `parseExpression`.
 *
 * @example
 * formatExpression(add(mul(2, x), 3));                      // "2 * x + 3"
 * formatExpression(pow(add(x, y), 2), { unicode: true });   // "(x + y)²"
 * formatExpression(div(1, mul(2, sqrt(x))));                // "1 / (2 * sqrt(x))"
 */
export function formatExpression(expr: Expression, options: FormatOptions = {}): string {
  const { unicode = false, spaces = true } = options;

  function wrap(child: Expression, needsParens: boolean): string {
    const text = fmt(child);
    return needsParens ? `(${text})` : text;
  }

  function fmtUnary(node: UnaryNode): string {
    const operand = fmt(node.operand);
    switch (node.operator) {
      case "negate": {
        const sign = unicode ? "−" : "-";
        return precedenceOf(node.operand) <= NEGATE_PRECEDENCE ? `${sign}(${operand})` : `${sign}${operand}`;
      }
      case "sqrt":
        if (!unicode) return `sqrt(${operand})`;
        return precedenceOf(node.operand) === ATOM_PRECEDENCE ? `√${operand}` : `√(${operand})`;
      case "abs":
        return unicode ? `|${operand}|` : `abs(${operand})`;
    }
  }

  function fmt(node: Expression): string {
    switch (node.type) {
      case "symbol":
        return node.name;
      case "constant":
        return formatNumber(node.value, unicode);
      case "unary":
        return fmtUnary(node);
      case "binary": {
        const prec = BINARY_PRECEDENCE[node.operator];
        const rightAssoc = isRightAssociative(node.operator);
        const leftPrec = precedenceOf(node.left);
        const rightPrec = precedenceOf(node.right);

        const left = wrap(node.left, leftPrec < prec || (rightAssoc && leftPrec === prec));

        // Small non-negative integer exponents as superscripts: x²
        if (
          unicode &&
          node.operator === "pow" &&
          node.right.type === "constant" &&
          Number.isInteger(node.right.value) &&
          node.right.value >= 0 &&
          node.right.value <= 9
        ) {
          return `${left}${SUPERSCRIPT_DIGITS.charAt(node.right.value)}`;
        }

        const right = wrap(node.right, rightPrec < prec || (rightPrec === prec && !rightAssoc));
        const op = (unicode ? UNICODE_OPERATORS : ASCII_OPERATORS)[node.operator];
        if (node.operator === "pow" || !spaces) return `${left}${op}${right}`;
        return `${left} ${op} ${right}`;
      }
    }
  }

  return fmt(expr);
}
