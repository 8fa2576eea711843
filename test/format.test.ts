/**
 * Unit tests for expression formatting
 */

import { describe, expect, test } from "vitest";
import {
  abs,
  add,
  constant,
  div,
  formatExpression,
  mul,
  neg,
  parseExpression,
  pow,
  sqrt,
  sub,
  symbols,
} from "../src/lib/symbolic/index.ts";

const [x, y] = symbols("x", "y");

describe("formatExpression", () => {
  test("uses minimal parentheses", () => {
    expect(formatExpression(add(mul(2, x), 3))).toBe("2 * x + 3");
    expect(formatExpression(pow(add(x, y), 2))).toBe("(x + y)^2");
    expect(formatExpression(div(1, mul(2, sqrt(x))))).toBe("1 / (2 * sqrt(x))");
    expect(formatExpression(sub(x, add(y, 1)))).toBe("x - (y + 1)");
    expect(formatExpression(sub(sub(x, y), 1))).toBe("x - y - 1");
  });

  test("groups powers to the right", () => {
    expect(formatExpression(pow(x, pow(2, 3)))).toBe("x^2^3");
    expect(formatExpression(pow(pow(x, 2), 3))).toBe("(x^2)^3");
  });

  test("negation and negative constants", () => {
    expect(formatExpression(neg(pow(x, 2)))).toBe("-x^2");
    expect(formatExpression(neg(add(x, 1)))).toBe("-(x + 1)");
    expect(formatExpression(mul(2, -3))).toBe("2 * -3");
    expect(formatExpression(pow(x, -1))).toBe("x^(-1)");
  });

  test("functions and special values", () => {
    expect(formatExpression(abs(sub(x, 1)))).toBe("abs(x - 1)");
    expect(formatExpression(constant(Number.NaN))).toBe("NaN");
    expect(formatExpression(constant(Number.POSITIVE_INFINITY))).toBe("Infinity");
  });

  test("compact output without spaces", () => {
    expect(formatExpression(add(mul(2, x), 3), { spaces: false })).toBe("2*x+3");
  });

  test("Unicode output", () => {
    const unicode = { unicode: true };
    expect(formatExpression(pow(add(x, y), 2), unicode)).toBe("(x + y)²");
    expect(formatExpression(sub(mul(2, x), div(1, y)), unicode)).toBe("2 × x − 1 ÷ y");
    expect(formatExpression(abs(x), unicode)).toBe("|x|");
    expect(formatExpression(sqrt(x), unicode)).toBe("√x");
    expect(formatExpression(sqrt(add(x, 1)), unicode)).toBe("√(x + 1)");
    expect(formatExpression(pow(x, 12), unicode)).toBe("x^12");
    expect(formatExpression(neg(x), unicode)).toBe("−x");
  });

  test("ASCII output parses back to the same tree", () => {
    const trees = [
      add(add(pow(x, 2), mul(3, x)), 2),
      div(sub(pow(x, 2), 1), sub(x, 1)),
      neg(pow(x, 2)),
      pow(2, pow(3, 2)),
      mul(2, abs(sub(x, y))),
    ];
    for (const tree of trees) {
      expect(parseExpression(formatExpression(tree)).expression).toEqual(tree);
    }
  });
});
