/**
 * Unit tests for symbolic differentiation
 */

import { describe, expect, test } from "vitest";
import {
  type Expression,
  UnknownOperatorError,
  abs,
  add,
  constant,
  derivative,
  div,
  mul,
  neg,
  pow,
  rawDerivative,
  sqrt,
  symbols,
} from "../src/lib/symbolic/index.ts";

const [x, y] = symbols("x", "y");

describe("derivative", () => {
  test("constants and other variables differentiate to zero", () => {
    expect(derivative(5, "x")).toEqual(constant(0));
    expect(derivative(y, "x")).toEqual(constant(0));
    expect(derivative(mul(3, y), "x")).toEqual(constant(0));
  });

  test("polynomial", () => {
    const expr = add(add(pow(x, 2), mul(3, x)), 2);
    expect(derivative(expr, "x")).toEqual(add(mul(2, x), 3));
  });

  test("accepts the variable as a symbol", () => {
    expect(derivative(pow(x, 2), x)).toEqual(mul(2, x));
  });

  test("product rule", () => {
    expect(derivative(mul(x, x), "x")).toEqual(mul(2, x));
  });

  test("power rule", () => {
    expect(derivative(pow(x, 3), "x")).toEqual(mul(3, pow(x, 2)));
  });

  test("quotient rule", () => {
    expect(derivative(div(1, x), "x")).toEqual(div(-1, pow(x, 2)));
  });

  test("negation keeps the negated constant", () => {
    expect(derivative(neg(x), "x")).toEqual(neg(constant(1)));
  });

  test("sqrt and abs", () => {
    expect(derivative(sqrt(x), "x")).toEqual(div(1, mul(2, sqrt(x))));
    expect(derivative(abs(x), "x")).toEqual(div(x, abs(x)));
  });

  test("rejects operators outside the closed set", () => {
    const bogus: Expression = JSON.parse('{"type":"unary","operator":"sin","operand":{"type":"symbol","name":"x"}}');
    expect(() => derivative(bogus, "x")).toThrow(UnknownOperatorError);
    expect(() => derivative(bogus, "x")).toThrow("Unknown operator: sin");
  });
});

describe("rawDerivative", () => {
  test("returns the unsimplified tree", () => {
    expect(rawDerivative(x, "x")).toEqual(constant(1));
    expect(rawDerivative(add(x, 1), "x")).toEqual(add(1, 0));
    expect(rawDerivative(mul(x, y), "x")).toEqual(add(mul(1, y), mul(x, 0)));
  });
});
