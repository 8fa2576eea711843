/**
 * Operator Tables
 * Mapping between operator characters (ASCII + Unicode) and expression operator
 * tags, with precedence and associativity for parsing and formatting
 */

import type { BinaryOperator, UnaryOperator } from "./expression.ts";

/** Pattern to match a single operator character */
export const SINGLE_OPERATOR_PATTERN = /^[+\-*/^×÷−·√²³]$/;

/** Binary operator characters and their tags */
export const BINARY_OPERATOR_SYMBOLS: Record<string, BinaryOperator> = {
  "+": "add",
  "-": "sub",
  "−": "sub", // Unicode minus
  "*": "mul",
  "×": "mul",
  "·": "mul", // Middle dot
  "/": "div",
  "÷": "div",
  "^": "pow",
};

/** Prefix operator characters and their tags ("+" is accepted and dropped) */
export const PREFIX_OPERATOR_SYMBOLS: Record<string, UnaryOperator> = {
  "-": "negate",
  "−": "negate",
  "√": "sqrt",
};

/** Postfix power characters and the exponent they stand for */
export const POSTFIX_EXPONENTS: Record<string, number> = {
  "²": 2,
  "³": 3,
};

/** Function names usable as `name(argument)` */
export const FUNCTION_NAMES: Record<string, UnaryOperator> = {
  sqrt: "sqrt",
  abs: "abs",
};

/**
 * Precedence levels (higher = binds tighter)
 * - 1: addition/subtraction
 * - 2: multiplication/division
 * - 3: unary minus, so that -x^2 reads as -(x^2)
 * - 4: exponentiation
 * - 5: functions and √
 */
export const BINARY_PRECEDENCE: Record<BinaryOperator, number> = {
  add: 1,
  sub: 1,
  mul: 2,
  div: 2,
  pow: 4,
};

export const NEGATE_PRECEDENCE = 3;
export const FUNCTION_PRECEDENCE = 5;

/** Right-associative operators: 2^3^2 = 2^(3^2) */
export const RIGHT_ASSOCIATIVE = new Set<BinaryOperator>(["pow"]);

/** Operators that are unary at the start of an expression or after another operator */
export const AMBIGUOUS_OPERATORS = new Set(["-", "−", "+"]);

/** Check if a character is a recognized operator */
export function isOperatorCharacter(char: string): boolean {
  return SINGLE_OPERATOR_PATTERN.test(char);
}

/** Check if a character is a postfix power (², ³) */
export function isPostfixOperator(char: string): boolean {
  return Object.hasOwn(POSTFIX_EXPONENTS, char);
}

/** Own-property lookup, so names like "constructor" never hit the prototype */
function lookup<T>(table: Record<string, T>, key: string): T | null {
  return Object.hasOwn(table, key) ? (table[key] ?? null) : null;
}

export function binaryOperatorFor(char: string): BinaryOperator | null {
  return lookup(BINARY_OPERATOR_SYMBOLS, char);
}

export function prefixOperatorFor(char: string): UnaryOperator | null {
  return lookup(PREFIX_OPERATOR_SYMBOLS, char);
}

export function postfixExponentFor(char: string): number | null {
  return lookup(POSTFIX_EXPONENTS, char);
}

export function functionFor(name: string): UnaryOperator | null {
  return lookup(FUNCTION_NAMES, name);
}

/**
 * Determine operator arity based on context
 * @param char - The operator character
 * @param afterOperator - Whether this operator follows another operator or is at start
 */
export function getOperatorArityInContext(char: string, afterOperator: boolean): 1 | 2 | null {
  if (!isOperatorCharacter(char)) return null;
  if (char === "√" || isPostfixOperator(char)) return 1;
  if (afterOperator && AMBIGUOUS_OPERATORS.has(char)) return 1;
  return 2;
}

/** Check if a binary operator is right-associative */
export function isRightAssociative(op: BinaryOperator): boolean {
  return RIGHT_ASSOCIATIVE.has(op);
}
