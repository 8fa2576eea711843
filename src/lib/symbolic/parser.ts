/**
 * Expression Parser (Shunting-Yard Algorithm)
 * Builds expression trees from text, respecting precedence and associativity
 */

import { type BinaryOperator, type Expression, type UnaryOperator, binary, constant, pow, symbol, unary } from "./expression.ts";
import {
  BINARY_PRECEDENCE,
  FUNCTION_PRECEDENCE,
  NEGATE_PRECEDENCE,
  binaryOperatorFor,
  functionFor,
  isRightAssociative,
  postfixExponentFor,
  prefixOperatorFor,
} from "./operators.ts";
import { type Token, tokenizeExpression } from "./tokenizer.ts";

/** Result of parsing */
export interface ParseResult {
  expression: Expression | null;
  error?: string;
}

/** Pending entry on the operator stack */
type StackEntry =
  | { kind: "binary"; operator: BinaryOperator; token: Token }
  /** `operator` is null for a unary plus, which is dropped */
  | { kind: "prefix"; operator: UnaryOperator | null; token: Token }
  | { kind: "function"; operator: UnaryOperator; token: Token }
  | { kind: "paren"; token: Token };

interface ParserState {
  output: Expression[];
  operators: StackEntry[];
}

/**
 * Parse expression text into an expression tree
 *
 * @example
 * parseExpression("x^2 + 3x + 2").expression;
 * // add(add(pow(x, 2), mul(3, x)), 2)
 * parseExpression("2 +").error; // "Missing operands for binary operator +"
 */
export function parseExpression(text: string): ParseResult {
  const { tokens, errors } = tokenizeExpression(text);
  if (errors.length > 0) return { expression: null, error: errors[0] };
  return buildExpression(tokens);
}

/** Build an expression tree from tokens */
export function buildExpression(tokens: Token[]): ParseResult {
  if (tokens.length === 0) {
    return { expression: null, error: "Empty expression" };
  }

  const state: ParserState = { output: [], operators: [] };

  for (const token of tokens) {
    const error = processToken(token, state);
    if (error) return { expression: null, error };
  }

  // Pop remaining operators
  for (let entry = state.operators.pop(); entry; entry = state.operators.pop()) {
    if (entry.kind === "paren") return { expression: null, error: "Mismatched parentheses" };
    const error = applyEntry(entry, state.output);
    if (error) return { expression: null, error };
  }

  const [expression] = state.output;
  if (state.output.length !== 1 || !expression) {
    return { expression: null, error: "Invalid expression structure" };
  }
  return { expression };
}

/** Process a single token; returns an error message on failure */
function processToken(token: Token, state: ParserState): string | null {
  switch (token.type) {
    case "number":
      state.output.push(constant(Number(token.value)));
      return null;

    case "variable":
      state.output.push(symbol(token.value));
      return null;

    case "function": {
      const operator = functionFor(token.value);
      if (!operator) return `Unknown function: ${token.value}`;
      state.operators.push({ kind: "function", operator, token });
      return null;
    }

    case "operator":
      return processOperator(token, state);

    case "paren":
      return processParen(token, state);

    case "unknown":
      return `Unknown token: ${token.value}`;
  }
}

function precedence(entry: StackEntry): number {
  switch (entry.kind) {
    case "binary":
      return BINARY_PRECEDENCE[entry.operator];
    case "prefix":
      return entry.operator === "sqrt" ? FUNCTION_PRECEDENCE : NEGATE_PRECEDENCE;
    case "function":
      return FUNCTION_PRECEDENCE;
    case "paren":
      return 0;
  }
}

/** Process operator token */
function processOperator(token: Token, state: ParserState): string | null {
  // Postfix powers bind tightest and apply to the operand just emitted
  const exponent = postfixExponentFor(token.value);
  if (exponent !== null) {
    const operand = state.output.pop();
    if (!operand) return `Missing operand for ${token.value}`;
    state.output.push(pow(operand, exponent));
    return null;
  }

  if (token.arity === 1) {
    state.operators.push({ kind: "prefix", operator: prefixOperatorFor(token.value), token });
    return null;
  }

  const operator = binaryOperatorFor(token.value);
  if (!operator) return `Unexpected operator '${token.value}'`;

  // Pop operators of higher (or equal, for left-associative) precedence
  const current = BINARY_PRECEDENCE[operator];
  for (let top = state.operators.at(-1); top && top.kind !== "paren" && top.kind !== "function"; top = state.operators.at(-1)) {
    const topPrec = precedence(top);
    const shouldPop = topPrec > current || (topPrec === current && !isRightAssociative(operator));
    if (!shouldPop) break;

    state.operators.pop();
    const error = applyEntry(top, state.output);
    if (error) return error;
  }

  state.operators.push({ kind: "binary", operator, token });
  return null;
}

/** Process parenthesis token */
function processParen(token: Token, state: ParserState): string | null {
  if (/[([{]/.test(token.value)) {
    state.operators.push({ kind: "paren", token });
    return null;
  }

  // Closing paren - pop until matching open
  for (let top = state.operators.pop(); top; top = state.operators.pop()) {
    if (top.kind === "paren") {
      // A function name owns the group it precedes
      const owner = state.operators.at(-1);
      if (owner?.kind === "function") {
        state.operators.pop();
        return applyEntry(owner, state.output);
      }
      return null;
    }
    const error = applyEntry(top, state.output);
    if (error) return error;
  }
  return "Mismatched parentheses";
}

/** Apply a stack entry to operands on the output stack */
function applyEntry(entry: StackEntry, output: Expression[]): string | null {
  switch (entry.kind) {
    case "paren":
      return "Mismatched parentheses";

    case "prefix":
    case "function": {
      const operand = output.pop();
      if (!operand) return `Missing operand for unary operator ${entry.token.value}`;
      if (entry.operator === null) {
        output.push(operand);
      } else if (entry.operator === "negate" && operand.type === "constant") {
        output.push(constant(-operand.value));
      } else {
        output.push(unary(entry.operator, operand));
      }
      return null;
    }

    case "binary": {
      const right = output.pop();
      const left = output.pop();
      if (!left || !right) return `Missing operands for binary operator ${entry.token.value}`;
      output.push(binary(entry.operator, left, right));
      return null;
    }
  }
}
