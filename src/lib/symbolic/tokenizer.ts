/**
 * Expression Tokenizer
 * Splits expression text into tokens with operator metadata
 */

import { functionFor, getOperatorArityInContext, isOperatorCharacter, isPostfixOperator } from "./operators.ts";

// =============================================================================
// TOKEN TYPES
// =============================================================================

/** Token types for expression tokenization */
export type TokenType = "number" | "variable" | "function" | "operator" | "paren" | "unknown";

/** A single token from an expression */
export interface Token {
  type: TokenType;
  value: string;
  position: number;
  /** For operators: arity in context (1 or 2) */
  arity?: 1 | 2;
}

/** Result of tokenizing an expression */
export interface TokenizeResult {
  tokens: Token[];
  /** Any errors encountered during tokenization */
  errors: string[];
}

// =============================================================================
// TOKENIZER
// =============================================================================

/**
 * Tokenize an expression into structured tokens
 *
 * @example
 * tokenizeExpression("2x - -1")
 * // [
 * //   { type: "number", value: "2", position: 0 },
 * //   { type: "operator", value: "*", position: 1, arity: 2 },
 * //   { type: "variable", value: "x", position: 1 },
 * //   { type: "operator", value: "-", position: 3, arity: 2 },
 * //   { type: "operator", value: "-", position: 5, arity: 1 },
 * //   { type: "number", value: "1", position: 6 },
 * // ]
 */
export function tokenizeExpression(expr: string): TokenizeResult {
  const tokens: Token[] = [];
  const errors: string[] = [];
  let i = 0;
  let lastWasOperand = false; // Start as if after an operator (for unary detection)

  while (i < expr.length) {
    const char = expr.charAt(i);
    const startPos = i;

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    // Parentheses and brackets
    if (/[()[\]{}]/.test(char)) {
      tokens.push({ type: "paren", value: char, position: startPos });
      lastWasOperand = /[)\]}]/.test(char);
      i++;
      continue;
    }

    if (isOperatorCharacter(char)) {
      const arity = getOperatorArityInContext(char, !lastWasOperand) ?? undefined;
      tokens.push({ type: "operator", value: char, position: startPos, arity });
      // Postfix powers leave an operand behind them
      lastWasOperand = isPostfixOperator(char);
      i++;
      continue;
    }

    // Numbers (including decimals and scientific notation)
    if (/[\d.]/.test(char)) {
      let numStr = "";
      while (i < expr.length) {
        const c = expr.charAt(i);
        if (/[\d.]/.test(c)) {
          numStr += c;
          i++;
        } else if (/[eE]/.test(c) && /^(\d|[+-]\d)/.test(expr.slice(i + 1))) {
          // Scientific notation: 1e10, 2.5e-3
          numStr += c + expr.charAt(i + 1);
          i += 2;
        } else {
          break;
        }
      }
      if (Number.isNaN(Number(numStr))) {
        errors.push(`Invalid number '${numStr}' at position ${startPos}`);
        tokens.push({ type: "unknown", value: numStr, position: startPos });
      } else {
        tokens.push({ type: "number", value: numStr, position: startPos });
      }
      lastWasOperand = true;
      continue;
    }

    // Identifiers: variables, or function names directly followed by "("
    if (/[a-zA-Z_]/.test(char)) {
      let name = "";
      while (i < expr.length && /[a-zA-Z0-9_]/.test(expr.charAt(i))) {
        name += expr.charAt(i);
        i++;
      }
      const isCall = functionFor(name) !== null && /^\s*\(/.test(expr.slice(i));
      tokens.push({ type: isCall ? "function" : "variable", value: name, position: startPos });
      lastWasOperand = !isCall;
      continue;
    }

    tokens.push({ type: "unknown", value: char, position: startPos });
    errors.push(`Unknown character '${char}' at position ${startPos}`);
    i++;
  }

  return { tokens: insertImplicitMultiplication(tokens), errors };
}

/** Whether a token ends an operand */
function endsOperand(token: Token): boolean {
  return (
    token.type === "number" ||
    token.type === "variable" ||
    (token.type === "paren" && /[)\]}]/.test(token.value)) ||
    (token.type === "operator" && isPostfixOperator(token.value))
  );
}

/** Whether a token starts an operand */
function startsOperand(token: Token): boolean {
  return (
    token.type === "number" ||
    token.type === "variable" ||
    token.type === "function" ||
    (token.type === "paren" && /[([{]/.test(token.value)) ||
    (token.type === "operator" && token.value === "√")
  );
}

/**
 * Insert implicit multiplication operators between adjacent operands
 * Handles: 2x, x(y), (a)(b), (a)2, x²y, 2sqrt(x), 2√x
 * @internal
 */
function insertImplicitMultiplication(tokens: Token[]): Token[] {
  const result: Token[] = [];

  tokens.forEach((curr, i) => {
    result.push(curr);
    const next = tokens[i + 1];
    if (next && endsOperand(curr) && startsOperand(next)) {
      result.push({
        type: "operator",
        value: "*",
        position: curr.position + curr.value.length,
        arity: 2,
      });
    }
  });

  return result;
}
