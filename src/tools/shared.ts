import { type Context, UserError } from "fastmcp";
import { z } from "zod";
import { type Expression, SymbolicError, parseExpression } from "../lib/symbolic/index.ts";

/** The part of the FastMCP request context the tools use */
export type ToolContext = Pick<Context<Record<string, unknown> | undefined>, "log">;

/** Shared parameter schemas */
export const expressionParam = z
  .string()
  .min(1)
  .describe("Expression text, e.g. \"x^2 + 3x + 2\", \"(x^2 - 1)/(x - 1)\", \"sqrt(x)\"");

export const variableParam = z
  .string()
  .regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, "Variable must be an identifier")
  .default("x")
  .describe("Variable name");

/** Parse expression text, reporting failures to the client */
export function parseOrThrow(text: string): Expression {
  const { expression, error } = parseExpression(text);
  if (!expression) {
    throw new UserError(`Could not parse "${text}": ${error ?? "invalid expression"}`);
  }
  return expression;
}

/** Run an engine operation, turning engine errors into client-facing errors */
export function runEngine<T>(operation: () => T): T {
  try {
    return operation();
  } catch (error) {
    if (error instanceof SymbolicError) throw new UserError(error.message);
    throw error;
  }
}
