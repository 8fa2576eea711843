/**
 * Symbolic module barrel export
 * Re-exports the expression model, rewriting passes, limit analysis, parser and formatter
 */

export * from "./derivative.ts";
export * from "./errors.ts";
export * from "./evaluate.ts";
export * from "./expression.ts";
export * from "./format.ts";
export * from "./limits.ts";
export * from "./operators.ts";
export * from "./parser.ts";
export * from "./simplify.ts";
export * from "./tokenizer.ts";
