import { z } from "zod";
import { formatExpression, simplify } from "../lib/symbolic/index.ts";
import { type ToolContext, expressionParam, parseOrThrow, runEngine } from "./shared.ts";

const SimplifySchema = z.object({
  expression: expressionParam,
});

type SimplifyArgs = z.infer<typeof SimplifySchema>;

/**
 * Simplify tool - rewrites an expression to its fixed point
 */
export const simplifyTool = {
  name: "simplify",
  description: `Simplify an algebraic expression.

Folds constants, removes identities (x+0, 1*x, x^1), distributes products over sums,
combines like terms (2x + 3x → 5x) and recognizes perfect squares (x² + 2xy + y² → (x+y)²).

Operators: + - * / ^, unary minus, sqrt(), abs(), implicit multiplication (2x).`,

  parameters: SimplifySchema,

  execute: async (args: SimplifyArgs, ctx: ToolContext): Promise<string> => {
    const input = parseOrThrow(args.expression);
    ctx.log.debug("Parsed expression", { expression: formatExpression(input) });

    const result = runEngine(() => simplify(input));
    ctx.log.info("Simplified expression", { result: formatExpression(result) });

    return [
      `**Simplified**`,
      `- Input: \`${formatExpression(input)}\``,
      `- Result: \`${formatExpression(result)}\``,
    ].join("\n");
  },
};
