import { z } from "zod";
import { evaluate, formatExpression, freeVariables } from "../lib/symbolic/index.ts";
import { type ToolContext, expressionParam, parseOrThrow, runEngine, variableParam } from "./shared.ts";

const EvaluateSchema = z.object({
  expression: expressionParam,
  variable: variableParam,
  value: z.number().describe("Value substituted for the variable"),
});

type EvaluateArgs = z.infer<typeof EvaluateSchema>;

/**
 * Evaluate tool - substitutes a value and folds what it can
 */
export const evaluateTool = {
  name: "evaluate",
  description: `Substitute a number for a variable and fold the expression.

Returns a number when the expression is fully determined, otherwise the partially
simplified residual and the variables it still contains. Division by an exact zero is an error.`,

  parameters: EvaluateSchema,

  execute: async (args: EvaluateArgs, ctx: ToolContext): Promise<string> => {
    const input = parseOrThrow(args.expression);
    const result = runEngine(() => evaluate(input, args.variable, args.value));
    const binding = `${args.variable} = ${args.value}`;

    if (result.type === "constant") {
      ctx.log.info("Evaluated expression", { value: result.value });
      return [`**Value** at ${binding}`, `- \`${formatExpression(input)}\` = ${result.value}`].join("\n");
    }

    const remaining = freeVariables(result);
    ctx.log.warn("Expression did not reduce to a number", { remaining: remaining.join(", ") });
    return [
      `**Residual** at ${binding}`,
      `- Result: \`${formatExpression(result)}\``,
      `- Free variables: ${remaining.join(", ")}`,
    ].join("\n");
  },
};
