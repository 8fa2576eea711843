import { z } from "zod";
import { derivative, evaluate, formatExpression, hasVariable } from "../lib/symbolic/index.ts";
import { type ToolContext, expressionParam, parseOrThrow, runEngine, variableParam } from "./shared.ts";

const DifferentiateSchema = z.object({
  expression: expressionParam,
  variable: variableParam,
  at: z.number().optional().describe("Optional point at which to evaluate the derivative"),
});

type DifferentiateArgs = z.infer<typeof DifferentiateSchema>;

/**
 * Differentiate tool - symbolic derivative, optionally evaluated at a point
 */
export const differentiateTool = {
  name: "differentiate",
  description: `Differentiate an expression with respect to a variable and simplify the result.

Supports sums, differences, products, quotients, constant powers, negation, sqrt() and abs().
Pass \`at\` to also evaluate the derivative at a point.`,

  parameters: DifferentiateSchema,

  execute: async (args: DifferentiateArgs, ctx: ToolContext): Promise<string> => {
    const { variable } = args;
    const input = parseOrThrow(args.expression);
    if (!hasVariable(input, variable)) {
      ctx.log.warn("Variable does not occur in expression", { variable });
    }

    const result = runEngine(() => derivative(input, variable));
    ctx.log.info("Computed derivative", { result: formatExpression(result) });

    const lines = [
      `**Derivative** d/d${variable}`,
      `- f(${variable}) = \`${formatExpression(input)}\``,
      `- f'(${variable}) = \`${formatExpression(result)}\``,
    ];

    if (args.at !== undefined) {
      const { at } = args;
      const value = runEngine(() => evaluate(result, variable, at));
      lines.push(
        value.type === "constant"
          ? `- f'(${at}) = ${value.value}`
          : `- f'(${at}) = \`${formatExpression(value)}\``,
      );
    }

    return lines.join("\n");
  },
};
