import { z } from "zod";
import {
  DEFAULT_EPSILON,
  type LimitValue,
  checkDivisionLimits,
  describeDivisionAnalysis,
  formatExpression,
  formatLimitValue,
  limit,
  limitValuesEqual,
} from "../lib/symbolic/index.ts";
import { type ToolContext, expressionParam, parseOrThrow, runEngine, variableParam } from "./shared.ts";

const epsilonParam = z
  .number()
  .positive()
  .default(DEFAULT_EPSILON)
  .describe("Distance of the first sample from the point");

const LimitSchema = z.object({
  expression: expressionParam,
  variable: variableParam,
  point: z.number().describe("Point the variable approaches"),
  direction: z
    .enum(["left", "right", "both"])
    .default("both")
    .describe("Approach from the left, the right, or both sides"),
  epsilon: epsilonParam,
});

type LimitArgs = z.infer<typeof LimitSchema>;

const AnalyzeSingularitiesSchema = z.object({
  expression: expressionParam,
  variable: variableParam,
  epsilon: epsilonParam,
});

type AnalyzeSingularitiesArgs = z.infer<typeof AnalyzeSingularitiesSchema>;

function isIndeterminate(value: LimitValue): boolean {
  return value.type === "undefined" || value.type === "nan";
}

/**
 * Limit tool - numeric one-sided and two-sided limits
 */
export const limitTool = {
  name: "limit",
  description: `Estimate the limit of an expression as a variable approaches a point.

Samples point ± epsilon/2^i and classifies the tail of the sequence as a finite value,
+∞, -∞ or undefined. With direction "both" the two one-sided limits are compared.`,

  parameters: LimitSchema,

  execute: async (args: LimitArgs, ctx: ToolContext): Promise<string> => {
    const { variable, point, direction, epsilon } = args;
    const input = parseOrThrow(args.expression);
    ctx.log.debug("Sampling limit", { point, direction, epsilon });

    const header = `**Limit** of \`${formatExpression(input)}\` as ${variable} → ${point}`;
    const leftLine = (value: LimitValue) => `- Left (${variable} → ${point}⁻): ${formatLimitValue(value)}`;
    const rightLine = (value: LimitValue) => `- Right (${variable} → ${point}⁺): ${formatLimitValue(value)}`;

    if (direction !== "both") {
      const value = runEngine(() => limit(input, variable, point, direction, epsilon));
      if (isIndeterminate(value)) ctx.log.warn("Limit could not be determined", { direction });
      return [header, direction === "left" ? leftLine(value) : rightLine(value)].join("\n");
    }

    const [left, right] = runEngine(() => limit(input, variable, point, "both", epsilon));
    const exists = limitValuesEqual(left, right) && !isIndeterminate(left);
    if (isIndeterminate(left) || isIndeterminate(right)) {
      ctx.log.warn("Limit could not be determined on at least one side");
    }
    ctx.log.info("Computed limit", { left: formatLimitValue(left), right: formatLimitValue(right) });

    return [
      header,
      leftLine(left),
      rightLine(right),
      `- Two-sided: ${exists ? formatLimitValue(left) : "does not exist"}`,
    ].join("\n");
  },
};

/**
 * Singularity tool - scans denominators for zeros and classifies each one
 */
export const analyzeSingularitiesTool = {
  name: "analyze_singularities",
  description: `Find points where a denominator of the expression vanishes and classify the behaviour there.

Denominators are probed at the integers -10..10. For each zero the one-sided limits of the
whole expression are reported; equal limits mean a removable (continuous) singularity.`,

  parameters: AnalyzeSingularitiesSchema,

  execute: async (args: AnalyzeSingularitiesArgs, ctx: ToolContext): Promise<string> => {
    const { variable, epsilon } = args;
    const input = parseOrThrow(args.expression);

    const analysis = runEngine(() => checkDivisionLimits(input, variable, epsilon));
    const description = describeDivisionAnalysis(analysis, variable);
    ctx.log.info("Analyzed singularities", { count: analysis.singularities.length });

    const lines = [`**Singularities** of \`${formatExpression(input)}\` in ${variable}`, description];
    if (!analysis.hasSingularity) return lines.join("\n");

    lines.push(
      "",
      "| Point | Denominator | Left | Right | Continuous |",
      "|-------|-------------|------|-------|------------|",
    );
    for (const s of analysis.singularities) {
      lines.push(
        `| ${s.point} | \`${formatExpression(s.denominator)}\` | ${formatLimitValue(s.leftLimit)} | ${formatLimitValue(s.rightLimit)} | ${s.continuous ? "yes" : "no"} |`,
      );
    }
    return lines.join("\n");
  },
};
