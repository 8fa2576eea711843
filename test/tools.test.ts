/**
 * Tool handler tests
 * Handlers run in-process against a stub request context.
 */

import { UserError } from "fastmcp";
import { describe, expect, test, vi } from "vitest";
import {
  type ToolContext,
  analyzeSingularitiesTool,
  differentiateTool,
  evaluateTool,
  limitTool,
  simplifyTool,
} from "../src/tools/index.ts";

function createContext() {
  return {
    log: { debug: vi.fn(), error: vi.fn(), info: vi.fn(), warn: vi.fn() },
  } satisfies ToolContext;
}

describe("simplify tool", () => {
  test("returns the simplified form", async () => {
    const ctx = createContext();
    const result = await simplifyTool.execute({ expression: "x + x" }, ctx);
    expect(result).toBe(["**Simplified**", "- Input: `x + x`", "- Result: `2 * x`"].join("\n"));
    expect(ctx.log.info).toHaveBeenCalledWith("Simplified expression", { result: "2 * x" });
  });

  test("parse errors become user errors", async () => {
    const run = simplifyTool.execute({ expression: "2 +" }, createContext());
    await expect(run).rejects.toBeInstanceOf(UserError);
    await expect(simplifyTool.execute({ expression: "2 +" }, createContext())).rejects.toThrow(
      'Could not parse "2 +": Missing operands for binary operator +',
    );
  });

  test("division by zero becomes a user error", async () => {
    await expect(simplifyTool.execute({ expression: "5/0" }, createContext())).rejects.toThrow("Division by zero");
  });
});

describe("differentiate tool", () => {
  test("differentiates and evaluates at a point", async () => {
    const args = differentiateTool.parameters.parse({ expression: "x^2 + 3x + 2", at: 2 });
    const result = await differentiateTool.execute(args, createContext());
    expect(result).toBe(
      ["**Derivative** d/dx", "- f(x) = `x^2 + 3 * x + 2`", "- f'(x) = `2 * x + 3`", "- f'(2) = 7"].join("\n"),
    );
  });

  test("warns when the variable does not occur", async () => {
    const ctx = createContext();
    const result = await differentiateTool.execute({ expression: "5", variable: "x" }, ctx);
    expect(result).toBe(["**Derivative** d/dx", "- f(x) = `5`", "- f'(x) = `0`"].join("\n"));
    expect(ctx.log.warn).toHaveBeenCalledWith("Variable does not occur in expression", { variable: "x" });
  });
});

describe("evaluate tool", () => {
  test("folds to a number", async () => {
    const args = evaluateTool.parameters.parse({ expression: "x^2 + 3x + 2", value: 2 });
    const result = await evaluateTool.execute(args, createContext());
    expect(result).toBe(["**Value** at x = 2", "- `x^2 + 3 * x + 2` = 12"].join("\n"));
  });

  test("reports a residual and its free variables", async () => {
    const ctx = createContext();
    const result = await evaluateTool.execute({ expression: "x + y", variable: "x", value: 1 }, ctx);
    expect(result).toBe(["**Residual** at x = 1", "- Result: `1 + y`", "- Free variables: y"].join("\n"));
    expect(ctx.log.warn).toHaveBeenCalledTimes(1);
  });

  test("division by zero becomes a user error", async () => {
    const run = evaluateTool.execute({ expression: "1/x", variable: "x", value: 0 }, createContext());
    await expect(run).rejects.toThrow("Division by zero");
  });
});

describe("limit tool", () => {
  test("two-sided limit that does not exist", async () => {
    const args = limitTool.parameters.parse({ expression: "1/x", point: 0 });
    expect(args.direction).toBe("both");
    expect(args.epsilon).toBe(1e-6);

    const result = await limitTool.execute(args, createContext());
    expect(result).toBe(
      [
        "**Limit** of `1 / x` as x → 0",
        "- Left (x → 0⁻): -∞",
        "- Right (x → 0⁺): +∞",
        "- Two-sided: does not exist",
      ].join("\n"),
    );
  });

  test("removable singularity has a two-sided limit", async () => {
    const args = limitTool.parameters.parse({ expression: "(x^2 - 1)/(x - 1)", point: 1 });
    const result = await limitTool.execute(args, createContext());
    expect(result).toBe(
      [
        "**Limit** of `(x^2 - 1) / (x - 1)` as x → 1",
        "- Left (x → 1⁻): 2",
        "- Right (x → 1⁺): 2",
        "- Two-sided: 2",
      ].join("\n"),
    );
  });

  test("one-sided limit that cannot be determined", async () => {
    const ctx = createContext();
    const args = limitTool.parameters.parse({ expression: "sqrt(x)", point: 0, direction: "left" });
    const result = await limitTool.execute(args, ctx);
    expect(result).toBe(["**Limit** of `sqrt(x)` as x → 0", "- Left (x → 0⁻): undefined"].join("\n"));
    expect(ctx.log.warn).toHaveBeenCalledWith("Limit could not be determined", { direction: "left" });
  });

  test("rejects a non-positive epsilon", () => {
    const parsed = limitTool.parameters.safeParse({ expression: "1/x", point: 0, epsilon: 0 });
    expect(parsed.success).toBe(false);
  });
});

describe("analyze_singularities tool", () => {
  test("describes and tabulates each pole", async () => {
    const args = analyzeSingularitiesTool.parameters.parse({ expression: "1/(x^2 - 1)" });
    const result = await analyzeSingularitiesTool.execute(args, createContext());
    expect(result).toBe(
      [
        "**Singularities** of `1 / (x^2 - 1)` in x",
        "At x=-1: Discontinuous - Left limit: +∞, Right limit: -∞",
        "At x=1: Discontinuous - Left limit: -∞, Right limit: +∞",
        "",
        "| Point | Denominator | Left | Right | Continuous |",
        "|-------|-------------|------|-------|------------|",
        "| -1 | `x^2 - 1` | +∞ | -∞ | no |",
        "| 1 | `x^2 - 1` | -∞ | +∞ | no |",
      ].join("\n"),
    );
  });

  test("reports expressions without division", async () => {
    const args = analyzeSingularitiesTool.parameters.parse({ expression: "x + 1" });
    const result = await analyzeSingularitiesTool.execute(args, createContext());
    expect(result).toBe(["**Singularities** of `x + 1` in x", "No division by zero detected"].join("\n"));
  });
});
