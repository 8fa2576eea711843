/**
 * MCP Schema Compliance Tests
 *
 * Validates that all tool schemas conform to MCP SDK requirements:
 * - inputSchema.type MUST be "object" at root level
 * - No oneOf/anyOf/allOf at root (breaks MCP validation)
 */

import { describe, expect, test } from "vitest";
import { z } from "zod";
import {
  analyzeSingularitiesTool,
  differentiateTool,
  evaluateTool,
  limitTool,
  simplifyTool,
} from "../src/tools/index.ts";

// Collect all tools with their Zod schemas
const tools: ReadonlyArray<{ name: string; schema: z.ZodType }> = [
  { name: simplifyTool.name, schema: simplifyTool.parameters },
  { name: differentiateTool.name, schema: differentiateTool.parameters },
  { name: evaluateTool.name, schema: evaluateTool.parameters },
  { name: limitTool.name, schema: limitTool.parameters },
  { name: analyzeSingularitiesTool.name, schema: analyzeSingularitiesTool.parameters },
];

describe("MCP Schema Compliance", () => {
  for (const { name, schema } of tools) {
    describe(`${name} tool`, () => {
      test('schema has type="object" at root', () => {
        expect(z.toJSONSchema(schema).type).toBe("object");
      });

      test("schema has no oneOf/anyOf/allOf at root level", () => {
        const jsonSchema = z.toJSONSchema(schema);
        expect(jsonSchema.oneOf).toBeUndefined();
        expect(jsonSchema.anyOf).toBeUndefined();
        expect(jsonSchema.allOf).toBeUndefined();
      });

      test("schema requires an expression", () => {
        const jsonSchema = z.toJSONSchema(schema);
        expect(jsonSchema.properties).toHaveProperty("expression");
        expect(jsonSchema.required).toContain("expression");
      });
    });
  }

  describe("limit specific checks", () => {
    test("direction is a simple enum with a default", () => {
      const properties = z.toJSONSchema(limitTool.parameters).properties;
      expect(properties?.direction).toMatchObject({ enum: ["left", "right", "both"], default: "both" });
    });
  });

  test("tool names are unique", () => {
    const names = tools.map((t) => t.name);
    expect(new Set(names).size).toBe(names.length);
  });
});
