export { differentiateTool } from "./derivative.ts";
export { evaluateTool } from "./evaluate.ts";
export { analyzeSingularitiesTool, limitTool } from "./limits.ts";
export { type ToolContext, parseOrThrow, runEngine } from "./shared.ts";
export { simplifyTool } from "./simplify.ts";
