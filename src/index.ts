import { FastMCP } from "fastmcp";
import {
  analyzeSingularitiesTool,
  differentiateTool,
  evaluateTool,
  limitTool,
  simplifyTool,
} from "./tools/index.ts";

const server = new FastMCP({
  name: "Symbolic Limits MCP",
  version: "0.1.0",
});

// Register tools
server.addTool(simplifyTool);
server.addTool(differentiateTool);
server.addTool(evaluateTool);
server.addTool(limitTool);
server.addTool(analyzeSingularitiesTool);

// Start server (stdio for local MCP agents)
await server.start({ transportType: "stdio" });
