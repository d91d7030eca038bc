import { FastMCP } from "fastmcp";
import { getConfig } from "./config.ts";
import { buildDocumentPrompt, solveLinearSystemPrompt } from "./prompts/index.ts";
import { sessionResource, sessionSummaryResource, sessionsListResource } from "./resources/index.ts";
import {
  clearSessionTool,
  getSystemTool,
  listSessionsTool,
  parseLineTool,
  resetSessionTool,
  solveEquationsTool,
} from "./tools/index.ts";

// Fail fast on a bad environment before the transport opens
getConfig();

const server = new FastMCP({
  name: "Linear Equations MCP",
  version: "0.1.0",
});

// Register tools
server.addTool(parseLineTool);
server.addTool(solveEquationsTool);
server.addTool(getSystemTool);
server.addTool(listSessionsTool);
server.addTool(resetSessionTool);
server.addTool(clearSessionTool);

// Register prompts
server.addPrompt(solveLinearSystemPrompt);
server.addPrompt(buildDocumentPrompt);

// Register resources
server.addResource(sessionsListResource);
server.addResourceTemplate(sessionResource);
server.addResourceTemplate(sessionSummaryResource);

// Start server (stdio for local MCP clients)
await server.start({ transportType: "stdio" });
