// Re-export SessionManager for document state access
export { SessionManager } from "../lib/session.ts";
export { getSystemTool, parseLineTool, solveEquationsTool, type ToolContext } from "./equations.ts";
export { clearSessionTool, listSessionsTool, resetSessionTool } from "./sessions.ts";
