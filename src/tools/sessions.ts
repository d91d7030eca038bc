import { z } from "zod";
import { SessionManager } from "../lib/session.ts";
import type { ToolContext } from "./equations.ts";

/**
 * Session management tools for equation documents
 */

export const listSessionsTool = {
  name: "list_sessions",
  description: "List all open equation documents with their line, equation and variable counts",
  parameters: z.object({}),
  execute: async () => {
    const sessions = SessionManager.list();

    if (sessions.length === 0) {
      return "No active sessions.";
    }

    const lines = [
      `**Active Sessions** (${sessions.length})`,
      "",
      "| Session | Lines | Equations | Variables | Age |",
      "|---------|-------|-----------|-----------|-----|",
    ];

    for (const s of sessions) {
      const age = formatAge(s.age_ms);
      lines.push(`| ${s.id} | ${s.line_count} | ${s.equation_count} | ${s.variable_count} | ${age} |`);
    }

    return lines.join("\n");
  },
};

export const resetSessionTool = {
  name: "reset_session",
  description: "Start a document over: clears its lines, equations and any parse error",
  parameters: z.object({
    session_id: z.string().describe("Document ID to reset"),
  }),
  execute: async (args: { session_id: string }, ctx: ToolContext) => {
    const reset = SessionManager.reset(args.session_id);
    if (reset) ctx.log.info("Session reset", { session_id: args.session_id });
    return reset ? `Reset session: ${args.session_id}` : `Session not found: ${args.session_id}`;
  },
};

export const clearSessionTool = {
  name: "clear_session",
  description: "Delete a specific document or all documents to free memory",
  parameters: z.object({
    session_id: z.string().optional().describe("Session ID to clear (omit for all)"),
    all: z.boolean().default(false).describe("Clear all sessions"),
  }),
  execute: async (args: { session_id?: string; all?: boolean }) => {
    if (args.all) {
      const count = SessionManager.clearAll();
      return `Cleared ${count} session(s).`;
    }

    if (!args.session_id) {
      return "Provide session_id or set all=true";
    }

    const cleared = SessionManager.clear(args.session_id);
    return cleared ? `Cleared session: ${args.session_id}` : `Session not found: ${args.session_id}`;
  },
};

export function formatAge(ms: number): string {
  if (ms < 60_000) return `${Math.round(ms / 1000)}s`;
  if (ms < 3_600_000) return `${Math.round(ms / 60_000)}m`;
  return `${Math.round(ms / 3_600_000)}h`;
}
