import { type Context, UserError } from "fastmcp";
import { z } from "zod";
import { getConfig } from "../config.ts";
import {
  describeStatus,
  formatOutcome,
  formatSolveResult,
  formatSystem,
  hasEquationInProgress,
  isParseSuccess,
  serializeSystem,
  type SolveEquationsResult,
  solveEquations,
  variableNames,
} from "../lib/equations/index.ts";
import { SessionManager } from "../lib/session.ts";

type MCPContext = Context<Record<string, unknown> | undefined>;

/** The part of the fastmcp context these tools use */
export type ToolContext = Pick<MCPContext, "log">;

// ============================================================================
// PARSE LINE - incremental, one line per call
// ============================================================================

export const parseLineTool = {
  name: "parse_line",
  description: `Add one line of text to an equations document and parse it.

Equations are linear: terms joined by "+", "-" and one "=".
A term is a number, a variable, or a number followed by a variable (2x, 1.5^3 y, -z).
An equation may continue on the next line after an operator ("x + y +" then "z = 3"),
but a term cannot be split. After an error the document must be reset.`,

  parameters: z.object({
    session_id: z.string().min(1).describe("Document ID; created on first use"),
    line: z.string().describe("One line of the document"),
  }),

  execute: async (args: { session_id: string; line: string }, ctx: ToolContext) => {
    const result = SessionManager.feed(args.session_id, args.line);

    if (!result.accepted) {
      throw new UserError(
        `Document ${args.session_id} stopped at an error (${describeStatus(result.outcome.status)}). ` +
          "Call reset_session before adding more lines.",
      );
    }

    const { session, outcome } = result;

    if (isParseSuccess(outcome.status)) {
      ctx.log.debug("Parsed line", { session_id: args.session_id, line: result.line_number });
    } else {
      ctx.log.warn("Parse error", {
        session_id: args.session_id,
        line: result.line_number,
        status: outcome.status,
        position: outcome.position,
      });
    }

    const names = variableNames(session.system);
    const lines = [
      `**Line ${result.line_number}**: ${formatOutcome(outcome, args.line.trimEnd())}`,
      `- Equations complete: ${session.system.equationCount}`,
      `- Variables: ${names.length > 0 ? names.join(", ") : "(none)"}`,
    ];
    if (isParseSuccess(outcome.status) && hasEquationInProgress(session.parser)) {
      lines.push(`- Equation ${session.parser.equationIndex + 1} continues on the next line`);
    }

    return lines.join("\n");
  },
};

// ============================================================================
// SOLVE - whole text or a document built with parse_line
// ============================================================================

function solveDocument(sessionId: string): SolveEquationsResult {
  const session = SessionManager.get(sessionId);
  if (!session) {
    throw new UserError(`Session not found: ${sessionId}`);
  }

  const last = session.last_outcome;
  if (last && !isParseSuccess(last.status)) {
    return {
      kind: "parse-error",
      status: last.status,
      message: describeStatus(last.status),
      line: session.lines.length,
      position: last.position,
    };
  }

  return solveEquations(session.lines.join("\n"), getConfig().solver);
}

export const solveEquationsTool = {
  name: "solve_equations",
  description: `Solve a system of linear equations.

Pass the equations as text (one equation per line, or split after operators),
or pass session_id to solve the document built with parse_line.
The system must have as many equations as variables.`,

  parameters: z.object({
    text: z.string().optional().describe("Equations, one per line"),
    session_id: z.string().optional().describe("Solve this parse_line document instead of text"),
  }),

  execute: async (args: { text?: string; session_id?: string }, ctx: ToolContext) => {
    let result: SolveEquationsResult;
    if (args.text !== undefined) {
      result = solveEquations(args.text, getConfig().solver);
    } else if (args.session_id) {
      result = solveDocument(args.session_id);
    } else {
      throw new UserError("Provide text or session_id");
    }

    ctx.log.info("Solve finished", { outcome: result.kind });

    const heading = result.kind === "solved" ? "**Solution**" : "**Not solved**";
    return `${heading}\n${formatSolveResult(result)}`;
  },
};

// ============================================================================
// GET SYSTEM
// ============================================================================

export const getSystemTool = {
  name: "get_system",
  description: "Show the equation system built so far for a parse_line document",
  parameters: z.object({
    session_id: z.string().describe("Document ID"),
    format: z
      .enum(["markdown", "json"])
      .default("markdown")
      .describe("markdown (readable equations) or json (sparse matrix and vector)"),
  }),

  execute: async (args: { session_id: string; format?: "markdown" | "json" }) => {
    const session = SessionManager.get(args.session_id);
    if (!session) {
      throw new UserError(`Session not found: ${args.session_id}`);
    }

    if (args.format === "json") {
      return JSON.stringify(serializeSystem(session.system), null, 2);
    }
    return formatSystem(session.system);
  },
};
