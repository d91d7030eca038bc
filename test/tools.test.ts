/**
 * Tool handler tests: call execute() directly with a stub logging context
 */

import { UserError } from "fastmcp";
import { beforeEach, describe, expect, test, vi } from "vitest";
import {
  clearSessionTool,
  getSystemTool,
  listSessionsTool,
  parseLineTool,
  resetSessionTool,
  SessionManager,
  solveEquationsTool,
  type ToolContext,
} from "../src/tools/index.ts";

function stubContext() {
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const ctx: ToolContext = { log };
  return { ctx, log };
}

beforeEach(() => {
  SessionManager.clearAll();
});

describe("parse_line", () => {
  test("reports a completed equation", async () => {
    const { ctx, log } = stubContext();
    const text = await parseLineTool.execute({ session_id: "doc", line: "x + y = 10" }, ctx);
    expect(text).toBe("**Line 1**: Success\n- Equations complete: 1\n- Variables: x, y");
    expect(log.debug).toHaveBeenCalledTimes(1);
  });

  test("reports an open equation", async () => {
    const { ctx } = stubContext();
    const text = await parseLineTool.execute({ session_id: "doc", line: "x +" }, ctx);
    expect(text).toBe(
      "**Line 1**: Success\n- Equations complete: 0\n- Variables: x\n- Equation 1 continues on the next line",
    );
  });

  test("reports an error with a caret, then refuses more lines", async () => {
    const { ctx, log } = stubContext();
    const text = await parseLineTool.execute({ session_id: "doc", line: "x = y = 2" }, ctx);
    expect(text).toBe(
      [
        "**Line 1**: The equation has more than one equal sign at column 7",
        "x = y = 2",
        "      ^",
        "- Equations complete: 0",
        "- Variables: x, y",
      ].join("\n"),
    );
    expect(log.warn).toHaveBeenCalledTimes(1);

    await expect(parseLineTool.execute({ session_id: "doc", line: "x = 1" }, ctx)).rejects.toThrow(UserError);
  });
});

describe("solve_equations", () => {
  test("solves text", async () => {
    const { ctx, log } = stubContext();
    const text = await solveEquationsTool.execute({ text: "x + y = 10\nx - y = 2" }, ctx);
    expect(text).toBe("**Solution**\nx = 6\ny = 4");
    expect(log.info).toHaveBeenCalledWith("Solve finished", { outcome: "solved" });
  });

  test("solves a parse_line document", async () => {
    const { ctx } = stubContext();
    await parseLineTool.execute({ session_id: "doc", line: "x + y =" }, ctx);
    await parseLineTool.execute({ session_id: "doc", line: "10" }, ctx);
    await parseLineTool.execute({ session_id: "doc", line: "x - y = 2" }, ctx);

    const text = await solveEquationsTool.execute({ session_id: "doc" }, ctx);
    expect(text).toBe("**Solution**\nx = 6\ny = 4");
  });

  test("a failed document reports its error", async () => {
    const { ctx } = stubContext();
    await parseLineTool.execute({ session_id: "doc", line: "x = 1" }, ctx);
    await parseLineTool.execute({ session_id: "doc", line: "x + = 2" }, ctx);

    const text = await solveEquationsTool.execute({ session_id: "doc" }, ctx);
    expect(text).toBe("**Not solved**\nLine 2, column 5: Expected a number or a variable");
  });

  test("underdetermined text", async () => {
    const { ctx } = stubContext();
    const text = await solveEquationsTool.execute({ text: "x + y = 10" }, ctx);
    expect(text).toBe("**Not solved**\nToo few equations: 1 equation(s) for 2 variable(s).");
  });

  test("needs text or session_id", async () => {
    const { ctx } = stubContext();
    await expect(solveEquationsTool.execute({}, ctx)).rejects.toThrow("Provide text or session_id");
  });

  test("unknown session", async () => {
    const { ctx } = stubContext();
    await expect(solveEquationsTool.execute({ session_id: "missing" }, ctx)).rejects.toThrow(
      "Session not found: missing",
    );
  });
});

describe("get_system", () => {
  test("json format", async () => {
    const { ctx } = stubContext();
    await parseLineTool.execute({ session_id: "doc", line: "2x = 4" }, ctx);

    const text = await getSystemTool.execute({ session_id: "doc", format: "json" });
    expect(JSON.parse(text)).toEqual({
      equation_count: 1,
      variables: { x: 0 },
      coefficients: [{ equation: 0, variable: 0, value: 2 }],
      constants: [{ equation: 0, value: 4 }],
    });
  });

  test("markdown format", async () => {
    const { ctx } = stubContext();
    await parseLineTool.execute({ session_id: "doc", line: "2x = 4" }, ctx);

    const text = await getSystemTool.execute({ session_id: "doc" });
    expect(text).toBe("**Equations**: 1\n**Variables**: x\n\n1. 2x = 4");
  });
});

describe("session tools", () => {
  test("list, reset and clear", async () => {
    const { ctx } = stubContext();
    expect(await listSessionsTool.execute()).toBe("No active sessions.");

    await parseLineTool.execute({ session_id: "doc", line: "x = 1" }, ctx);
    const listing = await listSessionsTool.execute();
    expect(listing).toContain("| doc | 1 | 1 | 1 |");

    expect(await resetSessionTool.execute({ session_id: "doc" }, ctx)).toBe("Reset session: doc");
    expect(SessionManager.get("doc")?.system.equationCount).toBe(0);

    expect(await clearSessionTool.execute({ session_id: "doc" })).toBe("Cleared session: doc");
    expect(await clearSessionTool.execute({ session_id: "doc" })).toBe("Session not found: doc");
    expect(await clearSessionTool.execute({ all: true })).toBe("Cleared 0 session(s).");
  });
});
