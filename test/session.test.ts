/**
 * Unit tests for the document SessionManager
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ParserStatus } from "../src/lib/equations/index.ts";
import { SessionManagerImpl } from "../src/lib/session.ts";

let manager: SessionManagerImpl;

beforeEach(() => {
  manager = new SessionManagerImpl({ cleanup_interval_ms: 0, ttl_ms: 1000, max_sessions: 2 });
});

afterEach(() => {
  manager.destroy();
});

describe("SessionManager", () => {
  test("feeds lines into a document", () => {
    const result = manager.feed("doc", "x + y = 10");
    expect(result).toMatchObject({
      accepted: true,
      outcome: { status: ParserStatus.Success, position: 0 },
      line_number: 1,
    });
    expect(result.session).toBe(manager.get("doc"));
    manager.feed("doc", "x - y = 2");

    expect(manager.list()).toMatchObject([{ id: "doc", line_count: 2, equation_count: 2, variable_count: 2 }]);
  });

  test("documents keep separate parse state", () => {
    manager.feed("a", "x +");
    manager.feed("b", "y = 1");

    expect(manager.get("a")?.system.equationCount).toBe(0);
    expect(manager.get("b")?.system.equationCount).toBe(1);
    expect(manager.get("b")?.system.variables.get("y")).toBe(0);
  });

  test("an error blocks the document until reset", () => {
    const failed = manager.feed("doc", "x = y = 2");
    expect(failed).toMatchObject({
      accepted: true,
      outcome: { status: ParserStatus.MultipleEqualSigns, position: 6 },
      line_number: 1,
    });
    expect(manager.get("doc")?.failed_line).toBe("x = y = 2");
    expect(manager.get("doc")?.lines).toEqual([]);

    expect(manager.feed("doc", "x = 1")).toMatchObject({
      accepted: false,
      reason: "blocked",
      outcome: { status: ParserStatus.MultipleEqualSigns, position: 6 },
    });

    expect(manager.reset("doc")).toBe(true);
    expect(manager.feed("doc", "x = 1")).toMatchObject({ accepted: true, line_number: 1 });
    expect(manager.get("doc")?.system.equationCount).toBe(1);
  });

  test("feed hands back the document even when it evicts another", () => {
    manager.getOrCreate("a").updated_at = 1;
    manager.getOrCreate("b").updated_at = 2;

    const result = manager.feed("c", "2x = 4");
    expect(result.session.id).toBe("c");
    expect(result.session.system.equationCount).toBe(1);
    expect(manager.list().map((s) => s.id)).toEqual(["b", "c"]);
  });

  test("blank lines are accepted without touching the system", () => {
    manager.feed("doc", "x +");
    expect(manager.feed("doc", "  ")).toMatchObject({
      accepted: true,
      outcome: { status: ParserStatus.SuccessNoEquation, position: 0 },
      line_number: 2,
    });
    manager.feed("doc", "y = 1");
    expect(manager.get("doc")?.system.equationCount).toBe(1);
  });

  test("reset of an unknown document", () => {
    expect(manager.reset("missing")).toBe(false);
  });

  test("expired documents are cleaned up", () => {
    manager.feed("old", "x = 1");
    expect(manager.cleanup(Date.now() + 5000)).toBe(1);
    expect(manager.list()).toHaveLength(0);
  });

  test("evicts the least recently updated document at capacity", () => {
    manager.getOrCreate("a").updated_at = 1;
    manager.getOrCreate("b").updated_at = 2;
    manager.getOrCreate("c");

    expect(manager.list().map((s) => s.id)).toEqual(["b", "c"]);
  });

  test("summary shows status and equations", () => {
    manager.feed("doc", "2x - y = 3");
    manager.feed("doc", "x +");

    expect(manager.getSummary("doc")).toBe(
      [
        "Session: doc",
        "Lines: 2",
        "Last status: Success",
        "Equation 2 is still open",
        "",
        "**Equations**: 1",
        "**Variables**: x, y",
        "",
        "1. 2x - y = 3",
      ].join("\n"),
    );
  });

  test("summary of unknown document", () => {
    expect(manager.getSummary("missing")).toBeNull();
  });

  test("clear and clearAll", () => {
    manager.feed("a", "x = 1");
    manager.feed("b", "y = 1");
    expect(manager.clear("a")).toBe(true);
    expect(manager.clear("a")).toBe(false);
    expect(manager.clearAll()).toBe(1);
  });
});
