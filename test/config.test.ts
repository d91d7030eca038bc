import { describe, expect, test } from "vitest";
import { loadConfig } from "../src/config.ts";

describe("loadConfig", () => {
  test("defaults", () => {
    expect(loadConfig({})).toEqual({
      sessions: { ttl_ms: 1_800_000, cleanup_interval_ms: 300_000, max_sessions: 100 },
      solver: { singularTolerance: 1e-12, conditionLimit: 1e12 },
    });
  });

  test("reads numeric strings", () => {
    const config = loadConfig({ EQUATIONS_MAX_SESSIONS: "5", EQUATIONS_CONDITION_LIMIT: "1e8" });
    expect(config.sessions.max_sessions).toBe(5);
    expect(config.solver.conditionLimit).toBe(1e8);
  });

  test("ignores unrelated variables", () => {
    expect(loadConfig({ PATH: "/usr/bin" }).sessions.max_sessions).toBe(100);
  });

  test("names the bad variable", () => {
    expect(() => loadConfig({ EQUATIONS_MAX_SESSIONS: "many" })).toThrow(
      /^Invalid configuration EQUATIONS_MAX_SESSIONS:/,
    );
    expect(() => loadConfig({ EQUATIONS_SESSION_TTL_MS: "-5" })).toThrow(/EQUATIONS_SESSION_TTL_MS/);
  });
});
