/**
 * Tests for the linear solver and the end-to-end solve driver
 */

import { describe, expect, test } from "vitest";
import {
  formatSolveResult,
  ParserStatus,
  parseDocument,
  solveDense,
  solveEquations,
  solveSystem,
} from "../src/lib/equations/index.ts";

describe("solveDense", () => {
  test("2x2 system", () => {
    expect(solveDense([[1, 1], [1, -1]], [10, 2])).toEqual({
      status: "success",
      solution: [6, 4],
      conditionEstimate: 2,
    });
  });

  test("3x3 system with pivoting", () => {
    // x + y + z = 6, 2y + 5z = -4, 2x + 5y - z = 27
    const result = solveDense(
      [
        [1, 1, 1],
        [0, 2, 5],
        [2, 5, -1],
      ],
      [6, -4, 27],
    );
    if (result.status !== "success") throw new Error(`unexpected ${result.status}`);
    expect(result.solution[0]).toBeCloseTo(5);
    expect(result.solution[1]).toBeCloseTo(3);
    expect(result.solution[2]).toBeCloseTo(-2);
  });

  test("does not modify its inputs", () => {
    const matrix = [[2, 0], [0, 4]];
    const vector = [2, 8];
    solveDense(matrix, vector);
    expect(matrix).toEqual([[2, 0], [0, 4]]);
    expect(vector).toEqual([2, 8]);
  });

  test("dependent rows are singular", () => {
    expect(solveDense([[1, 2], [2, 4]], [3, 6])).toEqual({ status: "singular", column: 1 });
  });

  test("all-zero matrix is singular", () => {
    expect(solveDense([[0]], [1])).toEqual({ status: "singular", column: 0 });
  });

  test("pivot ratio above the limit is ill-conditioned", () => {
    const result = solveDense([[1, 0], [0, 1e-6]], [1, 1], { conditionLimit: 1e3 });
    expect(result.status).toBe("ill-conditioned");
  });

  test("empty system", () => {
    expect(solveDense([], [])).toEqual({ status: "success", solution: [], conditionEstimate: 1 });
  });
});

describe("solveSystem", () => {
  test("solves a parsed system in variable index order", () => {
    const { system } = parseDocument("y + x = 10\nx - y = 2");
    // y is index 0, x is index 1
    expect(solveSystem(2, system)).toMatchObject({ status: "success", solution: [4, 6] });
  });
});

describe("solveEquations", () => {
  test("solved", () => {
    const result = solveEquations("x + y = 10\nx - y = 2");
    expect(result).toEqual({
      kind: "solved",
      equations: 2,
      solution: [
        { name: "x", value: 6 },
        { name: "y", value: 4 },
      ],
      conditionEstimate: 2,
    });
    expect(formatSolveResult(result)).toBe("x = 6\ny = 4");
  });

  test("parse error reports line and column", () => {
    const result = solveEquations("x = 1\nx + = 2");
    expect(result).toEqual({
      kind: "parse-error",
      status: ParserStatus.NoTermEncountered,
      message: "Expected a number or a variable",
      line: 1,
      position: 4,
    });
    expect(formatSolveResult(result)).toBe("Line 2, column 5: Expected a number or a variable");
  });

  test("too few equations", () => {
    const result = solveEquations("x + y = 10");
    expect(result).toEqual({ kind: "too-few-equations", equations: 1, variables: 2 });
    expect(formatSolveResult(result)).toBe("Too few equations: 1 equation(s) for 2 variable(s).");
  });

  test("too many equations", () => {
    expect(solveEquations("x = 1\nx = 2")).toEqual({ kind: "too-many-equations", equations: 2, variables: 1 });
  });

  test("singular", () => {
    const result = solveEquations("x + y = 1\n2x + 2y = 2");
    expect(result).toEqual({ kind: "singular", equations: 2 });
    expect(formatSolveResult(result)).toBe("The system of equations is singular.");
  });

  test("no equations", () => {
    expect(solveEquations("  \n")).toEqual({ kind: "no-equations" });
  });
});
