/**
 * Linear solver collaborator
 * Gauss-Jordan elimination with partial pivoting over the dense form of
 * a parsed EquationSystem.
 */

import { type EquationSystem, toDenseSystem } from "./system.ts";

export interface SolverOptions {
  /** Pivot magnitude, relative to the largest entry, treated as zero */
  singularTolerance: number;
  /** Largest-to-smallest pivot ratio above which the system is rejected */
  conditionLimit: number;
}

export const DEFAULT_SOLVER_OPTIONS: SolverOptions = {
  singularTolerance: 1e-12,
  conditionLimit: 1e12,
};

export type SolveResult =
  | { status: "success"; solution: number[]; conditionEstimate: number }
  | { status: "singular"; column: number }
  | { status: "ill-conditioned"; conditionEstimate: number };

function cell(matrix: number[][], row: number, col: number): number {
  return matrix[row]?.[col] ?? 0;
}

/** Solve an n×n dense system; inputs are not modified */
export function solveDense(
  matrixIn: number[][],
  vectorIn: number[],
  options: Partial<SolverOptions> = {},
): SolveResult {
  const { singularTolerance, conditionLimit } = { ...DEFAULT_SOLVER_OPTIONS, ...options };
  const n = vectorIn.length;
  const a = matrixIn.map((row) => row.slice());
  const b = vectorIn.slice();

  let maxAbs = 0;
  for (const row of a) {
    for (const value of row) maxAbs = Math.max(maxAbs, Math.abs(value));
  }

  let largestPivot = 0;
  let smallestPivot = Number.POSITIVE_INFINITY;

  for (let col = 0; col < n; col++) {
    let pivotRow = col;
    let best = Math.abs(cell(a, col, col));
    for (let r = col + 1; r < n; r++) {
      const v = Math.abs(cell(a, r, col));
      if (v > best) {
        best = v;
        pivotRow = r;
      }
    }

    if (best <= singularTolerance * maxAbs || best === 0) {
      return { status: "singular", column: col };
    }

    if (pivotRow !== col) {
      [a[col], a[pivotRow]] = [a[pivotRow] ?? [], a[col] ?? []];
      [b[col], b[pivotRow]] = [b[pivotRow] ?? 0, b[col] ?? 0];
    }

    largestPivot = Math.max(largestPivot, best);
    smallestPivot = Math.min(smallestPivot, best);

    const pivotValues = a[col] ?? [];
    const pivot = cell(a, col, col);
    for (let c = col; c < n; c++) pivotValues[c] = (pivotValues[c] ?? 0) / pivot;
    b[col] = (b[col] ?? 0) / pivot;

    for (let r = 0; r < n; r++) {
      if (r === col) continue;
      const row = a[r] ?? [];
      const factor = row[col] ?? 0;
      if (factor === 0) continue;
      for (let c = col; c < n; c++) {
        row[c] = (row[c] ?? 0) - factor * (pivotValues[c] ?? 0);
      }
      b[r] = (b[r] ?? 0) - factor * (b[col] ?? 0);
    }
  }

  const conditionEstimate = n === 0 ? 1 : largestPivot / smallestPivot;
  if (conditionEstimate > conditionLimit) {
    return { status: "ill-conditioned", conditionEstimate };
  }

  return { status: "success", solution: b, conditionEstimate };
}

/**
 * Solve A·x = b for the first n equations of a parsed system.
 * The solution is indexed like system.variables.
 */
export function solveSystem(
  n: number,
  system: EquationSystem,
  options: Partial<SolverOptions> = {},
): SolveResult {
  const dense = toDenseSystem(system, n);
  return solveDense(dense.matrix, dense.vector, options);
}
