/**
 * Equation System - caller-owned sparse containers for A·x = b
 * The parser only ever adds to these; entries are never removed.
 */

/** Sparse equation index -> variable index -> coefficient */
export type SparseMatrix = Map<number, Map<number, number>>;

/** Sparse equation index -> value */
export type SparseVector = Map<number, number>;

export interface EquationSystem {
  coefficients: SparseMatrix;
  constants: SparseVector;
  /** Variable name -> index, in order of first appearance */
  variables: Map<string, number>;
  /** Number of completed equations */
  equationCount: number;
}

export interface DenseSystem {
  matrix: number[][];
  vector: number[];
  /** Variable names by index */
  names: string[];
}

/** JSON-friendly form of an equation system */
export interface SerializedSystem {
  equation_count: number;
  variables: Record<string, number>;
  coefficients: { equation: number; variable: number; value: number }[];
  constants: { equation: number; value: number }[];
}

export function createEquationSystem(): EquationSystem {
  return {
    coefficients: new Map(),
    constants: new Map(),
    variables: new Map(),
    equationCount: 0,
  };
}

// =============================================================================
// ACCESSORS
// =============================================================================

export function getCoefficient(system: EquationSystem, equation: number, variable: number): number {
  return system.coefficients.get(equation)?.get(variable) ?? 0;
}

export function addCoefficient(
  system: EquationSystem,
  equation: number,
  variable: number,
  value: number,
): void {
  let row = system.coefficients.get(equation);
  if (!row) {
    row = new Map();
    system.coefficients.set(equation, row);
  }
  row.set(variable, (row.get(variable) ?? 0) + value);
}

export function getConstant(system: EquationSystem, equation: number): number {
  return system.constants.get(equation) ?? 0;
}

export function addConstant(system: EquationSystem, equation: number, value: number): void {
  system.constants.set(equation, getConstant(system, equation) + value);
}

/** Index for a variable name, allocating the next index on first sight */
export function resolveVariable(system: EquationSystem, name: string): number {
  const existing = system.variables.get(name);
  if (existing !== undefined) return existing;

  const index = system.variables.size;
  system.variables.set(name, index);
  return index;
}

/** Variable names ordered by index */
export function variableNames(system: EquationSystem): string[] {
  const names: string[] = [];
  for (const [name, index] of system.variables) {
    names[index] = name;
  }
  return names;
}

// =============================================================================
// CONVERSION
// =============================================================================

/** Dense n×n matrix and n-vector for the first n equations */
export function toDenseSystem(system: EquationSystem, size = system.equationCount): DenseSystem {
  const matrix: number[][] = [];
  const vector: number[] = [];

  for (let row = 0; row < size; row++) {
    const values: number[] = [];
    for (let col = 0; col < size; col++) {
      values.push(getCoefficient(system, row, col));
    }
    matrix.push(values);
    vector.push(getConstant(system, row));
  }

  return { matrix, vector, names: variableNames(system) };
}

export function serializeSystem(system: EquationSystem): SerializedSystem {
  const coefficients: SerializedSystem["coefficients"] = [];
  const rows = [...system.coefficients.keys()].sort((a, b) => a - b);
  for (const equation of rows) {
    const row = system.coefficients.get(equation);
    if (!row) continue;
    const cols = [...row.keys()].sort((a, b) => a - b);
    for (const variable of cols) {
      coefficients.push({ equation, variable, value: row.get(variable) ?? 0 });
    }
  }

  const constants = [...system.constants.entries()]
    .sort(([a], [b]) => a - b)
    .map(([equation, value]) => ({ equation, value }));

  return {
    equation_count: system.equationCount,
    variables: Object.fromEntries(system.variables),
    coefficients,
    constants,
  };
}
