/**
 * Solve a document of linear equations end to end:
 * parse every line, check the system is square, then hand it to the solver.
 */

import { type DocumentParse, parseDocument } from "./parser.ts";
import { DEFAULT_SOLVER_OPTIONS, type SolverOptions, solveSystem } from "./solver.ts";
import { describeStatus, isParseSuccess, type ParserStatus } from "./status.ts";
import { variableNames } from "./system.ts";

export interface VariableValue {
  name: string;
  value: number;
}

export type SolveEquationsResult =
  | {
      kind: "parse-error";
      status: ParserStatus;
      message: string;
      /** 0-based line index */
      line: number;
      position: number;
    }
  | { kind: "no-equations" }
  | { kind: "too-few-equations"; equations: number; variables: number }
  | { kind: "too-many-equations"; equations: number; variables: number }
  | { kind: "singular"; equations: number }
  | { kind: "ill-conditioned"; equations: number; conditionEstimate: number }
  | { kind: "solved"; equations: number; solution: VariableValue[]; conditionEstimate: number };

/** Check and solve an already parsed document */
export function solveParsed(
  parsed: DocumentParse,
  options: Partial<SolverOptions> = {},
): SolveEquationsResult {
  if (!isParseSuccess(parsed.status)) {
    return {
      kind: "parse-error",
      status: parsed.status,
      message: describeStatus(parsed.status),
      line: parsed.line,
      position: parsed.position,
    };
  }

  const { system } = parsed;
  const equations = system.equationCount;
  const variables = system.variables.size;

  if (equations === 0) return { kind: "no-equations" };
  if (equations < variables) return { kind: "too-few-equations", equations, variables };
  if (equations > variables) return { kind: "too-many-equations", equations, variables };

  const result = solveSystem(equations, system, { ...DEFAULT_SOLVER_OPTIONS, ...options });
  switch (result.status) {
    case "singular":
      return { kind: "singular", equations };
    case "ill-conditioned":
      return { kind: "ill-conditioned", equations, conditionEstimate: result.conditionEstimate };
    case "success": {
      const names = variableNames(system);
      const solution = names.map((name, index) => ({ name, value: result.solution[index] ?? 0 }));
      return { kind: "solved", equations, solution, conditionEstimate: result.conditionEstimate };
    }
  }
}

export function solveEquations(text: string, options: Partial<SolverOptions> = {}): SolveEquationsResult {
  return solveParsed(parseDocument(text), options);
}
