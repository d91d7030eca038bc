/**
 * Linear equations module
 * Incremental parser, equation system containers, solver and formatting
 */

// Status
export {
  describeStatus,
  isParseSuccess,
  type ParseFailure,
  type ParseOutcome,
  ParserStatus,
} from "./status.ts";

// Scanners
export {
  type Cursor,
  createCursor,
  MAX_NUMBER_LENGTH,
  type NumberToken,
  type ScanResult,
  scanNumber,
  scanSign,
  scanVariableName,
  type SignToken,
  skipSpaces,
} from "./scanner.ts";

// Term and operator
export { assembleTerm, scanTerm, type Term, termValue } from "./term.ts";
export { type OperatorScan, scanOperator } from "./operator.ts";

// Session and parser
export {
  classifyEquation,
  createParserSession,
  hasEquationInProgress,
  ParseMode,
  type ParserSession,
  resetParserSession,
} from "./session.ts";
export { type DocumentParse, parseDocument, parseLine, splitLines } from "./parser.ts";

// System
export {
  addCoefficient,
  addConstant,
  createEquationSystem,
  type DenseSystem,
  type EquationSystem,
  getCoefficient,
  getConstant,
  resolveVariable,
  type SerializedSystem,
  serializeSystem,
  toDenseSystem,
  variableNames,
} from "./system.ts";

// Solving
export { DEFAULT_SOLVER_OPTIONS, type SolveResult, type SolverOptions, solveDense, solveSystem } from "./solver.ts";
export { type SolveEquationsResult, solveEquations, solveParsed, type VariableValue } from "./solve.ts";

// Formatting
export { formatEquation, formatNumber, formatOutcome, formatSolveResult, formatSystem } from "./format.ts";
