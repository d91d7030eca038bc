/**
 * Parser status codes
 * Closed set of outcomes returned by the line parser, plus English messages
 */

// =============================================================================
// STATUS CODES
// =============================================================================

export const ParserStatus = {
  Success: "success",
  SuccessNoEquation: "success_no_equation",
  // Structural
  IllegalEquation: "illegal_equation",
  NoEqualSign: "no_equal_sign",
  MultipleEqualSigns: "multiple_equal_signs",
  NoTermBeforeEqualSign: "no_term_before_equal_sign",
  NoTermAfterEqualSign: "no_term_after_equal_sign",
  NoTermEncountered: "no_term_encountered",
  NoVariableInEquation: "no_variable_in_equation",
  // Numeric format
  MultipleDecimalPoints: "multiple_decimal_points",
  TooManyDigits: "too_many_digits",
  MissingExponent: "missing_exponent",
  IllegalExponent: "illegal_exponent",
} as const;

export type ParserStatus = (typeof ParserStatus)[keyof typeof ParserStatus];

/** Result of one parser call: status plus the offset where it was decided */
export interface ParseOutcome {
  status: ParserStatus;
  /** Character offset in the most recently parsed line */
  position: number;
}

/** A scanner or assembler failure, carried up to the line driver */
export interface ParseFailure {
  status: ParserStatus;
  position: number;
}

export function isParseSuccess(status: ParserStatus): boolean {
  return status === ParserStatus.Success || status === ParserStatus.SuccessNoEquation;
}

// =============================================================================
// MESSAGES
// =============================================================================

const STATUS_MESSAGES: Record<ParserStatus, string> = {
  [ParserStatus.Success]: "Success",
  [ParserStatus.SuccessNoEquation]: "Success",
  [ParserStatus.IllegalEquation]: "Illegal equation",
  [ParserStatus.NoEqualSign]: "The equation has no equal sign",
  [ParserStatus.MultipleEqualSigns]: "The equation has more than one equal sign",
  [ParserStatus.NoTermBeforeEqualSign]: "There is no term before the equal sign",
  [ParserStatus.NoTermAfterEqualSign]: "There is no term after the equal sign",
  [ParserStatus.NoTermEncountered]: "Expected a number or a variable",
  [ParserStatus.NoVariableInEquation]: "The equation has no variable",
  [ParserStatus.MultipleDecimalPoints]: "A number has more than one decimal point",
  [ParserStatus.TooManyDigits]: "A number has too many digits",
  [ParserStatus.MissingExponent]: "The exponent after '^' is missing",
  [ParserStatus.IllegalExponent]: "The exponent must be one or two digits",
};

/** English message for a status code */
export function describeStatus(status: ParserStatus): string {
  return STATUS_MESSAGES[status];
}
