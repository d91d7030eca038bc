/**
 * Parser Session - state that survives between line parses
 * One session per document; the equation system lives beside it, not in it.
 */

import { ParserStatus } from "./status.ts";

export const ParseMode = {
  ExpectTerm: "expect_term",
  ExpectOperator: "expect_operator",
} as const;

export type ParseMode = (typeof ParseMode)[keyof typeof ParseMode];

export interface ParserSession {
  mode: ParseMode;
  /** 0-based index of the equation being assembled */
  equationIndex: number;
  /** Sign set by the most recent "+" or "-" operator */
  negativeOperator: boolean;
  equalSignSeen: boolean;
  termBeforeEqualSign: boolean;
  termAfterEqualSign: boolean;
  variableSeen: boolean;
  /** Offset of the first non-blank character of the current line */
  startPosition: number;
}

export function createParserSession(): ParserSession {
  return {
    mode: ParseMode.ExpectTerm,
    equationIndex: 0,
    negativeOperator: false,
    equalSignSeen: false,
    termBeforeEqualSign: false,
    termAfterEqualSign: false,
    variableSeen: false,
    startPosition: 0,
  };
}

/** Back to the start of a new document */
export function resetParserSession(session: ParserSession): void {
  Object.assign(session, createParserSession());
}

/** Close the current equation and move to the next index */
export function startNextEquation(session: ParserSession): void {
  session.mode = ParseMode.ExpectTerm;
  session.negativeOperator = false;
  session.equalSignSeen = false;
  session.termBeforeEqualSign = false;
  session.termAfterEqualSign = false;
  session.variableSeen = false;
  session.startPosition = 0;
  session.equationIndex++;
}

/** True when the current equation has any term or an equal sign */
export function hasEquationInProgress(session: ParserSession): boolean {
  return session.equalSignSeen || session.termBeforeEqualSign || session.termAfterEqualSign;
}

/**
 * Structural classification of the equation currently being assembled.
 * The line parser does not call this; hosts use it on an unfinished equation.
 */
export function classifyEquation(session: ParserSession): ParserStatus {
  if (
    !session.equalSignSeen &&
    !session.termBeforeEqualSign &&
    !session.termAfterEqualSign &&
    !session.variableSeen
  ) {
    return ParserStatus.SuccessNoEquation;
  }
  if (!session.equalSignSeen) return ParserStatus.NoEqualSign;
  if (!session.termBeforeEqualSign) return ParserStatus.NoTermBeforeEqualSign;
  if (!session.termAfterEqualSign) return ParserStatus.NoTermAfterEqualSign;
  if (!session.variableSeen) return ParserStatus.NoVariableInEquation;
  return ParserStatus.Success;
}
