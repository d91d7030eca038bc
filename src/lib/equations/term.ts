/**
 * Term assembler
 * Reads one signed term (number, variable, or number followed by variable)
 * and folds it into the equation system at the current equation index.
 *
 * Term grammar:
 *   <sign> <spaces> <number> [^ <sign> <digits>] <spaces> <variable>
 * where either the number or the variable may be absent, but not both.
 */

import { type Cursor, atEnd, isDigit, peek, scanNumber, scanSign, scanVariableName, skipSpaces } from "./scanner.ts";
import type { ParserSession } from "./session.ts";
import { type ParseFailure, ParserStatus } from "./status.ts";
import { addCoefficient, addConstant, type EquationSystem, resolveVariable } from "./system.ts";

const MAX_EXPONENT_LENGTH = 2;

/** A term as read from the text, before it touches the system */
export interface Term {
  /** Numeric text in scientific form, or null for an implicit 1 */
  number: string | null;
  variable: string | null;
  negative: boolean;
}

type TermScan = { ok: true; term: Term } | { ok: false; failure: ParseFailure };

/**
 * Exponent clause after "^". The cursor sits just past the "^".
 * Returns the "E[-]dd" suffix to append to the mantissa.
 */
function scanExponent(cursor: Cursor): { ok: true; suffix: string } | { ok: false; failure: ParseFailure } {
  const sign = scanSign(cursor);
  const exponent = scanNumber(cursor);

  if (!exponent.ok || !exponent.value.found) {
    return { ok: false, failure: { status: ParserStatus.MissingExponent, position: cursor.pos } };
  }

  const text = exponent.value.text;
  if (text.length > MAX_EXPONENT_LENGTH || ![...text].every(isDigit)) {
    return { ok: false, failure: { status: ParserStatus.IllegalExponent, position: cursor.pos } };
  }

  return { ok: true, suffix: `E${sign.negative ? "-" : ""}${text}` };
}

/** Read a term without applying it */
export function scanTerm(cursor: Cursor): TermScan {
  const sign = scanSign(cursor);
  skipSpaces(cursor);

  const number = scanNumber(cursor);
  if (!number.ok) return number;

  let numberText: string | null = number.value.found ? number.value.text : null;

  // Exponent must follow the digits directly
  if (numberText !== null && !atEnd(cursor) && peek(cursor) === "^") {
    cursor.pos++;
    const exponent = scanExponent(cursor);
    if (!exponent.ok) return exponent;
    numberText += exponent.suffix;
  }

  skipSpaces(cursor);
  const name = scanVariableName(cursor);

  if (numberText === null && name === "") {
    return { ok: false, failure: { status: ParserStatus.NoTermEncountered, position: cursor.pos } };
  }

  return {
    ok: true,
    term: { number: numberText, variable: name === "" ? null : name, negative: sign.negative },
  };
}

/** Signed value of a term once the operator and equal-sign toggles apply */
export function termValue(session: ParserSession, term: Term): number {
  const negative = session.equalSignSeen !== session.negativeOperator !== term.negative;
  const magnitude = term.number === null ? 1.0 : Number(term.number);
  return negative ? -magnitude : magnitude;
}

/**
 * Read one term at the cursor and add it to the system.
 * Returns null on success, or the failure that stopped the scan.
 */
export function assembleTerm(
  session: ParserSession,
  cursor: Cursor,
  system: EquationSystem,
): ParseFailure | null {
  const scanned = scanTerm(cursor);
  if (!scanned.ok) return scanned.failure;

  const { term } = scanned;
  const value = termValue(session, term);

  if (term.variable !== null) {
    session.variableSeen = true;
    const index = resolveVariable(system, term.variable);
    addCoefficient(system, session.equationIndex, index, value);
  } else {
    // Constants move to the right-hand side
    addConstant(system, session.equationIndex, -value);
  }

  if (session.equalSignSeen) {
    session.termAfterEqualSign = true;
  } else {
    session.termBeforeEqualSign = true;
  }

  skipSpaces(cursor);
  return null;
}
