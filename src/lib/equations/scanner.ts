/**
 * Lexical scanners for linear equations
 * Primitive recognizers that read from a cursor and advance it
 */

import { type ParseFailure, ParserStatus } from "./status.ts";

/** Longest numeric literal accepted, in digits and in characters */
export const MAX_NUMBER_LENGTH = 20;

/** Scan position within one line of input */
export interface Cursor {
  text: string;
  pos: number;
}

export type ScanResult<T> = { ok: true; value: T } | { ok: false; failure: ParseFailure };

export interface SignToken {
  present: boolean;
  negative: boolean;
}

export interface NumberToken {
  /** True when at least one digit was read; a lone "." is not a number */
  found: boolean;
  text: string;
}

export function createCursor(text: string, pos = 0): Cursor {
  return { text, pos };
}

export function atEnd(cursor: Cursor): boolean {
  return cursor.pos >= cursor.text.length;
}

export function peek(cursor: Cursor): string {
  return cursor.text.charAt(cursor.pos);
}

export function isDigit(char: string): boolean {
  return /^[0-9]$/.test(char);
}

export function isNameChar(char: string): boolean {
  return /^[A-Za-z_]$/.test(char);
}

function fail<T>(status: ParserStatus, position: number): ScanResult<T> {
  return { ok: false, failure: { status, position } };
}

// =============================================================================
// SCANNERS
// =============================================================================

export function skipSpaces(cursor: Cursor): void {
  while (!atEnd(cursor) && /\s/.test(peek(cursor))) {
    cursor.pos++;
  }
}

/** Optional leading "+" or "-"; consumes at most one character */
export function scanSign(cursor: Cursor): SignToken {
  const char = peek(cursor);
  if (char === "+" || char === "-") {
    cursor.pos++;
    return { present: true, negative: char === "-" };
  }
  return { present: false, negative: false };
}

/**
 * Maximal run of digits and at most one decimal point, in any order
 * ("12.5", ".5", "12.").
 */
export function scanNumber(cursor: Cursor): ScanResult<NumberToken> {
  let digits = 0;
  let decimalPoints = 0;
  let text = "";

  while (!atEnd(cursor)) {
    const char = peek(cursor);
    if (isDigit(char)) {
      if (++digits > MAX_NUMBER_LENGTH) {
        return fail(ParserStatus.TooManyDigits, cursor.pos);
      }
    } else if (char === ".") {
      if (++decimalPoints > 1) {
        return fail(ParserStatus.MultipleDecimalPoints, cursor.pos);
      }
    } else {
      break;
    }
    text += char;
    cursor.pos++;
  }

  // Twenty digits plus the point is still too long
  if (text.length > MAX_NUMBER_LENGTH) {
    return fail(ParserStatus.TooManyDigits, cursor.pos);
  }

  return { ok: true, value: { found: digits > 0, text } };
}

/** Maximal run of ASCII letters and underscores; empty string when none */
export function scanVariableName(cursor: Cursor): string {
  const start = cursor.pos;
  while (!atEnd(cursor) && isNameChar(peek(cursor))) {
    cursor.pos++;
  }
  return cursor.text.slice(start, cursor.pos);
}
