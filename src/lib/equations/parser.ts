/**
 * Incremental Linear Equation Parser
 *
 * Consumes one line per call and builds A·x = b in a caller-owned
 * EquationSystem. The ParserSession carries the state machine between
 * calls, so an equation may continue on the next line after an operator:
 *
 *   x + 2y +      <- ends on an operator, equation stays open
 *   3z = 7        <- ends on a term, equation completes
 *
 * A single term is never split across lines.
 */

import { atEnd, createCursor, skipSpaces } from "./scanner.ts";
import { scanOperator } from "./operator.ts";
import {
  classifyEquation,
  createParserSession,
  hasEquationInProgress,
  ParseMode,
  type ParserSession,
  startNextEquation,
} from "./session.ts";
import { isParseSuccess, type ParseOutcome, ParserStatus } from "./status.ts";
import { createEquationSystem, type EquationSystem } from "./system.ts";
import { assembleTerm } from "./term.ts";

// =============================================================================
// LINE PARSER
// =============================================================================

/**
 * Parse one line of input into the system.
 * The first problem found stops the line; earlier equations are not touched
 * and the session is left as it was at the point of failure.
 */
export function parseLine(session: ParserSession, line: string, system: EquationSystem): ParseOutcome {
  const cursor = createCursor(line.trimEnd());
  let outcome: ParseOutcome = { status: ParserStatus.Success, position: 0 };

  if (cursor.text.length === 0) {
    return { status: ParserStatus.SuccessNoEquation, position: 0 };
  }

  skipSpaces(cursor);
  session.startPosition = cursor.pos;

  let operatorLast = false;
  while (!atEnd(cursor)) {
    skipSpaces(cursor);
    if (atEnd(cursor)) break;

    if (session.mode === ParseMode.ExpectTerm) {
      const failure = assembleTerm(session, cursor, system);
      if (failure) {
        outcome = failure;
        break;
      }
      session.mode = ParseMode.ExpectOperator;
      operatorLast = false;
    } else {
      const operator = scanOperator(session, cursor);
      if (operator.ok && operator.found) {
        session.mode = ParseMode.ExpectTerm;
        operatorLast = true;
        continue;
      }
      // Two terms with nothing between them ("x y") stop the line quietly
      if (!operator.ok) {
        outcome =
          cursor.pos === session.startPosition
            ? { status: ParserStatus.IllegalEquation, position: cursor.pos }
            : operator.failure;
      }
      break;
    }
  }

  // Line ended on a term: the equation is complete
  if (atEnd(cursor) && cursor.pos > 0 && !operatorLast) {
    startNextEquation(session);
    system.equationCount = session.equationIndex;
  }

  return outcome;
}

// =============================================================================
// DOCUMENT PARSER
// =============================================================================

export interface DocumentParse extends ParseOutcome {
  /** 0-based line where the status was decided */
  line: number;
  system: EquationSystem;
  session: ParserSession;
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Parse a whole document from a fresh session.
 * Stops at the first failing line. An equation still open at the end of
 * input is reported where it began when that is an earlier line, else at
 * the end of the last non-blank line.
 */
export function parseDocument(text: string): DocumentParse {
  const session = createParserSession();
  const system = createEquationSystem();
  const lines = splitLines(text);

  let lastContentLine = 0;
  let equationStartLine = 0;
  for (const [index, line] of lines.entries()) {
    const blank = line.trim() === "";
    if (!blank && !hasEquationInProgress(session)) equationStartLine = index;

    const outcome = parseLine(session, line, system);
    if (!isParseSuccess(outcome.status)) {
      return { ...outcome, line: index, system, session };
    }
    if (!blank) lastContentLine = index;
  }

  if (hasEquationInProgress(session)) {
    const classified = classifyEquation(session);
    // Structurally whole but never closed, e.g. "x = 1 +" at end of input
    const status = isParseSuccess(classified) ? ParserStatus.IllegalEquation : classified;

    if (equationStartLine !== lastContentLine) {
      const startText = lines[equationStartLine] ?? "";
      const position = startText.length - startText.trimStart().length;
      return { status, position, line: equationStartLine, system, session };
    }
    const position = (lines[lastContentLine] ?? "").trimEnd().length;
    return { status, position, line: lastContentLine, system, session };
  }

  return {
    status: system.equationCount > 0 ? ParserStatus.Success : ParserStatus.SuccessNoEquation,
    position: 0,
    line: Math.max(lines.length - 1, 0),
    system,
    session,
  };
}
