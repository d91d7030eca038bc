/**
 * Operator recognizer: "=", "+", "-" between terms
 */

import { type Cursor, atEnd, peek, scanSign, skipSpaces } from "./scanner.ts";
import type { ParserSession } from "./session.ts";
import { type ParseFailure, ParserStatus } from "./status.ts";

export type OperatorScan = { ok: true; found: boolean } | { ok: false; failure: ParseFailure };

/**
 * Recognize an optional "=" followed by an optional sign.
 * "= -" is one operator: the sign carries to the next term.
 */
export function scanOperator(session: ParserSession, cursor: Cursor): OperatorScan {
  skipSpaces(cursor);
  session.negativeOperator = false;

  let equalSign = false;
  if (!atEnd(cursor) && peek(cursor) === "=") {
    if (session.equalSignSeen) {
      return { ok: false, failure: { status: ParserStatus.MultipleEqualSigns, position: cursor.pos } };
    }
    session.equalSignSeen = true;
    equalSign = true;
    cursor.pos++;
  }

  const sign = scanSign(cursor);
  session.negativeOperator = sign.negative;

  return { ok: true, found: sign.present || equalSign };
}
