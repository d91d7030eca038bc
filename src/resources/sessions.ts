/**
 * Session Resources - Expose equation documents as MCP resources
 * Lets clients read a document's sparse system without calling a tool
 */

import { serializeSystem } from "../lib/equations/index.ts";
import { SessionManager } from "../lib/session.ts";

/**
 * Resource template for a document's equation system
 * URI: equations://{session_id}
 */
export const sessionResource = {
  name: "Equation Document",
  uriTemplate: "equations://{session_id}",
  description: "Lines, last parse status and the sparse A·x = b system of an equation document",
  mimeType: "application/json",
  arguments: [
    {
      name: "session_id",
      description: "The document identifier",
      required: true,
    },
  ],
  load: async (args: { session_id?: string }) => {
    const sessionId = args.session_id;
    if (!sessionId) {
      return {
        text: JSON.stringify({ error: "session_id is required" }),
      };
    }

    const session = SessionManager.get(sessionId);
    if (!session) {
      return {
        text: JSON.stringify({ error: `Session '${sessionId}' not found` }),
      };
    }

    const data = {
      id: session.id,
      created_at: new Date(session.created_at).toISOString(),
      updated_at: new Date(session.updated_at).toISOString(),
      lines: session.lines,
      last_outcome: session.last_outcome,
      failed_line: session.failed_line,
      parser: {
        mode: session.parser.mode,
        equation_index: session.parser.equationIndex,
        equal_sign_seen: session.parser.equalSignSeen,
      },
      system: serializeSystem(session.system),
    };

    return {
      text: JSON.stringify(data, null, 2),
    };
  },
};

/**
 * Resource template for document summaries
 * URI: equations://{session_id}/summary
 */
export const sessionSummaryResource = {
  name: "Equation Document Summary",
  uriTemplate: "equations://{session_id}/summary",
  description: "Readable summary of an equation document",
  mimeType: "text/plain",
  arguments: [
    {
      name: "session_id",
      description: "The document identifier",
      required: true,
    },
  ],
  load: async (args: { session_id?: string }) => {
    const sessionId = args.session_id;
    if (!sessionId) {
      return { text: "Error: session_id is required" };
    }

    const summary = SessionManager.getSummary(sessionId);
    if (!summary) {
      return { text: `Error: Session '${sessionId}' not found` };
    }

    return { text: summary };
  },
};

/**
 * Static resource listing all open documents
 */
export const sessionsListResource = {
  name: "Equation Documents",
  uri: "equations://list",
  description: "List all open equation documents",
  mimeType: "application/json",
  load: async () => {
    const sessions = SessionManager.list();

    const data = {
      count: sessions.length,
      sessions: sessions.map((s) => ({
        id: s.id,
        line_count: s.line_count,
        equation_count: s.equation_count,
        variable_count: s.variable_count,
        age_seconds: Math.round(s.age_ms / 1000),
      })),
    };

    return {
      text: JSON.stringify(data, null, 2),
    };
  },
};
