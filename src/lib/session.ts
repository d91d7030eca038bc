/**
 * Document Session Manager - named equation documents with TTL cleanup
 * Each document owns one parser session and one equation system, so
 * independent documents never share parse state.
 */

import { getConfig } from "../config.ts";
import {
  createEquationSystem,
  createParserSession,
  describeStatus,
  type EquationSystem,
  formatSystem,
  hasEquationInProgress,
  isParseSuccess,
  type ParseOutcome,
  type ParserSession,
  parseLine,
  resetParserSession,
} from "./equations/index.ts";

export interface DocumentSession {
  id: string;
  created_at: number;
  updated_at: number;
  parser: ParserSession;
  system: EquationSystem;
  /** Lines accepted so far, in order */
  lines: string[];
  last_outcome: ParseOutcome | null;
  /** Line that produced last_outcome when it was an error */
  failed_line: string | null;
}

export type FeedResult =
  | { accepted: true; session: DocumentSession; outcome: ParseOutcome; line_number: number }
  | { accepted: false; reason: "blocked"; session: DocumentSession; outcome: ParseOutcome };

export interface SessionManagerConfig {
  ttl_ms: number; // Time-to-live for idle documents
  cleanup_interval_ms: number;
  max_sessions: number;
}

const DEFAULT_CONFIG: SessionManagerConfig = {
  ttl_ms: 30 * 60 * 1000, // 30 minutes
  cleanup_interval_ms: 5 * 60 * 1000, // 5 minutes
  max_sessions: 100,
};

class SessionManagerImpl {
  private sessions: Map<string, DocumentSession> = new Map();
  private config: SessionManagerConfig;
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;

  constructor(config: Partial<SessionManagerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.startCleanup();
  }

  private startCleanup(): void {
    if (this.cleanupTimer || this.config.cleanup_interval_ms <= 0) return;
    this.cleanupTimer = setInterval(() => {
      this.cleanup();
    }, this.config.cleanup_interval_ms);
    // Never keep the process alive just for cleanup
    this.cleanupTimer.unref();
  }

  cleanup(now = Date.now()): number {
    const expired: string[] = [];

    for (const [id, session] of this.sessions) {
      if (now - session.updated_at > this.config.ttl_ms) {
        expired.push(id);
      }
    }

    for (const id of expired) {
      this.sessions.delete(id);
    }
    return expired.length;
  }

  getOrCreate(sessionId: string): DocumentSession {
    let session = this.sessions.get(sessionId);

    if (!session) {
      if (this.sessions.size >= this.config.max_sessions) {
        // Evict the least recently updated document
        let oldest: [string, DocumentSession] | null = null;
        for (const entry of this.sessions) {
          if (!oldest || entry[1].updated_at < oldest[1].updated_at) {
            oldest = entry;
          }
        }
        if (oldest) this.sessions.delete(oldest[0]);
      }

      const now = Date.now();
      session = {
        id: sessionId,
        created_at: now,
        updated_at: now,
        parser: createParserSession(),
        system: createEquationSystem(),
        lines: [],
        last_outcome: null,
        failed_line: null,
      };
      this.sessions.set(sessionId, session);
    }

    return session;
  }

  get(sessionId: string): DocumentSession | undefined {
    const session = this.sessions.get(sessionId);
    if (session) {
      session.updated_at = Date.now(); // Touch on access
    }
    return session;
  }

  /**
   * Parse one more line into a document. After an error the document
   * accepts nothing until reset().
   */
  feed(sessionId: string, line: string): FeedResult {
    const session = this.getOrCreate(sessionId);
    session.updated_at = Date.now();

    if (session.last_outcome && !isParseSuccess(session.last_outcome.status)) {
      return { accepted: false, reason: "blocked", session, outcome: session.last_outcome };
    }

    const outcome = parseLine(session.parser, line, session.system);
    session.last_outcome = outcome;

    if (!isParseSuccess(outcome.status)) {
      session.failed_line = line;
      return { accepted: true, session, outcome, line_number: session.lines.length + 1 };
    }

    session.lines.push(line);
    return { accepted: true, session, outcome, line_number: session.lines.length };
  }

  /** Start the document over with empty containers */
  reset(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    resetParserSession(session.parser);
    session.system = createEquationSystem();
    session.lines = [];
    session.last_outcome = null;
    session.failed_line = null;
    session.updated_at = Date.now();
    return true;
  }

  list(): { id: string; line_count: number; equation_count: number; variable_count: number; age_ms: number }[] {
    const now = Date.now();
    return Array.from(this.sessions.values()).map((s) => ({
      id: s.id,
      line_count: s.lines.length,
      equation_count: s.system.equationCount,
      variable_count: s.system.variables.size,
      age_ms: now - s.created_at,
    }));
  }

  getSummary(sessionId: string): string | null {
    const session = this.get(sessionId);
    if (!session) return null;

    const status = session.last_outcome ? describeStatus(session.last_outcome.status) : "Empty";
    const lines: string[] = [
      `Session: ${sessionId}`,
      `Lines: ${session.lines.length}`,
      `Last status: ${status}`,
    ];
    if (hasEquationInProgress(session.parser)) {
      lines.push(`Equation ${session.parser.equationIndex + 1} is still open`);
    }
    lines.push("", formatSystem(session.system));

    return lines.join("\n");
  }

  clear(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  clearAll(): number {
    const count = this.sessions.size;
    this.sessions.clear();
    return count;
  }

  destroy(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.sessions.clear();
  }
}

// Export class for testing
export { SessionManagerImpl };

// Singleton instance
export const SessionManager = new SessionManagerImpl(getConfig().sessions);
