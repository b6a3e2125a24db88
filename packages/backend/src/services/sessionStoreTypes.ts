import type { Session, SessionSummary } from "@siteqa/shared";

export interface SessionStoreLike {
  getSession(id: string): Promise<Session | null>;
  /** Upserts the session row and replaces its turns. */
  saveSession(session: Session): Promise<void>;
  deleteSession(id: string): Promise<boolean>;
  listSessions(limit?: number): Promise<SessionSummary[]>;
  countSessions(): Promise<number>;
  /** Removes sessions last accessed before `cutoff`; resolves to the number removed. */
  deleteIdleSessions(cutoff: Date): Promise<number>;
  close(): void;
}

export function cloneSession(session: Session): Session {
  return {
    id: session.id,
    createdAt: new Date(session.createdAt),
    lastAccessAt: new Date(session.lastAccessAt),
    turns: session.turns.map((turn) => ({ ...turn, timestamp: new Date(turn.timestamp) }))
  };
}

export function summarizeSession(session: Session): SessionSummary {
  return {
    id: session.id,
    turnCount: session.turns.length,
    createdAt: session.createdAt,
    lastAccessAt: session.lastAccessAt
  };
}
