import type { Session, SessionSummary } from "@siteqa/shared";
import { compareIds } from "../utils/text.js";
import { cloneSession, summarizeSession, type SessionStoreLike } from "./sessionStoreTypes.js";

export class InMemorySessionStore implements SessionStoreLike {
  private readonly sessions = new Map<string, Session>();

  close(): void {
    this.sessions.clear();
  }

  async getSession(id: string): Promise<Session | null> {
    const session = this.sessions.get(id);
    return session ? cloneSession(session) : null;
  }

  async saveSession(session: Session): Promise<void> {
    this.sessions.set(session.id, cloneSession(session));
  }

  async deleteSession(id: string): Promise<boolean> {
    return this.sessions.delete(id);
  }

  async listSessions(limit = 100): Promise<SessionSummary[]> {
    const safeLimit = Math.max(1, limit);
    return [...this.sessions.values()]
      .sort(
        (a, b) => b.lastAccessAt.getTime() - a.lastAccessAt.getTime() || compareIds(a.id, b.id)
      )
      .slice(0, safeLimit)
      .map((session) => summarizeSession(cloneSession(session)));
  }

  async countSessions(): Promise<number> {
    return this.sessions.size;
  }

  async deleteIdleSessions(cutoff: Date): Promise<number> {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (session.lastAccessAt.getTime() < cutoff.getTime()) {
        this.sessions.delete(id);
        removed += 1;
      }
    }
    return removed;
  }
}
