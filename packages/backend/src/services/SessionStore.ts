import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import type { QueryLabel, Session, SessionSummary, SessionTurn } from "@siteqa/shared";
import type { SessionStoreLike } from "./sessionStoreTypes.js";

export interface SessionStoreOptions {
  dbPath?: string;
}

interface SessionRow {
  id: string;
  created_at: string;
  last_access_at: string;
}

interface SessionSummaryRow extends SessionRow {
  turn_count: number;
}

interface SessionTurnRow {
  position: number;
  question: string;
  answer: string;
  label: string;
  degraded: number;
  created_at: string;
}

function toLabel(value: string): QueryLabel {
  return value === "off_domain" ? "off_domain" : "in_domain";
}

export class SessionStore implements SessionStoreLike {
  private readonly db: Database.Database;

  constructor(options: SessionStoreOptions = {}) {
    const dbPath = resolve(options.dbPath ?? "data/sessions.db");
    mkdirSync(dirname(dbPath), { recursive: true });

    this.db = new Database(dbPath);
    this.db.pragma("foreign_keys = ON");
    this.db.pragma("journal_mode = WAL");

    this.initializeSchema();
  }

  close(): void {
    this.db.close();
  }

  async getSession(id: string): Promise<Session | null> {
    const row = this.db
      .prepare<[string], SessionRow>(
        `
        SELECT id, created_at, last_access_at
        FROM sessions
        WHERE id = ?
        LIMIT 1
        `
      )
      .get(id);
    if (!row) {
      return null;
    }

    const turns = this.db
      .prepare<[string], SessionTurnRow>(
        `
        SELECT position, question, answer, label, degraded, created_at
        FROM session_turns
        WHERE session_id = ?
        ORDER BY position ASC
        `
      )
      .all(id)
      .map((turn): SessionTurn => ({
        question: turn.question,
        answer: turn.answer,
        label: toLabel(turn.label),
        degraded: turn.degraded === 1,
        timestamp: new Date(turn.created_at)
      }));

    return {
      id: row.id,
      createdAt: new Date(row.created_at),
      lastAccessAt: new Date(row.last_access_at),
      turns
    };
  }

  async saveSession(session: Session): Promise<void> {
    const upsertSession = this.db.prepare(
      `
      INSERT INTO sessions (id, created_at, last_access_at)
      VALUES (@id, @created_at, @last_access_at)
      ON CONFLICT(id) DO UPDATE SET last_access_at = excluded.last_access_at
      `
    );
    const clearTurns = this.db.prepare("DELETE FROM session_turns WHERE session_id = ?");
    const insertTurn = this.db.prepare(
      `
      INSERT INTO session_turns (session_id, position, question, answer, label, degraded, created_at)
      VALUES (@session_id, @position, @question, @answer, @label, @degraded, @created_at)
      `
    );

    this.db.transaction(() => {
      upsertSession.run({
        id: session.id,
        created_at: session.createdAt.toISOString(),
        last_access_at: session.lastAccessAt.toISOString()
      });
      clearTurns.run(session.id);
      session.turns.forEach((turn, position) => {
        insertTurn.run({
          session_id: session.id,
          position,
          question: turn.question,
          answer: turn.answer,
          label: turn.label,
          degraded: turn.degraded ? 1 : 0,
          created_at: turn.timestamp.toISOString()
        });
      });
    })();
  }

  async deleteSession(id: string): Promise<boolean> {
    const result = this.db.prepare("DELETE FROM sessions WHERE id = ?").run(id);
    return result.changes > 0;
  }

  async listSessions(limit = 100): Promise<SessionSummary[]> {
    const safeLimit = Math.max(1, limit);
    return this.db
      .prepare<[number], SessionSummaryRow>(
        `
        SELECT s.id, s.created_at, s.last_access_at, COUNT(t.position) AS turn_count
        FROM sessions s
        LEFT JOIN session_turns t ON t.session_id = s.id
        GROUP BY s.id
        ORDER BY s.last_access_at DESC, s.id ASC
        LIMIT ?
        `
      )
      .all(safeLimit)
      .map((row) => ({
        id: row.id,
        turnCount: row.turn_count,
        createdAt: new Date(row.created_at),
        lastAccessAt: new Date(row.last_access_at)
      }));
  }

  async countSessions(): Promise<number> {
    const row = this.db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM sessions").get();
    return row?.total ?? 0;
  }

  async deleteIdleSessions(cutoff: Date): Promise<number> {
    const result = this.db
      .prepare("DELETE FROM sessions WHERE last_access_at < ?")
      .run(cutoff.toISOString());
    return result.changes;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        created_at TEXT NOT NULL,
        last_access_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS session_turns (
        session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
        position INTEGER NOT NULL,
        question TEXT NOT NULL,
        answer TEXT NOT NULL,
        label TEXT NOT NULL,
        degraded INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        PRIMARY KEY (session_id, position)
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_last_access
      ON sessions(last_access_at);
    `);
  }
}
