import type { Session, SessionSummary, SessionTurn } from "@siteqa/shared";
import { InvalidConfigError } from "../errors.js";
import { KeyedMutex } from "./KeyedMutex.js";
import { cloneSession, type SessionStoreLike } from "./sessionStoreTypes.js";

export interface SessionMemoryOptions {
  maxTurns: number;
  /** Idle time after which a session reads as absent; 0 keeps sessions forever. */
  ttlMs: number;
  now?: () => Date;
}

/**
 * Bounded per-session conversation history. Every operation on one session id runs
 * under that id's lock; different ids never wait on each other.
 */
export class SessionMemory {
  private readonly mutex = new KeyedMutex();
  private readonly maxTurns: number;
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly store: SessionStoreLike,
    options: SessionMemoryOptions
  ) {
    if (!Number.isInteger(options.maxTurns) || options.maxTurns < 1) {
      throw new InvalidConfigError(`Session max turns must be a positive integer, got ${options.maxTurns}`);
    }
    if (!(options.ttlMs >= 0)) {
      throw new InvalidConfigError(`Session TTL must be non-negative, got ${options.ttlMs}`);
    }
    this.maxTurns = options.maxTurns;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? (() => new Date());
  }

  /** Turns of the session, creating it empty when unseen. */
  get(sessionId: string): Promise<SessionTurn[]> {
    return this.mutex.runExclusive(sessionId, async () => {
      const now = this.now();
      const session = (await this.load(sessionId, now)) ?? this.create(sessionId, now);
      session.lastAccessAt = now;
      await this.store.saveSession(session);
      return session.turns;
    });
  }

  append(sessionId: string, turn: SessionTurn): Promise<void> {
    return this.mutex.runExclusive(sessionId, async () => {
      const now = this.now();
      const session = (await this.load(sessionId, now)) ?? this.create(sessionId, now);
      while (session.turns.length >= this.maxTurns) {
        session.turns.shift();
      }
      session.turns.push({ ...turn });
      session.lastAccessAt = now;
      await this.store.saveSession(session);
    });
  }

  /** Resolves to whether a live session was removed. */
  clear(sessionId: string): Promise<boolean> {
    return this.mutex.runExclusive(sessionId, async () => {
      const session = await this.load(sessionId, this.now());
      if (!session) {
        return false;
      }
      return this.store.deleteSession(sessionId);
    });
  }

  /** Last `count` turns, oldest first. Does not create the session. */
  recent(sessionId: string, count: number): Promise<SessionTurn[]> {
    return this.mutex.runExclusive(sessionId, async () => {
      if (count <= 0) {
        return [];
      }
      const session = await this.load(sessionId, this.now());
      return session ? session.turns.slice(-count) : [];
    });
  }

  peek(sessionId: string): Promise<Session | null> {
    return this.mutex.runExclusive(sessionId, async () => {
      const session = await this.load(sessionId, this.now());
      return session ? cloneSession(session) : null;
    });
  }

  async list(limit = 100): Promise<SessionSummary[]> {
    await this.purgeExpired();
    return this.store.listSessions(limit);
  }

  async count(): Promise<number> {
    await this.purgeExpired();
    return this.store.countSessions();
  }

  async purgeExpired(): Promise<number> {
    if (this.ttlMs === 0) {
      return 0;
    }
    return this.store.deleteIdleSessions(new Date(this.now().getTime() - this.ttlMs));
  }

  private async load(sessionId: string, now: Date): Promise<Session | null> {
    const session = await this.store.getSession(sessionId);
    if (!session) {
      return null;
    }
    if (this.isExpired(session, now)) {
      await this.store.deleteSession(sessionId);
      return null;
    }
    return session;
  }

  private isExpired(session: Session, now: Date): boolean {
    return this.ttlMs > 0 && now.getTime() - session.lastAccessAt.getTime() > this.ttlMs;
  }

  private create(sessionId: string, now: Date): Session {
    return { id: sessionId, turns: [], createdAt: now, lastAccessAt: now };
  }
}
