import Database from "better-sqlite3";
import type { Session, SessionId, SessionRepository, TurnSummary, UserId } from "@helpdesk/types";
import { deepFreeze } from "@helpdesk/core";
import {
  StoredProfileSchema,
  StoredScratchSchema,
  StoredTurnSummarySchema,
  parseColumn,
  type SessionRow,
  type TurnRow,
} from "./rows.js";

/**
 * SQLite-backed SessionRepository.
 *
 * The `sessions` row holds the profile and scratch as JSON and is replaced
 * on every save. Turn summaries go to an append-only `turns` table and are
 * replayed in order on load. Scratch values must be JSON-serializable.
 */
export class SQLiteSessionRepository implements SessionRepository {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.migrate();
  }

  /** Idempotent. */
  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id              TEXT PRIMARY KEY,
        user_id         TEXT NOT NULL,
        profile         TEXT NOT NULL,
        scratch         TEXT NOT NULL DEFAULT '{}',
        created_at      TEXT NOT NULL,
        last_active_at  TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS turns (
        session_id  TEXT NOT NULL,
        seq         INTEGER NOT NULL,
        turn_id     TEXT NOT NULL,
        summary     TEXT NOT NULL,
        PRIMARY KEY (session_id, seq),
        FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_user
        ON sessions(user_id, last_active_at);
    `);
  }

  async get(id: SessionId): Promise<Session | undefined> {
    const row = this.db.prepare<[string], SessionRow>("SELECT * FROM sessions WHERE id = ?").get(id);
    if (!row) return undefined;

    const turns = this.db
      .prepare<[string], TurnRow>("SELECT summary FROM turns WHERE session_id = ? ORDER BY seq ASC")
      .all(id);

    const userId = row.user_id as UserId;
    const profile = parseColumn(StoredProfileSchema, row.profile, "profile");
    const scratch = parseColumn(StoredScratchSchema, row.scratch, "scratch");

    return {
      id: row.id as SessionId,
      userId,
      userProfile: deepFreeze({ userId, ...profile }),
      scratch: new Map(Object.entries(scratch)),
      turnHistory: turns.map((t): TurnSummary => parseColumn(StoredTurnSummarySchema, t.summary, "turn summary")),
      createdAt: row.created_at,
      lastActiveAt: row.last_active_at,
    };
  }

  async save(session: Session): Promise<void> {
    const { userId: _userId, ...profile } = session.userProfile;
    const upsert = this.db.prepare(`
      INSERT INTO sessions (id, user_id, profile, scratch, created_at, last_active_at)
      VALUES (@id, @userId, @profile, @scratch, @createdAt, @lastActiveAt)
      ON CONFLICT(id) DO UPDATE SET
        profile = excluded.profile,
        scratch = excluded.scratch,
        last_active_at = excluded.last_active_at
    `);
    const countTurns = this.db.prepare<[string], { cnt: number }>(
      "SELECT COUNT(*) AS cnt FROM turns WHERE session_id = ?"
    );
    const insertTurn = this.db.prepare(
      "INSERT INTO turns (session_id, seq, turn_id, summary) VALUES (?, ?, ?, ?)"
    );

    const write = this.db.transaction((s: Session) => {
      upsert.run({
        id: s.id,
        userId: s.userId,
        profile: JSON.stringify(profile),
        scratch: JSON.stringify(Object.fromEntries(s.scratch)),
        createdAt: s.createdAt,
        lastActiveAt: s.lastActiveAt,
      });

      // turnHistory is append-only, so only the tail is new.
      const stored = countTurns.get(s.id)?.cnt ?? 0;
      s.turnHistory.slice(stored).forEach((summary, i) => {
        insertTurn.run(s.id, stored + i, summary.turnId, JSON.stringify(summary));
      });
    });

    write(session);
  }

  async delete(id: SessionId): Promise<void> {
    this.db.prepare("DELETE FROM sessions WHERE id = ?").run(id);
  }

  async listByUser(userId: UserId): Promise<Session[]> {
    const rows = this.db
      .prepare<[string], { id: string }>("SELECT id FROM sessions WHERE user_id = ? ORDER BY last_active_at DESC")
      .all(userId);

    const sessions: Session[] = [];
    for (const row of rows) {
      const session = await this.get(row.id as SessionId);
      if (session) sessions.push(session);
    }
    return sessions;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
