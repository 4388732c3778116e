import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Session, SessionId, TurnId, TurnSummary, UserId } from "@helpdesk/types";
import { SQLiteSessionRepository } from "./session-repository.js";

function makeSession(id: string, userId = "user_123"): Session {
  return {
    id: id as SessionId,
    userId: userId as UserId,
    userProfile: {
      userId: userId as UserId,
      name: "John Smith",
      email: "john.smith@example.com",
      plan: "Pro",
      accountStatus: "active",
      createdAt: "2024-01-15",
      recentTickets: ["TICKET-456"],
      purchases: ["Pro plan (annual)"],
    },
    scratch: new Map(),
    turnHistory: [],
    createdAt: "2025-01-01T00:00:00.000Z",
    lastActiveAt: "2025-01-01T00:00:00.000Z",
  };
}

function summary(n: number, extra: Partial<TurnSummary> = {}): TurnSummary {
  return {
    turnId: `turn-${n}` as TurnId,
    input: `message ${n}`,
    reply: `reply ${n}`,
    handledBy: "FrontDesk",
    routingTrace: ["Coordinator", "FrontDesk"],
    toolCalls: [],
    startedAt: "2025-01-01T00:00:00.000Z",
    completedAt: "2025-01-01T00:00:01.000Z",
    ...extra,
  };
}

describe("SQLiteSessionRepository", () => {
  let tmpDir: string;
  let dbPath: string;
  let repo: SQLiteSessionRepository;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "helpdesk-sessions-"));
    dbPath = path.join(tmpDir, "sessions.db");
    repo = new SQLiteSessionRepository(dbPath);
  });

  afterEach(async () => {
    await repo.close();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("returns undefined for unknown sessions", async () => {
    expect(await repo.get("missing" as SessionId)).toBeUndefined();
  });

  it("round-trips profile, scratch and turn history", async () => {
    const session = makeSession("s-1");
    session.scratch.set("lastTicketId", "TICKET-1001");
    session.scratch.set("similarTickets", ["TICKET-612"]);
    session.turnHistory.push(
      summary(1),
      summary(2, {
        handledBy: undefined,
        failure: "ToolFailure",
        toolCalls: [{ toolId: "search_web", ok: false, errorKind: "Timeout", latencyMs: 50 }],
      })
    );
    await repo.save(session);

    const loaded = await repo.get(session.id);
    expect(loaded?.userProfile).toEqual(session.userProfile);
    expect(Object.isFrozen(loaded?.userProfile)).toBe(true);
    expect(Object.isFrozen(loaded?.userProfile.recentTickets)).toBe(true);
    expect(Object.fromEntries(loaded?.scratch ?? [])).toEqual({
      lastTicketId: "TICKET-1001",
      similarTickets: ["TICKET-612"],
    });
    expect(loaded?.turnHistory.map((t) => t.turnId)).toEqual(["turn-1", "turn-2"]);
    expect(loaded?.turnHistory[1]).toMatchObject({
      failure: "ToolFailure",
      toolCalls: [{ toolId: "search_web", ok: false, errorKind: "Timeout", latencyMs: 50 }],
    });
  });

  it("appends only new turns and replaces scratch on later saves", async () => {
    const session = makeSession("s-2");
    session.scratch.set("lastOrderId", "12345");
    session.turnHistory.push(summary(1));
    await repo.save(session);

    session.scratch.delete("lastOrderId");
    session.scratch.set("lastTicketId", "TICKET-1001");
    session.turnHistory.push(summary(2));
    session.lastActiveAt = "2025-01-02T00:00:00.000Z";
    await repo.save(session);
    await repo.save(session);

    const loaded = await repo.get(session.id);
    expect(loaded?.turnHistory.map((t) => t.input)).toEqual(["message 1", "message 2"]);
    expect([...(loaded?.scratch.keys() ?? [])]).toEqual(["lastTicketId"]);
    expect(loaded?.lastActiveAt).toBe("2025-01-02T00:00:00.000Z");
  });

  it("keeps sessions across reopening the database", async () => {
    const session = makeSession("s-3");
    session.scratch.set("lastTicketId", "TICKET-1001");
    session.turnHistory.push(summary(1));
    await repo.save(session);
    await repo.close();

    repo = new SQLiteSessionRepository(dbPath);
    const loaded = await repo.get(session.id);
    expect(loaded?.scratch.get("lastTicketId")).toBe("TICKET-1001");
    expect(loaded?.turnHistory).toHaveLength(1);
  });

  it("lists a user's sessions, most recently active first", async () => {
    const older = makeSession("s-old");
    const newer = makeSession("s-new");
    newer.lastActiveAt = "2025-02-01T00:00:00.000Z";
    await repo.save(older);
    await repo.save(newer);
    await repo.save(makeSession("s-other", "user_456"));

    const sessions = await repo.listByUser("user_123" as UserId);
    expect(sessions.map((s) => s.id)).toEqual(["s-new", "s-old"]);
  });

  it("deletes a session with its turns", async () => {
    const session = makeSession("s-4");
    session.turnHistory.push(summary(1));
    await repo.save(session);
    await repo.delete(session.id);

    expect(await repo.get(session.id)).toBeUndefined();
    await repo.save(makeSession("s-4"));
    expect((await repo.get(session.id))?.turnHistory).toEqual([]);
  });
});
