import { v7 as uuidv7 } from "uuid";
import type {
  ProfileLoader,
  Session,
  SessionId,
  SessionRepository,
  Timestamp,
  UserId,
  UserProfile,
} from "@helpdesk/types";
import type { Logger } from "pino";
import { BootstrapError, SessionNotFoundError } from "./errors.js";
import { silentLogger } from "./logger.js";

/** Recursively freeze a plain value. */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Per-conversation state: creation, lookup, and root-namespace scratch
 * access. The user profile is written here and nowhere else.
 */
export class SessionStateStore {
  constructor(
    private readonly profiles: ProfileLoader,
    private readonly repository: SessionRepository,
    private readonly log: Logger = silentLogger()
  ) {}

  /** Create a session for `userId`, loading its profile from the CRM collaborator. */
  async bootstrap(userId: UserId): Promise<Session> {
    const profile = await this.loadProfile(userId);
    const now = new Date().toISOString() as Timestamp;
    const session: Session = {
      id: uuidv7() as SessionId,
      userId,
      userProfile: profile,
      scratch: new Map(),
      turnHistory: [],
      createdAt: now,
      lastActiveAt: now,
    };
    await this.repository.save(session);
    this.log.info({ sessionId: session.id, userId }, "session bootstrapped");
    return session;
  }

  async find(id: SessionId): Promise<Session | undefined> {
    return this.repository.get(id);
  }

  async load(id: SessionId): Promise<Session> {
    const session = await this.repository.get(id);
    if (!session) throw new SessionNotFoundError(id);
    return session;
  }

  async save(session: Session): Promise<void> {
    await this.repository.save(session);
  }

  get(session: Session, key: string): unknown {
    return session.scratch.get(key);
  }

  set(session: Session, key: string, value: unknown): void {
    session.scratch.set(key, value);
  }

  delete(session: Session, key: string): boolean {
    return session.scratch.delete(key);
  }

  /** Explicit refresh; the only path that replaces a profile after bootstrap. */
  async refreshProfile(session: Session): Promise<Readonly<UserProfile>> {
    session.userProfile = await this.loadProfile(session.userId);
    await this.repository.save(session);
    this.log.debug({ sessionId: session.id }, "profile refreshed");
    return session.userProfile;
  }

  private async loadProfile(userId: UserId): Promise<Readonly<UserProfile>> {
    try {
      return deepFreeze(await this.profiles.loadProfile(userId));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new BootstrapError(userId, `Could not load profile for ${userId}: ${reason}`, { cause: err });
    }
  }
}

/** Keeps sessions for the lifetime of the process. */
export class InMemorySessionRepository implements SessionRepository {
  private sessions = new Map<SessionId, Session>();

  async get(id: SessionId): Promise<Session | undefined> {
    return this.sessions.get(id);
  }

  async save(session: Session): Promise<void> {
    this.sessions.set(session.id, session);
  }

  async delete(id: SessionId): Promise<void> {
    this.sessions.delete(id);
  }

  async listByUser(userId: UserId): Promise<Session[]> {
    return [...this.sessions.values()].filter((s) => s.userId === userId);
  }

  async close(): Promise<void> {
    this.sessions.clear();
  }
}
