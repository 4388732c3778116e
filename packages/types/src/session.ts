import type { SessionId, Timestamp, TurnId, UserId } from "./foundational.js";
import type { ProcessingErrorKind } from "./error.js";

/**
 * User attributes loaded once by the bootstrap collaborator.
 * Read by every agent; replaced only by an explicit profile refresh.
 */
export interface UserProfile {
  readonly userId: UserId;
  readonly name: string;
  readonly email: string;
  /** Plan tier, e.g. "Standard", "Pro", "Enterprise". */
  readonly plan: string;
  readonly accountStatus: string;
  readonly createdAt: string;
  readonly recentTickets: ReadonlyArray<string>;
  readonly purchases: ReadonlyArray<string>;
}

/** Summary of a finished turn, appended to `Session.turnHistory`. */
export interface TurnSummary {
  readonly turnId: TurnId;
  readonly input: string;
  readonly reply: string;
  /** The leaf that produced the reply. Absent when the turn failed before any leaf replied. */
  readonly handledBy?: string;
  readonly routingTrace: ReadonlyArray<string>;
  readonly failure?: ProcessingErrorKind;
  readonly toolCalls: ReadonlyArray<ToolCallSummary>;
  readonly startedAt: Timestamp;
  readonly completedAt: Timestamp;
}

export interface ToolCallSummary {
  readonly toolId: string;
  readonly ok: boolean;
  readonly errorKind?: string;
  readonly latencyMs: number;
}

/**
 * One ongoing conversation.
 *
 * `id` never changes. `userProfile` is frozen at bootstrap. `scratch` is the
 * only mutable area shared between agents; keys are namespaced strings.
 */
export interface Session {
  readonly id: SessionId;
  readonly userId: UserId;
  userProfile: Readonly<UserProfile>;
  readonly scratch: Map<string, unknown>;
  readonly turnHistory: TurnSummary[];
  readonly createdAt: Timestamp;
  lastActiveAt: Timestamp;
}

/** Session bootstrap collaborator (CRM lookup). */
export interface ProfileLoader {
  loadProfile(userId: UserId): Promise<UserProfile>;
}

/** Storage for whole sessions. */
export interface SessionRepository {
  get(id: SessionId): Promise<Session | undefined>;
  /** Insert or replace the session and append any turn summaries not yet stored. */
  save(session: Session): Promise<void>;
  delete(id: SessionId): Promise<void>;
  listByUser(userId: UserId): Promise<Session[]>;
  close(): Promise<void>;
}
