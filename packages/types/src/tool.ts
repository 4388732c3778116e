import type { SessionId, Timestamp } from "./foundational.js";
import type { ToolErrorKind } from "./error.js";
import type { UserProfile } from "./session.js";
import type { SideEffect } from "./agent.js";

/** Read/write view of the scratch area, scoped to the calling node. */
export interface ScratchAccess {
  get(key: string): unknown;
  has(key: string): boolean;
  set(key: string, value: unknown): void;
  delete(key: string): boolean;
}

/** Everything a tool may touch while executing. */
export interface ToolExecutionContext {
  readonly sessionId: SessionId;
  readonly profile: Readonly<UserProfile>;
  readonly scratch: ScratchAccess;
  /** Aborted on timeout or turn cancellation. Tools should stop promptly. */
  readonly signal: AbortSignal;
  /** Name of the node that made the call. */
  readonly node: string;
}

export interface ToolParameter {
  readonly name: string;
  readonly description: string;
  readonly required: boolean;
}

/** Shown to the language model. */
export interface ToolDescriptor {
  readonly id: string;
  readonly description: string;
  readonly parameters: ReadonlyArray<ToolParameter>;
}

export interface ToolOutcome {
  readonly result: unknown;
  readonly effect?: SideEffect;
}

/**
 * A registered capability. `run` validates `args` and throws a ToolError
 * ("InvalidArgs") when they don't match.
 */
export interface Tool extends ToolDescriptor {
  /** Overrides the adapter's default timeout. */
  readonly timeoutMs?: number;
  /** Extra attempts after a Timeout/Upstream failure. Default 0. */
  readonly retries?: number;
  run(args: unknown, ctx: ToolExecutionContext): Promise<ToolOutcome>;
}

export type ToolCallOutcome =
  | { readonly ok: true; readonly result: unknown }
  | { readonly ok: false; readonly errorKind: ToolErrorKind | "Cancelled"; readonly message: string };

/** One invocation of an external capability, kept for the duration of a turn. */
export interface ToolCallRecord {
  readonly callId: string;
  readonly toolId: string;
  readonly node: string;
  readonly args: Readonly<Record<string, unknown>>;
  readonly outcome: ToolCallOutcome;
  readonly attempts: number;
  readonly latencyMs: number;
  readonly startedAt: Timestamp;
}
