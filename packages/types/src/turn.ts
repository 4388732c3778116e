import type { SessionId, Timestamp, TraceId, TurnId } from "./foundational.js";
import type { ProcessingErrorKind } from "./error.js";
import type { SideEffect } from "./agent.js";
import type { ToolCallRecord } from "./tool.js";

/** A scratch write made during a turn. `key` is the fully namespaced key. */
export interface ScratchMutation {
  readonly key: string;
  readonly node: string;
  readonly op: "set" | "delete";
}

export interface TurnOutput {
  readonly reply: string;
  readonly effects: ReadonlyArray<SideEffect>;
}

/** One exchange, from raw user message to reply. */
export interface Turn {
  readonly id: TurnId;
  readonly sessionId: SessionId;
  readonly traceId: TraceId;
  readonly input: string;
  /**
   * Node names in visiting order; ends with the replying leaf (or the
   * `<parallel>:<function>` synthesis step) or a `failed:<kind>` tag.
   */
  readonly routingTrace: ReadonlyArray<string>;
  readonly output: TurnOutput;
  readonly toolCalls: ReadonlyArray<ToolCallRecord>;
  readonly mutations: ReadonlyArray<ScratchMutation>;
  readonly handledBy?: string;
  readonly failure?: ProcessingErrorKind;
  readonly startedAt: Timestamp;
  readonly completedAt: Timestamp;
}
