import type { EventId, SessionId, Timestamp } from "./foundational.js";
import type { TraceContext } from "./observability.js";

/**
 * Every observable step of a turn is published as a `HelpdeskEvent`.
 *
 * @typeParam T - The topic-specific payload type.
 */
export interface HelpdeskEvent<T = unknown> {
  readonly id: EventId;
  readonly topic: EventTopic;
  readonly payload: T;
  readonly traceCtx: TraceContext;
  readonly timestamp: Timestamp;
  readonly sessionId?: SessionId;
  /** Node that emitted the event. Absent for turn/session events. */
  readonly node?: string;
}

/**
 * Enumerated event topics.
 * Using a string union rather than a numeric enum for debuggability.
 */
export type EventTopic =
  // Sessions
  | "session.created"
  // Turn lifecycle
  | "turn.started"
  | "turn.completed"
  | "turn.failed"
  // Node lifecycle
  | "node.entered"
  | "node.completed"
  | "node.failed"
  // Dispatch and merge
  | "routing.decided"
  | "routing.fallback"
  | "parallel.merged"
  // Tool calls
  | "tool.invoked"
  | "tool.result";

/**
 * Predicate for filtering which events a subscriber receives.
 */
export interface EventFilter {
  /** Match specific topics. If empty, matches all topics. */
  readonly topics?: EventTopic[];
  readonly sessionId?: SessionId;
  readonly node?: string;
  /** Custom predicate for advanced filtering. */
  readonly predicate?: (event: HelpdeskEvent) => boolean;
}

/** Callback signature for event subscribers. */
export type EventHandler<T = unknown> = (event: HelpdeskEvent<T>) => void | Promise<void>;

/** Returned when subscribing; used to unsubscribe. */
export interface Subscription {
  readonly id: string;
  unsubscribe(): void;
}

export interface EventBus {
  /** Publish an event to all matching subscribers. */
  publish<T>(event: HelpdeskEvent<T>): Promise<void>;

  /** Subscribe to events matching the filter. Payloads arrive untyped; narrow by topic. */
  subscribe(filter: EventFilter, handler: EventHandler): Subscription;
}
