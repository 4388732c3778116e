import type { SpanId, TraceId } from "./foundational.js";

/**
 * Attached to every HelpdeskEvent. One trace per user turn; every node
 * visited during the turn opens a child span.
 *
 * Compatible with OpenTelemetry W3C Trace Context.
 */
export interface TraceContext {
  /** Unique per user turn. All descendant spans share this. */
  readonly traceId: TraceId;
  /** Unique per node execution / tool call. */
  readonly spanId: SpanId;
  /** The span that caused this one. Absent for the turn's root span. */
  readonly parentSpanId?: SpanId;
}

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";
