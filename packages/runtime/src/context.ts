import type {
  NodeOutput,
  PromptContext,
  Session,
  SideEffect,
  ToolCallRecord,
  TraceContext,
  TurnSummary,
} from "@helpdesk/types";
import type { Logger, ScratchScope } from "@helpdesk/core";
import type { InvocationScope } from "./tool-adapter.js";

/** What a node executes against during one turn. */
export interface ExecutionContext {
  readonly session: Session;
  readonly input: string;
  /** Scope bound to the executing node. */
  readonly scratch: ScratchScope;
  readonly signal: AbortSignal;
  /** Span of the executing node. */
  readonly traceCtx: TraceContext;
  /** Routing trace; nodes push their name on entry. */
  readonly trace: string[];
  readonly toolCalls: ToolCallRecord[];
  readonly effects: SideEffect[];
  /** Output of the preceding Sequential sibling. */
  readonly previous?: NodeOutput;
  readonly log: Logger;
}

export function recentHistory(session: Session, window: number): TurnSummary[] {
  return window > 0 ? session.turnHistory.slice(-window) : [];
}

export function promptContext(
  agent: string,
  ctx: ExecutionContext,
  scratch: Readonly<Record<string, unknown>>,
  historyWindow: number
): PromptContext {
  return {
    agent,
    profile: ctx.session.userProfile,
    scratch,
    history: recentHistory(ctx.session, historyWindow),
    previous: ctx.previous,
  };
}

export function invocationScope(ctx: ExecutionContext): InvocationScope {
  return {
    sessionId: ctx.session.id,
    profile: ctx.session.userProfile,
    scratch: ctx.scratch,
    signal: ctx.signal,
    traceCtx: ctx.traceCtx,
    toolCalls: ctx.toolCalls,
    effects: ctx.effects,
  };
}
