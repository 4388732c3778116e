import { v7 as uuidv7 } from "uuid";
import type {
  AgentNode,
  EventBus,
  EventTopic,
  NodeOutput,
  ProcessingErrorKind,
  ScratchMutation,
  Session,
  SideEffect,
  Timestamp,
  ToolCallRecord,
  TraceContext,
  Turn,
  TurnId,
  TurnSummary,
} from "@helpdesk/types";
import {
  ScratchScope,
  applyRetention,
  createEvent,
  createTraceContext,
  silentLogger,
  toProcessingError,
  type Logger,
} from "@helpdesk/core";
import type { CompositionRuntime } from "./composition.js";

/** Replies shown to the customer when a turn fails. No internal names or ids. */
export const FALLBACK_REPLIES: Readonly<Record<ProcessingErrorKind, string>> = {
  RoutingFailed:
    "I'm sorry, I wasn't able to work out who should help with that. Could you rephrase your question?",
  ToolFailure: "I'm sorry, one of our systems isn't responding right now. Please try again in a few minutes.",
  SynthesisFailure: "I'm sorry, I couldn't put together an answer just now. Please try again shortly.",
  Cancelled: "The request was cancelled before it finished.",
};

export interface TurnProcessorOptions {
  root: AgentNode;
  runtime: CompositionRuntime;
  /** Scratch keys (or `prefix*` patterns) kept after the turn ends. */
  retain?: ReadonlyArray<string>;
  bus?: EventBus;
  log?: Logger;
}

export interface ProcessOptions {
  signal?: AbortSignal;
}

/**
 * Runs one user turn through the agent tree and folds the result back into
 * the session. Never throws for failures inside the tree: those come back
 * as a Turn with `failure` set and a fallback reply.
 *
 * Callers serialize turns per session.
 */
export class TurnProcessor {
  private readonly root: AgentNode;
  private readonly runtime: CompositionRuntime;
  private readonly retain: ReadonlyArray<string>;
  private readonly bus?: EventBus;
  private readonly log: Logger;

  constructor(opts: TurnProcessorOptions) {
    this.root = opts.root;
    this.runtime = opts.runtime;
    this.retain = opts.retain ?? [];
    this.bus = opts.bus;
    this.log = opts.log ?? silentLogger();
  }

  async process(session: Session, input: string, opts: ProcessOptions = {}): Promise<Turn> {
    const id = uuidv7() as TurnId;
    const traceCtx = createTraceContext();
    const startedAt = now();
    const log = this.log.child({ sessionId: session.id, turnId: id });

    const mutations: ScratchMutation[] = [];
    const trace: string[] = [];
    const toolCalls: ToolCallRecord[] = [];
    const effects: SideEffect[] = [];

    await this.emit("turn.started", { turnId: id, input }, traceCtx, session);
    log.info({ input }, "turn started");

    const scratch = ScratchScope.root(session.scratch, mutations);
    let output: NodeOutput | undefined;
    let failure: ProcessingErrorKind | undefined;
    try {
      output = await this.runtime.run(this.root, {
        session,
        input,
        scratch,
        signal: opts.signal ?? new AbortController().signal,
        traceCtx,
        trace,
        toolCalls,
        effects,
        log,
      });
    } catch (err) {
      const processingError = toProcessingError(err);
      failure = processingError.kind;
      trace.push(`failed:${failure}`);
      log.warn({ err, kind: failure, trace }, "turn failed");
    }

    const completedAt = now();
    const turn: Turn = {
      id,
      sessionId: session.id,
      traceId: traceCtx.traceId,
      input,
      routingTrace: trace,
      output: {
        reply: output ? output.reply : FALLBACK_REPLIES[failure ?? "SynthesisFailure"],
        effects,
      },
      toolCalls,
      mutations,
      handledBy: output?.handledBy,
      failure,
      startedAt,
      completedAt,
    };

    scratch.seal();
    session.turnHistory.push(summarize(turn));
    const cleared = applyRetention(session.scratch, mutations, this.retain);
    session.lastActiveAt = completedAt;

    if (failure) {
      await this.emit("turn.failed", { turnId: id, failure, trace }, traceCtx, session);
    } else {
      await this.emit("turn.completed", { turnId: id, handledBy: turn.handledBy, trace }, traceCtx, session);
    }
    log.info({ handledBy: turn.handledBy, trace, toolCalls: toolCalls.length, cleared }, "turn completed");
    return turn;
  }

  private async emit(topic: EventTopic, payload: unknown, traceCtx: TraceContext, session: Session): Promise<void> {
    await this.bus?.publish(createEvent(topic, payload, traceCtx, { sessionId: session.id }));
  }
}

export function summarize(turn: Turn): TurnSummary {
  return {
    turnId: turn.id,
    input: turn.input,
    reply: turn.output.reply,
    handledBy: turn.handledBy,
    routingTrace: [...turn.routingTrace],
    failure: turn.failure,
    toolCalls: turn.toolCalls.map((c) => ({
      toolId: c.toolId,
      ok: c.outcome.ok,
      errorKind: c.outcome.ok ? undefined : c.outcome.errorKind,
      latencyMs: c.latencyMs,
    })),
    startedAt: turn.startedAt,
    completedAt: turn.completedAt,
  };
}

function now(): Timestamp {
  return new Date().toISOString();
}
