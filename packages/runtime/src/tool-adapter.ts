import { v7 as uuidv7 } from "uuid";
import type {
  EventBus,
  EventTopic,
  ScratchAccess,
  SessionId,
  SideEffect,
  Tool,
  ToolCallRecord,
  TraceContext,
  UserProfile,
} from "@helpdesk/types";
import {
  CancellationError,
  ToolError,
  createEvent,
  createTraceContext,
  silentLogger,
  withTimeout,
  type Logger,
  type ToolOverride,
} from "@helpdesk/core";
import type { ToolRegistry } from "./tool-registry.js";

/** The node making a call. Only its name and tool allow-list matter here. */
export interface ToolCaller {
  readonly name: string;
  readonly tools: ReadonlySet<string>;
}

/** Per-turn state an invocation reads from and reports into. */
export interface InvocationScope {
  readonly sessionId: SessionId;
  readonly profile: Readonly<UserProfile>;
  readonly scratch: ScratchAccess;
  readonly signal: AbortSignal;
  readonly traceCtx: TraceContext;
  /** Every call is appended here, successful or not. */
  readonly toolCalls: ToolCallRecord[];
  readonly effects: SideEffect[];
}

export type CompletedToolCall = ToolCallRecord & {
  readonly outcome: { readonly ok: true; readonly result: unknown };
};

export interface ToolInvocationOptions {
  registry: ToolRegistry;
  defaultTimeoutMs: number;
  overrides?: Readonly<Record<string, ToolOverride>>;
  bus?: EventBus;
  log?: Logger;
}

/**
 * The single path from an agent to an external capability.
 *
 * Checks run in a fixed order: authorization against the caller's
 * allow-list, registration, argument validation (inside the tool), then
 * execution under a timeout with the tool's retry policy.
 */
export class ToolInvocationAdapter {
  private readonly registry: ToolRegistry;
  private readonly defaultTimeoutMs: number;
  private readonly overrides: Readonly<Record<string, ToolOverride>>;
  private readonly bus?: EventBus;
  private readonly log: Logger;

  constructor(opts: ToolInvocationOptions) {
    this.registry = opts.registry;
    this.defaultTimeoutMs = opts.defaultTimeoutMs;
    this.overrides = opts.overrides ?? {};
    this.bus = opts.bus;
    this.log = (opts.log ?? silentLogger()).child({ component: "tools" });
  }

  /**
   * Invoke `toolId` on behalf of `caller`. Resolves with the call record on
   * success; otherwise records the failure and throws a ToolError (or a
   * CancellationError when the turn was aborted).
   */
  async invoke(
    caller: ToolCaller,
    toolId: string,
    args: Readonly<Record<string, unknown>>,
    scope: InvocationScope
  ): Promise<CompletedToolCall> {
    const callId = uuidv7();
    const startedAt = new Date().toISOString();
    const began = Date.now();
    const span = createTraceContext(scope.traceCtx);
    let attempts = 0;

    await this.emit("tool.invoked", { callId, toolId, args }, span, scope, caller.name);

    try {
      const tool = this.resolve(caller, toolId);
      const { timeoutMs, retries } = this.policyFor(tool);

      for (;;) {
        attempts++;
        try {
          const outcome = await withTimeout(
            (signal) =>
              tool.run(args, {
                sessionId: scope.sessionId,
                profile: scope.profile,
                scratch: scope.scratch,
                signal,
                node: caller.name,
              }),
            timeoutMs,
            scope.signal,
            () => new ToolError("Timeout", toolId, `Tool ${toolId} timed out after ${timeoutMs}ms`)
          );

          const record: CompletedToolCall = {
            callId,
            toolId,
            node: caller.name,
            args,
            outcome: { ok: true, result: outcome.result },
            attempts,
            latencyMs: Date.now() - began,
            startedAt,
          };
          scope.toolCalls.push(record);
          if (outcome.effect) scope.effects.push(outcome.effect);
          await this.emit("tool.result", summarize(record), span, scope, caller.name);
          return record;
        } catch (err) {
          const failure = normalize(err, toolId);
          if (failure instanceof ToolError && failure.transient && attempts <= retries) {
            this.log.warn({ toolId, attempt: attempts, kind: failure.kind }, "retrying tool call");
            continue;
          }
          throw failure;
        }
      }
    } catch (err) {
      const failure = normalize(err, toolId);
      const errorKind = failure instanceof ToolError ? failure.kind : "Cancelled";
      const record: ToolCallRecord = {
        callId,
        toolId,
        node: caller.name,
        args,
        outcome: {
          ok: false,
          errorKind,
          message: failure.message,
        },
        attempts,
        latencyMs: Date.now() - began,
        startedAt,
      };
      scope.toolCalls.push(record);
      this.log.info({ toolId, node: caller.name, kind: errorKind, attempts }, "tool call failed");
      await this.emit("tool.result", summarize(record), span, scope, caller.name);
      throw failure;
    }
  }

  private resolve(caller: ToolCaller, toolId: string): Tool {
    if (!caller.tools.has(toolId)) {
      throw new ToolError("Unauthorized", toolId, `${caller.name} is not allowed to call ${toolId}`);
    }
    const tool = this.registry.get(toolId);
    if (!tool) {
      throw new ToolError("NotFound", toolId, `No tool registered as ${toolId}`);
    }
    return tool;
  }

  private policyFor(tool: Tool): { timeoutMs: number; retries: number } {
    const override = this.overrides[tool.id];
    return {
      timeoutMs: override?.timeoutMs ?? tool.timeoutMs ?? this.defaultTimeoutMs,
      retries: override?.retries ?? tool.retries ?? 0,
    };
  }

  private async emit(
    topic: EventTopic,
    payload: unknown,
    span: TraceContext,
    scope: InvocationScope,
    node: string
  ): Promise<void> {
    await this.bus?.publish(createEvent(topic, payload, span, { sessionId: scope.sessionId, node }));
  }
}

function normalize(err: unknown, toolId: string): ToolError | CancellationError {
  if (err instanceof ToolError || err instanceof CancellationError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ToolError("Upstream", toolId, `Tool ${toolId} failed: ${message}`, { cause: err });
}

function summarize(record: ToolCallRecord) {
  return {
    callId: record.callId,
    toolId: record.toolId,
    ok: record.outcome.ok,
    errorKind: record.outcome.ok ? undefined : record.outcome.errorKind,
    attempts: record.attempts,
    latencyMs: record.latencyMs,
  };
}
