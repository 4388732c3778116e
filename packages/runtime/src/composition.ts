import type {
  AgentNode,
  BranchResult,
  EventBus,
  EventTopic,
  LanguageModel,
  NodeOutput,
  ParallelNode,
  RouterNode,
  RoutingErrorKind,
  SequentialNode,
} from "@helpdesk/types";
import {
  CancellationError,
  RoutingError,
  SynthesisError,
  TreeDefinitionError,
  createEvent,
  createTraceContext,
  describeError,
  throwIfCancelled,
  withTimeout,
} from "@helpdesk/core";
import { AgentLoop } from "./agent-loop.js";
import { promptContext, type ExecutionContext } from "./context.js";
import type { ToolInvocationAdapter } from "./tool-adapter.js";
import type { ToolRegistry } from "./tool-registry.js";

export interface CompositionRuntimeOptions {
  model: LanguageModel;
  tools: ToolInvocationAdapter;
  registry: ToolRegistry;
  bus?: EventBus;
  /** Per model completion inside a leaf. */
  modelTimeoutMs: number;
  /** Per router classification. */
  classifyTimeoutMs: number;
  /** Past turns shown to the model. */
  historyWindow: number;
}

/**
 * Executes an agent tree. Each node kind has one strategy:
 *
 * - leaf: the model/tool loop in {@link AgentLoop}
 * - sequential: children in order over a shared scope, each receiving the
 *   previous child's output; the first failure stops the sequence
 * - parallel: children concurrently over partitioned scopes, joined with
 *   allSettled and merged by the synthesis step
 * - router: classification by the model, then dispatch to one child
 */
export class CompositionRuntime {
  private readonly leaves: AgentLoop;

  constructor(private readonly opts: CompositionRuntimeOptions) {
    this.leaves = new AgentLoop({
      model: opts.model,
      tools: opts.tools,
      registry: opts.registry,
      modelTimeoutMs: opts.modelTimeoutMs,
      historyWindow: opts.historyWindow,
    });
  }

  async run(node: AgentNode, parent: ExecutionContext): Promise<NodeOutput> {
    parent.trace.push(node.name);
    throwIfCancelled(parent.signal);

    const ctx: ExecutionContext = {
      ...parent,
      scratch: parent.scratch.forNode(node.name),
      traceCtx: createTraceContext(parent.traceCtx),
      log: parent.log.child({ node: node.name }),
    };
    await this.emit("node.entered", { kind: node.kind }, node.name, ctx);

    try {
      const output = await this.execute(node, ctx);
      await this.emit("node.completed", { kind: node.kind, handledBy: output.handledBy }, node.name, ctx);
      return output;
    } catch (err) {
      await this.emit("node.failed", { kind: node.kind, error: describeError(err) }, node.name, ctx);
      throw err;
    }
  }

  private execute(node: AgentNode, ctx: ExecutionContext): Promise<NodeOutput> {
    switch (node.kind) {
      case "leaf":
        return this.leaves.run(node, ctx);
      case "sequential":
        return this.runSequential(node, ctx);
      case "parallel":
        return this.runParallel(node, ctx);
      case "router":
        return this.runRouter(node, ctx);
      default: {
        const unreachable: never = node;
        throw new Error(`Unknown node kind: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private async runSequential(node: SequentialNode, ctx: ExecutionContext): Promise<NodeOutput> {
    let previous = ctx.previous;
    let output: NodeOutput | undefined;
    for (const child of node.children) {
      output = await this.run(child, { ...ctx, previous });
      previous = output;
    }
    if (!output) {
      throw new TreeDefinitionError(`sequential node ${node.name} has no children`);
    }
    return output;
  }

  private async runParallel(node: ParallelNode, ctx: ExecutionContext): Promise<NodeOutput> {
    const branches = node.children.map((child) => {
      const trace: string[] = [];
      const promise = this.run(child, {
        ...ctx,
        scratch: ctx.scratch.partition(node.name, child.name),
        trace,
      });
      return { child, trace, promise };
    });

    const settled = await Promise.allSettled(branches.map((b) => b.promise));
    for (const branch of branches) ctx.trace.push(...branch.trace);
    throwIfCancelled(ctx.signal);

    const results = settled.map((outcome, i): BranchResult => {
      const name = branches[i].child.name;
      return outcome.status === "fulfilled"
        ? { name, status: "fulfilled", output: outcome.value }
        : { name, status: "rejected", error: describeError(outcome.reason) };
    });

    const failed = results.filter((r) => r.status === "rejected").map((r) => r.name);
    ctx.log.debug({ branches: results.length, failed }, "parallel branches joined");

    const output = await this.synthesize(node, results, ctx);
    if (node.outputKey) {
      ctx.scratch.set(node.outputKey, output.reply);
    }

    await this.emit(
      "parallel.merged",
      { branches: results.map((r) => ({ name: r.name, status: r.status })), synthesis: synthesisName(node) },
      node.name,
      ctx
    );
    return output;
  }

  private async synthesize(
    node: ParallelNode,
    results: ReadonlyArray<BranchResult>,
    ctx: ExecutionContext
  ): Promise<NodeOutput> {
    const synthesis = node.synthesis;

    if (synthesis.kind === "function") {
      const step = `${node.name}:${synthesis.name}`;
      ctx.trace.push(step);
      try {
        return { reply: synthesis.fn(results, ctx.input), handledBy: step };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new SynthesisError(node.name, `Synthesis ${synthesis.name} failed: ${message}`, { cause: err });
      }
    }

    try {
      return await this.run(synthesis.node, {
        ...ctx,
        previous: { reply: formatBranches(results), handledBy: node.name },
      });
    } catch (err) {
      if (err instanceof CancellationError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new SynthesisError(node.name, `Synthesizer ${synthesis.node.name} failed: ${message}`, { cause: err });
    }
  }

  private async runRouter(node: RouterNode, ctx: ExecutionContext): Promise<NodeOutput> {
    const timeoutMs = this.opts.classifyTimeoutMs;

    let label: string;
    try {
      label = await withTimeout(
        (signal) =>
          this.opts.model.classify(
            {
              router: node.name,
              instructions: node.instructions,
              input: ctx.input,
              context: promptContext(node.name, ctx, ctx.scratch.snapshot(), this.opts.historyWindow),
              labels: node.children.map((c) => ({ name: c.name, description: c.description })),
            },
            signal
          ),
        timeoutMs,
        ctx.signal,
        () => new RoutingError("Timeout", node.name, `${node.name} classification timed out after ${timeoutMs}ms`)
      );
    } catch (err) {
      if (err instanceof CancellationError) throw err;
      const kind: RoutingErrorKind = err instanceof RoutingError ? "Timeout" : "NoDefault";
      const reason = err instanceof Error ? err.message : String(err);
      const target = await this.fallback(node, kind, reason, ctx, err);
      return this.run(target, ctx);
    }

    const wanted = label.trim().toLowerCase();
    const match = node.children.find((c) => c.name.toLowerCase() === wanted);
    if (!match) {
      const target = await this.fallback(
        node,
        "UnknownTarget",
        `${node.name} got label "${label}", which matches none of its children`,
        ctx
      );
      return this.run(target, ctx);
    }

    ctx.log.debug({ label, target: match.name }, "routing decided");
    await this.emit("routing.decided", { label, target: match.name }, node.name, ctx);
    return this.run(match, ctx);
  }

  /** The router's default child, or the routing error when it has none. */
  private async fallback(
    node: RouterNode,
    kind: RoutingErrorKind,
    reason: string,
    ctx: ExecutionContext,
    cause?: unknown
  ): Promise<AgentNode> {
    const target = node.children.find((c) => c.name === node.defaultChild);
    if (!target) {
      throw new RoutingError(kind, node.name, reason, { cause });
    }
    ctx.log.info({ kind, reason, target: target.name }, "routing fell back to default child");
    await this.emit("routing.fallback", { kind, reason, target: target.name }, node.name, ctx);
    return target;
  }

  private async emit(topic: EventTopic, payload: unknown, node: string, ctx: ExecutionContext): Promise<void> {
    await this.opts.bus?.publish(
      createEvent(topic, payload, ctx.traceCtx, { sessionId: ctx.session.id, node })
    );
  }
}

function synthesisName(node: ParallelNode): string {
  return node.synthesis.kind === "function" ? node.synthesis.name : node.synthesis.node.name;
}

/** One line per branch, in child order: its reply's first line, or why it is missing. */
export function formatBranches(results: ReadonlyArray<BranchResult>): string {
  return results
    .map((r) => {
      if (r.status === "fulfilled") {
        return `- ${r.name}: ${r.output.reply.split("\n")[0]}`;
      }
      return `- ${r.name}: unavailable (${r.error.kind === "Timeout" ? "timed out" : "failed"})`;
    })
    .join("\n");
}
