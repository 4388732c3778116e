import type {
  ChatMessage,
  Completion,
  CompletionRequest,
  LanguageModel,
  LeafNode,
  NodeOutput,
  ToolCall,
} from "@helpdesk/types";
import { CompletionError, HelpdeskError, ToolError, throwIfCancelled, withTimeout } from "@helpdesk/core";
import { invocationScope, promptContext, type ExecutionContext } from "./context.js";
import { buildSystemPrompt } from "./prompt-builder.js";
import type { ToolInvocationAdapter } from "./tool-adapter.js";
import type { ToolRegistry } from "./tool-registry.js";

export interface AgentLoopOptions {
  model: LanguageModel;
  tools: ToolInvocationAdapter;
  registry: ToolRegistry;
  modelTimeoutMs: number;
  historyWindow: number;
}

/**
 * The think → tool → think cycle of a leaf.
 *
 * Each iteration asks the model for a completion. Requested tool calls go
 * through the invocation adapter and their results are appended to the
 * transcript; a completion without tool calls is the leaf's reply.
 * `NotFound` and `InvalidArgs` results are shown to the model so it can
 * correct itself. Every other tool failure ends the leaf.
 */
export class AgentLoop {
  constructor(private readonly opts: AgentLoopOptions) {}

  async run(node: LeafNode, ctx: ExecutionContext): Promise<NodeOutput> {
    const tools = this.opts.registry.describe(node.tools);
    const transcript: ChatMessage[] = [{ role: "user", content: ctx.input }];

    for (let i = 0; i < node.maxIterations; i++) {
      throwIfCancelled(ctx.signal);

      const scratch = node.contextKeys ? ctx.scratch.select(node.contextKeys) : ctx.scratch.snapshot();
      const context = promptContext(node.name, ctx, scratch, this.opts.historyWindow);
      const request: CompletionRequest = {
        agent: node.name,
        instructions: node.instructions,
        input: ctx.input,
        context,
        tools,
        messages: [{ role: "system", content: buildSystemPrompt(node.instructions, context, tools) }, ...transcript],
      };

      const result = await this.complete(node, request, ctx.signal);

      if (!result.toolCalls || result.toolCalls.length === 0) {
        if (node.outputKey) {
          ctx.scratch.set(node.outputKey, result.text);
        }
        ctx.log.debug({ node: node.name, iterations: i + 1 }, "leaf replied");
        return { reply: result.text, handledBy: node.name };
      }

      transcript.push({ role: "assistant", content: result.text, toolCalls: result.toolCalls });
      for (const call of result.toolCalls) {
        transcript.push({
          role: "tool",
          toolCallId: call.id,
          name: call.name,
          content: await this.executeTool(node, call, ctx),
        });
      }
    }

    throw new CompletionError(
      "MaxIterations",
      node.name,
      `${node.name} reached ${node.maxIterations} iterations without a reply`
    );
  }

  private async complete(node: LeafNode, request: CompletionRequest, signal: AbortSignal): Promise<Completion> {
    const timeoutMs = this.opts.modelTimeoutMs;
    try {
      return await withTimeout(
        (s) => this.opts.model.complete(request, s),
        timeoutMs,
        signal,
        () => new CompletionError("Timeout", node.name, `Model did not answer ${node.name} within ${timeoutMs}ms`)
      );
    } catch (err) {
      if (err instanceof HelpdeskError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new CompletionError("Upstream", node.name, `Model call for ${node.name} failed: ${message}`, { cause: err });
    }
  }

  private async executeTool(node: LeafNode, call: ToolCall, ctx: ExecutionContext): Promise<string> {
    try {
      const record = await this.opts.tools.invoke(node, call.name, call.arguments, invocationScope(ctx));
      const result = record.outcome.result;
      return typeof result === "string" ? result : JSON.stringify(result ?? null);
    } catch (err) {
      if (err instanceof ToolError && err.recoverable) {
        return `Error: ${err.message}`;
      }
      throw err;
    }
  }
}
