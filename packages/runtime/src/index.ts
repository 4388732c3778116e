export { AgentLoop } from "./agent-loop.js";
export type { AgentLoopOptions } from "./agent-loop.js";
export { CompositionRuntime, formatBranches } from "./composition.js";
export type { CompositionRuntimeOptions } from "./composition.js";
export { recentHistory, promptContext, invocationScope } from "./context.js";
export type { ExecutionContext } from "./context.js";
export { buildSystemPrompt, buildClassificationPrompt } from "./prompt-builder.js";
export { MockLanguageModel, detectIntent } from "./model-adapter.js";
export { OpenAIAdapter } from "./openai-adapter.js";
export type { OpenAIModelOptions } from "./openai-adapter.js";
export { ToolRegistry, defineTool } from "./tool-registry.js";
export type { ToolDefinition, ToolArgs } from "./tool-registry.js";
export { ToolInvocationAdapter } from "./tool-adapter.js";
export type { ToolCaller, InvocationScope, CompletedToolCall, ToolInvocationOptions } from "./tool-adapter.js";
export {
  leaf,
  sequential,
  parallel,
  router,
  synthesizeWith,
  synthesizeBy,
  childrenOf,
  collectNodes,
  validateTree,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_ITERATIONS,
} from "./tree.js";
export type { LeafSpec, SequentialSpec, ParallelSpec, RouterSpec } from "./tree.js";
export { TurnProcessor, FALLBACK_REPLIES, summarize } from "./turn-processor.js";
export type { TurnProcessorOptions, ProcessOptions } from "./turn-processor.js";
