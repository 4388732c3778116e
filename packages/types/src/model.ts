import type { UserProfile, TurnSummary } from "./session.js";
import type { NodeOutput } from "./agent.js";
import type { ToolDescriptor } from "./tool.js";

/**
 * Message shape handed to the language model. Leaves build these for their
 * tool loop; adapters convert them to the provider's wire format.
 */
export interface ChatMessage {
  role: "system" | "user" | "assistant" | "tool";
  content: string;
  name?: string;
  toolCallId?: string;
  toolCalls?: ToolCall[];
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/** The slice of session state a node shows the model. */
export interface PromptContext {
  readonly agent: string;
  readonly profile: Readonly<UserProfile>;
  readonly scratch: Readonly<Record<string, unknown>>;
  readonly history: ReadonlyArray<TurnSummary>;
  /** Output of the preceding Sequential sibling, if any. */
  readonly previous?: NodeOutput;
}

export interface CompletionRequest {
  readonly agent: string;
  readonly instructions: string;
  readonly input: string;
  readonly context: PromptContext;
  readonly tools: ReadonlyArray<ToolDescriptor>;
  /** Full transcript for this leaf, system prompt first. */
  readonly messages: ReadonlyArray<ChatMessage>;
}

export interface Completion {
  text: string;
  toolCalls?: ToolCall[];
}

export interface ClassificationLabel {
  readonly name: string;
  readonly description: string;
}

export interface ClassificationRequest {
  readonly router: string;
  readonly instructions: string;
  readonly input: string;
  readonly context: PromptContext;
  readonly labels: ReadonlyArray<ClassificationLabel>;
}

/**
 * Abstraction over the underlying LLM. Never assumed deterministic; either
 * call may fail or hang, so callers always pass a signal bound to a timeout.
 */
export interface LanguageModel {
  complete(request: CompletionRequest, signal: AbortSignal): Promise<Completion>;
  /** Returns the chosen label. It is not guaranteed to be one of `request.labels`. */
  classify(request: ClassificationRequest, signal: AbortSignal): Promise<string>;
}
