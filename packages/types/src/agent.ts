import type { ErrorInfo } from "./error.js";

interface BaseNode {
  /** Unique within the tree. Routers match classification labels against it. */
  readonly name: string;
  /** One-line purpose; offered to the classifier as label text. */
  readonly description: string;
  /** Opaque to the core; handed to the language model. */
  readonly instructions: string;
  /** Tool ids this node may invoke. The only access-control boundary. */
  readonly tools: ReadonlySet<string>;
}

export interface LeafNode extends BaseNode {
  readonly kind: "leaf";
  /** Scratch key that receives the reply. */
  readonly outputKey?: string;
  /** Bound on model ↔ tool round trips. */
  readonly maxIterations: number;
  /**
   * Scratch key patterns exposed to the model (exact, or prefix with trailing `*`).
   * Absent = every visible key.
   */
  readonly contextKeys?: ReadonlyArray<string>;
}

export interface SequentialNode extends BaseNode {
  readonly kind: "sequential";
  readonly children: ReadonlyArray<AgentNode>;
}

export interface ParallelNode extends BaseNode {
  readonly kind: "parallel";
  readonly children: ReadonlyArray<AgentNode>;
  readonly synthesis: Synthesis;
  readonly outputKey?: string;
}

export interface RouterNode extends BaseNode {
  readonly kind: "router";
  readonly children: ReadonlyArray<AgentNode>;
  /** Name of the child used when classification yields no usable target. */
  readonly defaultChild?: string;
}

export type AgentNode = LeafNode | SequentialNode | ParallelNode | RouterNode;

/** Structured side effect surfaced in the turn output. */
export interface SideEffect {
  readonly type: string;
  readonly data: Readonly<Record<string, unknown>>;
}

/** What a node hands back to its parent. */
export interface NodeOutput {
  readonly reply: string;
  /** Leaf that produced `reply`, or `<parallel>:<function>` for a synthesis function. */
  readonly handledBy: string;
}

/** One child's contribution to a Parallel merge. Never dropped, even on failure. */
export type BranchResult =
  | { readonly name: string; readonly status: "fulfilled"; readonly output: NodeOutput }
  | { readonly name: string; readonly status: "rejected"; readonly error: ErrorInfo };

/** Pure merge of branch results into a reply. */
export type SynthesisFn = (branches: ReadonlyArray<BranchResult>, input: string) => string;

export type Synthesis =
  | { readonly kind: "leaf"; readonly node: LeafNode }
  | { readonly kind: "function"; readonly name: string; readonly fn: SynthesisFn };
