import type {
  AgentNode,
  LeafNode,
  ParallelNode,
  RouterNode,
  SequentialNode,
  Synthesis,
  SynthesisFn,
} from "@helpdesk/types";
import { SCRATCH_SEPARATOR, TreeDefinitionError } from "@helpdesk/core";

export const DEFAULT_MAX_ITERATIONS = 5;
export const DEFAULT_MAX_DEPTH = 6;

interface NodeSpec {
  name: string;
  description?: string;
  instructions?: string;
  tools?: Iterable<string>;
}

export interface LeafSpec extends NodeSpec {
  outputKey?: string;
  maxIterations?: number;
  contextKeys?: string[];
}

export interface SequentialSpec extends NodeSpec {
  children: AgentNode[];
}

export interface ParallelSpec extends NodeSpec {
  children: AgentNode[];
  synthesis: Synthesis;
  outputKey?: string;
}

export interface RouterSpec extends NodeSpec {
  children: AgentNode[];
  defaultChild?: string;
}

function base(spec: NodeSpec) {
  return {
    name: spec.name,
    description: spec.description ?? "",
    instructions: spec.instructions ?? "",
    tools: new Set(spec.tools ?? []),
  };
}

export function leaf(spec: LeafSpec): LeafNode {
  return {
    ...base(spec),
    kind: "leaf",
    outputKey: spec.outputKey,
    maxIterations: spec.maxIterations ?? DEFAULT_MAX_ITERATIONS,
    contextKeys: spec.contextKeys,
  };
}

export function sequential(spec: SequentialSpec): SequentialNode {
  return { ...base(spec), kind: "sequential", children: spec.children };
}

export function parallel(spec: ParallelSpec): ParallelNode {
  return {
    ...base(spec),
    kind: "parallel",
    children: spec.children,
    synthesis: spec.synthesis,
    outputKey: spec.outputKey,
  };
}

export function router(spec: RouterSpec): RouterNode {
  return { ...base(spec), kind: "router", children: spec.children, defaultChild: spec.defaultChild };
}

export function synthesizeWith(node: LeafNode): Synthesis {
  return { kind: "leaf", node };
}

export function synthesizeBy(name: string, fn: SynthesisFn): Synthesis {
  return { kind: "function", name, fn };
}

/** Children of a node, with a Parallel's synthesizer leaf last. */
export function childrenOf(node: AgentNode): ReadonlyArray<AgentNode> {
  switch (node.kind) {
    case "leaf":
      return [];
    case "parallel":
      return node.synthesis.kind === "leaf" ? [...node.children, node.synthesis.node] : node.children;
    case "sequential":
    case "router":
      return node.children;
  }
}

/** Every node of a validated tree, depth first. */
export function collectNodes(root: AgentNode): AgentNode[] {
  const nodes: AgentNode[] = [root];
  for (const child of childrenOf(root)) nodes.push(...collectNodes(child));
  return nodes;
}

/**
 * Check the structural invariants of an authored tree: bounded depth, no
 * node reached twice, unique names, non-empty child lists, and default
 * children that exist. Throws TreeDefinitionError on the first violation.
 */
export function validateTree(root: AgentNode, opts: { maxDepth?: number } = {}): void {
  const maxDepth = opts.maxDepth ?? DEFAULT_MAX_DEPTH;
  const seen = new Set<AgentNode>();
  const names = new Set<string>();

  const visit = (node: AgentNode, depth: number): void => {
    if (depth > maxDepth) {
      throw new TreeDefinitionError(`${node.name} is deeper than the maximum depth of ${maxDepth}`);
    }
    if (seen.has(node)) {
      throw new TreeDefinitionError(`${node.name} appears more than once in the tree`);
    }
    seen.add(node);

    if (!node.name || node.name.includes(SCRATCH_SEPARATOR)) {
      throw new TreeDefinitionError(`Invalid node name "${node.name}"`);
    }
    if (names.has(node.name)) {
      throw new TreeDefinitionError(`Duplicate node name ${node.name}`);
    }
    names.add(node.name);

    switch (node.kind) {
      case "leaf":
        if (!Number.isInteger(node.maxIterations) || node.maxIterations < 1) {
          throw new TreeDefinitionError(`${node.name} needs maxIterations of at least 1`);
        }
        break;
      case "router": {
        const fallback = node.defaultChild;
        if (fallback !== undefined && !node.children.some((c) => c.name === fallback)) {
          throw new TreeDefinitionError(`${node.name} default child ${fallback} is not one of its children`);
        }
        break;
      }
      case "sequential":
      case "parallel":
        break;
    }

    if (node.kind !== "leaf" && node.children.length === 0) {
      throw new TreeDefinitionError(`${node.kind} node ${node.name} has no children`);
    }

    for (const child of childrenOf(node)) visit(child, depth + 1);
  };

  visit(root, 1);
}
