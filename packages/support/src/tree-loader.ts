import fs from "node:fs/promises";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import { z } from "zod";
import type { AgentNode, LeafNode, Synthesis, SynthesisFn } from "@helpdesk/types";
import { TreeDefinitionError } from "@helpdesk/core";
import {
  collectNodes,
  leaf,
  parallel,
  router,
  sequential,
  synthesizeBy,
  synthesizeWith,
  validateTree,
  type ToolRegistry,
} from "@helpdesk/runtime";
import { SYNTHESIS_FUNCTIONS } from "./synthesis.js";

/** The tree shipped with this package. */
export const DEFAULT_TREE_PATH = fileURLToPath(new URL("../support-tree.yaml", import.meta.url));

// ─── Definition schema ──────────────────────────────────────

interface BaseDefinition {
  name: string;
  description?: string;
  instructions?: string;
  tools?: string[];
}

export interface LeafDefinition extends BaseDefinition {
  kind: "leaf";
  outputKey?: string;
  maxIterations?: number;
  contextKeys?: string[];
}

export interface SequentialDefinition extends BaseDefinition {
  kind: "sequential";
  children: NodeDefinition[];
}

export interface ParallelDefinition extends BaseDefinition {
  kind: "parallel";
  children: NodeDefinition[];
  synthesis: { function: string } | { agent: LeafDefinition };
  outputKey?: string;
}

export interface RouterDefinition extends BaseDefinition {
  kind: "router";
  children: NodeDefinition[];
  defaultChild?: string;
}

export type NodeDefinition = LeafDefinition | SequentialDefinition | ParallelDefinition | RouterDefinition;

const base = {
  name: z.string().min(1),
  description: z.string().optional(),
  instructions: z.string().optional(),
  tools: z.array(z.string()).optional(),
};

const LeafDefinitionSchema = z
  .object({
    ...base,
    kind: z.literal("leaf"),
    outputKey: z.string().min(1).optional(),
    maxIterations: z.number().int().positive().optional(),
    contextKeys: z.array(z.string().min(1)).optional(),
  })
  .strict();

const NodeDefinitionSchema: z.ZodType<NodeDefinition> = z.lazy(() =>
  z.union([
    LeafDefinitionSchema,
    z.object({ ...base, kind: z.literal("sequential"), children: z.array(NodeDefinitionSchema) }).strict(),
    z
      .object({
        ...base,
        kind: z.literal("parallel"),
        children: z.array(NodeDefinitionSchema),
        synthesis: z.union([
          z.object({ function: z.string().min(1) }).strict(),
          z.object({ agent: LeafDefinitionSchema }).strict(),
        ]),
        outputKey: z.string().min(1).optional(),
      })
      .strict(),
    z
      .object({
        ...base,
        kind: z.literal("router"),
        children: z.array(NodeDefinitionSchema),
        defaultChild: z.string().optional(),
      })
      .strict(),
  ])
);

const TreeFileSchema = z.object({ root: NodeDefinitionSchema }).strict();

// ─── Loading ────────────────────────────────────────────────

export interface TreeLoadOptions {
  /** Every tool a node declares must be registered here. */
  registry: ToolRegistry;
  maxDepth?: number;
  synthesis?: Readonly<Record<string, SynthesisFn>>;
}

export async function loadAgentTree(path: string, opts: TreeLoadOptions): Promise<AgentNode> {
  let source: string;
  try {
    source = await fs.readFile(path, "utf8");
  } catch (err) {
    throw new TreeDefinitionError(`Could not read agent tree ${path}: ${String(err)}`);
  }
  return parseAgentTree(source, opts);
}

/**
 * Parse a YAML tree definition, build the node objects, and check the
 * structural invariants plus tool registration. Throws TreeDefinitionError.
 */
export function parseAgentTree(source: string, opts: TreeLoadOptions): AgentNode {
  let raw: unknown;
  try {
    raw = yaml.load(source);
  } catch (err) {
    throw new TreeDefinitionError(`Agent tree is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = TreeFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new TreeDefinitionError(`Invalid agent tree: ${issues}`);
  }

  const root = buildNode(parsed.data.root, opts.synthesis ?? SYNTHESIS_FUNCTIONS);
  validateTree(root, { maxDepth: opts.maxDepth });

  for (const node of collectNodes(root)) {
    for (const tool of node.tools) {
      if (!opts.registry.has(tool)) {
        throw new TreeDefinitionError(`${node.name} declares unknown tool ${tool}`);
      }
    }
  }
  return root;
}

function buildNode(def: NodeDefinition, functions: Readonly<Record<string, SynthesisFn>>): AgentNode {
  switch (def.kind) {
    case "leaf":
      return buildLeaf(def);
    case "sequential":
      return sequential({ ...def, children: def.children.map((c) => buildNode(c, functions)) });
    case "router":
      return router({ ...def, children: def.children.map((c) => buildNode(c, functions)) });
    case "parallel":
      return parallel({
        ...def,
        children: def.children.map((c) => buildNode(c, functions)),
        synthesis: buildSynthesis(def, functions),
      });
  }
}

function buildLeaf(def: LeafDefinition): LeafNode {
  return leaf(def);
}

function buildSynthesis(def: ParallelDefinition, functions: Readonly<Record<string, SynthesisFn>>): Synthesis {
  if ("agent" in def.synthesis) {
    return synthesizeWith(buildLeaf(def.synthesis.agent));
  }
  const name = def.synthesis.function;
  const fn = functions[name];
  if (!fn) {
    throw new TreeDefinitionError(`${def.name} names unknown synthesis function ${name}`);
  }
  return synthesizeBy(name, fn);
}
