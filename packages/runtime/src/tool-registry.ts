import { z } from "zod";
import type { Tool, ToolDescriptor, ToolExecutionContext, ToolOutcome, ToolParameter } from "@helpdesk/types";
import { ToolError } from "@helpdesk/core";

/** Parsed arguments for a parameter shape. */
export type ToolArgs<Shape extends z.ZodRawShape> = z.objectOutputType<Shape, z.ZodTypeAny, "strip">;

/**
 * Authoring shape for a tool: a zod shape for its arguments and an
 * `execute` that receives the parsed values.
 */
export interface ToolDefinition<Shape extends z.ZodRawShape> {
  id: string;
  description: string;
  parameters: Shape;
  timeoutMs?: number;
  retries?: number;
  execute(args: ToolArgs<Shape>, ctx: ToolExecutionContext): Promise<ToolOutcome> | ToolOutcome;
}

/** Turn a definition into a registry entry that validates its own arguments. */
export function defineTool<Shape extends z.ZodRawShape>(def: ToolDefinition<Shape>): Tool {
  const schema = z.object(def.parameters);
  const parameters: ToolParameter[] = Object.entries(def.parameters).map(([name, field]) => ({
    name,
    description: field.description ?? "",
    required: !field.isOptional(),
  }));

  return {
    id: def.id,
    description: def.description,
    parameters,
    timeoutMs: def.timeoutMs,
    retries: def.retries,
    async run(args: unknown, ctx: ToolExecutionContext): Promise<ToolOutcome> {
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((i) => `${i.path.join(".") || "(args)"}: ${i.message}`)
          .join("; ");
        throw new ToolError("InvalidArgs", def.id, `Invalid arguments for ${def.id}: ${issues}`);
      }
      return def.execute(parsed.data, ctx);
    },
  };
}

/** Tools by id. The adapter resolves every call through here. */
export class ToolRegistry {
  private tools = new Map<string, Tool>();

  constructor(tools: Iterable<Tool> = []) {
    for (const tool of tools) this.register(tool);
  }

  register(tool: Tool): this {
    if (this.tools.has(tool.id)) {
      throw new Error(`Tool already registered: ${tool.id}`);
    }
    this.tools.set(tool.id, tool);
    return this;
  }

  get(id: string): Tool | undefined {
    return this.tools.get(id);
  }

  has(id: string): boolean {
    return this.tools.has(id);
  }

  ids(): string[] {
    return [...this.tools.keys()];
  }

  /** Descriptors for the registered subset of `ids`, in the order given. */
  describe(ids: Iterable<string>): ToolDescriptor[] {
    const descriptors: ToolDescriptor[] = [];
    for (const id of ids) {
      const tool = this.tools.get(id);
      if (tool) {
        descriptors.push({ id: tool.id, description: tool.description, parameters: tool.parameters });
      }
    }
    return descriptors;
  }
}
