import { z } from "zod";
import type { TurnId } from "@helpdesk/types";

/** Profile column, minus the user id kept in its own column. */
export const StoredProfileSchema = z.object({
  name: z.string(),
  email: z.string(),
  plan: z.string(),
  accountStatus: z.string(),
  createdAt: z.string(),
  recentTickets: z.array(z.string()),
  purchases: z.array(z.string()),
});

export const StoredScratchSchema = z.record(z.unknown());

export const StoredTurnSummarySchema = z.object({
  turnId: z.string().transform((id) => id as TurnId),
  input: z.string(),
  reply: z.string(),
  handledBy: z.string().optional(),
  routingTrace: z.array(z.string()),
  failure: z.enum(["RoutingFailed", "ToolFailure", "SynthesisFailure", "Cancelled"]).optional(),
  toolCalls: z.array(
    z.object({
      toolId: z.string(),
      ok: z.boolean(),
      errorKind: z.string().optional(),
      latencyMs: z.number(),
    })
  ),
  startedAt: z.string(),
  completedAt: z.string(),
});

export interface SessionRow {
  id: string;
  user_id: string;
  profile: string;
  scratch: string;
  created_at: string;
  last_active_at: string;
}

export interface TurnRow {
  summary: string;
}

/** Parse a JSON column, naming the column when it is corrupt. */
export function parseColumn<S extends z.ZodTypeAny>(schema: S, json: string, column: string): z.output<S> {
  const parsed = schema.safeParse(JSON.parse(json));
  if (!parsed.success) {
    throw new Error(`Corrupt ${column} column: ${parsed.error.message}`);
  }
  return parsed.data;
}
