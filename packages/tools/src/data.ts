import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

/** Fixture directory shipped with the package. */
export const DEFAULT_DATA_DIR = fileURLToPath(new URL("../data/", import.meta.url));

const ArticleSchema = z.object({
  id: z.string(),
  title: z.string(),
  category: z.string(),
  content: z.string(),
  keywords: z.array(z.string()),
});

const OrderSchema = z.object({
  item: z.string(),
  status: z.string(),
  carrier: z.string().nullable(),
  estimatedDelivery: z.string().nullable(),
});

const TicketSchema = z.object({
  id: z.string(),
  title: z.string(),
  category: z.string(),
  priority: z.string(),
  status: z.enum(["open", "in_progress", "resolved"]),
  assignedTeam: z.string(),
  createdAt: z.string(),
  resolvedAt: z.string().nullable(),
  description: z.string(),
  resolution: z.string().nullable(),
  userId: z.string().optional(),
  attemptedSolutions: z.array(z.string()).optional(),
});

const TeamsSchema = z.object({
  assignments: z.record(z.string()),
  responseSlaHours: z.record(z.number().positive()),
  escalationPaths: z.record(z.string()),
});

const UserSchema = z.object({
  name: z.string(),
  email: z.string(),
  plan: z.string(),
  accountStatus: z.string(),
  createdAt: z.string(),
  recentTickets: z.array(z.string()),
  purchases: z.array(z.string()),
});

const WebResultSchema = z.object({
  title: z.string(),
  url: z.string().url(),
  snippet: z.string(),
  keywords: z.array(z.string()),
});

export type Article = z.infer<typeof ArticleSchema>;
export type Order = z.infer<typeof OrderSchema>;
export type Ticket = z.infer<typeof TicketSchema>;
export type Teams = z.infer<typeof TeamsSchema>;
export type UserRecord = z.infer<typeof UserSchema>;
export type WebResult = z.infer<typeof WebResultSchema>;

/** Everything the mocked support backends serve. */
export interface SupportData {
  articles: Article[];
  faq: Record<string, string>;
  orders: Record<string, Order>;
  tickets: Ticket[];
  teams: Teams;
  users: Record<string, UserRecord>;
  webResults: WebResult[];
}

export async function loadSupportData(dir: string = DEFAULT_DATA_DIR): Promise<SupportData> {
  const [articles, faq, orders, tickets, teams, users, webResults] = await Promise.all([
    readJson(dir, "knowledge-base.json", z.array(ArticleSchema)),
    readJson(dir, "faq.json", z.record(z.string())),
    readJson(dir, "orders.json", z.record(OrderSchema)),
    readJson(dir, "tickets.json", z.array(TicketSchema)),
    readJson(dir, "teams.json", TeamsSchema),
    readJson(dir, "users.json", z.record(UserSchema)),
    readJson(dir, "web-results.json", z.array(WebResultSchema)),
  ]);
  return { articles, faq, orders, tickets, teams, users, webResults };
}

async function readJson<S extends z.ZodTypeAny>(dir: string, file: string, schema: S): Promise<z.output<S>> {
  const fullPath = path.join(dir, file);
  const raw: unknown = JSON.parse(await fs.readFile(fullPath, "utf8"));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid fixture ${fullPath}: ${parsed.error.message}`);
  }
  return parsed.data;
}
